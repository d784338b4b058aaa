/**
 * Ledger (consumed interface)
 * Purpose: owns balances, total supply and allowances. The orchestrator depends on this seam, never on an implementation.
 * Failures surface as ReasonedRejection (`LEDGER_*` codes).
 */
import { Address } from '@feegate/dto'

export interface Ledger {
  balanceOf(account: Address): bigint
  totalSupply(): bigint

  /** Move `amount` from one account to another; fails LEDGER_INSUFFICIENT_BALANCE when `from` is short. */
  debitCredit(from: Address, to: Address, amount: bigint): void

  allowance(owner: Address, spender: Address): bigint
  approve(owner: Address, spender: Address, amount: bigint): void
  /** Raise an allowance; `addedValue` and the result must both be uint256. */
  increaseAllowance(owner: Address, spender: Address, addedValue: bigint): void
  decreaseAllowance(owner: Address, spender: Address, subtractedValue: bigint): void

  /**
   * atomic
   * Runs `work` as one unit: if it throws, every ledger write made inside is undone before the error propagates.
   */
  atomic<T>(work: () => T): T
}
