/**
 * InMemoryLedger
 * Map-backed implementation of the Ledger seam. Non-persistent; used by createFeeToken and the test-suites.
 * atomic() snapshots balances, allowances and supply and restores them if the unit of work throws,
 * which also makes nested units roll back independently.
 */
import { Address } from '@feegate/dto'
import { assertUint256, checkedAdd } from '@feegate/math'
import { reject } from '@feegate/reasons'
import { Ledger } from '../interfaces/Ledger'

type Snapshot = {
  balances: Map<Address, bigint>
  allowances: Map<string, bigint>
  supply: bigint
}

export class InMemoryLedger implements Ledger {
  private balances: Map<Address, bigint> = new Map()
  private allowances: Map<string, bigint> = new Map()
  private supply = 0n

  private static allowanceKey(owner: Address, spender: Address): string {
    return `${owner}:${spender}`
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n
  }

  totalSupply(): bigint {
    return this.supply
  }

  /** Accounts holding a non-zero balance, in first-credit order. */
  holders(): Address[] {
    return [...this.balances.entries()].filter(([, b]) => b > 0n).map(([a]) => a)
  }

  /** Initial issuance only; the fee paths never mint. */
  mint(to: Address, amount: bigint): void {
    const supply = checkedAdd(this.supply, amount)
    this.balances.set(to, checkedAdd(this.balanceOf(to), amount))
    this.supply = supply
  }

  debitCredit(from: Address, to: Address, amount: bigint): void {
    assertUint256(amount)
    const fromBalance = this.balanceOf(from)
    if (fromBalance < amount) {
      reject('LEDGER_INSUFFICIENT_BALANCE', {
        context: { account: from, balance: fromBalance.toString(), needed: amount.toString() }
      })
    }
    this.balances.set(from, fromBalance - amount)
    // read after the debit so a self-transfer nets to zero
    this.balances.set(to, checkedAdd(this.balanceOf(to), amount))
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.allowances.get(InMemoryLedger.allowanceKey(owner, spender)) ?? 0n
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(InMemoryLedger.allowanceKey(owner, spender), assertUint256(amount))
  }

  increaseAllowance(owner: Address, spender: Address, addedValue: bigint): void {
    this.approve(owner, spender, checkedAdd(this.allowance(owner, spender), addedValue))
  }

  decreaseAllowance(owner: Address, spender: Address, subtractedValue: bigint): void {
    assertUint256(subtractedValue)
    const current = this.allowance(owner, spender)
    if (current < subtractedValue) {
      reject('LEDGER_INSUFFICIENT_ALLOWANCE', {
        context: { owner, spender, allowance: current.toString(), needed: subtractedValue.toString() }
      })
    }
    this.approve(owner, spender, current - subtractedValue)
  }

  atomic<T>(work: () => T): T {
    const snapshot = this.snapshot()
    try {
      return work()
    } catch (e) {
      this.restore(snapshot)
      throw e
    }
  }

  private snapshot(): Snapshot {
    return { balances: new Map(this.balances), allowances: new Map(this.allowances), supply: this.supply }
  }

  private restore(s: Snapshot): void {
    this.balances = s.balances
    this.allowances = s.allowances
    this.supply = s.supply
  }
}

export default InMemoryLedger
