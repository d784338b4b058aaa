/**
 * ReflectionDistributor (consumed interface)
 * Purpose: spend the reflection share of a transfer fee. How holders are rewarded is up to the implementation,
 * but every unit it moves must go through the ledger so supply is conserved.
 * Runs inside the orchestrator's atomic unit; throwing aborts the whole transfer.
 */
import { Address } from '@feegate/dto'
import { Ledger } from './Ledger'

export type ReflectionCtx = {
  ledger: Ledger
  /** account paying the reflection share (the transfer sender) */
  from: Address
  recipient: Address
  amount: bigint
}

export type ReflectionPayout = { to: Address; amount: bigint }

export interface ReflectionDistributor {
  distribute(ctx: ReflectionCtx): ReflectionPayout[]
}
