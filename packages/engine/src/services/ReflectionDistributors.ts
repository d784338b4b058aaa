/**
 * Reflection distributors
 * - PoolReflectionDistributor: parks the whole share on one pool account.
 * - HolderReflectionDistributor: splits the share pro-rata over eligible holders' balances.
 *   Truncation dust and the whole share when nobody is eligible stay with the payer.
 */
import { Address } from '@feegate/dto'
import { mulDiv } from '@feegate/math'
import { ReflectionCtx, ReflectionDistributor, ReflectionPayout } from '../interfaces/ReflectionDistributor'

export class PoolReflectionDistributor implements ReflectionDistributor {
  constructor(private readonly pool: Address) {}

  distribute(ctx: ReflectionCtx): ReflectionPayout[] {
    if (ctx.amount === 0n) return []
    ctx.ledger.debitCredit(ctx.from, this.pool, ctx.amount)
    return [{ to: this.pool, amount: ctx.amount }]
  }
}

export type HolderSource = {
  holders: () => Address[]
  isEligible?: (account: Address) => boolean
}

export class HolderReflectionDistributor implements ReflectionDistributor {
  constructor(private readonly source: HolderSource) {}

  distribute(ctx: ReflectionCtx): ReflectionPayout[] {
    if (ctx.amount === 0n) return []
    const eligible = this.source
      .holders()
      .filter((a) => a !== ctx.from && a !== ctx.recipient)
      .filter((a) => this.source.isEligible?.(a) ?? true)
      .map((a) => ({ account: a, balance: ctx.ledger.balanceOf(a) }))
      .filter((h) => h.balance > 0n)

    const total = eligible.reduce((sum, h) => sum + h.balance, 0n)
    if (total === 0n) return []

    const payouts: ReflectionPayout[] = []
    for (const h of eligible) {
      const share = mulDiv(ctx.amount, h.balance, total)
      if (share === 0n) continue
      ctx.ledger.debitCredit(ctx.from, h.account, share)
      payouts.push({ to: h.account, amount: share })
    }
    return payouts
  }
}
