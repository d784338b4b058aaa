/**
 * TransferOrchestrator
 * - one transfer at a time: a non-reentrant lock is held for the whole of executeTransfer
 * - guard -> quote -> ledger legs, all legs inside a single ledger.atomic unit
 * - the cooldown stamp and the allowance spend are the last writes of that unit
 * - events are buffered and published only after the unit commits
 */
import { ulid } from 'ulid'
import { Address, FeatureName, FeeComponent, FeeLegs, TokenEvent } from '@feegate/dto'
import { assertUint256 } from '@feegate/math'
import { reject } from '@feegate/reasons'
import { Clock } from '../interfaces/Clock'
import { EventSink } from '../interfaces/EventSink'
import { Ledger } from '../interfaces/Ledger'
import { ReflectionDistributor, ReflectionPayout } from '../interfaces/ReflectionDistributor'
import { guardTransfer } from '../stages/guard'
import { quoteTransfer } from '../stages/quote'
import { countFeeLeg, countTransfer } from '../utils/metrics'
import { getLogger, logTransfer } from '../utils/logger'
import { PolicyRegistry } from './PolicyRegistry'
import { ReentrancyGuard } from './ReentrancyGuard'

export type FeeDestinations = {
  /** token's own holding account; receives the liquidity leg */
  liquidity: Address
  marketing: Address
  burn: Address
}

export type OrchestratorDeps = {
  ledger: Ledger
  registry: PolicyRegistry
  sink: EventSink
  clock: Clock
  reflection: ReflectionDistributor
  destinations: FeeDestinations
  lock?: ReentrancyGuard
}

export type TransferRequest = {
  sender: Address
  recipient: Address
  amount: bigint
  /** set for transferFrom: the account spending `sender`'s allowance */
  spender?: Address
}

export type TransferReceipt = {
  id: string
  sender: Address
  recipient: Address
  spender?: Address
  amount: bigint
  netAmount: bigint
  totalFee: bigint
  surchargePercent: number
  legs: FeeLegs
  reflections: ReflectionPayout[]
  /** truncation dust left with the sender */
  remainder: bigint
  at: number
}

export class TransferOrchestrator {
  private readonly lock: ReentrancyGuard

  constructor(private readonly deps: OrchestratorDeps) {
    this.lock = deps.lock ?? new ReentrancyGuard()
  }

  get inProgress(): boolean {
    return this.lock.locked
  }

  executeTransfer(req: TransferRequest): TransferReceipt {
    return this.lock.run(() => this.execute(req))
  }

  private execute(req: TransferRequest): TransferReceipt {
    const { ledger, registry, sink, clock, destinations } = this.deps
    const { sender, recipient, spender } = req
    const amount = assertUint256(req.amount)
    const now = clock.now()

    if (spender !== undefined) {
      const allowed = ledger.allowance(sender, spender)
      if (allowed < amount) {
        reject('LEDGER_INSUFFICIENT_ALLOWANCE', { context: { owner: sender, spender, allowance: allowed.toString(), needed: amount.toString() } })
      }
    }

    const outcome = guardTransfer({ registry, ledger, sender, recipient, amount, now })
    const quote = quoteTransfer(registry, outcome, amount)

    const events: TokenEvent[] = []
    const routed: FeeComponent[] = []
    let reflections: ReflectionPayout[] = []

    const route = (component: FeeComponent, to: Address) => {
      const value = quote.legs[component]
      if (value === 0n) return
      ledger.debitCredit(sender, to, value)
      events.push({ type: 'Transfer', from: sender, to, amount: value })
      routed.push(component)
    }

    ledger.atomic(() => {
      ledger.debitCredit(sender, recipient, quote.netAmount)
      events.push({ type: 'Transfer', from: sender, to: recipient, amount: quote.netAmount })

      if (quote.legs[FeeComponent.REFLECTION] > 0n) {
        reflections = this.deps.reflection.distribute({
          ledger,
          from: sender,
          recipient,
          amount: quote.legs[FeeComponent.REFLECTION]
        })
        for (const p of reflections) events.push({ type: 'Transfer', from: sender, to: p.to, amount: p.amount })
        routed.push(FeeComponent.REFLECTION)
      }

      route(FeeComponent.LIQUIDITY, destinations.liquidity)
      route(FeeComponent.MARKETING, destinations.marketing)
      if (registry.isFeatureEnabled(FeatureName.AUTO_BURN) && quote.legs[FeeComponent.BURN] > 0n) {
        route(FeeComponent.BURN, destinations.burn)
        events.push({ type: 'TokensBurned', from: sender, amount: quote.legs[FeeComponent.BURN] })
      }

      if (spender !== undefined) ledger.decreaseAllowance(sender, spender, amount)
      if (outcome.tradeStamp) registry.recordTrade(outcome.tradeStamp.account, outcome.tradeStamp.at)
    })

    // the transfer has committed; a failing sink must not turn it into an error
    for (const e of events) {
      try {
        sink.emit(e)
      } catch (err) {
        getLogger().warn({ event: 'events.sink_failed', type: e.type, error: err instanceof Error ? err.message : String(err) })
      }
    }
    for (const c of routed) countFeeLeg(c)
    countTransfer(spender === undefined ? 'transfer' : 'transferFrom')

    const receipt: TransferReceipt = {
      id: ulid(),
      sender,
      recipient,
      spender,
      amount,
      netAmount: quote.netAmount,
      totalFee: quote.totalFee,
      surchargePercent: quote.surchargePercent,
      legs: quote.legs,
      reflections,
      remainder: quote.remainder,
      at: now
    }
    logTransfer({
      receiptId: receipt.id,
      sender,
      recipient,
      spender,
      amount,
      netAmount: receipt.netAmount,
      totalFee: receipt.totalFee,
      surchargePercent: receipt.surchargePercent,
      at: now
    })
    return receipt
  }
}

export default TransferOrchestrator
