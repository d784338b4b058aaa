/**
 * FeeToken
 * ERC-20 style facade over the ledger, the policy registry and the orchestrator.
 * Every acting method takes the calling address first; addresses are normalized on the way in.
 *
 * Failures are logged once here (warn + rejection counter) and rethrown unchanged.
 */
import {
  Address,
  FeatureName,
  FeatureSet,
  FeeSchedule,
  Limits,
  TradingState
} from '@feegate/dto'
import { isRejection, reject } from '@feegate/reasons'
import { Clock } from '../interfaces/Clock'
import { Ledger } from '../interfaces/Ledger'
import { AccessGate } from '../services/AccessGate'
import { PolicyRegistry } from '../services/PolicyRegistry'
import { TokenEventBus } from '../services/TokenEventBus'
import { TransferOrchestrator, TransferReceipt } from '../services/TransferOrchestrator'
import { isZeroAddress, normalizeAddress } from '../utils/address'
import { logPolicyChange, logRejection } from '../utils/logger'
import { countAdminOp, countRejection } from '../utils/metrics'

export type TokenMetadata = {
  name: string
  symbol: string
  decimals: number
}

export type FeeTokenDeps = {
  ledger: Ledger
  registry: PolicyRegistry
  access: AccessGate
  orchestrator: TransferOrchestrator
  events: TokenEventBus
  clock: Clock
  burnAddress: Address
}

/** Fee update as accepted by updateFees; the reflection component may be omitted for standard tokens. */
export type FeeUpdate = Omit<FeeSchedule, 'reflectionFee'> & { reflectionFee?: number }

export class FeeToken {
  readonly events: TokenEventBus

  constructor(private readonly meta: TokenMetadata, private readonly deps: FeeTokenDeps) {
    this.events = deps.events
  }

  // ---- metadata / balances -------------------------------------------------

  name(): string {
    return this.meta.name
  }

  symbol(): string {
    return this.meta.symbol
  }

  decimals(): number {
    return this.meta.decimals
  }

  totalSupply(): bigint {
    return this.deps.ledger.totalSupply()
  }

  /** Supply not sitting in the burn sink. */
  circulatingSupply(): bigint {
    return this.deps.ledger.totalSupply() - this.deps.ledger.balanceOf(this.deps.burnAddress)
  }

  balanceOf(account: string): bigint {
    return this.deps.ledger.balanceOf(normalizeAddress(account, 'account'))
  }

  allowance(owner: string, spender: string): bigint {
    return this.deps.ledger.allowance(normalizeAddress(owner, 'owner'), normalizeAddress(spender, 'spender'))
  }

  // ---- allowances ----------------------------------------------------------

  approve(caller: string, spender: string, amount: bigint): boolean {
    return this.run('approve', caller, () => {
      const [owner, to] = this.approvalParties(caller, spender)
      this.deps.ledger.approve(owner, to, amount)
      this.deps.events.emit({ type: 'Approval', owner, spender: to, amount })
      return true
    })
  }

  increaseAllowance(caller: string, spender: string, addedValue: bigint): boolean {
    return this.run('increaseAllowance', caller, () => {
      const [owner, to] = this.approvalParties(caller, spender)
      this.deps.ledger.increaseAllowance(owner, to, addedValue)
      this.deps.events.emit({ type: 'Approval', owner, spender: to, amount: this.deps.ledger.allowance(owner, to) })
      return true
    })
  }

  decreaseAllowance(caller: string, spender: string, subtractedValue: bigint): boolean {
    return this.run('decreaseAllowance', caller, () => {
      const [owner, to] = this.approvalParties(caller, spender)
      this.deps.ledger.decreaseAllowance(owner, to, subtractedValue)
      this.deps.events.emit({ type: 'Approval', owner, spender: to, amount: this.deps.ledger.allowance(owner, to) })
      return true
    })
  }

  // ---- transfers -----------------------------------------------------------

  transfer(caller: string, to: string, amount: bigint): TransferReceipt {
    return this.run('transfer', caller, () => {
      this.deps.access.assertNotPaused()
      const sender = normalizeAddress(caller, 'sender')
      const recipient = normalizeAddress(to, 'recipient')
      return this.deps.orchestrator.executeTransfer({ sender, recipient, amount })
    })
  }

  transferFrom(caller: string, from: string, to: string, amount: bigint): TransferReceipt {
    return this.run('transferFrom', caller, () => {
      this.deps.access.assertNotPaused()
      const spender = normalizeAddress(caller, 'spender')
      const sender = normalizeAddress(from, 'sender')
      const recipient = normalizeAddress(to, 'recipient')
      return this.deps.orchestrator.executeTransfer({ sender, recipient, amount, spender })
    })
  }

  // ---- administration (owner only) -----------------------------------------

  toggleFeature(caller: string, feature: FeatureName | string, enabled: boolean): boolean {
    return this.admin('toggleFeature', caller, () => {
      const recognized = this.deps.registry.setFeatureFlag(feature, enabled)
      return { result: recognized, detail: { feature, enabled, recognized } }
    })
  }

  updateFees(caller: string, fees: FeeUpdate): void {
    this.admin('updateFees', caller, () => {
      const schedule: FeeSchedule = {
        reflectionFee: fees.reflectionFee ?? 0,
        liquidityFee: fees.liquidityFee,
        marketingFee: fees.marketingFee,
        burnFee: fees.burnFee
      }
      this.deps.registry.setFees(schedule)
      return {
        result: undefined,
        detail: {
          reflectionFee: schedule.reflectionFee,
          liquidityFee: schedule.liquidityFee,
          marketingFee: schedule.marketingFee,
          burnFee: schedule.burnFee
        }
      }
    })
  }

  updateLimits(caller: string, limits: Limits): void {
    this.admin('updateLimits', caller, () => {
      this.deps.registry.setLimits(limits)
      return {
        result: undefined,
        detail: {
          maxTransactionAmount: limits.maxTransactionAmount.toString(),
          maxWalletSize: limits.maxWalletSize.toString(),
          cooldownTime: limits.cooldownTime
        }
      }
    })
  }

  setBlacklisted(caller: string, account: string, blacklisted: boolean): void {
    this.admin('setBlacklisted', caller, () => {
      const target = normalizeAddress(account, 'account')
      this.deps.registry.setBlacklisted(target, blacklisted)
      return { result: undefined, detail: { account: target, blacklisted } }
    })
  }

  setExcludedFromFees(caller: string, account: string, excluded: boolean): void {
    this.admin('setExcludedFromFees', caller, () => {
      const target = normalizeAddress(account, 'account')
      this.deps.registry.setFeeExcluded(target, excluded)
      return { result: undefined, detail: { account: target, excluded } }
    })
  }

  enableTrading(caller: string): void {
    this.admin('enableTrading', caller, () => {
      const now = this.deps.clock.now()
      this.deps.registry.enableTrading(now)
      return { result: undefined, detail: { launchedAt: now } }
    })
  }

  pause(caller: string): void {
    this.run('pause', caller, () => {
      const who = normalizeAddress(caller, 'caller')
      this.deps.access.pause(who)
      logPolicyChange({ op: 'pause', caller: who })
      countAdminOp('pause')
    })
  }

  unpause(caller: string): void {
    this.run('unpause', caller, () => {
      const who = normalizeAddress(caller, 'caller')
      this.deps.access.unpause(who)
      logPolicyChange({ op: 'unpause', caller: who })
      countAdminOp('unpause')
    })
  }

  // ---- queries -------------------------------------------------------------

  owner(): Address {
    return this.deps.access.owner()
  }

  paused(): boolean {
    return this.deps.access.isPaused()
  }

  getFeatures(): FeatureSet {
    return this.deps.registry.getFeatures()
  }

  getFees(): FeeSchedule {
    return this.deps.registry.getFees()
  }

  getLimits(): Limits {
    return this.deps.registry.getLimits()
  }

  getBlacklist(): Address[] {
    return this.deps.registry.getBlacklist()
  }

  isBlacklisted(account: string): boolean {
    return this.deps.registry.isBlacklisted(normalizeAddress(account, 'account'))
  }

  isExcludedFromFees(account: string): boolean {
    return this.deps.registry.isExcludedFromFees(normalizeAddress(account, 'account'))
  }

  tradingState(): TradingState {
    return this.deps.registry.getTradingState()
  }

  launchedAt(): number | undefined {
    return this.deps.registry.getLaunchedAt()
  }

  lastTradeOf(account: string): number {
    return this.deps.registry.lastTradeOf(normalizeAddress(account, 'account'))
  }

  // ---- internals -----------------------------------------------------------

  private approvalParties(caller: string, spender: string): [Address, Address] {
    const owner = normalizeAddress(caller, 'owner')
    const to = normalizeAddress(spender, 'spender')
    if (isZeroAddress(owner) || isZeroAddress(to)) {
      reject('GUARD_INVALID_ADDRESS', { message: 'Approve from or to the zero address' })
    }
    return [owner, to]
  }

  private admin<T>(
    op: string,
    caller: string,
    work: () => { result: T; detail: Record<string, string | number | boolean> }
  ): T {
    return this.run(op, caller, () => {
      const who = normalizeAddress(caller, 'caller')
      this.deps.access.assertOwner(who)
      const { result, detail } = work()
      logPolicyChange({ op, caller: who, detail })
      countAdminOp(op)
      return result
    })
  }

  private run<T>(op: string, caller: string, work: () => T): T {
    try {
      return work()
    } catch (e) {
      if (isRejection(e)) {
        logRejection({ op, code: e.code, caller, message: e.message, context: e.reason.context })
        countRejection(op, e.code)
      }
      throw e
    }
  }
}

export default FeeToken
