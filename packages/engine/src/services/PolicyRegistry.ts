/**
 * PolicyRegistry
 * Single owned configuration object read by the guard and the fee calculator on every transfer.
 * Mutation is confined to the methods below; ownership is checked by the caller (AccessGate) before they run.
 *
 * Notifications go to the injected EventSink after the state change has been applied.
 */
import {
  Address,
  BlacklistPolicy,
  FeatureName,
  FeatureSet,
  FeeSchedule,
  Limits,
  PolicySnapshot,
  TokenVariant,
  TradingState
} from '@feegate/dto'
import { assertUint256, validateFeeSchedule } from '@feegate/math'
import { reject } from '@feegate/reasons'
import { TradingStateMachine } from '../fsm/stateMachine'
import { EventSink } from '../interfaces/EventSink'

export type PolicyRegistryInit = {
  variant: TokenVariant
  features: FeatureSet
  fees: FeeSchedule
  limits: Limits
  blacklistPolicy: BlacklistPolicy
}

// toggles the standard variant does not carry; names for them are treated as unknown
const REFLECTION_ONLY: FeatureName[] = [FeatureName.REFLECTION, FeatureName.AUTO_LIQUIDITY]

const FEATURE_ALIASES: Map<string, FeatureName> = new Map(
  Object.values(FeatureName).flatMap((name): Array<[string, FeatureName]> => [
    [name, name],
    [`${name}Enabled`, name]
  ])
)

/**
 * resolveFeatureName
 * Maps a toggle name (enum value or its legacy `<name>Enabled` spelling) to a FeatureName for the given variant.
 * Returns undefined for anything the variant does not know.
 */
export function resolveFeatureName(name: string, variant: TokenVariant): FeatureName | undefined {
  const resolved = FEATURE_ALIASES.get(name)
  if (resolved === undefined) return undefined
  if (variant === TokenVariant.STANDARD && REFLECTION_ONLY.includes(resolved)) return undefined
  return resolved
}

function pinVariant(features: FeatureSet, variant: TokenVariant): FeatureSet {
  if (variant === TokenVariant.REFLECTION) return { ...features }
  return { ...features, [FeatureName.REFLECTION]: false, [FeatureName.AUTO_LIQUIDITY]: true }
}

function validateLimits(limits: Limits): void {
  assertUint256(limits.maxTransactionAmount, 'maxTransactionAmount')
  assertUint256(limits.maxWalletSize, 'maxWalletSize')
  if (!Number.isSafeInteger(limits.cooldownTime) || limits.cooldownTime < 0) {
    reject('CONFIG_INVALID', { message: 'cooldownTime must be a whole number of seconds', context: { cooldownTime: String(limits.cooldownTime) } })
  }
}

export class PolicyRegistry {
  readonly variant: TokenVariant
  readonly blacklistPolicy: BlacklistPolicy

  private features: FeatureSet
  private fees: FeeSchedule
  private limits: Limits
  private tradingState = TradingState.DISABLED
  private launchedAtTs?: number
  private readonly fsm = new TradingStateMachine()

  private blacklisted: Set<Address> = new Set()
  // append-only; unblacklisting never removes from here
  private blacklistHistory: Address[] = []
  private excluded: Set<Address> = new Set()
  private lastTrade: Map<Address, number> = new Map()

  constructor(init: PolicyRegistryInit, private readonly sink: EventSink) {
    validateFeeSchedule(init.fees, init.variant)
    validateLimits(init.limits)
    this.variant = init.variant
    this.blacklistPolicy = { ...init.blacklistPolicy }
    this.features = pinVariant(init.features, init.variant)
    this.fees = { ...init.fees }
    this.limits = { ...init.limits }
  }

  // ---- queries -------------------------------------------------------------

  getFeatures(): FeatureSet {
    return { ...this.features }
  }

  isFeatureEnabled(name: FeatureName): boolean {
    return this.features[name]
  }

  getFees(): FeeSchedule {
    return { ...this.fees }
  }

  getLimits(): Limits {
    return { ...this.limits }
  }

  getTradingState(): TradingState {
    return this.tradingState
  }

  isTradingEnabled(): boolean {
    return this.tradingState === TradingState.ENABLED
  }

  getLaunchedAt(): number | undefined {
    return this.launchedAtTs
  }

  isBlacklisted(account: Address): boolean {
    return this.blacklisted.has(account)
  }

  /** Every address ever blacklisted, including ones since cleared. */
  getBlacklist(): Address[] {
    return [...this.blacklistHistory]
  }

  isExcludedFromFees(account: Address): boolean {
    return this.excluded.has(account)
  }

  lastTradeOf(account: Address): number {
    return this.lastTrade.get(account) ?? 0
  }

  snapshot(): PolicySnapshot {
    return {
      variant: this.variant,
      features: this.getFeatures(),
      fees: this.getFees(),
      limits: this.getLimits(),
      tradingState: this.tradingState,
      launchedAt: this.launchedAtTs
    }
  }

  // ---- mutators ------------------------------------------------------------

  /**
   * setFeatureFlag
   * Unknown names change nothing but are still announced, flagged `recognized: false`.
   * Returns whether the name matched a toggle.
   */
  setFeatureFlag(name: string, enabled: boolean): boolean {
    const feature = resolveFeatureName(name, this.variant)
    if (feature !== undefined) this.features[feature] = enabled
    this.sink.emit({ type: 'FeatureToggled', feature: feature ?? name, enabled, recognized: feature !== undefined })
    return feature !== undefined
  }

  setFees(fees: FeeSchedule): void {
    validateFeeSchedule(fees, this.variant)
    const before = this.getFees()
    this.fees = { ...fees }
    this.sink.emit({ type: 'FeesUpdated', before, after: this.getFees() })
  }

  setLimits(limits: Limits): void {
    validateLimits(limits)
    const before = this.getLimits()
    this.limits = { ...limits }
    this.sink.emit({ type: 'LimitsUpdated', before, after: this.getLimits() })
  }

  setBlacklisted(account: Address, flag: boolean): void {
    if (this.blacklistPolicy.mutation === 'featureGated') {
      if (!this.features[FeatureName.BLACKLIST]) {
        reject('CONFIG_INVALID', { message: 'Blacklist feature disabled' })
      }
      if (flag) this.blacklistHistory.push(account)
    } else if (flag && !this.blacklistHistory.includes(account)) {
      this.blacklistHistory.push(account)
    }

    if (flag) this.blacklisted.add(account)
    else this.blacklisted.delete(account)
    this.sink.emit({ type: 'AddressBlacklisted', account, blacklisted: flag })
  }

  setFeeExcluded(account: Address, flag: boolean): void {
    if (flag) this.excluded.add(account)
    else this.excluded.delete(account)
    this.sink.emit({ type: 'FeeExclusionUpdated', account, excluded: flag })
  }

  enableTrading(now: number): void {
    if (!this.fsm.can(this.tradingState, TradingState.ENABLED)) {
      reject('CONFIG_ALREADY_ENABLED', { context: { launchedAt: this.launchedAtTs ?? 0 } })
    }
    this.tradingState = TradingState.ENABLED
    this.launchedAtTs = now
    this.sink.emit({ type: 'TradingEnabled', launchedAt: now })
  }

  /** Called by the orchestrator as the last write of a committed transfer. */
  recordTrade(account: Address, at: number): void {
    this.lastTrade.set(account, at)
  }
}

export default PolicyRegistry
