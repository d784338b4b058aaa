import { FeatureName, FeeComponent, TokenVariant, TradingState } from './enums'

/** Checksummed account address. */
export type Address = string

export type FeatureSet = Record<FeatureName, boolean>

/** Whole-percent fee components. The standard variant keeps `reflectionFee` at 0. */
export interface FeeSchedule {
  reflectionFee: number
  liquidityFee: number
  marketingFee: number
  burnFee: number
}

export interface Limits {
  maxTransactionAmount: bigint
  maxWalletSize: bigint
  /** seconds */
  cooldownTime: number
}

/**
 * How blacklisting behaves.
 * - enforcement `always`: stored flags block transfers whatever the feature toggle says
 * - enforcement `whenEnabled`: stored flags only block while the blacklist feature is on
 * - mutation `appendOnce`: no feature precondition, history records an address once
 * - mutation `featureGated`: requires the blacklist feature, history appends on every set
 */
export interface BlacklistPolicy {
  enforcement: 'always' | 'whenEnabled'
  mutation: 'appendOnce' | 'featureGated'
}

export type FeeLegs = Record<FeeComponent, bigint>

export interface FeeQuote {
  exempt: boolean
  /** base rate plus any whale surcharge, in whole percent */
  ratePercent: number
  surchargePercent: number
  totalFee: bigint
  legs: FeeLegs
  /** part of totalFee not allocated to any leg; stays with the sender */
  remainder: bigint
  netAmount: bigint
}

export interface PolicySnapshot {
  variant: TokenVariant
  features: FeatureSet
  fees: FeeSchedule
  limits: Limits
  tradingState: TradingState
  launchedAt?: number
}

export type TokenEvent =
  | { type: 'Transfer'; from: Address; to: Address; amount: bigint }
  | { type: 'Approval'; owner: Address; spender: Address; amount: bigint }
  | { type: 'FeatureToggled'; feature: string; enabled: boolean; recognized: boolean }
  | { type: 'FeesUpdated'; before: FeeSchedule; after: FeeSchedule }
  | { type: 'LimitsUpdated'; before: Limits; after: Limits }
  | { type: 'AddressBlacklisted'; account: Address; blacklisted: boolean }
  | { type: 'FeeExclusionUpdated'; account: Address; excluded: boolean }
  | { type: 'TradingEnabled'; launchedAt: number }
  | { type: 'TokensBurned'; from: Address; amount: bigint }
  | { type: 'Paused'; account: Address }
  | { type: 'Unpaused'; account: Address }

export type TokenEventType = TokenEvent['type']
