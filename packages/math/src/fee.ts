/**
 * fee.ts
 * Transfer fee accounting; pure functions only (no I/O, no side-effects).
 *
 * All rates are whole percents. Fees round down and whatever the truncation drops
 * stays with the sender, so sender debit = netAmount + sum(legs) <= amount.
 */
import { FeatureName, FeatureSet, FeeComponent, FeeLegs, FeeQuote, FeeSchedule, Limits, TokenVariant } from '@feegate/dto'
import { reject } from '@feegate/reasons'
import { assertUint256, mulDiv } from './uint256'

export const MAX_TOTAL_FEE_PERCENT = 25
export const WHALE_SURCHARGE_PERCENT = 3
export const WHALE_THRESHOLD_PERCENT = 50

const FEE_FIELD: Record<FeeComponent, keyof FeeSchedule> = {
  [FeeComponent.REFLECTION]: 'reflectionFee',
  [FeeComponent.LIQUIDITY]: 'liquidityFee',
  [FeeComponent.MARKETING]: 'marketingFee',
  [FeeComponent.BURN]: 'burnFee',
}

export type FeeInput = {
  variant: TokenVariant
  features: FeatureSet
  fees: FeeSchedule
  limits: Pick<Limits, 'maxTransactionAmount'>
  senderExcluded: boolean
  recipientExcluded: boolean
  amount: bigint
}

export function zeroLegs(): FeeLegs {
  return {
    [FeeComponent.REFLECTION]: 0n,
    [FeeComponent.LIQUIDITY]: 0n,
    [FeeComponent.MARKETING]: 0n,
    [FeeComponent.BURN]: 0n,
  }
}

export function componentPercent(fees: FeeSchedule, component: FeeComponent): number {
  return fees[FEE_FIELD[component]]
}

/**
 * enabledComponents
 * Which components are collected under the current toggles. Marketing is always on; the standard
 * variant has no reflection component and always collects liquidity.
 */
export function enabledComponents(variant: TokenVariant, features: FeatureSet): FeeComponent[] {
  const out: FeeComponent[] = []
  if (variant === TokenVariant.REFLECTION && features[FeatureName.REFLECTION]) out.push(FeeComponent.REFLECTION)
  if (variant === TokenVariant.STANDARD || features[FeatureName.AUTO_LIQUIDITY]) out.push(FeeComponent.LIQUIDITY)
  out.push(FeeComponent.MARKETING)
  if (features[FeatureName.AUTO_BURN]) out.push(FeeComponent.BURN)
  return out
}

export function feeScheduleTotal(fees: FeeSchedule): number {
  return fees.reflectionFee + fees.liquidityFee + fees.marketingFee + fees.burnFee
}

/**
 * validateFeeSchedule
 * The 25% ceiling is checked here, at update time. Transfers may still exceed it through the whale surcharge.
 */
export function validateFeeSchedule(fees: FeeSchedule, variant: TokenVariant): void {
  for (const [field, value] of Object.entries(fees)) {
    if (!Number.isInteger(value) || value < 0 || value > 255) {
      reject('CONFIG_INVALID', { message: `Fee ${field} must be a whole percent`, context: { field, value: String(value) } })
    }
  }
  if (variant === TokenVariant.STANDARD && fees.reflectionFee !== 0) {
    reject('CONFIG_INVALID', { message: 'Reflection fee not supported by this token', context: { reflectionFee: fees.reflectionFee } })
  }
  const total = feeScheduleTotal(fees)
  if (total > MAX_TOTAL_FEE_PERCENT) {
    reject('CONFIG_INVALID', { message: 'Total fee too high', context: { total, max: MAX_TOTAL_FEE_PERCENT } })
  }
}

/** Strictly above half the max transaction amount, using truncating division for the threshold. */
export function isWhaleTransfer(amount: bigint, maxTransactionAmount: bigint): boolean {
  return amount > (maxTransactionAmount * BigInt(WHALE_THRESHOLD_PERCENT)) / 100n
}

export function computeFee(input: FeeInput): FeeQuote {
  const amount = assertUint256(input.amount)
  const legs = zeroLegs()

  // excluded parties pay nothing, which also skips the whale surcharge
  if (input.senderExcluded || input.recipientExcluded) {
    return { exempt: true, ratePercent: 0, surchargePercent: 0, totalFee: 0n, legs, remainder: 0n, netAmount: amount }
  }

  const components = enabledComponents(input.variant, input.features)
  const basePercent = components.reduce((sum, c) => sum + componentPercent(input.fees, c), 0)
  if (basePercent === 0) {
    return { exempt: false, ratePercent: 0, surchargePercent: 0, totalFee: 0n, legs, remainder: 0n, netAmount: amount }
  }

  const surchargePercent =
    input.features[FeatureName.ANTI_WHALE] && isWhaleTransfer(amount, input.limits.maxTransactionAmount)
      ? WHALE_SURCHARGE_PERCENT
      : 0
  const ratePercent = basePercent + surchargePercent
  const totalFee = mulDiv(amount, BigInt(ratePercent), 100n)
  if (totalFee > amount) {
    reject('CONFIG_INVALID', { message: 'Fee exceeds transfer amount', context: { ratePercent } })
  }

  let allocated = 0n
  for (const c of components) {
    legs[c] = mulDiv(totalFee, BigInt(componentPercent(input.fees, c)), BigInt(basePercent))
    allocated += legs[c]
  }

  return {
    exempt: false,
    ratePercent,
    surchargePercent,
    totalFee,
    legs,
    remainder: totalFee - allocated,
    netAmount: amount - totalFee,
  }
}
