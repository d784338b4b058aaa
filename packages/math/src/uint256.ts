/**
 * uint256.ts
 * Bounded unsigned arithmetic over bigint. Every helper rejects instead of wrapping or going negative.
 */
import { reject } from '@feegate/reasons'

export const MAX_UINT256 = (1n << 256n) - 1n

export function isUint256(x: bigint): boolean {
  return x >= 0n && x <= MAX_UINT256
}

export function assertUint256(x: bigint, label = 'amount'): bigint {
  if (!isUint256(x)) reject('LEDGER_INVALID_AMOUNT', { context: { field: label, value: x.toString() } })
  return x
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  const sum = assertUint256(a) + assertUint256(b)
  if (sum > MAX_UINT256) reject('LEDGER_INVALID_AMOUNT', { message: 'uint256 overflow' })
  return sum
}

export function checkedSub(a: bigint, b: bigint): bigint {
  if (assertUint256(b) > assertUint256(a)) reject('LEDGER_INVALID_AMOUNT', { message: 'uint256 underflow' })
  return a - b
}

/**
 * mulDiv
 * floor(a * b / d). bigint keeps the intermediate product exact, so only the result needs bounding.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  if (d <= 0n) reject('CONFIG_INVALID', { message: 'division by zero' })
  return assertUint256((assertUint256(a) * assertUint256(b)) / d, 'mulDiv')
}
