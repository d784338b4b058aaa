import { getAddress, isAddress, ZeroAddress } from 'ethers'
import { Address } from '@feegate/dto'
import { reject } from '@feegate/reasons'

/** Canonical burn sink; nothing ever debits it. */
export const BURN_ADDRESS: Address = getAddress('0x000000000000000000000000000000000000dead')

export const ZERO_ADDRESS: Address = ZeroAddress

/**
 * normalizeAddress
 * Returns the checksummed form so lookups are case-insensitive. Malformed input is rejected as GUARD_INVALID_ADDRESS.
 */
export function normalizeAddress(value: string, field = 'address'): Address {
  if (!isAddress(value)) reject('GUARD_INVALID_ADDRESS', { message: `Invalid ${field}`, context: { field } })
  return getAddress(value)
}

export function isZeroAddress(account: Address): boolean {
  return account === ZERO_ADDRESS
}
