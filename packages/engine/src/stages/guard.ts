/* Transfer guard stage. Checks run strictly in this order and the first failure throws:
     1. null identities           GUARD_INVALID_ADDRESS
     2. blacklist                 GUARD_BLACKLISTED
     3. trading gate              GUARD_TRADING_NOT_ENABLED
     4. anti-whale caps           GUARD_EXCEEDS_MAX_TRANSACTION / GUARD_EXCEEDS_MAX_WALLET
     5. cooldown                  GUARD_COOLDOWN_ACTIVE

   The guard never writes. A passing cooldown check yields a pending trade stamp that the
   orchestrator commits only together with the ledger legs.
*/

import { Address, FeatureName } from '@feegate/dto'
import { reject } from '@feegate/reasons'
import { Ledger } from '../interfaces/Ledger'
import { PolicyRegistry } from '../services/PolicyRegistry'
import { isZeroAddress } from '../utils/address'

export type GuardCtx = {
  registry: PolicyRegistry
  ledger: Ledger
  sender: Address
  recipient: Address
  amount: bigint
  now: number
}

export type TradeStamp = { account: Address; at: number }

export type GuardOutcome = {
  senderExcluded: boolean
  recipientExcluded: boolean
  tradeStamp?: TradeStamp
}

export function guardTransfer(ctx: GuardCtx): GuardOutcome {
  const { registry, ledger, sender, recipient, amount, now } = ctx

  if (isZeroAddress(sender) || isZeroAddress(recipient)) {
    reject('GUARD_INVALID_ADDRESS', { context: { sender, recipient } })
  }

  const enforceBlacklist =
    registry.blacklistPolicy.enforcement === 'always' || registry.isFeatureEnabled(FeatureName.BLACKLIST)
  if (enforceBlacklist && (registry.isBlacklisted(sender) || registry.isBlacklisted(recipient))) {
    reject('GUARD_BLACKLISTED', { context: { sender, recipient } })
  }

  const senderExcluded = registry.isExcludedFromFees(sender)
  const recipientExcluded = registry.isExcludedFromFees(recipient)
  if (!registry.isTradingEnabled() && !senderExcluded && !recipientExcluded) {
    reject('GUARD_TRADING_NOT_ENABLED')
  }

  if (registry.isFeatureEnabled(FeatureName.ANTI_WHALE)) {
    const { maxTransactionAmount, maxWalletSize } = registry.getLimits()
    if (amount > maxTransactionAmount) {
      reject('GUARD_EXCEEDS_MAX_TRANSACTION', { context: { amount: amount.toString(), max: maxTransactionAmount.toString() } })
    }
    const projected = ledger.balanceOf(recipient) + amount
    if (projected > maxWalletSize) {
      reject('GUARD_EXCEEDS_MAX_WALLET', { context: { projected: projected.toString(), max: maxWalletSize.toString() } })
    }
  }

  let tradeStamp: TradeStamp | undefined
  if (registry.isFeatureEnabled(FeatureName.COOLDOWN) && !senderExcluded) {
    const readyAt = registry.lastTradeOf(sender) + registry.getLimits().cooldownTime
    if (now < readyAt) {
      reject('GUARD_COOLDOWN_ACTIVE', { context: { now, readyAt } })
    }
    tradeStamp = { account: sender, at: now }
  }

  return { senderExcluded, recipientExcluded, tradeStamp }
}

export default guardTransfer
