/* Fee quote stage: feeds the current policy snapshot and the guard's exclusion lookups to the pure calculator. */

import { FeeQuote } from '@feegate/dto'
import { computeFee } from '@feegate/math'
import { PolicyRegistry } from '../services/PolicyRegistry'
import { GuardOutcome } from './guard'

export function quoteTransfer(registry: PolicyRegistry, outcome: GuardOutcome, amount: bigint): FeeQuote {
  const policy = registry.snapshot()
  return computeFee({
    variant: policy.variant,
    features: policy.features,
    fees: policy.fees,
    limits: policy.limits,
    senderExcluded: outcome.senderExcluded,
    recipientExcluded: outcome.recipientExcluded,
    amount
  })
}

export default quoteTransfer
