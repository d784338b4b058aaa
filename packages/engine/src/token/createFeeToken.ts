/**
 * createFeeToken
 * Wires ledger, registry, gate, orchestrator and event bus from one validated configuration.
 * The whole supply goes to the owner; owner, token holding account and marketing wallet start fee-excluded.
 */
import { parseTokenConfig, TokenConfig, TokenConfigInput } from '../config'
import { Clock } from '../interfaces/Clock'
import { ReflectionDistributor } from '../interfaces/ReflectionDistributor'
import { AccessGate } from '../services/AccessGate'
import { InMemoryLedger } from '../services/InMemoryLedger'
import { PolicyRegistry } from '../services/PolicyRegistry'
import { HolderReflectionDistributor, PoolReflectionDistributor } from '../services/ReflectionDistributors'
import { TokenEventBus } from '../services/TokenEventBus'
import { TransferOrchestrator } from '../services/TransferOrchestrator'
import { ZERO_ADDRESS } from '../utils/address'
import { systemClock } from '../utils/clock'
import { FeeToken } from './FeeToken'

export type FeeTokenOverrides = {
  ledger?: InMemoryLedger
  events?: TokenEventBus
  clock?: Clock
  reflection?: ReflectionDistributor
}

export type FeeTokenBundle = {
  token: FeeToken
  config: TokenConfig
  ledger: InMemoryLedger
  registry: PolicyRegistry
  orchestrator: TransferOrchestrator
}

export function createFeeToken(input: TokenConfigInput, overrides: FeeTokenOverrides = {}): FeeTokenBundle {
  const config = parseTokenConfig(input)
  const ledger = overrides.ledger ?? new InMemoryLedger()
  const events = overrides.events ?? new TokenEventBus()
  const clock = overrides.clock ?? systemClock

  const registry = new PolicyRegistry(
    {
      variant: config.variant,
      features: config.features,
      fees: config.fees,
      limits: config.limits,
      blacklistPolicy: config.blacklistPolicy
    },
    events
  )
  const access = new AccessGate(config.owner, events)

  const reflection =
    overrides.reflection ??
    (config.reflectionPool !== undefined
      ? new PoolReflectionDistributor(config.reflectionPool)
      : new HolderReflectionDistributor({
          holders: () => ledger.holders(),
          isEligible: (a) => !registry.isExcludedFromFees(a) && a !== config.burnAddress
        }))

  const orchestrator = new TransferOrchestrator({
    ledger,
    registry,
    sink: events,
    clock,
    reflection,
    destinations: { liquidity: config.tokenAddress, marketing: config.marketingWallet, burn: config.burnAddress }
  })

  ledger.mint(config.owner, config.totalSupply)
  events.emit({ type: 'Transfer', from: ZERO_ADDRESS, to: config.owner, amount: config.totalSupply })
  for (const account of [config.owner, config.tokenAddress, config.marketingWallet]) {
    registry.setFeeExcluded(account, true)
  }

  const token = new FeeToken(
    { name: config.name, symbol: config.symbol, decimals: config.decimals },
    { ledger, registry, access, orchestrator, events, clock, burnAddress: config.burnAddress }
  )
  return { token, config, ledger, registry, orchestrator }
}

export default createFeeToken
