/**
 * feegate engine public surface.
 */
export * from './config'
export * from './interfaces/Clock'
export * from './interfaces/EventSink'
export * from './interfaces/Ledger'
export * from './interfaces/ReflectionDistributor'
export { TradingStateMachine } from './fsm/stateMachine'
export { guardTransfer } from './stages/guard'
export type { GuardCtx, GuardOutcome, TradeStamp } from './stages/guard'
export { quoteTransfer } from './stages/quote'
export { AccessGate } from './services/AccessGate'
export { InMemoryLedger } from './services/InMemoryLedger'
export { PolicyRegistry, resolveFeatureName } from './services/PolicyRegistry'
export type { PolicyRegistryInit } from './services/PolicyRegistry'
export { ReentrancyGuard } from './services/ReentrancyGuard'
export { HolderReflectionDistributor, PoolReflectionDistributor } from './services/ReflectionDistributors'
export type { HolderSource } from './services/ReflectionDistributors'
export { TokenEventBus } from './services/TokenEventBus'
export { TransferOrchestrator } from './services/TransferOrchestrator'
export type { FeeDestinations, OrchestratorDeps, TransferReceipt, TransferRequest } from './services/TransferOrchestrator'
export { FeeToken } from './token/FeeToken'
export type { FeeTokenDeps, FeeUpdate, TokenMetadata } from './token/FeeToken'
export { createFeeToken } from './token/createFeeToken'
export type { FeeTokenBundle, FeeTokenOverrides } from './token/createFeeToken'
export { BURN_ADDRESS, ZERO_ADDRESS, normalizeAddress, isZeroAddress } from './utils/address'
export { ManualClock, systemClock } from './utils/clock'
export { setLogger } from './utils/logger'
export { setRegistry, getRegistry } from './utils/metrics'
