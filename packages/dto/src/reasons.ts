import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, revert message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // GUARD
  GUARD_INVALID_ADDRESS: { code: 'GUARD_INVALID_ADDRESS', category: ReasonCategory.GUARD, message: 'Transfer from or to the zero address' },
  GUARD_BLACKLISTED: { code: 'GUARD_BLACKLISTED', category: ReasonCategory.GUARD, message: 'Sender or recipient is blacklisted' },
  GUARD_TRADING_NOT_ENABLED: { code: 'GUARD_TRADING_NOT_ENABLED', category: ReasonCategory.GUARD, message: 'Trading not enabled' },
  GUARD_EXCEEDS_MAX_TRANSACTION: { code: 'GUARD_EXCEEDS_MAX_TRANSACTION', category: ReasonCategory.GUARD, message: 'Exceeds max transaction amount' },
  GUARD_EXCEEDS_MAX_WALLET: { code: 'GUARD_EXCEEDS_MAX_WALLET', category: ReasonCategory.GUARD, message: 'Exceeds max wallet size' },
  GUARD_COOLDOWN_ACTIVE: { code: 'GUARD_COOLDOWN_ACTIVE', category: ReasonCategory.GUARD, message: 'Cooldown period active' },

  // LEDGER
  LEDGER_INSUFFICIENT_BALANCE: { code: 'LEDGER_INSUFFICIENT_BALANCE', category: ReasonCategory.LEDGER, message: 'Transfer amount exceeds balance' },
  LEDGER_INSUFFICIENT_ALLOWANCE: { code: 'LEDGER_INSUFFICIENT_ALLOWANCE', category: ReasonCategory.LEDGER, message: 'Insufficient allowance' },
  LEDGER_INVALID_AMOUNT: { code: 'LEDGER_INVALID_AMOUNT', category: ReasonCategory.LEDGER, message: 'Amount outside uint256 range' },

  // CONFIG
  CONFIG_INVALID: { code: 'CONFIG_INVALID', category: ReasonCategory.CONFIG, message: 'Invalid configuration' },
  CONFIG_ALREADY_ENABLED: { code: 'CONFIG_ALREADY_ENABLED', category: ReasonCategory.CONFIG, message: 'Trading already enabled' },

  // ACCESS
  ACCESS_UNAUTHORIZED: { code: 'ACCESS_UNAUTHORIZED', category: ReasonCategory.ACCESS, message: 'Caller is not the owner' },
  ACCESS_PAUSED: { code: 'ACCESS_PAUSED', category: ReasonCategory.ACCESS, message: 'Token is paused' },
  ACCESS_NOT_PAUSED: { code: 'ACCESS_NOT_PAUSED', category: ReasonCategory.ACCESS, message: 'Token is not paused' },
  ACCESS_REENTRANT_CALL: { code: 'ACCESS_REENTRANT_CALL', category: ReasonCategory.ACCESS, message: 'Reentrant call' },

  // INTERNAL
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, message: 'Internal error' },
}

export function getReason(code: ReasonCode): ReasonDetail {
  return REASONS[code]
}
