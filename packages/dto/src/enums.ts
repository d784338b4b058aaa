export enum TradingState {
  DISABLED = "DISABLED",
  ENABLED = "ENABLED",
}

export enum TokenVariant {
  REFLECTION = "REFLECTION",
  STANDARD = "STANDARD",
}

export enum FeatureName {
  REFLECTION = "reflection",
  ANTI_WHALE = "antiWhale",
  AUTO_LIQUIDITY = "autoLiquidity",
  COOLDOWN = "cooldown",
  BLACKLIST = "blacklist",
  AUTO_BURN = "autoBurn",
}

export enum FeeComponent {
  REFLECTION = "reflection",
  LIQUIDITY = "liquidity",
  MARKETING = "marketing",
  BURN = "burn",
}

export enum ReasonCategory {
  GUARD = "GUARD",
  LEDGER = "LEDGER",
  CONFIG = "CONFIG",
  ACCESS = "ACCESS",
  INTERNAL = "INTERNAL",
}

export type ReasonCode =
  | "GUARD_INVALID_ADDRESS"
  | "GUARD_BLACKLISTED"
  | "GUARD_TRADING_NOT_ENABLED"
  | "GUARD_EXCEEDS_MAX_TRANSACTION"
  | "GUARD_EXCEEDS_MAX_WALLET"
  | "GUARD_COOLDOWN_ACTIVE"
  | "LEDGER_INSUFFICIENT_BALANCE"
  | "LEDGER_INSUFFICIENT_ALLOWANCE"
  | "LEDGER_INVALID_AMOUNT"
  | "CONFIG_INVALID"
  | "CONFIG_ALREADY_ENABLED"
  | "ACCESS_UNAUTHORIZED"
  | "ACCESS_PAUSED"
  | "ACCESS_NOT_PAUSED"
  | "ACCESS_REENTRANT_CALL"
  | "INTERNAL_ERROR";

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  message: string;
  context?: Record<string, string | number | boolean>;
}
