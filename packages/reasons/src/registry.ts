/**
 * Reasons Registry
 * Centralizes every machine-parsable rejection code raised by the ledger, the guard and the admin surface.
 * Codes are stable; callers branch on them rather than on messages.
 */
import { ReasonCode, ReasonDetail, REASONS as DTO_REASONS } from '@feegate/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export function getReason(code: ReasonCode): ReasonDetail { return DTO_REASONS[code] }

export type { ReasonDetail }
