/**
 * reason() factory
 * Merges a base registry entry with optional overrides.
 * Defaults come from REASONS; overrides can change `message` and add `context`.
 */
import { ReasonDetail, ReasonCode } from '@feegate/dto'
import { REASONS } from './registry'

export type ReasonOverrides = Partial<Pick<ReasonDetail, 'message' | 'context'>>

export function reason(code: ReasonCode, overrides?: ReasonOverrides): ReasonDetail {
  const base = REASONS[code]
  const context = { ...(base.context || {}), ...(overrides?.context || {}) }
  return {
    ...base,
    message: overrides?.message ?? base.message,
    context: Object.keys(context).length ? context : undefined,
  }
}
