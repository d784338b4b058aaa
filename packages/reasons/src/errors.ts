/**
 * ReasonedRejection Error
 * Wraps a ReasonDetail so every failed operation reverts with the same deterministic shape.
 */
import { ReasonCode, ReasonDetail } from '@feegate/dto'
import { reason, ReasonOverrides } from './factory'

export class ReasonedRejection extends Error {
  public readonly reason: ReasonDetail
  public readonly terminalState = 'REVERTED' as const

  constructor(reason: ReasonDetail, human?: string) {
    super(human ?? reason.message)
    this.name = 'ReasonedRejection'
    this.reason = reason
  }

  get code(): ReasonCode {
    return this.reason.code
  }
}

/** Build and throw in one step; the return type lets callers use it in expression position. */
export function reject(code: ReasonCode, overrides?: ReasonOverrides): never {
  throw new ReasonedRejection(reason(code, overrides))
}

export function isRejection(err: unknown, code?: ReasonCode): err is ReasonedRejection {
  if (!(err instanceof ReasonedRejection)) return false
  return code === undefined || err.reason.code === code
}
