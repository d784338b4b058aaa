import { TradingState } from '@feegate/dto'

/** Trading lifecycle: DISABLED -> ENABLED, never back. */
export class TradingStateMachine {
  private ALLOWED: Record<TradingState, TradingState[]> = {
    [TradingState.DISABLED]: [TradingState.ENABLED],
    [TradingState.ENABLED]: []
  }

  can(from: TradingState, to: TradingState): boolean {
    return this.ALLOWED[from].includes(to)
  }
}
