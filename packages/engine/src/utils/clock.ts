import { Clock } from '../interfaces/Clock'

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
}

/** Hand-driven clock for simulations and tests. */
export class ManualClock implements Clock {
  private current: number

  constructor(start: number) {
    this.current = start
  }

  now(): number {
    return this.current
  }

  advance(seconds: number): number {
    this.current += seconds
    return this.current
  }

  set(timestamp: number): void {
    this.current = timestamp
  }
}
