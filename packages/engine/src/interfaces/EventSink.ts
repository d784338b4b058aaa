import { TokenEvent } from '@feegate/dto'

/** Fire-and-forget notification sink. Return values are never consumed by the core. */
export interface EventSink {
  emit(event: TokenEvent): void
}
