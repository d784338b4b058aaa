import { EventEmitter } from 'events'
import { TokenEvent, TokenEventType } from '@feegate/dto'
import { EventSink } from '../interfaces/EventSink'
import { getLogger } from '../utils/logger'

type Handler<K extends TokenEventType> = (event: Extract<TokenEvent, { type: K }>) => void

/**
 * TokenEventBus
 * Default EventSink on top of node's EventEmitter. Delivery is synchronous and fire-and-forget:
 * a throwing subscriber is logged and never reaches the operation that emitted.
 */
export class TokenEventBus implements EventSink {
  private emitter = new EventEmitter()

  emit(event: TokenEvent): void {
    this.deliver(event.type, event)
    this.deliver('*', event)
  }

  on<K extends TokenEventType>(type: K, handler: Handler<K>): () => void {
    this.emitter.on(type, handler)
    return () => {
      this.emitter.off(type, handler)
    }
  }

  onAny(handler: (event: TokenEvent) => void): () => void {
    this.emitter.on('*', handler)
    return () => {
      this.emitter.off('*', handler)
    }
  }

  private deliver(channel: string, event: TokenEvent): void {
    for (const listener of this.emitter.listeners(channel)) {
      try {
        listener(event)
      } catch (e) {
        getLogger().warn({ event: 'events.subscriber_failed', type: event.type, error: e instanceof Error ? e.message : String(e) })
      }
    }
  }
}

export default TokenEventBus
