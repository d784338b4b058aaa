/**
 * AccessGate
 * Owner predicate for every administrative call and the pause switch wrapping transfer/transferFrom.
 * Ownership is fixed at construction.
 */
import { Address } from '@feegate/dto'
import { reject } from '@feegate/reasons'
import { EventSink } from '../interfaces/EventSink'

export class AccessGate {
  private pausedFlag = false

  constructor(private readonly ownerAddress: Address, private readonly sink: EventSink) {}

  owner(): Address {
    return this.ownerAddress
  }

  isPaused(): boolean {
    return this.pausedFlag
  }

  assertOwner(caller: Address): void {
    if (caller !== this.ownerAddress) reject('ACCESS_UNAUTHORIZED', { context: { caller } })
  }

  assertNotPaused(): void {
    if (this.pausedFlag) reject('ACCESS_PAUSED')
  }

  pause(caller: Address): void {
    this.assertOwner(caller)
    this.assertNotPaused()
    this.pausedFlag = true
    this.sink.emit({ type: 'Paused', account: caller })
  }

  unpause(caller: Address): void {
    this.assertOwner(caller)
    if (!this.pausedFlag) reject('ACCESS_NOT_PAUSED')
    this.pausedFlag = false
    this.sink.emit({ type: 'Unpaused', account: caller })
  }
}

export default AccessGate
