// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { ArrayMailbox } from './ArrayMailbox.js'
import { OverflowPolicy } from './OverflowPolicy.js'

/**
 * Capacity-limited FIFO mailbox.
 *
 * When full, the overflow policy decides which item loses:
 * - DropOldest: the head of the queue is dropped, the new item queued
 * - DropNewest: the new item is dropped, the send still succeeds
 * - Reject: the send fails
 *
 * Dropped items are handed to `onDropped`; rejected items are not, since
 * their producer already sees the failed send.
 */
export class BoundedMailbox<T> extends ArrayMailbox<T> {
  private _droppedCount = 0

  constructor(
    private readonly _capacity: number,
    private readonly _overflowPolicy: OverflowPolicy,
    private readonly _onDropped: (item: T) => void = () => {}
  ) {
    super()

    if (!Number.isInteger(_capacity) || _capacity <= 0) {
      throw new Error('Mailbox capacity must be positive')
    }
  }

  getCapacity(): number {
    return this._capacity
  }

  overflowPolicy(): OverflowPolicy {
    return this._overflowPolicy
  }

  isFull(): boolean {
    return this.size() >= this._capacity
  }

  /**
   * Returns how many items were dropped or rejected because of capacity.
   */
  droppedMessageCount(): number {
    return this._droppedCount
  }

  protected enqueue(item: T): boolean {
    if (!this.isFull()) {
      return super.enqueue(item)
    }

    this._droppedCount++

    switch (this._overflowPolicy) {
      case OverflowPolicy.DropOldest: {
        const oldest = this.queue.shift()
        this.queue.push(item)
        if (oldest !== undefined) {
          this._onDropped(oldest)
        }
        return true
      }
      case OverflowPolicy.DropNewest:
        this._onDropped(item)
        return true
      case OverflowPolicy.Reject:
        return false
    }
  }
}
