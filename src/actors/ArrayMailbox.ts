// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { createDeferred, type DeferredPromise } from './DeferredPromise.js'
import type { Mailbox } from './Mailbox.js'

/**
 * Unbounded FIFO mailbox backed by a JavaScript array.
 *
 * There is no backpressure: a producer that outpaces the worker grows
 * the queue without limit. Use BoundedMailbox where that matters.
 */
export class ArrayMailbox<T> implements Mailbox<T> {
  protected readonly queue: T[] = []
  private _closed = false
  private _waiting?: DeferredPromise<T | undefined>

  send(item: T): boolean {
    if (this._closed) {
      return false
    }

    const waiting = this._waiting
    if (waiting) {
      // A waiting consumer implies an empty queue.
      this._waiting = undefined
      waiting.resolve(item)
      return true
    }

    return this.enqueue(item)
  }

  receive(): Promise<T | undefined> {
    if (this._waiting) {
      throw new Error('Mailbox has a single consumer; receive is already pending')
    }

    if (this.queue.length > 0) {
      return Promise.resolve(this.queue.shift())
    }

    if (this._closed) {
      return Promise.resolve(undefined)
    }

    this._waiting = createDeferred<T | undefined>()
    return this._waiting.promise
  }

  drain(): T[] {
    return this.queue.splice(0, this.queue.length)
  }

  close(): void {
    if (this._closed) {
      return
    }

    this._closed = true

    const waiting = this._waiting
    if (waiting) {
      this._waiting = undefined
      waiting.resolve(undefined)
    }
  }

  isClosed(): boolean {
    return this._closed
  }

  size(): number {
    return this.queue.length
  }

  /**
   * Appends to a queue that has no waiting consumer.
   * @returns whether the item was accepted
   */
  protected enqueue(item: T): boolean {
    this.queue.push(item)
    return true
  }
}
