// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { createDeferred, type DeferredPromise } from './DeferredPromise.js'

/**
 * How a response slot was settled.
 */
export type SlotOutcome<T> =
  | { readonly status: 'filled'; readonly value: T }
  | { readonly status: 'abandoned' }

/**
 * Producer half of a response slot, carried to the worker inside a wait
 * call. Exactly one of `send` or `abandon` takes effect; every later call
 * is a no-op that returns false.
 */
export interface ReplyTo<T> {
  /**
   * Writes the reply. Succeeds even when the caller is no longer
   * listening.
   * @returns true if this call settled the slot
   */
  send(value: T): boolean

  /**
   * Settles the slot without a value; the caller sees
   * MailboxClosedOrAbandoned.
   * @returns true if this call settled the slot
   */
  abandon(): boolean

  isSettled(): boolean
}

/**
 * Consumer half of a response slot, kept by the caller.
 */
export interface ResponseReceiver<T> {
  /**
   * Suspends until the slot is filled or abandoned.
   */
  receive(): Promise<SlotOutcome<T>>
}

/**
 * A single-use, single-value transfer cell.
 */
export interface ResponseSlot<T> {
  readonly sender: ReplyTo<T>
  readonly receiver: ResponseReceiver<T>
}

class SlotSender<T> implements ReplyTo<T> {
  private _settled = false

  constructor(private readonly deferred: DeferredPromise<SlotOutcome<T>>) {}

  send(value: T): boolean {
    return this.settle({ status: 'filled', value })
  }

  abandon(): boolean {
    return this.settle({ status: 'abandoned' })
  }

  isSettled(): boolean {
    return this._settled
  }

  private settle(outcome: SlotOutcome<T>): boolean {
    if (this._settled) {
      return false
    }
    this._settled = true
    this.deferred.resolve(outcome)
    return true
  }
}

/**
 * Creates a fresh response slot for one wait call.
 */
export function createResponseSlot<T>(): ResponseSlot<T> {
  const deferred = createDeferred<SlotOutcome<T>>()

  return {
    sender: new SlotSender(deferred),
    receiver: {
      receive: () => deferred.promise
    }
  }
}
