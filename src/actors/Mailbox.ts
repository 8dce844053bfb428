// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Envelope queue between the handles of an actor and its worker.
 *
 * Required properties, relied on by the worker and the handles:
 * - any number of producers, exactly one consumer
 * - FIFO: items are received in enqueue order
 * - no item is duplicated or lost while the mailbox is open
 * - after close, queued items can still be received; then receive
 *   yields undefined
 *
 * Implementations:
 * - ArrayMailbox: unbounded FIFO queue
 * - BoundedMailbox: capacity-limited queue with an overflow policy
 */
export interface Mailbox<T> {
  /**
   * Enqueues an item for the consumer.
   * @returns false if the mailbox is closed or refused the item
   */
  send(item: T): boolean

  /**
   * Suspends until an item is available.
   * @returns The next item, or undefined once closed and empty
   */
  receive(): Promise<T | undefined>

  /**
   * Removes and returns every queued item without delivering it.
   */
  drain(): T[]

  /**
   * Closes the mailbox. Further sends fail; a pending receive on an
   * empty queue resolves with undefined.
   */
  close(): void

  isClosed(): boolean

  /**
   * Returns the number of queued items.
   */
  size(): number
}
