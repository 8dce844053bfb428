// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorMessage } from './Envelope.js'
import { DefaultLogger, type Logger } from './Logger.js'

/**
 * Why an envelope never reached its processor.
 *
 * - overflow: a bounded mailbox dropped it
 * - stopped: it was still queued when the worker stopped
 */
export type DeadLetterReason = 'overflow' | 'stopped'

/**
 * A message that was accepted by a mailbox but never delivered.
 */
export class DeadLetter {
  constructor(
    readonly actorName: string,
    readonly message: ActorMessage,
    readonly reason: DeadLetterReason
  ) {}

  toString(): string {
    return `DeadLetter[actor=${this.actorName}, variant=${this.message.kind}, reason=${this.reason}]`
  }
}

/**
 * Receives dead letters as they occur.
 */
export interface DeadLettersListener {
  handle(deadLetter: DeadLetter): void
}

/**
 * Fan-out point for undeliverable messages.
 */
export class DeadLetters {
  private readonly _listeners: DeadLettersListener[] = []

  constructor(private readonly _logger: Logger = DefaultLogger) {}

  registerListener(listener: DeadLettersListener): void {
    this._listeners.push(listener)
  }

  /**
   * Reports a dead letter to every listener. A listener that throws is
   * logged and does not prevent the others from being notified.
   */
  failedDelivery(deadLetter: DeadLetter): void {
    this._logger.debug(deadLetter.toString())

    for (const listener of this._listeners) {
      try {
        listener.handle(deadLetter)
      } catch (error) {
        this._logger.error('Dead letters listener failed:', error)
      }
    }
  }
}
