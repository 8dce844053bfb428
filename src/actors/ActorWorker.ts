// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { FailurePolicy } from './ActorConfig.js'
import { DeadLetter, type DeadLetterReason, type DeadLetters } from './DeadLetters.js'
import type { ActorMessage, Envelope, Processor, Replies } from './Envelope.js'
import type { Logger } from './Logger.js'
import type { Mailbox } from './Mailbox.js'
import type { Stoppable } from './Stoppable.js'

/**
 * Collaborators a worker needs besides its processor and mailbox.
 */
export interface WorkerSettings {
  readonly name: string
  readonly logger: Logger
  readonly failurePolicy: FailurePolicy
  readonly deadLetters: DeadLetters
}

/**
 * Owns the consumer end of a mailbox and the only reference to a
 * processor. The dispatch loop takes one envelope, awaits the processor
 * on it, and only then takes the next, so the processor's state is never
 * touched concurrently and envelopes are handled in enqueue order.
 *
 * Loop states:
 * - receiving: suspended on an empty mailbox
 * - delivering: suspended on the processor
 * - terminated: the mailbox is closed and empty, or the processor
 *   failed under the 'stop' policy
 */
export class ActorWorker<M extends ActorMessage, R extends Replies<M>> implements Stoppable {
  private _completion?: Promise<void>
  private _processed = 0

  constructor(
    private readonly _processor: Processor<M, R>,
    private readonly _mailbox: Mailbox<Envelope<M, R>>,
    private readonly _settings: WorkerSettings
  ) {}

  /**
   * Starts the dispatch loop as an independent task. The loop runs
   * synchronously up to its first receive, so the caller regains control
   * before any envelope is processed. Idempotent.
   *
   * @returns Promise that resolves when the loop terminates
   */
  start(): Promise<void> {
    if (!this._completion) {
      this._completion = this.run()
    }
    return this._completion
  }

  /**
   * Closes the mailbox and waits for the envelopes already queued to be
   * processed.
   */
  async stop(): Promise<void> {
    this._mailbox.close()
    await this.start()
  }

  isRunning(): boolean {
    return this._completion !== undefined && !this._mailbox.isClosed()
  }

  /**
   * Returns how many envelopes were handed to the processor.
   */
  processedCount(): number {
    return this._processed
  }

  private async run(): Promise<void> {
    this._settings.logger.debug(`Actor '${this._settings.name}' started`)

    for (;;) {
      const envelope = await this._mailbox.receive()
      if (envelope === undefined) {
        break
      }

      const delivered = await this.deliver(envelope)

      if (!delivered && this._settings.failurePolicy === 'stop') {
        this.halt()
        break
      }
    }

    this._settings.logger.debug(`Actor '${this._settings.name}' stopped after ${this._processed} envelope(s)`)
  }

  private async deliver(envelope: Envelope<M, R>): Promise<boolean> {
    this._processed++

    try {
      await this._processor.process(envelope)
      return true
    } catch (error) {
      this._settings.logger.error(
        `Actor '${this._settings.name}' failed processing '${envelope.message.kind}':`,
        error
      )
      return false
    } finally {
      // Once the processor is done with the envelope nobody else can reply.
      if (envelope.call.mode === 'wait') {
        envelope.call.reply.abandon()
      }
    }
  }

  private halt(): void {
    this._mailbox.close()

    for (const envelope of this._mailbox.drain()) {
      this.discard(envelope, 'stopped')
    }
  }

  /**
   * Gives up on an envelope that will never be delivered.
   */
  discard(envelope: Envelope<M, R>, reason: DeadLetterReason): void {
    if (envelope.call.mode === 'wait') {
      envelope.call.reply.abandon()
    }
    this._settings.deadLetters.failedDelivery(new DeadLetter(this._settings.name, envelope.message, reason))
  }
}
