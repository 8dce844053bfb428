// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { ActorConfigs, type ActorConfig, type MailboxConfig } from './ActorConfig.js'
import { ActorWorker, type WorkerSettings } from './ActorWorker.js'
import { ArrayMailbox } from './ArrayMailbox.js'
import { BoundedMailbox } from './BoundedMailbox.js'
import { DeadLetters } from './DeadLetters.js'
import type { ActorMessage, Envelope, Processor, Replies } from './Envelope.js'
import type { Logger } from './Logger.js'
import type { Mailbox } from './Mailbox.js'
import { OperationError } from './OperationError.js'
import { createResponseSlot } from './ResponseSlot.js'
import { err, ok, type Result } from './Result.js'
import type { Stoppable } from './Stoppable.js'

/**
 * Message-type-independent view of a handle, used by the actor registry.
 */
export interface ActorReference extends Stoppable {
  name(): string
  isClosed(): boolean
  close(): void
  completion(): Promise<void>
}

/**
 * State shared by every clone of one handle.
 */
class ActorCore<M extends ActorMessage, R extends Replies<M>> {
  private _references = 0

  constructor(
    readonly name: string,
    readonly mailbox: Mailbox<Envelope<M, R>>,
    readonly worker: ActorWorker<M, R>,
    readonly logger: Logger
  ) {}

  retain(): void {
    this._references++
  }

  release(): void {
    this._references--

    if (this._references === 0) {
      this.logger.debug(`Last handle of actor '${this.name}' closed`)
      this.mailbox.close()
    }
  }
}

/**
 * Producer side of an actor: the only way to reach its processor.
 *
 * Each handle holds one reference to the mailbox. `clone()` adds a
 * reference, `close()` gives this handle's reference back, and when the
 * last reference is given back the mailbox closes and the worker ends
 * after finishing what is already queued.
 *
 * Every operation resolves to a Result; none of them throws on a
 * call-time failure.
 *
 * @example
 * ```typescript
 * const calculator = ActorHandle.spawn<CalculatorMsg, CalculatorReplies>(new Calculator())
 *
 * const result = await calculator.request('MsgOne', { kind: 'MsgOne', value: 1 })
 * if (result.ok) {
 *   console.log(result.value) // 101
 * }
 * ```
 */
export class ActorHandle<M extends ActorMessage, R extends Replies<M>> implements ActorReference {
  private _closed = false

  private constructor(private readonly _core: ActorCore<M, R>) {
    _core.retain()
  }

  /**
   * Creates the mailbox, binds the processor to a new worker on its
   * consumer end, starts the worker and returns a handle on the producer
   * end. Does not wait for any envelope to be processed.
   *
   * @param processor The state owner; must not be shared with anything else
   * @param config Optional overrides of ActorConfigs.DEFAULT
   */
  static spawn<M extends ActorMessage, R extends Replies<M>>(
    processor: Processor<M, R>,
    config: ActorConfig = {}
  ): ActorHandle<M, R> {
    const name = config.name ?? ActorConfigs.DEFAULT.name
    const logger = config.logger ?? ActorConfigs.DEFAULT.logger
    const settings: WorkerSettings = {
      name,
      logger,
      failurePolicy: config.failurePolicy ?? ActorConfigs.DEFAULT.failurePolicy,
      deadLetters: config.deadLetters ?? new DeadLetters(logger)
    }

    const mailbox = createMailbox<Envelope<M, R>>(
      config.mailbox ?? ActorConfigs.DEFAULT.mailbox,
      (envelope) => worker.discard(envelope, 'overflow')
    )
    const worker = new ActorWorker(processor, mailbox, settings)
    const handle = new ActorHandle(new ActorCore(name, mailbox, worker, logger))

    void worker.start()

    return handle
  }

  name(): string {
    return this._core.name
  }

  /**
   * Returns a new handle to the same worker.
   * @throws Error if this handle is already closed
   */
  clone(): ActorHandle<M, R> {
    if (this._closed) {
      throw new Error(`Cannot clone a closed handle of actor '${this._core.name}'`)
    }
    return new ActorHandle(this._core)
  }

  /**
   * Gives back this handle's mailbox reference. Idempotent. Later
   * operations on this handle fail with SendFailed.
   */
  close(): void {
    if (this._closed) {
      return
    }
    this._closed = true
    this._core.release()
  }

  /**
   * Returns true if this handle can no longer send.
   */
  isClosed(): boolean {
    return this._closed || this._core.mailbox.isClosed()
  }

  /**
   * Closes the mailbox for every clone and waits for the worker to
   * finish what is queued.
   */
  async stop(): Promise<void> {
    this.close()
    await this._core.worker.stop()
  }

  /**
   * Resolves when the worker's loop has terminated.
   */
  completion(): Promise<void> {
    return this._core.worker.start()
  }

  /**
   * Wait form: sends the message and suspends until the processor
   * replies.
   *
   * @param variant The variant this operation serves
   * @param message Must be tagged with `variant`
   * @returns The reply, or WrongVariant, SendFailed or
   *   MailboxClosedOrAbandoned
   */
  async request<K extends M['kind']>(variant: K, message: M): Promise<Result<R[K], OperationError>> {
    if (message.kind !== variant) {
      return err(OperationError.wrongVariant(variant, message.kind))
    }

    if (this.isClosed()) {
      return err(OperationError.sendFailed(variant, this._core.name))
    }

    const slot = createResponseSlot<R[K]>()

    if (!this.enqueue({ message, call: { mode: 'wait', reply: slot.sender } })) {
      return err(OperationError.sendFailed(variant, this._core.name))
    }

    const outcome = await slot.receiver.receive()

    if (outcome.status === 'abandoned') {
      return err(OperationError.abandoned(variant, this._core.name))
    }

    return ok(outcome.value)
  }

  /**
   * No-wait form: sends the message and returns as soon as it is
   * enqueued. Never yields the processor's reply.
   *
   * @param variant The variant this operation serves
   * @param message Must be tagged with `variant`
   */
  async tell<K extends M['kind']>(variant: K, message: M): Promise<Result<void, OperationError>> {
    if (message.kind !== variant) {
      return err(OperationError.wrongVariant(variant, message.kind))
    }

    if (!this.enqueue({ message, call: { mode: 'fire' } })) {
      return err(OperationError.sendFailed(variant, this._core.name))
    }

    return ok(undefined)
  }

  private enqueue(envelope: Envelope<M, R>): boolean {
    if (this._closed) {
      return false
    }

    const sent = this._core.mailbox.send(envelope)
    if (!sent) {
      this._core.logger.debug(`Actor '${this._core.name}' refused '${envelope.message.kind}'`)
    }
    return sent
  }
}

function createMailbox<T>(config: MailboxConfig, onDropped: (item: T) => void): Mailbox<T> {
  switch (config.kind) {
    case 'unbounded':
      return new ArrayMailbox<T>()
    case 'bounded':
      return new BoundedMailbox<T>(config.capacity, config.overflowPolicy, onDropped)
  }
}
