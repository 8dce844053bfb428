// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorConfig } from './ActorConfig.js'
import { ActorHandle, type ActorReference } from './ActorHandle.js'
import { DeadLetters } from './DeadLetters.js'
import type { ActorMessage, Processor, Replies } from './Envelope.js'
import { DefaultLogger, type Logger } from './Logger.js'

/**
 * Process-wide table of actors with an explicit lifecycle.
 *
 * Each entry keeps one handle reference of its own, so an actor stays
 * alive while registered even if every handle given out is closed.
 * `stop(id)` and `teardown()` release those references and wait for the
 * workers to finish what is queued. An actor whose worker terminates on
 * its own, after a processor failure under the 'stop' policy, is
 * unregistered when its worker completes.
 */
export class ActorRuntime {
  private readonly _actors = new Map<string, ActorReference>()
  private readonly _deadLetters: DeadLetters
  private _tornDown = false

  constructor(private readonly _logger: Logger = DefaultLogger) {
    this._deadLetters = new DeadLetters(_logger)
  }

  /**
   * Dead letters shared by every actor spawned here, unless a config
   * names its own.
   */
  deadLetters(): DeadLetters {
    return this._deadLetters
  }

  /**
   * Spawns and registers an actor.
   *
   * @param id Unique id; also the actor's name unless config names it
   * @param processor The state owner
   * @param config Optional actor configuration
   * @returns A handle the caller owns; the registry keeps its own clone
   * @throws Error if the runtime was torn down or the id is taken
   */
  spawn<M extends ActorMessage, R extends Replies<M>>(
    id: string,
    processor: Processor<M, R>,
    config: ActorConfig = {}
  ): ActorHandle<M, R> {
    if (this._tornDown) {
      throw new Error('Actor runtime has been torn down')
    }

    if (this._actors.has(id)) {
      throw new Error(`Actor '${id}' is already registered`)
    }

    const handle = ActorHandle.spawn(processor, {
      ...config,
      name: config.name ?? id,
      logger: config.logger ?? this._logger,
      deadLetters: config.deadLetters ?? this._deadLetters
    })
    const registered = handle.clone()

    this._actors.set(id, registered)
    this._logger.debug(`Registered actor '${id}'`)

    void registered.completion().then(() => this.unregisterCompleted(id, registered))

    return handle
  }

  has(id: string): boolean {
    return this._actors.has(id)
  }

  /**
   * Returns the registry's reference to an actor, if registered.
   */
  actor(id: string): ActorReference | undefined {
    return this._actors.get(id)
  }

  ids(): string[] {
    return Array.from(this._actors.keys())
  }

  size(): number {
    return this._actors.size
  }

  /**
   * Unregisters an actor, closes its mailbox for every handle and waits
   * for its worker to terminate.
   *
   * @throws Error if no actor is registered under id
   */
  async stop(id: string): Promise<void> {
    const actor = this._actors.get(id)

    if (!actor) {
      throw new Error(`Actor '${id}' is not registered`)
    }

    this._actors.delete(id)
    await actor.stop()
    this._logger.debug(`Stopped actor '${id}'`)
  }

  private unregisterCompleted(id: string, actor: ActorReference): void {
    if (this._actors.get(id) !== actor) {
      return
    }

    this._actors.delete(id)
    actor.close()
    this._logger.debug(`Unregistered terminated actor '${id}'`)
  }

  /**
   * Stops every registered actor and refuses further spawns. Idempotent.
   */
  async teardown(): Promise<void> {
    if (this._tornDown) {
      return
    }

    this._tornDown = true

    const actors = Array.from(this._actors.values())
    this._actors.clear()

    await Promise.all(actors.map((actor) => actor.stop()))
    this._logger.debug(`Actor runtime torn down; ${actors.length} actor(s) stopped`)
  }
}
