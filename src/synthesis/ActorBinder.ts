// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ActorConfig } from '../actors/ActorConfig.js'
import { ActorHandle, type ActorReference } from '../actors/ActorHandle.js'
import type { ActorMessage, Processor, Replies } from '../actors/Envelope.js'
import type { OperationError } from '../actors/OperationError.js'
import type { Result } from '../actors/Result.js'
import type { OperationModel, OutputModel } from './OutputModel.js'
import type { OperationForm } from './VariantContract.js'

type AnyReplies = Replies<ActorMessage>

/**
 * One derived operation of a bound actor.
 */
export interface BoundOperation {
  readonly name: string
  readonly form: OperationForm
  readonly variant: string
  invoke(message: ActorMessage): Promise<Result<unknown, OperationError>>
}

/**
 * A running actor whose operations are looked up by their derived
 * names, for callers that work from an output model instead of emitted
 * source.
 */
export class BoundActor implements ActorReference {
  private readonly _operations: ReadonlyMap<string, BoundOperation>

  constructor(
    private readonly _output: OutputModel,
    private readonly _handle: ActorHandle<ActorMessage, AnyReplies>
  ) {
    this._operations = new Map(
      _output.operations.map((operation): [string, BoundOperation] => [operation.name, bindOperation(operation, _handle)])
    )
  }

  output(): OutputModel {
    return this._output
  }

  name(): string {
    return this._handle.name()
  }

  operation(name: string): BoundOperation | undefined {
    return this._operations.get(name)
  }

  operationNames(): string[] {
    return Array.from(this._operations.keys())
  }

  /**
   * Invokes an operation by name.
   *
   * @throws Error if the output model has no such operation
   */
  invoke(name: string, message: ActorMessage): Promise<Result<unknown, OperationError>> {
    const operation = this._operations.get(name)

    if (!operation) {
      return Promise.reject(new Error(`Actor '${this._output.handle.name}' has no operation '${name}'`))
    }

    return operation.invoke(message)
  }

  clone(): BoundActor {
    return new BoundActor(this._output, this._handle.clone())
  }

  close(): void {
    this._handle.close()
  }

  isClosed(): boolean {
    return this._handle.isClosed()
  }

  stop(): Promise<void> {
    return this._handle.stop()
  }

  completion(): Promise<void> {
    return this._handle.completion()
  }
}

function bindOperation(operation: OperationModel, handle: ActorHandle<ActorMessage, AnyReplies>): BoundOperation {
  return {
    name: operation.name,
    form: operation.form,
    variant: operation.variant,
    invoke: (message) => operation.form === 'wait'
      ? handle.request(operation.variant, message)
      : handle.tell(operation.variant, message)
  }
}

/**
 * Starts an actor for an output model.
 *
 * @param output A synthesized output model
 * @param processor The state owner handling the model's messages
 * @param config Optional actor configuration; the name defaults to the
 *   model's actor name
 */
export function bindActor(
  output: OutputModel,
  processor: Processor<ActorMessage, AnyReplies>,
  config: ActorConfig = {}
): BoundActor {
  const handle = ActorHandle.spawn(processor, { ...config, name: config.name ?? output.actorName })
  return new BoundActor(output, handle)
}
