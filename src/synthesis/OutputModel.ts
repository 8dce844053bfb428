// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { FieldDeclaration, TypeReference } from './Declarations.js'
import type { OperationForm, VariantContract } from './VariantContract.js'

/**
 * Member of every generated message variant that holds the variant name.
 */
export const MESSAGE_DISCRIMINANT = 'kind'

/**
 * One variant of the generated message union: the declared fields
 * without the response field, tagged by `kind`.
 */
export interface MessageVariantModel {
  readonly name: string
  readonly fields: readonly FieldDeclaration[]
  readonly responseType: TypeReference
}

/**
 * The message type as callers build it, plus the map from variant to
 * response type that replaces the response field.
 */
export interface MessageModel {
  readonly name: string
  readonly repliesName: string
  readonly discriminant: typeof MESSAGE_DISCRIMINANT
  readonly variants: readonly MessageVariantModel[]
}

export interface MailboxModel {
  readonly carries: string
  readonly capacity: 'unbounded'
  readonly producers: 'many'
  readonly consumers: 'one'
}

export type WorkerLoopStep = 'receive' | 'terminate-if-closed' | 'invoke-handler' | 'await-handler'

export interface WorkerModel {
  readonly name: string
  readonly processorName: string
  readonly processorTypeName: string
  readonly handler: string
  /**
   * One iteration of the dispatch loop, repeated until terminate-if-closed
   * fires.
   */
  readonly loop: readonly WorkerLoopStep[]
}

export interface HandleModel {
  readonly name: string
  /**
   * Members declared besides the operations.
   */
  readonly members: readonly string[]
}

export type ConstructionStep = 'create-mailbox' | 'bind-processor' | 'spawn-worker' | 'return-handle'

export interface OperationModel {
  readonly name: string
  readonly form: OperationForm
  readonly variant: string
  readonly success: TypeReference
}

/**
 * Everything synthesized for one accepted unit.
 */
export interface OutputModel {
  readonly actorName: string
  readonly message: MessageModel
  readonly mailbox: MailboxModel
  readonly worker: WorkerModel
  readonly handle: HandleModel
  readonly construction: readonly ConstructionStep[]
  /**
   * Wait form then no-wait form, per variant, in variant order.
   */
  readonly operations: readonly OperationModel[]
  readonly contracts: readonly VariantContract[]
}
