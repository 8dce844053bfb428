// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { ReplyTo } from './ResponseSlot.js'

/**
 * Any tagged message. `kind` names the variant.
 */
export interface ActorMessage {
  readonly kind: string
}

/**
 * Maps every variant name of M to its response type.
 *
 * @example
 * ```typescript
 * type CalculatorMsg =
 *   | { kind: 'MsgOne'; value: number }
 *   | { kind: 'MsgTwo'; value: number }
 *
 * interface CalculatorReplies {
 *   MsgOne: number
 *   MsgTwo: number
 * }
 * ```
 */
export type Replies<M extends ActorMessage> = { readonly [K in M['kind']]: unknown }

/**
 * The member of M tagged with K.
 */
export type MessageOf<M extends ActorMessage, K extends M['kind']> = Extract<M, { readonly kind: K }>

/**
 * Calling convention of one envelope: a wait call carries the producer
 * half of a response slot, a fire call carries nothing.
 */
export type Call<T> =
  | { readonly mode: 'wait'; readonly reply: ReplyTo<T> }
  | { readonly mode: 'fire' }

/**
 * What travels through a mailbox: the caller's message, untouched, plus
 * the calling convention. Keeping the slot out of the message keeps the
 * message's shape independent of how it was sent.
 */
export interface Envelope<M extends ActorMessage, R extends Replies<M>> {
  readonly message: M
  readonly call: Call<R[M['kind']]>
}

/**
 * The user-supplied state owner. Its `process` is only ever invoked by
 * its worker, one envelope at a time, so it may mutate its own fields
 * freely.
 */
export interface Processor<M extends ActorMessage, R extends Replies<M>> {
  process(envelope: Envelope<M, R>): Promise<void>
}

/**
 * Writes a reply if the call is a wait call. Fire calls ignore it.
 *
 * @returns true if a waiting caller's slot was settled by this value
 */
export function respond<T>(call: Call<T>, value: T): boolean {
  if (call.mode === 'fire') {
    return false
  }
  return call.reply.send(value)
}
