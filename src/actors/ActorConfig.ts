// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { DeadLetters } from './DeadLetters.js'
import { DefaultLogger, type Logger } from './Logger.js'
import { OverflowPolicy } from './OverflowPolicy.js'

/**
 * What a worker does when its processor throws.
 *
 * - stop: close the mailbox, abandon everything still queued, terminate
 * - resume: log the failure and continue with the next envelope
 */
export type FailurePolicy = 'stop' | 'resume'

/**
 * Mailbox selection for a new actor.
 */
export type MailboxConfig =
  | { readonly kind: 'unbounded' }
  | { readonly kind: 'bounded'; readonly capacity: number; readonly overflowPolicy: OverflowPolicy }

/**
 * Options accepted when an actor is constructed. Every field is optional;
 * missing fields come from ActorConfigs.DEFAULT.
 */
export interface ActorConfig {
  /**
   * Name used in logs, errors and dead letters.
   */
  readonly name?: string
  readonly logger?: Logger
  readonly mailbox?: MailboxConfig
  readonly failurePolicy?: FailurePolicy
  /**
   * Receives undeliverable envelopes. A private instance using the
   * actor's logger is created when absent.
   */
  readonly deadLetters?: DeadLetters
}

/**
 * Predefined configurations.
 */
export const ActorConfigs = {
  /**
   * Unbounded mailbox, stop on failure, console logging.
   */
  DEFAULT: {
    name: 'actor',
    logger: DefaultLogger,
    mailbox: { kind: 'unbounded' },
    failurePolicy: 'stop'
  },

  /**
   * Keeps serving after a processor failure.
   */
  RESILIENT: {
    name: 'actor',
    logger: DefaultLogger,
    mailbox: { kind: 'unbounded' },
    failurePolicy: 'resume'
  },

  /**
   * Bounded to 1024 envelopes, refusing sends when full.
   */
  BOUNDED: {
    name: 'actor',
    logger: DefaultLogger,
    mailbox: { kind: 'bounded', capacity: 1024, overflowPolicy: OverflowPolicy.Reject },
    failurePolicy: 'stop'
  }
} as const satisfies Record<string, ActorConfig>
