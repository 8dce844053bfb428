// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Runtime the synthesized actors run on.
 *
 * @packageDocumentation
 */

// Handles and workers
export { ActorHandle } from './ActorHandle.js'
export type { ActorReference } from './ActorHandle.js'
export { ActorWorker } from './ActorWorker.js'
export type { WorkerSettings } from './ActorWorker.js'
export { ActorRuntime } from './ActorRuntime.js'
export type { Stoppable } from './Stoppable.js'

// Messages and calls
export { respond } from './Envelope.js'
export type { ActorMessage, Call, Envelope, MessageOf, Processor, Replies } from './Envelope.js'
export { createResponseSlot } from './ResponseSlot.js'
export type { ReplyTo, ResponseReceiver, ResponseSlot, SlotOutcome } from './ResponseSlot.js'
export { createDeferred } from './DeferredPromise.js'
export type { DeferredPromise } from './DeferredPromise.js'

// Mailboxes
export type { Mailbox } from './Mailbox.js'
export { ArrayMailbox } from './ArrayMailbox.js'
export { BoundedMailbox } from './BoundedMailbox.js'
export { OverflowPolicy } from './OverflowPolicy.js'

// Configuration
export { ActorConfigs } from './ActorConfig.js'
export type { ActorConfig, FailurePolicy, MailboxConfig } from './ActorConfig.js'

// Results and errors
export { ok, err, unwrap } from './Result.js'
export type { Ok, Err, Result } from './Result.js'
export { OperationError } from './OperationError.js'
export type { OperationErrorKind } from './OperationError.js'
export { DeadLetter, DeadLetters } from './DeadLetters.js'
export type { DeadLetterReason, DeadLettersListener } from './DeadLetters.js'

// Logging
export { DefaultLogger, NoOpLogger } from './Logger.js'
export type { Logger } from './Logger.js'

// TestKit - Testing utilities
export { TestDeadLettersListener } from './testkit/TestDeadLettersListener.js'
export { awaitAssert } from './testkit/TestAwaitAssist.js'
export type { AwaitOptions } from './testkit/TestAwaitAssist.js'
