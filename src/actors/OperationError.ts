// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Call-time failure categories.
 *
 * - WrongVariant: the message does not match the operation invoked;
 *   nothing was sent
 * - SendFailed: the mailbox refused the envelope (closed, or rejected
 *   by a bounded mailbox)
 * - MailboxClosedOrAbandoned: the envelope was sent but no reply will
 *   ever arrive
 */
export type OperationErrorKind = 'WrongVariant' | 'SendFailed' | 'MailboxClosedOrAbandoned'

/**
 * Error returned (not thrown) by handle operations.
 */
export class OperationError extends Error {
  constructor(
    readonly kind: OperationErrorKind,
    message: string,
    readonly variant: string
  ) {
    super(message)
    this.name = 'OperationError'
  }

  static wrongVariant(expected: string, actual: string): OperationError {
    return new OperationError(
      'WrongVariant',
      `Operation for variant '${expected}' received a '${actual}' message`,
      expected
    )
  }

  static sendFailed(variant: string, actorName: string): OperationError {
    return new OperationError(
      'SendFailed',
      `Mailbox of actor '${actorName}' refused '${variant}'`,
      variant
    )
  }

  static abandoned(variant: string, actorName: string): OperationError {
    return new OperationError(
      'MailboxClosedOrAbandoned',
      `Actor '${actorName}' did not reply to '${variant}'`,
      variant
    )
  }
}
