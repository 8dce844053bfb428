// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Defines how a BoundedMailbox handles envelopes when capacity is reached.
 *
 * Dropped envelopes go to dead letters, and a dropped wait call has its
 * response slot abandoned so the caller observes MailboxClosedOrAbandoned.
 */
export enum OverflowPolicy {
  /**
   * Drop the oldest queued envelope to make room for the new one.
   * The send itself succeeds.
   */
  DropOldest,

  /**
   * Accept the send but discard the incoming envelope.
   */
  DropNewest,

  /**
   * Refuse the incoming envelope. The send fails with SendFailed.
   */
  Reject
}
