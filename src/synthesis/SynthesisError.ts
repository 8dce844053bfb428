// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Why a declaration unit produced no actor. Each reason carries the
 * names needed to find and fix the offending declaration.
 */
export type RejectionReason =
  | {
      readonly code: 'AmbiguousOrMissingPair'
      /** Every pairing that satisfied the linkage; empty when none did. */
      readonly pairs: readonly { readonly processor: string; readonly message: string }[]
    }
  | { readonly code: 'MissingHandler'; readonly processor: string; readonly message: string; readonly handler: string }
  | { readonly code: 'EmptyMessageType'; readonly message: string }
  | { readonly code: 'MissingResponseField'; readonly message: string; readonly variant: string; readonly field: string }
  | { readonly code: 'DuplicateResponseField'; readonly message: string; readonly variant: string; readonly field: string }
  | { readonly code: 'ReservedFieldName'; readonly message: string; readonly variant: string; readonly field: string }
  | { readonly code: 'DuplicateOperationName'; readonly operation: string; readonly variants: readonly string[] }
  | { readonly code: 'ReservedOperationName'; readonly operation: string; readonly variant: string }
  | { readonly code: 'InvalidOperationName'; readonly operation: string; readonly variant: string }

export type RejectionCode = RejectionReason['code']

/**
 * Renders a rejection as one line of text.
 */
export function describeRejection(reason: RejectionReason): string {
  switch (reason.code) {
    case 'AmbiguousOrMissingPair':
      if (reason.pairs.length === 0) {
        return 'No processor type is paired with a message type'
      }
      return `Expected one processor/message pair but found ${reason.pairs.length}: ` +
        reason.pairs.map((pair) => `${pair.processor}/${pair.message}`).join(', ')
    case 'MissingHandler':
      return `Processor '${reason.processor}' has no async '${reason.handler}' method taking '${reason.message}' exclusively`
    case 'EmptyMessageType':
      return `Message type '${reason.message}' has no variants`
    case 'MissingResponseField':
      return `Variant '${reason.message}::${reason.variant}' has no '${reason.field}' field`
    case 'DuplicateResponseField':
      return `Variant '${reason.message}::${reason.variant}' has more than one '${reason.field}' field`
    case 'ReservedFieldName':
      return `Field '${reason.field}' of variant '${reason.message}::${reason.variant}' is reserved for the variant tag`
    case 'DuplicateOperationName':
      return `Operation name '${reason.operation}' is derived from more than one variant: ${reason.variants.join(', ')}`
    case 'ReservedOperationName':
      return `Operation name '${reason.operation}' derived from variant '${reason.variant}' is reserved by the handle`
    case 'InvalidOperationName':
      return `Variant '${reason.variant}' does not yield a usable operation name (got '${reason.operation}')`
  }
}

/**
 * Thrown by the throwing entry points when a unit is rejected.
 */
export class SynthesisError extends Error {
  constructor(readonly reason: RejectionReason) {
    super(describeRejection(reason))
    this.name = 'SynthesisError'
  }

  code(): RejectionCode {
    return this.reason.code
  }
}
