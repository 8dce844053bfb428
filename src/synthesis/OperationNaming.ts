// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

// Alternatives, tried left to right at each position:
// - an uppercase run directly followed by a capitalized word (HTTP in HTTPRequest)
// - an optionally capitalized lowercase word with trailing digits (Msg, One2)
// - an uppercase run with trailing digits (URL, V2)
// - a bare digit run
// Anything else (underscores, $) separates words.
const WORD = /[A-Z]+(?=[A-Z][a-z])|[A-Z]?[a-z]+[0-9]*|[A-Z]+[0-9]*|[0-9]+/g

const OPERATION_NAME = /^[a-z_][a-z0-9_]*$/

/**
 * Splits an identifier into its words.
 *
 * @example
 * ```typescript
 * words('MsgOne')      // ['Msg', 'One']
 * words('HTTPRequest') // ['HTTP', 'Request']
 * ```
 */
export function words(identifier: string): string[] {
  return identifier.match(WORD) ?? []
}

/**
 * Converts an identifier to snake_case: `MsgOne` becomes `msg_one`,
 * `HTTPRequest` becomes `http_request`.
 */
export function toSnakeCase(identifier: string): string {
  return words(identifier)
    .map((word) => word.toLowerCase())
    .join('_')
}

/**
 * Returns true if the name can be used as a method name on a handle.
 */
export function isOperationName(name: string): boolean {
  return OPERATION_NAME.test(name)
}
