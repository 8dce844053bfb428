// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Successful outcome of an operation.
 */
export interface Ok<T> {
  readonly ok: true
  readonly value: T
}

/**
 * Failed outcome of an operation.
 */
export interface Err<E> {
  readonly ok: false
  readonly error: E
}

/**
 * Outcome of every handle operation. Call-time failures are returned,
 * never thrown, so a caller always sees a typed value.
 */
export type Result<T, E> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error }
}

/**
 * Returns the value of a successful result, or throws the error of a
 * failed one.
 *
 * @param result The result to unwrap
 * @returns The success value
 * @throws The result's error when it is not ok
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value
  }
  throw result.error
}
