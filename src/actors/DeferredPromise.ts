// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * A promise that can be resolved from outside its executor.
 *
 * Bridges the two sides of the runtime that never share a call stack:
 * - the caller awaiting a reply, and the worker writing it
 * - the worker waiting for the next envelope, and a producer enqueuing it
 *
 * Only `resolve` is exposed; failures travel as Result values.
 */
export interface DeferredPromise<T> {
  /**
   * The promise that will be resolved.
   */
  promise: Promise<T>

  /**
   * Resolves the promise with a value. Later calls are ignored by the
   * underlying promise.
   * @param value The resolution value
   */
  resolve: (value: T) => void
}

/**
 * Creates a deferred promise that can be resolved externally.
 *
 * @returns A DeferredPromise containing the promise and its resolve function
 */
export function createDeferred<T>(): DeferredPromise<T> {
  let resolve: (value: T) => void

  const promise = new Promise<T>((resolveWith) => {
    resolve = resolveWith
  })

  return {
    promise,
    resolve: resolve!
  }
}
