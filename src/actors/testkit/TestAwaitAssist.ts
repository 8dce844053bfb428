// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Polling options for awaitAssert.
 */
export interface AwaitOptions {
  /** Total time to keep retrying, in milliseconds. Default: 1000 */
  timeout?: number
  /** Delay between attempts, in milliseconds. Default: 5 */
  interval?: number
}

/**
 * Retries an assertion until it passes or the timeout elapses, then
 * rethrows the last failure. Useful when the effect being asserted is
 * produced by a worker running concurrently with the test.
 *
 * @example
 * ```typescript
 * await handle.tell('Record', { kind: 'Record', value: 1 })
 * await awaitAssert(() => expect(recorder.values).toEqual([1]))
 * ```
 */
export async function awaitAssert(assertion: () => void, options: AwaitOptions = {}): Promise<void> {
  const timeout = options.timeout ?? 1000
  const interval = options.interval ?? 5
  const deadline = Date.now() + timeout

  for (;;) {
    try {
      assertion()
      return
    } catch (error) {
      if (Date.now() >= deadline) {
        throw error
      }
    }
    await new Promise((resolve) => setTimeout(resolve, interval))
  }
}
