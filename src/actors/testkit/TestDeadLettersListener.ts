// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { DeadLetter, DeadLettersListener } from '../DeadLetters.js'

/**
 * Dead letters listener that records what it receives.
 */
export class TestDeadLettersListener implements DeadLettersListener {
  private _deadLetters: DeadLetter[] = []

  handle(deadLetter: DeadLetter): void {
    this._deadLetters.push(deadLetter)
  }

  deadLetters(): DeadLetter[] {
    return [...this._deadLetters]
  }

  count(): number {
    return this._deadLetters.length
  }

  clear(): void {
    this._deadLetters = []
  }
}
