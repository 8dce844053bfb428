// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Interface for components that can be stopped.
 *
 * Implemented by workers and handles so the actor registry can tear
 * them down without knowing their message types.
 */
export interface Stoppable {
  /**
   * Stops the component.
   * After stop, the component does not accept new work; work already
   * accepted is finished first.
   * @returns Promise that resolves when stop completes
   */
  stop(): Promise<void>
}
