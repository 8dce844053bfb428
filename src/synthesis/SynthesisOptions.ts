// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { DefaultLogger, type Logger } from '../actors/Logger.js'

/**
 * Conventions the analyzer, deriver, synthesizer and emitter follow.
 */
export interface SynthesisOptions {
  /**
   * Appended to a processor name to form its message type name when no
   * explicit binding is given.
   */
  readonly messageSuffix: string
  readonly handlerName: string
  /**
   * Name of the field whose type is a variant's response type.
   */
  readonly responseField: string
  /**
   * Prepended to the processor name to form the handle type name.
   */
  readonly handlePrefix: string
  readonly noWaitSuffix: string
  /**
   * Single-argument generic types treated as optional wrappers around a
   * response type.
   */
  readonly optionalWrappers: readonly string[]
  /**
   * Module specifier the emitted source imports the runtime from.
   */
  readonly runtimeModule: string
  readonly logger: Logger
}

export const SynthesisOptionsDefaults: SynthesisOptions = {
  messageSuffix: 'Msg',
  handlerName: 'process',
  responseField: 'resp',
  handlePrefix: 'Actor',
  noWaitSuffix: '_no_wait',
  optionalWrappers: ['Option', 'Optional', 'Maybe'],
  runtimeModule: 'actor-synth',
  logger: DefaultLogger
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/
const IDENTIFIER_PART = /^[A-Za-z0-9_$]*$/

/**
 * Merges overrides onto the defaults and validates the result.
 *
 * @throws Error if a name-forming option could not produce identifiers
 */
export function synthesisOptions(overrides: Partial<SynthesisOptions> = {}): SynthesisOptions {
  const options: SynthesisOptions = { ...SynthesisOptionsDefaults, ...overrides }

  if (options.messageSuffix.length === 0 || !IDENTIFIER_PART.test(options.messageSuffix)) {
    throw new Error(`Invalid message suffix '${options.messageSuffix}'`)
  }

  for (const [label, value] of [
    ['handler name', options.handlerName],
    ['response field', options.responseField]
  ] as const) {
    if (!IDENTIFIER.test(value)) {
      throw new Error(`Invalid ${label} '${value}'`)
    }
  }

  if (!IDENTIFIER_PART.test(options.handlePrefix)) {
    throw new Error(`Invalid handle prefix '${options.handlePrefix}'`)
  }

  if (options.noWaitSuffix.length === 0 || !IDENTIFIER_PART.test(options.noWaitSuffix)) {
    throw new Error(`Invalid no-wait suffix '${options.noWaitSuffix}'`)
  }

  return options
}
