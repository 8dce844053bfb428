// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect } from 'vitest'
import { synthesisOptions, SynthesisOptionsDefaults, type SynthesisOptions } from '@/synthesis/SynthesisOptions'
import { DefaultLogger, NoOpLogger } from '@/actors/Logger'

describe('SynthesisOptions', () => {
  it('should default to the standard conventions', () => {
    expect(synthesisOptions()).toEqual(SynthesisOptionsDefaults)
    expect(SynthesisOptionsDefaults.messageSuffix).toBe('Msg')
    expect(SynthesisOptionsDefaults.responseField).toBe('resp')
    expect(SynthesisOptionsDefaults.handlePrefix).toBe('Actor')
    expect(SynthesisOptionsDefaults.noWaitSuffix).toBe('_no_wait')
    expect(SynthesisOptionsDefaults.logger).toBe(DefaultLogger)
  })

  it('should merge overrides', () => {
    const options = synthesisOptions({ messageSuffix: 'Message', logger: NoOpLogger })

    expect(options.messageSuffix).toBe('Message')
    expect(options.handlerName).toBe('process')
    expect(options.logger).toBe(NoOpLogger)
  })

  it.each<[Partial<SynthesisOptions>, string]>([
    [{ messageSuffix: '' }, "Invalid message suffix ''"],
    [{ messageSuffix: 'Msg-' }, "Invalid message suffix 'Msg-'"],
    [{ handlerName: '1process' }, "Invalid handler name '1process'"],
    [{ responseField: 're sp' }, "Invalid response field 're sp'"],
    [{ handlePrefix: 'Actor.' }, "Invalid handle prefix 'Actor.'"],
    [{ noWaitSuffix: '' }, "Invalid no-wait suffix ''"]
  ])('should reject %o', (overrides, message) => {
    expect(() => synthesisOptions(overrides)).toThrow(message)
  })

  it('should allow an empty handle prefix', () => {
    expect(synthesisOptions({ handlePrefix: '' }).handlePrefix).toBe('')
  })
})
