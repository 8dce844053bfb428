// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect } from 'vitest'
import { named, optional, renderType, unwrapOptional } from '@/synthesis/Declarations'

describe('Declarations', () => {
  it('should render type references', () => {
    expect(renderType(named('number'))).toBe('number')
    expect(renderType(named('Map', named('string'), named('Array', named('number'))))).toBe('Map<string, Array<number>>')
    expect(renderType(optional(named('string')))).toBe('string | undefined')
  })

  it('should unwrap only listed wrappers', () => {
    expect(unwrapOptional(named('Option', named('string')), ['Option'])).toEqual(named('string'))
    expect(unwrapOptional(named('Option', named('string')), [])).toEqual(named('Option', named('string')))
  })
})
