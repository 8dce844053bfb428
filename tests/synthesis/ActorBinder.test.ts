// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect } from 'vitest'
import { bindActor } from '@/synthesis/ActorBinder'
import { generateActorOrThrow } from '@/synthesis/ActorGenerator'
import { synthesisOptions } from '@/synthesis/SynthesisOptions'
import { NoOpLogger } from '@/actors/Logger'
import { Calculator, calculatorUnit, type CalculatorMsg } from '../fixtures/Calculator'

const output = generateActorOrThrow(calculatorUnit, synthesisOptions({ logger: NoOpLogger }))

const msgOne: CalculatorMsg = { kind: 'MsgOne', value: 1 }
const msgTwo: CalculatorMsg = { kind: 'MsgTwo', value: 3 }

describe('ActorBinder', () => {
  it('should expose every derived operation by name', async () => {
    const actor = bindActor(output, new Calculator(), { logger: NoOpLogger })

    expect(actor.name()).toBe('Calculator')
    expect(actor.output()).toBe(output)
    expect(actor.operationNames()).toEqual(['msg_one', 'msg_one_no_wait', 'msg_two', 'msg_two_no_wait'])
    expect(actor.operation('msg_two_no_wait')?.variant).toBe('MsgTwo')
    expect(actor.operation('msg_two_no_wait')?.form).toBe('no-wait')
    expect(actor.operation('missing')).toBeUndefined()

    await actor.stop()
  })

  it('should run the wait and no-wait operations', async () => {
    const processor = new Calculator()
    const actor = bindActor(output, processor, { logger: NoOpLogger })

    expect(await actor.invoke('msg_one', msgOne)).toEqual({ ok: true, value: 101 })
    expect(await actor.invoke('msg_two', msgTwo)).toEqual({ ok: true, value: 30 })
    expect(await actor.invoke('msg_one_no_wait', msgOne)).toEqual({ ok: true, value: undefined })

    await actor.stop()
    expect(processor.seen).toEqual([1, 3, 1])
  })

  it('should refuse a message of another variant', async () => {
    const actor = bindActor(output, new Calculator(), { logger: NoOpLogger })

    const result = await actor.invoke('msg_two', msgOne)

    expect(result.ok ? undefined : result.error.kind).toBe('WrongVariant')

    await actor.stop()
  })

  it('should reject an unknown operation', async () => {
    const actor = bindActor(output, new Calculator(), { logger: NoOpLogger })

    await expect(actor.invoke('msg_three', msgOne)).rejects.toThrow("Actor 'ActorCalculator' has no operation 'msg_three'")

    await actor.stop()
  })

  it('should share the worker between clones', async () => {
    const actor = bindActor(output, new Calculator(), { logger: NoOpLogger })
    const clone = actor.clone()

    actor.close()

    expect(actor.isClosed()).toBe(true)
    expect(clone.isClosed()).toBe(false)
    expect(await clone.invoke('msg_one', msgOne)).toEqual({ ok: true, value: 101 })

    clone.close()
    await clone.completion()

    const after = await clone.invoke('msg_one', msgOne)
    expect(after.ok ? undefined : after.error.kind).toBe('SendFailed')
  })
})
