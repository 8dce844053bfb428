// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect } from 'vitest'
import { ActorWorker } from '@/actors/ActorWorker'
import { ArrayMailbox } from '@/actors/ArrayMailbox'
import { DeadLetters } from '@/actors/DeadLetters'
import type { Envelope } from '@/actors/Envelope'
import { NoOpLogger, type Logger } from '@/actors/Logger'
import { createResponseSlot } from '@/actors/ResponseSlot'
import { Calculator, type CalculatorMsg, type CalculatorReplies } from '../fixtures/Calculator'
import { RecordingLogger } from '../fixtures/RecordingLogger'

function newWorker(logger: Logger = NoOpLogger) {
  const mailbox = new ArrayMailbox<Envelope<CalculatorMsg, CalculatorReplies>>()
  const processor = new Calculator()
  const worker = new ActorWorker(processor, mailbox, {
    name: 'calculator',
    logger,
    failurePolicy: 'stop',
    deadLetters: new DeadLetters(NoOpLogger)
  })
  return { mailbox, processor, worker }
}

describe('ActorWorker', () => {
  it('should reply through the envelope slot', async () => {
    const { mailbox, worker } = newWorker()
    const slot = createResponseSlot<number>()

    void worker.start()
    mailbox.send({ message: { kind: 'MsgOne', value: 5 }, call: { mode: 'wait', reply: slot.sender } })

    expect(await slot.receiver.receive()).toEqual({ status: 'filled', value: 105 })
    expect(worker.isRunning()).toBe(true)

    await worker.stop()
    expect(worker.isRunning()).toBe(false)
    expect(worker.processedCount()).toBe(1)
  })

  it('should start only once', async () => {
    const { worker } = newWorker()

    const first = worker.start()
    const second = worker.start()

    expect(first).toBe(second)

    await worker.stop()
  })

  it('should log its lifecycle and processor failures', async () => {
    const logger = new RecordingLogger()
    const { mailbox, worker } = newWorker(logger)

    void worker.start()
    mailbox.send({ message: { kind: 'MsgTwo', value: -2 }, call: { mode: 'fire' } })
    await worker.start()

    expect(logger.lines).toEqual([
      "debug: Actor 'calculator' started",
      "error: Actor 'calculator' failed processing 'MsgTwo': Error: Negative value: -2",
      "debug: Actor 'calculator' stopped after 1 envelope(s)"
    ])
  })
})
