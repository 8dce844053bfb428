// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { describe, it, expect } from 'vitest'
import { emitTypeScript } from '@/synthesis/TypeScriptEmitter'
import { generateActorOrThrow } from '@/synthesis/ActorGenerator'
import { field, messageType, named, optional, processorType, handlerMethod, variant } from '@/synthesis/Declarations'
import { synthesisOptions } from '@/synthesis/SynthesisOptions'
import { NoOpLogger } from '@/actors/Logger'
import { calculatorUnit } from '../fixtures/Calculator'
import { CalculatorDeclarations } from '../../examples/calculator/model/Calculator'

const options = synthesisOptions({ logger: NoOpLogger })

describe('TypeScriptEmitter', () => {
  it('should emit the complete calculator module', () => {
    const source = emitTypeScript(generateActorOrThrow(calculatorUnit, options), options)

    expect(source.split('\n')).toEqual([
      '// Generated by actor-synth from Calculator and CalculatorMsg.',
      'import {',
      '  ActorHandle,',
      '  type ActorConfig,',
      '  type ActorWorker,',
      '  type Envelope,',
      '  type OperationError,',
      '  type Result',
      "} from 'actor-synth'",
      '',
      'export type CalculatorMsg =',
      "  | { readonly kind: 'MsgOne'; readonly value: number }",
      "  | { readonly kind: 'MsgTwo'; readonly value: number }",
      '',
      'export interface CalculatorReplies {',
      '  readonly MsgOne: number',
      '  readonly MsgTwo: number',
      '}',
      '',
      'export interface CalculatorProcessor {',
      '  process(envelope: Envelope<CalculatorMsg, CalculatorReplies>): Promise<void>',
      '}',
      '',
      'export type CalculatorWorker = ActorWorker<CalculatorMsg, CalculatorReplies>',
      '',
      'export class ActorCalculator {',
      '  private constructor(private readonly handle: ActorHandle<CalculatorMsg, CalculatorReplies>) {}',
      '',
      '  static create(processor: CalculatorProcessor, config?: ActorConfig): ActorCalculator {',
      '    const bound = { process: (envelope: Envelope<CalculatorMsg, CalculatorReplies>) => processor.process(envelope) }',
      '    return new ActorCalculator(ActorHandle.spawn<CalculatorMsg, CalculatorReplies>(bound, config))',
      '  }',
      '',
      '  clone(): ActorCalculator {',
      '    return new ActorCalculator(this.handle.clone())',
      '  }',
      '',
      '  close(): void {',
      '    this.handle.close()',
      '  }',
      '',
      '  stop(): Promise<void> {',
      '    return this.handle.stop()',
      '  }',
      '',
      '  completion(): Promise<void> {',
      '    return this.handle.completion()',
      '  }',
      '',
      '  msg_one(message: CalculatorMsg): Promise<Result<number, OperationError>> {',
      "    return this.handle.request('MsgOne', message)",
      '  }',
      '',
      '  msg_one_no_wait(message: CalculatorMsg): Promise<Result<void, OperationError>> {',
      "    return this.handle.tell('MsgOne', message)",
      '  }',
      '',
      '  msg_two(message: CalculatorMsg): Promise<Result<number, OperationError>> {',
      "    return this.handle.request('MsgTwo', message)",
      '  }',
      '',
      '  msg_two_no_wait(message: CalculatorMsg): Promise<Result<void, OperationError>> {',
      "    return this.handle.tell('MsgTwo', message)",
      '  }',
      '}',
      ''
    ])
  })

  it('should render optional and generic field types', () => {
    const unit = {
      declarations: [
        processorType('Store', [handlerMethod('StoreMsg')]),
        messageType(
          'StoreMsg',
          variant('Put', field('key', named('string')), field('note', optional(named('string'))), field('resp', named('boolean'))),
          variant('Keys', field('resp', named('Option', named('Array', named('string')))))
        )
      ]
    }

    const lines = emitTypeScript(generateActorOrThrow(unit, options), options).split('\n')

    expect(lines).toContain("  | { readonly kind: 'Put'; readonly key: string; readonly note: string | undefined }")
    expect(lines).toContain("  | { readonly kind: 'Keys' }")
    expect(lines).toContain('  readonly Keys: Array<string>')
    expect(lines).toContain('  keys(message: StoreMsg): Promise<Result<Array<string>, OperationError>> {')
  })

  it('should emit unwrapped reply types for the calculator example', () => {
    const lines = emitTypeScript(generateActorOrThrow(CalculatorDeclarations, options), options).split('\n')
    const start = lines.indexOf('export interface CalculatorReplies {')

    expect(lines.slice(start, start + 6)).toEqual([
      'export interface CalculatorReplies {',
      '  readonly Add: number',
      '  readonly Multiply: number',
      '  readonly Reset: void',
      '  readonly LastEntry: number',
      '}'
    ])
  })

  it('should honor the configured runtime module, prefix and handler', () => {
    const custom = synthesisOptions({
      runtimeModule: '../runtime/index.js',
      handlePrefix: 'Remote',
      handlerName: 'handle',
      logger: NoOpLogger
    })
    const unit = {
      declarations: [
        processorType('Counter', [handlerMethod('CounterMsg', 'exclusive', 'handle')]),
        messageType('CounterMsg', variant('Increment', field('resp', named('number'))))
      ]
    }

    const lines = emitTypeScript(generateActorOrThrow(unit, custom), custom).split('\n')

    expect(lines).toContain("} from '../runtime/index.js'")
    expect(lines).toContain('export class RemoteCounter {')
    expect(lines).toContain('  handle(envelope: Envelope<CounterMsg, CounterReplies>): Promise<void>')
    expect(lines).toContain('    const bound = { process: (envelope: Envelope<CounterMsg, CounterReplies>) => processor.handle(envelope) }')
  })
})
