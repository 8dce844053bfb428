// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import {
  ActorRuntime,
  bindActor,
  describeRejection,
  generateActor,
  generateTypeScript,
  synthesisOptions,
  unwrap,
  type ActorMessage,
  type Processor,
  type Replies
} from '../../src/index.js'
import { Calculator, CalculatorDeclarations, type CalculatorMsg, type CalculatorReplies } from './model/Calculator.js'

/**
 * Calculator example
 *
 * Walks through both ways of using a synthesized actor:
 * - emitting the TypeScript module for the calculator unit
 * - spawning the calculator in a runtime and calling its operations
 * - binding the output model and calling operations by derived name
 * - showing why a malformed unit is rejected
 */

const options = synthesisOptions({ runtimeModule: 'actor-synth' })

function section(title: string): void {
  console.log('\n' + '═'.repeat(48))
  console.log(`  ${title}`)
  console.log('═'.repeat(48))
}

async function main(): Promise<void> {
  section('Generated module')
  console.log(generateTypeScript(CalculatorDeclarations, options))

  section('Runtime')
  const runtime = new ActorRuntime()
  const calculator = runtime.spawn<CalculatorMsg, CalculatorReplies>('calculator', new Calculator())

  await calculator.tell('Add', { kind: 'Add', value: 4 })
  console.log('add(6)        =', unwrap(await calculator.request('Add', { kind: 'Add', value: 6 })))
  console.log('multiply(3)   =', unwrap(await calculator.request('Multiply', { kind: 'Multiply', value: 3 })))
  console.log('last_entry()  =', unwrap(await calculator.request('LastEntry', { kind: 'LastEntry' })))

  await calculator.request('Reset', { kind: 'Reset' })
  const empty = await calculator.request('LastEntry', { kind: 'LastEntry' })
  if (!empty.ok) {
    console.log('last_entry()  ->', empty.error.message)
  }

  const wrong = await calculator.request('Add', { kind: 'Reset' })
  if (!wrong.ok) {
    console.log('add(reset)    ->', wrong.error.message)
  }

  section('Bound by operation name')
  const generation = generateActor(CalculatorDeclarations, options)
  if (generation.generated) {
    const processor: Processor<ActorMessage, Replies<ActorMessage>> = new Calculator()
    const bound = bindActor(generation.output, processor)
    const add: CalculatorMsg = { kind: 'Add', value: 2 }

    console.log('operations    =', bound.operationNames().join(', '))
    console.log('add(2)        =', unwrap(await bound.invoke('add', add)))
    await bound.stop()
  }

  section('Rejected unit')
  const rejected = generateActor(
    { declarations: CalculatorDeclarations.declarations.filter((declaration) => declaration.kind === 'message') },
    options
  )
  if (!rejected.generated) {
    console.log(describeRejection(rejected.reason))
  }

  await runtime.teardown()
}

main().catch((error: unknown) => {
  console.error(error)
  process.exitCode = 1
})
