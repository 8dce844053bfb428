// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { renderType } from './Declarations.js'
import type { MessageVariantModel, OperationModel, OutputModel } from './OutputModel.js'
import { SynthesisOptionsDefaults, type SynthesisOptions } from './SynthesisOptions.js'

/**
 * Renders an output model as a TypeScript module built on the runtime
 * in `options.runtimeModule`.
 *
 * The module declares, in order: the message union, the replies
 * interface, the processor interface, the worker type, and the handle
 * class with one wait/no-wait method pair per variant.
 */
export function emitTypeScript(output: OutputModel, options: SynthesisOptions = SynthesisOptionsDefaults): string {
  const messageType = output.message.name
  const repliesType = output.message.repliesName
  const handleType = output.handle.name
  const typeArguments = `${messageType}, ${repliesType}`
  const lines: string[] = []

  lines.push(`// Generated by actor-synth from ${output.actorName} and ${messageType}.`)
  lines.push('import {')
  lines.push('  ActorHandle,')
  lines.push('  type ActorConfig,')
  lines.push('  type ActorWorker,')
  lines.push('  type Envelope,')
  lines.push('  type OperationError,')
  lines.push('  type Result')
  lines.push(`} from '${options.runtimeModule}'`)
  lines.push('')

  lines.push(`export type ${messageType} =`)
  for (const variant of output.message.variants) {
    lines.push(`  | ${renderVariant(variant, output.message.discriminant)}`)
  }
  lines.push('')

  lines.push(`export interface ${repliesType} {`)
  for (const variant of output.message.variants) {
    lines.push(`  readonly ${variant.name}: ${renderType(variant.responseType)}`)
  }
  lines.push('}')
  lines.push('')

  lines.push(`export interface ${output.worker.processorTypeName} {`)
  lines.push(`  ${output.worker.handler}(envelope: Envelope<${typeArguments}>): Promise<void>`)
  lines.push('}')
  lines.push('')

  lines.push(`export type ${output.worker.name} = ActorWorker<${typeArguments}>`)
  lines.push('')

  lines.push(`export class ${handleType} {`)
  lines.push(`  private constructor(private readonly handle: ActorHandle<${typeArguments}>) {}`)
  lines.push('')
  lines.push(`  static create(processor: ${output.worker.processorTypeName}, config?: ActorConfig): ${handleType} {`)
  lines.push(`    const bound = { process: (envelope: Envelope<${typeArguments}>) => processor.${output.worker.handler}(envelope) }`)
  lines.push(`    return new ${handleType}(ActorHandle.spawn<${typeArguments}>(bound, config))`)
  lines.push('  }')
  lines.push('')
  lines.push(`  clone(): ${handleType} {`)
  lines.push(`    return new ${handleType}(this.handle.clone())`)
  lines.push('  }')
  lines.push('')
  lines.push('  close(): void {')
  lines.push('    this.handle.close()')
  lines.push('  }')
  lines.push('')
  lines.push('  stop(): Promise<void> {')
  lines.push('    return this.handle.stop()')
  lines.push('  }')
  lines.push('')
  lines.push('  completion(): Promise<void> {')
  lines.push('    return this.handle.completion()')
  lines.push('  }')

  for (const operation of output.operations) {
    lines.push('')
    lines.push(...renderOperation(operation, messageType))
  }

  lines.push('}')
  lines.push('')

  return lines.join('\n')
}

function renderVariant(variant: MessageVariantModel, discriminant: string): string {
  const members = [`readonly ${discriminant}: '${variant.name}'`]
    .concat(variant.fields.map((field) => `readonly ${field.name}: ${renderType(field.type)}`))

  return `{ ${members.join('; ')} }`
}

function renderOperation(operation: OperationModel, messageType: string): string[] {
  const call = operation.form === 'wait' ? 'request' : 'tell'

  return [
    `  ${operation.name}(message: ${messageType}): Promise<Result<${renderType(operation.success)}, OperationError>> {`,
    `    return this.handle.${call}('${operation.variant}', message)`,
    '  }'
  ]
}
