// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { synthesize } from './ActorSynthesizer.js'
import type { DeclarationUnit, HandlerBinding } from './Declarations.js'
import { analyze } from './EligibilityAnalyzer.js'
import type { OutputModel } from './OutputModel.js'
import { describeRejection, SynthesisError, type RejectionReason } from './SynthesisError.js'
import { SynthesisOptionsDefaults, type SynthesisOptions } from './SynthesisOptions.js'
import { emitTypeScript } from './TypeScriptEmitter.js'
import { deriveContracts } from './VariantContract.js'

export type Generation =
  | { readonly generated: true; readonly output: OutputModel; readonly handler: HandlerBinding }
  | { readonly generated: false; readonly reason: RejectionReason }

/**
 * Runs analysis, contract derivation and synthesis over one unit.
 * Either every step succeeds and an output model is returned, or the
 * first failing step's reason is returned and nothing is produced.
 */
export function generateActor(unit: DeclarationUnit, options: SynthesisOptions = SynthesisOptionsDefaults): Generation {
  const logger = options.logger

  const analysis = analyze(unit, options)
  if (!analysis.accepted) {
    logger.debug(`Rejected: ${describeRejection(analysis.reason)}`)
    return { generated: false, reason: analysis.reason }
  }

  logger.debug(`Accepted ${analysis.processor.name} with ${analysis.message.name} (${analysis.message.variants.length} variant(s))`)

  const derivation = deriveContracts(analysis.message, options)
  if (!derivation.derived) {
    logger.debug(`Rejected: ${describeRejection(derivation.reason)}`)
    return { generated: false, reason: derivation.reason }
  }

  const output = synthesize(analysis.processor, analysis.message, derivation.contracts, options)
  logger.debug(`Synthesized ${output.handle.name}: ${output.operations.map((operation) => operation.name).join(', ')}`)

  return { generated: true, output, handler: analysis.handler }
}

/**
 * Like generateActor, but throws on rejection.
 *
 * @throws SynthesisError carrying the rejection reason
 */
export function generateActorOrThrow(unit: DeclarationUnit, options: SynthesisOptions = SynthesisOptionsDefaults): OutputModel {
  const generation = generateActor(unit, options)

  if (!generation.generated) {
    throw new SynthesisError(generation.reason)
  }

  return generation.output
}

/**
 * Generates and renders one unit as a TypeScript module.
 *
 * @throws SynthesisError carrying the rejection reason
 */
export function generateTypeScript(unit: DeclarationUnit, options: SynthesisOptions = SynthesisOptionsDefaults): string {
  return emitTypeScript(generateActorOrThrow(unit, options), options)
}
