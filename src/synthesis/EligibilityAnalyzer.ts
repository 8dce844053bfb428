// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import {
  isMessageType,
  isProcessorType,
  type DeclarationUnit,
  type HandlerBinding,
  type MessageType,
  type MethodDeclaration,
  type ProcessorType
} from './Declarations.js'
import { MESSAGE_DISCRIMINANT } from './OutputModel.js'
import type { RejectionReason } from './SynthesisError.js'
import { SynthesisOptionsDefaults, type SynthesisOptions } from './SynthesisOptions.js'

export interface Accepted {
  readonly accepted: true
  readonly processor: ProcessorType
  readonly message: MessageType
  readonly handler: HandlerBinding
}

export interface Rejected {
  readonly accepted: false
  readonly reason: RejectionReason
}

export type Analysis = Accepted | Rejected

interface Pair {
  readonly processor: ProcessorType
  readonly message: MessageType
}

/**
 * Decides whether a unit qualifies as a generatable actor.
 *
 * Rules, in order, first failure wins:
 * 1. exactly one processor/message pair is linked
 * 2. the processor has an async handler taking the message exclusively
 * 3. the message type has at least one variant
 * 4. every variant has exactly one response field, and no other field
 *    named like the variant tag
 *
 * The unit is accepted or rejected as a whole.
 */
export function analyze(unit: DeclarationUnit, options: SynthesisOptions = SynthesisOptionsDefaults): Analysis {
  const pairs = unit.bindings ? pairsByBinding(unit) : pairsByConvention(unit, options)
  const [pair] = pairs
  // More than one explicit binding is ambiguous even if only one resolves.
  const bindingCount = unit.bindings?.length ?? 1

  if (bindingCount !== 1 || pairs.length !== 1 || pair === undefined) {
    return rejected({
      code: 'AmbiguousOrMissingPair',
      pairs: pairs.map((each) => ({ processor: each.processor.name, message: each.message.name }))
    })
  }

  const { processor, message } = pair
  const method = findHandler(processor, message, options)

  if (!method) {
    return rejected({
      code: 'MissingHandler',
      processor: processor.name,
      message: message.name,
      handler: options.handlerName
    })
  }

  if (message.variants.length === 0) {
    return rejected({ code: 'EmptyMessageType', message: message.name })
  }

  for (const variant of message.variants) {
    const responseFields = variant.fields.filter((field) => field.name === options.responseField)

    if (responseFields.length === 0) {
      return rejected({
        code: 'MissingResponseField',
        message: message.name,
        variant: variant.name,
        field: options.responseField
      })
    }

    if (responseFields.length > 1) {
      return rejected({
        code: 'DuplicateResponseField',
        message: message.name,
        variant: variant.name,
        field: options.responseField
      })
    }

    const tag = variant.fields.find((field) => field.name === MESSAGE_DISCRIMINANT && field.name !== options.responseField)

    if (tag) {
      return rejected({
        code: 'ReservedFieldName',
        message: message.name,
        variant: variant.name,
        field: tag.name
      })
    }
  }

  return {
    accepted: true,
    processor,
    message,
    handler: { processor: processor.name, method }
  }
}

function rejected(reason: RejectionReason): Rejected {
  return { accepted: false, reason }
}

function pairsByConvention(unit: DeclarationUnit, options: SynthesisOptions): Pair[] {
  const processors = unit.declarations.filter(isProcessorType)
  const messages = unit.declarations.filter(isMessageType)

  return processors.flatMap((processor) =>
    messages
      .filter((message) => message.name === processor.name + options.messageSuffix)
      .map((message) => ({ processor, message }))
  )
}

function pairsByBinding(unit: DeclarationUnit): Pair[] {
  return (unit.bindings ?? []).flatMap((binding) => pairsByNames(unit, binding.processor, binding.message))
}

function pairsByNames(unit: DeclarationUnit, processorName: string, messageName: string): Pair[] {
  const processors = unit.declarations.filter(isProcessorType).filter((each) => each.name === processorName)
  const messages = unit.declarations.filter(isMessageType).filter((each) => each.name === messageName)

  return processors.flatMap((processor) => messages.map((message) => ({ processor, message })))
}

function findHandler(
  processor: ProcessorType,
  message: MessageType,
  options: SynthesisOptions
): MethodDeclaration | undefined {
  return processor.methods.find((method) =>
    method.name === options.handlerName &&
    method.isAsync &&
    method.parameters.length === 1 &&
    method.parameters.every((parameter) =>
      parameter.type.kind === 'named' &&
      parameter.type.name === message.name &&
      parameter.type.arguments.length === 0 &&
      parameter.passing !== 'shared'
    )
  )
}
