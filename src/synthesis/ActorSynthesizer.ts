// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import type { MessageType, ProcessorType } from './Declarations.js'
import { MESSAGE_DISCRIMINANT, type OperationModel, type OutputModel } from './OutputModel.js'
import { SynthesisOptionsDefaults, type SynthesisOptions } from './SynthesisOptions.js'
import { RESERVED_OPERATION_NAMES, type VariantContract } from './VariantContract.js'

/**
 * Assembles the output model of an accepted unit. Never fails: the
 * analyzer and the contract deriver have already checked everything
 * this relies on.
 *
 * @param processor The accepted processor type
 * @param message Its message type
 * @param contracts One contract per variant, in variant order
 */
export function synthesize(
  processor: ProcessorType,
  message: MessageType,
  contracts: readonly VariantContract[],
  options: SynthesisOptions = SynthesisOptionsDefaults
): OutputModel {
  const operations: OperationModel[] = contracts.flatMap((contract) => [
    {
      name: contract.waitSignature.name,
      form: contract.waitSignature.form,
      variant: contract.variant,
      success: contract.waitSignature.success
    },
    {
      name: contract.noWaitSignature.name,
      form: contract.noWaitSignature.form,
      variant: contract.variant,
      success: contract.noWaitSignature.success
    }
  ])

  return {
    actorName: processor.name,
    message: {
      name: message.name,
      repliesName: `${processor.name}Replies`,
      discriminant: MESSAGE_DISCRIMINANT,
      variants: contracts.map((contract) => ({
        name: contract.variant,
        fields: contract.payloadFields,
        responseType: contract.responseType
      }))
    },
    mailbox: {
      carries: message.name,
      capacity: 'unbounded',
      producers: 'many',
      consumers: 'one'
    },
    worker: {
      name: `${processor.name}Worker`,
      processorName: processor.name,
      processorTypeName: `${processor.name}Processor`,
      handler: options.handlerName,
      loop: ['receive', 'terminate-if-closed', 'invoke-handler', 'await-handler']
    },
    handle: {
      name: options.handlePrefix + processor.name,
      members: RESERVED_OPERATION_NAMES
    },
    construction: ['create-mailbox', 'bind-processor', 'spawn-worker', 'return-handle'],
    operations,
    contracts
  }
}
