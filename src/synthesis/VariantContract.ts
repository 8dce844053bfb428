// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import { named, unwrapOptional, type FieldDeclaration, type MessageType, type TypeReference, type Variant } from './Declarations.js'
import { isOperationName, toSnakeCase } from './OperationNaming.js'
import type { RejectionReason } from './SynthesisError.js'
import { SynthesisOptionsDefaults, type SynthesisOptions } from './SynthesisOptions.js'

/**
 * Members every generated handle class declares besides its operations.
 */
export const RESERVED_OPERATION_NAMES: readonly string[] = [
  'constructor',
  'create',
  'handle',
  'clone',
  'close',
  'stop',
  'completion'
]

export type OperationForm = 'wait' | 'no-wait'

/**
 * Shape of one handle operation: `name(message) -> Result<success, OperationError>`.
 */
export interface OperationSignature {
  readonly name: string
  readonly form: OperationForm
  readonly success: TypeReference
}

/**
 * Public API derived from one variant. Immutable once computed.
 */
export interface VariantContract {
  readonly variant: string
  readonly operationName: string
  readonly noWaitOperationName: string
  /**
   * The response field's type with any optional wrapper removed.
   */
  readonly responseType: TypeReference
  /**
   * The variant's fields other than the response field, in order.
   */
  readonly payloadFields: readonly FieldDeclaration[]
  readonly waitSignature: OperationSignature
  readonly noWaitSignature: OperationSignature
}

export type ContractDerivation =
  | { readonly derived: true; readonly contracts: readonly VariantContract[] }
  | { readonly derived: false; readonly reason: RejectionReason }

export const VOID_TYPE: TypeReference = named('void')

/**
 * Derives the contract of one variant. Pure and deterministic.
 *
 * @throws Error if the variant has no response field, which an accepted
 *   unit never contains
 */
export function deriveContract(variant: Variant, options: SynthesisOptions = SynthesisOptionsDefaults): VariantContract {
  const response = variant.fields.find((field) => field.name === options.responseField)

  if (!response) {
    throw new Error(`Variant '${variant.name}' has no '${options.responseField}' field`)
  }

  const operationName = toSnakeCase(variant.name)
  const noWaitOperationName = operationName + options.noWaitSuffix
  const responseType = unwrapOptional(response.type, options.optionalWrappers)

  return {
    variant: variant.name,
    operationName,
    noWaitOperationName,
    responseType,
    payloadFields: variant.fields.filter((field) => field !== response),
    waitSignature: { name: operationName, form: 'wait', success: responseType },
    noWaitSignature: { name: noWaitOperationName, form: 'no-wait', success: VOID_TYPE }
  }
}

/**
 * Derives every variant's contract and checks the derived names against
 * each other and against the handle's own members. A collision can only
 * be seen across variants, which is why it is reported here rather than
 * by the analyzer.
 */
export function deriveContracts(
  message: MessageType,
  options: SynthesisOptions = SynthesisOptionsDefaults
): ContractDerivation {
  const contracts = message.variants.map((variant) => deriveContract(variant, options))
  const owners = new Map<string, string[]>()

  for (const contract of contracts) {
    if (!isOperationName(contract.operationName)) {
      return {
        derived: false,
        reason: { code: 'InvalidOperationName', operation: contract.operationName, variant: contract.variant }
      }
    }

    for (const name of [contract.operationName, contract.noWaitOperationName]) {
      if (RESERVED_OPERATION_NAMES.includes(name)) {
        return {
          derived: false,
          reason: { code: 'ReservedOperationName', operation: name, variant: contract.variant }
        }
      }

      owners.set(name, [...(owners.get(name) ?? []), contract.variant])
    }
  }

  for (const [operation, variants] of owners) {
    if (variants.length > 1) {
      return {
        derived: false,
        reason: { code: 'DuplicateOperationName', operation, variants }
      }
    }
  }

  return { derived: true, contracts }
}
