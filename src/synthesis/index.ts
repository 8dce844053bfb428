// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Analysis and synthesis of actors from declarations.
 *
 * @packageDocumentation
 */

export {
  named,
  optional,
  field,
  variant,
  messageType,
  processorType,
  handlerMethod,
  unwrapOptional,
  renderType,
  isMessageType,
  isProcessorType
} from './Declarations.js'
export type {
  ActorBinding,
  Declaration,
  DeclarationUnit,
  FieldDeclaration,
  HandlerBinding,
  MessageType,
  MethodDeclaration,
  ParameterDeclaration,
  ParameterPassing,
  ProcessorType,
  TypeReference,
  Variant
} from './Declarations.js'

export { analyze } from './EligibilityAnalyzer.js'
export type { Accepted, Analysis, Rejected } from './EligibilityAnalyzer.js'

export { toSnakeCase, words, isOperationName } from './OperationNaming.js'
export { deriveContract, deriveContracts, RESERVED_OPERATION_NAMES, VOID_TYPE } from './VariantContract.js'
export type { ContractDerivation, OperationForm, OperationSignature, VariantContract } from './VariantContract.js'

export { synthesize } from './ActorSynthesizer.js'
export { MESSAGE_DISCRIMINANT } from './OutputModel.js'
export type {
  ConstructionStep,
  HandleModel,
  MailboxModel,
  MessageModel,
  MessageVariantModel,
  OperationModel,
  OutputModel,
  WorkerLoopStep,
  WorkerModel
} from './OutputModel.js'

export { generateActor, generateActorOrThrow, generateTypeScript } from './ActorGenerator.js'
export type { Generation } from './ActorGenerator.js'
export { emitTypeScript } from './TypeScriptEmitter.js'
export { bindActor, BoundActor } from './ActorBinder.js'
export type { BoundOperation } from './ActorBinder.js'

export { SynthesisError, describeRejection } from './SynthesisError.js'
export type { RejectionCode, RejectionReason } from './SynthesisError.js'
export { synthesisOptions, SynthesisOptionsDefaults } from './SynthesisOptions.js'
export type { SynthesisOptions } from './SynthesisOptions.js'
