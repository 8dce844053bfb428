// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

/**
 * Typed view of one candidate actor unit, as supplied by a front end.
 *
 * Pure data. The front end has already resolved every name; the engine
 * never looks at source text.
 */

/**
 * A type as written in the declaration: a (possibly generic) named type,
 * or an optional wrapper around another type.
 */
export type TypeReference =
  | { readonly kind: 'named'; readonly name: string; readonly arguments: readonly TypeReference[] }
  | { readonly kind: 'optional'; readonly inner: TypeReference }

export interface FieldDeclaration {
  readonly name: string
  readonly type: TypeReference
}

/**
 * How a parameter receives its argument.
 *
 * - value: ownership moves to the callee
 * - shared: read-only borrow
 * - exclusive: sole mutable borrow
 */
export type ParameterPassing = 'value' | 'shared' | 'exclusive'

export interface ParameterDeclaration {
  readonly name: string
  readonly type: TypeReference
  readonly passing: ParameterPassing
}

export interface MethodDeclaration {
  readonly name: string
  readonly parameters: readonly ParameterDeclaration[]
  readonly isAsync: boolean
}

/**
 * The record-like type owning the actor's state. Fields are opaque to
 * the engine beyond their existence.
 */
export interface ProcessorType {
  readonly kind: 'processor'
  readonly name: string
  readonly fields: readonly FieldDeclaration[]
  readonly methods: readonly MethodDeclaration[]
}

/**
 * One alternative of a message type.
 */
export interface Variant {
  readonly name: string
  readonly fields: readonly FieldDeclaration[]
}

/**
 * The tagged union of messages the processor handles.
 */
export interface MessageType {
  readonly kind: 'message'
  readonly name: string
  readonly variants: readonly Variant[]
}

export type Declaration = ProcessorType | MessageType

/**
 * Explicit pairing of a processor with its message type, by name.
 */
export interface ActorBinding {
  readonly processor: string
  readonly message: string
}

/**
 * Everything the front end hands over for one analysis. When `bindings`
 * is present it is the only linkage used; otherwise processors and
 * message types are paired by the naming convention.
 */
export interface DeclarationUnit {
  readonly declarations: readonly Declaration[]
  readonly bindings?: readonly ActorBinding[]
}

/**
 * The method of a processor that handles its messages.
 */
export interface HandlerBinding {
  readonly processor: string
  readonly method: MethodDeclaration
}

export function named(name: string, ...typeArguments: TypeReference[]): TypeReference {
  return { kind: 'named', name, arguments: typeArguments }
}

export function optional(inner: TypeReference): TypeReference {
  return { kind: 'optional', inner }
}

export function field(name: string, type: TypeReference): FieldDeclaration {
  return { name, type }
}

export function variant(name: string, ...fields: FieldDeclaration[]): Variant {
  return { name, fields }
}

export function messageType(name: string, ...variants: Variant[]): MessageType {
  return { kind: 'message', name, variants }
}

export function processorType(
  name: string,
  methods: readonly MethodDeclaration[],
  fields: readonly FieldDeclaration[] = []
): ProcessorType {
  return { kind: 'processor', name, fields, methods }
}

/**
 * Declares `async process(message)` taking `message` of the named type.
 */
export function handlerMethod(
  messageTypeName: string,
  passing: ParameterPassing = 'value',
  name = 'process'
): MethodDeclaration {
  return {
    name,
    parameters: [{ name: 'message', type: named(messageTypeName), passing }],
    isAsync: true
  }
}

/**
 * Removes one optional wrapper, if present. A wrapper is either an
 * `optional` reference or a single-argument named type whose name is in
 * `wrappers`.
 */
export function unwrapOptional(type: TypeReference, wrappers: readonly string[]): TypeReference {
  if (type.kind === 'optional') {
    return type.inner
  }

  const [inner] = type.arguments
  if (type.arguments.length === 1 && inner !== undefined && wrappers.includes(type.name)) {
    return inner
  }

  return type
}

/**
 * Renders a type reference in TypeScript syntax. An optional becomes a
 * union with undefined.
 */
export function renderType(type: TypeReference): string {
  if (type.kind === 'optional') {
    return `${renderType(type.inner)} | undefined`
  }

  if (type.arguments.length === 0) {
    return type.name
  }

  return `${type.name}<${type.arguments.map(renderType).join(', ')}>`
}

export function isProcessorType(declaration: Declaration): declaration is ProcessorType {
  return declaration.kind === 'processor'
}

export function isMessageType(declaration: Declaration): declaration is MessageType {
  return declaration.kind === 'message'
}
