// Copyright © 2012-2025 Vaughn Vernon. All rights reserved.
// Copyright © 2012-2025 Kalele, Inc. All rights reserved.
//
// Licensed under the Reciprocal Public License 1.5
//
// See: LICENSE.md in repository root directory
// See: https://opensource.org/license/rpl-1-5

import {
  field,
  handlerMethod,
  messageType,
  named,
  optional,
  processorType,
  respond,
  variant,
  type DeclarationUnit,
  type Envelope,
  type MessageOf,
  type Processor
} from '../../../src/index.js'

/**
 * Declarations of the calculator unit, as a front end would hand them over.
 */
export const CalculatorDeclarations: DeclarationUnit = {
  declarations: [
    processorType('Calculator', [handlerMethod('CalculatorMsg', 'exclusive')], [
      field('total', named('number')),
      field('history', named('Array', named('number')))
    ]),
    messageType(
      'CalculatorMsg',
      variant('Add', field('value', named('number')), field('resp', named('number'))),
      variant('Multiply', field('value', named('number')), field('resp', named('number'))),
      variant('Reset', field('resp', named('void'))),
      variant('LastEntry', field('resp', optional(named('number'))))
    )
  ]
}

export type CalculatorMsg =
  | { readonly kind: 'Add'; readonly value: number }
  | { readonly kind: 'Multiply'; readonly value: number }
  | { readonly kind: 'Reset' }
  | { readonly kind: 'LastEntry' }

export interface CalculatorReplies {
  readonly Add: number
  readonly Multiply: number
  readonly Reset: void
  readonly LastEntry: number
}

/**
 * Running total with a history of every value entered. LastEntry is not
 * answered while the history is empty, so its caller sees
 * MailboxClosedOrAbandoned.
 */
export class Calculator implements Processor<CalculatorMsg, CalculatorReplies> {
  private total = 0
  private readonly history: number[] = []

  async process({ message, call }: Envelope<CalculatorMsg, CalculatorReplies>): Promise<void> {
    switch (message.kind) {
      case 'Add':
      case 'Multiply':
        respond(call, this.enter(message))
        break
      case 'Reset':
        this.total = 0
        this.history.length = 0
        respond(call, undefined)
        break
      case 'LastEntry': {
        const last = this.history[this.history.length - 1]
        if (last !== undefined) {
          respond(call, last)
        }
        break
      }
    }
  }

  private enter(message: MessageOf<CalculatorMsg, 'Add' | 'Multiply'>): number {
    this.history.push(message.value)
    this.total = message.kind === 'Add' ? this.total + message.value : this.total * message.value
    return this.total
  }
}
