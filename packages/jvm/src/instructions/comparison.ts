/**
 * Comparison Instructions
 *
 * lcmp, fcmpl, fcmpg, dcmpl and dcmpg push -1, 0 or 1. The l and g float
 * forms differ only in what an unordered (NaN) comparison yields.
 */

import { OPCODES } from '../config'
import type { InstructionContext, InstructionResult } from '../types'
import { intValue } from '../values'
import { DOUBLE, FLOAT, LONG, type NumericKind } from './arithmetic'
import { BaseInstruction, CONTINUE } from './base'

export class CompareInstruction<T extends number | bigint> extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly kind: NumericKind<T>,
    /** Result when either operand is NaN */
    private readonly unordered: -1 | 1,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    const right = this.kind.pop(frame)
    const left = this.kind.pop(frame)
    frame.push(intValue(this.compare(left, right)))
    return CONTINUE
  }

  private compare(left: T, right: T): number {
    if (left > right) return 1
    if (left < right) return -1
    if (left === right) return 0
    return this.unordered
  }
}

export function comparisonInstructions(): BaseInstruction[] {
  return [
    new CompareInstruction(OPCODES.LCMP, 'lcmp', LONG, -1),
    new CompareInstruction(OPCODES.FCMPL, 'fcmpl', FLOAT, -1),
    new CompareInstruction(OPCODES.FCMPG, 'fcmpg', FLOAT, 1),
    new CompareInstruction(OPCODES.DCMPL, 'dcmpl', DOUBLE, -1),
    new CompareInstruction(OPCODES.DCMPG, 'dcmpg', DOUBLE, 1),
  ]
}
