/**
 * Return Instructions
 *
 * ireturn, lreturn, freturn, dreturn, areturn and return. The instruction must
 * agree with the method's declared return type.
 */

import { TypeFault } from '@tinyjvm/types'
import { OPCODES, RESULT_CODES } from '../config'
import type { InstructionContext, InstructionResult } from '../types'
import { intValue, narrowInt, type StackType, stackTypeOf } from '../values'
import { BaseInstruction } from './base'

export class ReturnInstruction extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    /** null for void `return` */
    private readonly type: StackType | null,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    const returnType = frame.method.parsedDescriptor.returnType
    const expected = returnType === null ? null : stackTypeOf(returnType)
    if (expected !== this.type) {
      throw new TypeFault(
        `${this.name} in ${frame.location()} does not match return type ${frame.method.descriptor}`,
      )
    }
    if (this.type === null || returnType === null) {
      return { resultCode: RESULT_CODES.RETURN, returnValue: null }
    }

    const value = frame.popTyped(this.type)
    return {
      resultCode: RESULT_CODES.RETURN,
      // boolean, byte, char and short results are narrowed on the way out
      returnValue: value.type === 'int' ? intValue(narrowInt(value.value, returnType)) : value,
    }
  }
}

export function returnInstructions(): ReturnInstruction[] {
  return [
    new ReturnInstruction(OPCODES.IRETURN, 'ireturn', 'int'),
    new ReturnInstruction(OPCODES.LRETURN, 'lreturn', 'long'),
    new ReturnInstruction(OPCODES.FRETURN, 'freturn', 'float'),
    new ReturnInstruction(OPCODES.DRETURN, 'dreturn', 'double'),
    new ReturnInstruction(OPCODES.ARETURN, 'areturn', 'reference'),
    new ReturnInstruction(OPCODES.RETURN, 'return', null),
  ]
}
