/**
 * Constant Instructions
 *
 * nop, aconst_null, the <t>const_<n> family, bipush, sipush and the ldc family
 */

import { TypeFault, type Value } from '@tinyjvm/types'
import { OPCODES } from '../config'
import type { ConstantPool } from '../constant-pool'
import type { InstructionContext, InstructionResult } from '../types'
import {
  doubleValue,
  floatValue,
  intValue,
  isCategory2,
  longValue,
  NULL_VALUE,
} from '../values'
import { BaseInstruction, CONTINUE, describeConstant } from './base'

/**
 * NOP instruction (opcode 0x00)
 */
export class NOPInstruction extends BaseInstruction {
  readonly opcode = OPCODES.NOP
  readonly name = 'nop'

  execute(_context: InstructionContext): InstructionResult {
    return CONTINUE
  }
}

/**
 * Push one fixed value: aconst_null, iconst_m1..iconst_5, lconst_0/1,
 * fconst_0..2, dconst_0/1
 */
export class ConstInstruction extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly value: Value,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    context.frame.push(this.value)
    return CONTINUE
  }
}

export function constInstructions(): ConstInstruction[] {
  return [
    new ConstInstruction(OPCODES.ACONST_NULL, 'aconst_null', NULL_VALUE),
    new ConstInstruction(OPCODES.ICONST_M1, 'iconst_m1', intValue(-1)),
    ...[0, 1, 2, 3, 4, 5].map(
      (n) => new ConstInstruction(OPCODES.ICONST_0 + n, `iconst_${n}`, intValue(n)),
    ),
    new ConstInstruction(OPCODES.LCONST_0, 'lconst_0', longValue(0n)),
    new ConstInstruction(OPCODES.LCONST_1, 'lconst_1', longValue(1n)),
    new ConstInstruction(OPCODES.FCONST_0, 'fconst_0', floatValue(0)),
    new ConstInstruction(OPCODES.FCONST_1, 'fconst_1', floatValue(1)),
    new ConstInstruction(OPCODES.FCONST_2, 'fconst_2', floatValue(2)),
    new ConstInstruction(OPCODES.DCONST_0, 'dconst_0', doubleValue(0)),
    new ConstInstruction(OPCODES.DCONST_1, 'dconst_1', doubleValue(1)),
  ]
}

/**
 * BIPUSH instruction (opcode 0x10)
 * Sign-extended byte operand
 */
export class BIPUSHInstruction extends BaseInstruction {
  readonly opcode = OPCODES.BIPUSH
  readonly name = 'bipush'
  protected readonly operandLength = 1

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    frame.push(intValue(this.s1(frame.code, frame.pc + 1)))
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    return `${this.name} ${this.s1(code, pc + 1)}`
  }
}

/**
 * SIPUSH instruction (opcode 0x11)
 * Sign-extended short operand
 */
export class SIPUSHInstruction extends BaseInstruction {
  readonly opcode = OPCODES.SIPUSH
  readonly name = 'sipush'
  protected readonly operandLength = 2

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    frame.push(intValue(this.s2(frame.code, frame.pc + 1)))
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    return `${this.name} ${this.s2(code, pc + 1)}`
  }
}

/**
 * ldc, ldc_w and ldc2_w: push a loadable pool constant.
 * ldc2_w takes only Long and Double, the other two anything but.
 */
export class LDCInstruction extends BaseInstruction {
  protected readonly operandLength: number

  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly wideIndex: boolean,
    private readonly wideValue: boolean,
  ) {
    super()
    this.operandLength = wideIndex ? 2 : 1
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame, runtime } = context
    const index = this.index(frame.code, frame.pc)
    const constant = this.unwrap(frame.pool.resolveLoadable(index))
    const value = runtime.loadConstant(constant)
    if (isCategory2(value) !== this.wideValue) {
      throw new TypeFault(
        `${this.name} cannot load ${constant.kind} constant #${index} at pc ${frame.pc}`,
      )
    }
    frame.push(value)
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, pool: ConstantPool): string {
    const index = this.index(code, pc)
    return `${this.name} #${index} // ${describeConstant(pool, index)}`
  }

  private index(code: Uint8Array, pc: number): number {
    return this.wideIndex ? this.u2(code, pc + 1) : this.u1(code, pc + 1)
  }
}

export function ldcInstructions(): LDCInstruction[] {
  return [
    new LDCInstruction(OPCODES.LDC, 'ldc', false, false),
    new LDCInstruction(OPCODES.LDC_W, 'ldc_w', true, false),
    new LDCInstruction(OPCODES.LDC2_W, 'ldc2_w', true, true),
  ]
}
