/**
 * Arithmetic Instructions
 *
 * add, sub, mul, div, rem and neg for the four numeric categories, plus int
 * and long shifts and bitwise operations. Each handler names its operand
 * category and pops through it, so a mismatch is a TypeFault.
 */

import { RUNTIME_FAULTS, RuntimeFault, type Value } from '@tinyjvm/types'
import { OPCODES } from '../config'
import type { Frame } from '../frame'
import type { InstructionContext, InstructionResult } from '../types'
import { doubleValue, floatValue, intValue, longValue } from '../values'
import { BaseInstruction, CONTINUE } from './base'

/**
 * How one operand category is popped and pushed
 */
export interface NumericKind<T> {
  readonly prefix: 'i' | 'l' | 'f' | 'd'
  pop(frame: Frame): T
  wrap(value: T): Value
}

export const INT: NumericKind<number> = {
  prefix: 'i',
  pop: (frame) => frame.popInt(),
  wrap: intValue,
}

export const LONG: NumericKind<bigint> = {
  prefix: 'l',
  pop: (frame) => frame.popLong(),
  wrap: longValue,
}

export const FLOAT: NumericKind<number> = {
  prefix: 'f',
  pop: (frame) => frame.popFloat(),
  wrap: floatValue,
}

export const DOUBLE: NumericKind<number> = {
  prefix: 'd',
  pop: (frame) => frame.popDouble(),
  wrap: doubleValue,
}

function divideByZero(): RuntimeFault {
  return new RuntimeFault(RUNTIME_FAULTS.DIVIDE_BY_ZERO, '/ by zero')
}

/**
 * value2 is popped first, then value1; the result is value1 op value2
 */
export class BinaryInstruction<T> extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly kind: NumericKind<T>,
    private readonly operation: (left: T, right: T) => T,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    const right = this.kind.pop(frame)
    const left = this.kind.pop(frame)
    frame.push(this.kind.wrap(this.operation(left, right)))
    return CONTINUE
  }
}

export class NegateInstruction<T> extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly kind: NumericKind<T>,
    private readonly operation: (value: T) => T,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    frame.push(this.kind.wrap(this.operation(this.kind.pop(frame))))
    return CONTINUE
  }
}

/**
 * The shift distance is always an int, masked to the operand width
 */
export class ShiftInstruction<T> extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly kind: NumericKind<T>,
    private readonly operation: (value: T, distance: number) => T,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    const distance = frame.popInt()
    const value = this.kind.pop(frame)
    frame.push(this.kind.wrap(this.operation(value, distance)))
    return CONTINUE
  }
}

const intOps = {
  add: (a: number, b: number) => a + b,
  sub: (a: number, b: number) => a - b,
  mul: (a: number, b: number) => Math.imul(a, b),
  div: (a: number, b: number) => {
    if (b === 0) throw divideByZero()
    return Math.trunc(a / b)
  },
  rem: (a: number, b: number) => {
    if (b === 0) throw divideByZero()
    return a % b
  },
}

const longOps = {
  add: (a: bigint, b: bigint) => a + b,
  sub: (a: bigint, b: bigint) => a - b,
  mul: (a: bigint, b: bigint) => a * b,
  div: (a: bigint, b: bigint) => {
    if (b === 0n) throw divideByZero()
    return a / b
  },
  rem: (a: bigint, b: bigint) => {
    if (b === 0n) throw divideByZero()
    return a % b
  },
}

// IEEE semantics: division by zero yields an infinity or NaN, rem is fmod
const floatingOps = {
  add: (a: number, b: number) => a + b,
  sub: (a: number, b: number) => a - b,
  mul: (a: number, b: number) => a * b,
  div: (a: number, b: number) => a / b,
  rem: (a: number, b: number) => a % b,
}

const OPERATIONS = ['add', 'sub', 'mul', 'div', 'rem'] as const

export function arithmeticInstructions(): BaseInstruction[] {
  const handlers: BaseInstruction[] = []

  // Opcodes run i, l, f, d within each operation
  OPERATIONS.forEach((operation, row) => {
    const base = OPCODES.IADD + row * 4
    handlers.push(
      new BinaryInstruction(base, `i${operation}`, INT, intOps[operation]),
      new BinaryInstruction(base + 1, `l${operation}`, LONG, longOps[operation]),
      new BinaryInstruction(base + 2, `f${operation}`, FLOAT, floatingOps[operation]),
      new BinaryInstruction(base + 3, `d${operation}`, DOUBLE, floatingOps[operation]),
    )
  })

  handlers.push(
    new NegateInstruction(OPCODES.INEG, 'ineg', INT, (a) => -a),
    new NegateInstruction(OPCODES.LNEG, 'lneg', LONG, (a) => -a),
    new NegateInstruction(OPCODES.FNEG, 'fneg', FLOAT, (a) => -a),
    new NegateInstruction(OPCODES.DNEG, 'dneg', DOUBLE, (a) => -a),

    new ShiftInstruction(OPCODES.ISHL, 'ishl', INT, (a, n) => a << (n & 31)),
    new ShiftInstruction(OPCODES.LSHL, 'lshl', LONG, (a, n) => a << BigInt(n & 63)),
    new ShiftInstruction(OPCODES.ISHR, 'ishr', INT, (a, n) => a >> (n & 31)),
    new ShiftInstruction(OPCODES.LSHR, 'lshr', LONG, (a, n) => a >> BigInt(n & 63)),
    new ShiftInstruction(OPCODES.IUSHR, 'iushr', INT, (a, n) => a >>> (n & 31)),
    new ShiftInstruction(
      OPCODES.LUSHR,
      'lushr',
      LONG,
      (a, n) => BigInt.asUintN(64, a) >> BigInt(n & 63),
    ),

    new BinaryInstruction(OPCODES.IAND, 'iand', INT, (a, b) => a & b),
    new BinaryInstruction(OPCODES.LAND, 'land', LONG, (a, b) => a & b),
    new BinaryInstruction(OPCODES.IOR, 'ior', INT, (a, b) => a | b),
    new BinaryInstruction(OPCODES.LOR, 'lor', LONG, (a, b) => a | b),
    new BinaryInstruction(OPCODES.IXOR, 'ixor', INT, (a, b) => a ^ b),
    new BinaryInstruction(OPCODES.LXOR, 'lxor', LONG, (a, b) => a ^ b),
  )

  return handlers
}
