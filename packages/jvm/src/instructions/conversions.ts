/**
 * Conversion Instructions
 *
 * Widening and narrowing between the numeric categories. Floating-point to
 * integral conversions saturate and send NaN to zero.
 */

import { OPCODES } from '../config'
import type { InstructionContext, InstructionResult } from '../types'
import { DOUBLE, FLOAT, INT, LONG, type NumericKind } from './arithmetic'
import { BaseInstruction, CONTINUE } from './base'

const INT_MIN = -2147483648
const INT_MAX = 2147483647
const LONG_MIN = -(2n ** 63n)
const LONG_MAX = 2n ** 63n - 1n

export function floatingToInt(value: number): number {
  if (Number.isNaN(value)) return 0
  if (value <= INT_MIN) return INT_MIN
  if (value >= INT_MAX) return INT_MAX
  return Math.trunc(value)
}

export function floatingToLong(value: number): bigint {
  if (Number.isNaN(value)) return 0n
  if (value === Number.POSITIVE_INFINITY) return LONG_MAX
  if (value === Number.NEGATIVE_INFINITY) return LONG_MIN
  const truncated = BigInt(Math.trunc(value))
  if (truncated <= LONG_MIN) return LONG_MIN
  if (truncated >= LONG_MAX) return LONG_MAX
  return truncated
}

/**
 * Rounds once to the 24-bit float significand, ties to even. Going through a
 * double first would round twice.
 */
export function longToFloat(value: bigint): number {
  const magnitude = value < 0n ? -value : value
  const bits = magnitude.toString(2).length
  if (bits <= 24) return Number(value)
  const shift = BigInt(bits - 24)
  const remainder = magnitude & ((1n << shift) - 1n)
  const half = 1n << (shift - 1n)
  let significand = magnitude >> shift
  if (remainder > half || (remainder === half && (significand & 1n) === 1n)) {
    significand += 1n
  }
  const rounded = Number(significand << shift)
  return value < 0n ? -rounded : rounded
}

export class ConversionInstruction<From, To> extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly from: NumericKind<From>,
    private readonly to: NumericKind<To>,
    private readonly convert: (value: From) => To,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    frame.push(this.to.wrap(this.convert(this.from.pop(frame))))
    return CONTINUE
  }
}

export function conversionInstructions(): BaseInstruction[] {
  return [
    new ConversionInstruction(OPCODES.I2L, 'i2l', INT, LONG, (v) => BigInt(v)),
    new ConversionInstruction(OPCODES.I2F, 'i2f', INT, FLOAT, (v) => v),
    new ConversionInstruction(OPCODES.I2D, 'i2d', INT, DOUBLE, (v) => v),
    new ConversionInstruction(OPCODES.L2I, 'l2i', LONG, INT, (v) =>
      Number(BigInt.asIntN(32, v)),
    ),
    new ConversionInstruction(OPCODES.L2F, 'l2f', LONG, FLOAT, longToFloat),
    new ConversionInstruction(OPCODES.L2D, 'l2d', LONG, DOUBLE, (v) => Number(v)),
    new ConversionInstruction(OPCODES.F2I, 'f2i', FLOAT, INT, floatingToInt),
    new ConversionInstruction(OPCODES.F2L, 'f2l', FLOAT, LONG, floatingToLong),
    new ConversionInstruction(OPCODES.F2D, 'f2d', FLOAT, DOUBLE, (v) => v),
    new ConversionInstruction(OPCODES.D2I, 'd2i', DOUBLE, INT, floatingToInt),
    new ConversionInstruction(OPCODES.D2L, 'd2l', DOUBLE, LONG, floatingToLong),
    new ConversionInstruction(OPCODES.D2F, 'd2f', DOUBLE, FLOAT, (v) => v),
    new ConversionInstruction(OPCODES.I2B, 'i2b', INT, INT, (v) => (v << 24) >> 24),
    new ConversionInstruction(OPCODES.I2C, 'i2c', INT, INT, (v) => v & 0xffff),
    new ConversionInstruction(OPCODES.I2S, 'i2s', INT, INT, (v) => (v << 16) >> 16),
  ]
}
