/**
 * Base JVM Instruction System
 *
 * Defines the handler interface the dispatch loop and the disassembler work
 * against, and the abstract class every instruction extends.
 */

import { FrameFault, type JvmError, type Safe, unwrapSafe } from '@tinyjvm/types'
import type { ConstantPool } from '../constant-pool'
import type { InstructionContext, InstructionResult } from '../types'

/**
 * Base interface for all JVM instruction handlers
 */
export interface JvmInstructionHandler {
  readonly opcode: number
  readonly name: string

  /**
   * Encoded size in bytes, opcode included, of the instruction at `pc`
   */
  length(code: Uint8Array, pc: number): number

  /**
   * Execute the instruction (mutates the frame in place)
   * @returns resultCode (null = continue, otherwise invoke/return)
   */
  execute(context: InstructionContext): InstructionResult

  /**
   * Mnemonic and operands, with pool references spelled out
   */
  disassemble(code: Uint8Array, pc: number, pool: ConstantPool): string
}

export const CONTINUE: InstructionResult = { resultCode: null }

/**
 * Abstract base class for JVM instructions
 * Operands are big-endian and follow the opcode byte directly
 */
export abstract class BaseInstruction implements JvmInstructionHandler {
  abstract readonly opcode: number
  abstract readonly name: string

  /** Operand bytes after the opcode, for fixed-length instructions */
  protected readonly operandLength: number = 0

  abstract execute(context: InstructionContext): InstructionResult

  length(_code: Uint8Array, _pc: number): number {
    return 1 + this.operandLength
  }

  /**
   * Default disassembly: mnemonic followed by each operand byte
   */
  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    const operands: number[] = []
    for (let i = 1; i <= this.operandLength; i++) {
      operands.push(this.u1(code, pc + i))
    }
    return [this.name, ...operands].join(' ')
  }

  protected u1(code: Uint8Array, at: number): number {
    const byte = code[at]
    if (byte === undefined) {
      throw new FrameFault(`Truncated operands of ${this.name} at byte ${at}`)
    }
    return byte
  }

  protected s1(code: Uint8Array, at: number): number {
    return (this.u1(code, at) << 24) >> 24
  }

  protected u2(code: Uint8Array, at: number): number {
    return (this.u1(code, at) << 8) | this.u1(code, at + 1)
  }

  protected s2(code: Uint8Array, at: number): number {
    return (this.u2(code, at) << 16) >> 16
  }

  protected s4(code: Uint8Array, at: number): number {
    return (
      (this.u1(code, at) << 24) |
      (this.u1(code, at + 1) << 16) |
      (this.u1(code, at + 2) << 8) |
      this.u1(code, at + 3)
    )
  }

  /**
   * Rethrow the error half of a Safe result inside the dispatch loop
   */
  protected unwrap<T>(result: Safe<T, JvmError>): T {
    return unwrapSafe(result)
  }
}

/**
 * Instructions whose single operand is a u2 constant-pool index
 */
export abstract class PoolInstruction extends BaseInstruction {
  protected readonly operandLength: number = 2

  protected poolIndex(context: InstructionContext): number {
    return this.u2(context.frame.code, context.frame.pc + 1)
  }

  disassemble(code: Uint8Array, pc: number, pool: ConstantPool): string {
    const index = this.u2(code, pc + 1)
    return `${this.name} #${index} // ${describeConstant(pool, index)}`
  }
}

/**
 * Resolved rendering of a pool entry for disassembly comments
 */
export function describeConstant(pool: ConstantPool, index: number): string {
  const entry = pool.entryAt(index)
  if (!entry) return '<invalid>'
  switch (entry.tag) {
    case 'Fieldref':
    case 'Methodref':
    case 'InterfaceMethodref': {
      const [error, member] =
        entry.tag === 'Fieldref' ? pool.resolveFieldRef(index) : pool.resolveMethodRef(index)
      return error
        ? '<invalid>'
        : `${entry.tag} ${member.className}.${member.name}:${member.descriptor}`
    }
    case 'Class': {
      const [error, className] = pool.resolveClassName(index)
      return error ? '<invalid>' : `class ${className}`
    }
    case 'String': {
      const [error, text] = pool.resolveString(index)
      return error ? '<invalid>' : `String ${JSON.stringify(text)}`
    }
    case 'Integer':
    case 'Float':
      return `${entry.tag} ${entry.value}`
    case 'Long':
      return `Long ${entry.value}l`
    case 'Double':
      return `Double ${entry.value}d`
    default:
      return entry.tag
  }
}
