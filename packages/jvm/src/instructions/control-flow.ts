/**
 * Control Flow Instructions
 *
 * Conditional branches, goto, goto_w, tableswitch and lookupswitch. Offsets
 * are signed and relative to the pc of the branching instruction itself.
 */

import { FrameFault, type HeapObject } from '@tinyjvm/types'
import { OPCODES } from '../config'
import type { ConstantPool } from '../constant-pool'
import type { Frame } from '../frame'
import type { InstructionContext, InstructionResult } from '../types'
import { BaseInstruction, CONTINUE } from './base'

/**
 * Branching instructions: set the target once it is known to be inside the code
 */
abstract class BranchInstruction extends BaseInstruction {
  protected branch(context: InstructionContext, offset: number): void {
    const { frame } = context
    const target = frame.pc + offset
    if (target < 0 || target >= frame.code.length) {
      throw new FrameFault(
        `Branch target ${target} is outside the code of ${frame.location()}`,
      )
    }
    context.branchTarget = target
  }
}

/**
 * if<cond>, if_icmp<cond>, if_acmp<cond>, ifnull and ifnonnull
 */
export class ConditionalBranchInstruction extends BranchInstruction {
  protected readonly operandLength = 2

  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly test: (frame: Frame) => boolean,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    const offset = this.s2(frame.code, frame.pc + 1)
    if (this.test(frame)) {
      this.branch(context, offset)
    }
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    return `${this.name} ${pc + this.s2(code, pc + 1)}`
  }
}

type IntPredicate = (left: number, right: number) => boolean

const CONDITIONS: ReadonlyArray<[string, IntPredicate]> = [
  ['eq', (a, b) => a === b],
  ['ne', (a, b) => a !== b],
  ['lt', (a, b) => a < b],
  ['ge', (a, b) => a >= b],
  ['gt', (a, b) => a > b],
  ['le', (a, b) => a <= b],
]

function sameReference(left: HeapObject | null, right: HeapObject | null): boolean {
  return left === right
}

export function conditionalBranchInstructions(): ConditionalBranchInstruction[] {
  const handlers: ConditionalBranchInstruction[] = []
  CONDITIONS.forEach(([suffix, predicate], offset) => {
    handlers.push(
      new ConditionalBranchInstruction(OPCODES.IFEQ + offset, `if${suffix}`, (frame) =>
        predicate(frame.popInt(), 0),
      ),
      new ConditionalBranchInstruction(
        OPCODES.IF_ICMPEQ + offset,
        `if_icmp${suffix}`,
        (frame) => {
          const right = frame.popInt()
          return predicate(frame.popInt(), right)
        },
      ),
    )
  })
  handlers.push(
    new ConditionalBranchInstruction(OPCODES.IF_ACMPEQ, 'if_acmpeq', (frame) =>
      sameReference(frame.popReference(), frame.popReference()),
    ),
    new ConditionalBranchInstruction(
      OPCODES.IF_ACMPNE,
      'if_acmpne',
      (frame) => !sameReference(frame.popReference(), frame.popReference()),
    ),
    new ConditionalBranchInstruction(
      OPCODES.IFNULL,
      'ifnull',
      (frame) => frame.popReference() === null,
    ),
    new ConditionalBranchInstruction(
      OPCODES.IFNONNULL,
      'ifnonnull',
      (frame) => frame.popReference() !== null,
    ),
  )
  return handlers
}

/**
 * GOTO instruction (opcode 0xa7)
 */
export class GOTOInstruction extends BranchInstruction {
  readonly opcode = OPCODES.GOTO
  readonly name = 'goto'
  protected readonly operandLength = 2

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    this.branch(context, this.s2(frame.code, frame.pc + 1))
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    return `${this.name} ${pc + this.s2(code, pc + 1)}`
  }
}

/**
 * GOTO_W instruction (opcode 0xc8)
 */
export class GOTO_WInstruction extends BranchInstruction {
  readonly opcode = OPCODES.GOTO_W
  readonly name = 'goto_w'
  protected readonly operandLength = 4

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    this.branch(context, this.s4(frame.code, frame.pc + 1))
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    return `${this.name} ${pc + this.s4(code, pc + 1)}`
  }
}

/**
 * Start of the 4-byte aligned operands after a switch opcode at `pc`
 */
function alignedOperands(pc: number): number {
  return (pc + 4) & ~3
}

interface SwitchTable {
  defaultOffset: number
  /** [match, offset] in table order */
  cases: Array<[number, number]>
  /** Offset just past the instruction */
  end: number
}

/**
 * TABLESWITCH instruction (opcode 0xaa)
 * default, low, high, then high - low + 1 jump offsets
 */
export class TABLESWITCHInstruction extends BranchInstruction {
  readonly opcode = OPCODES.TABLESWITCH
  readonly name = 'tableswitch'

  length(code: Uint8Array, pc: number): number {
    return this.table(code, pc).end - pc
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    const { defaultOffset, cases } = this.table(frame.code, frame.pc)
    const key = frame.popInt()
    const match = cases.find(([value]) => value === key)
    this.branch(context, match ? match[1] : defaultOffset)
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    return renderSwitch(this.name, pc, this.table(code, pc))
  }

  private table(code: Uint8Array, pc: number): SwitchTable {
    const start = alignedOperands(pc)
    const defaultOffset = this.s4(code, start)
    const low = this.s4(code, start + 4)
    const high = this.s4(code, start + 8)
    if (high < low) {
      throw new FrameFault(`tableswitch at pc ${pc} has high ${high} below low ${low}`)
    }
    const cases: Array<[number, number]> = []
    for (let i = 0; i <= high - low; i++) {
      cases.push([low + i, this.s4(code, start + 12 + i * 4)])
    }
    return { defaultOffset, cases, end: start + 12 + cases.length * 4 }
  }
}

/**
 * LOOKUPSWITCH instruction (opcode 0xab)
 * default, npairs, then npairs (match, offset) pairs sorted by match
 */
export class LOOKUPSWITCHInstruction extends BranchInstruction {
  readonly opcode = OPCODES.LOOKUPSWITCH
  readonly name = 'lookupswitch'

  length(code: Uint8Array, pc: number): number {
    return this.table(code, pc).end - pc
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    const { defaultOffset, cases } = this.table(frame.code, frame.pc)
    const key = frame.popInt()
    const match = cases.find(([value]) => value === key)
    this.branch(context, match ? match[1] : defaultOffset)
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    return renderSwitch(this.name, pc, this.table(code, pc))
  }

  private table(code: Uint8Array, pc: number): SwitchTable {
    const start = alignedOperands(pc)
    const defaultOffset = this.s4(code, start)
    const pairs = this.s4(code, start + 4)
    if (pairs < 0) {
      throw new FrameFault(`lookupswitch at pc ${pc} has negative npairs ${pairs}`)
    }
    const cases: Array<[number, number]> = []
    for (let i = 0; i < pairs; i++) {
      const at = start + 8 + i * 8
      cases.push([this.s4(code, at), this.s4(code, at + 4)])
    }
    return { defaultOffset, cases, end: start + 8 + pairs * 8 }
  }
}

function renderSwitch(name: string, pc: number, table: SwitchTable): string {
  const cases = table.cases.map(([match, offset]) => `${match}: ${pc + offset}`)
  return `${name} { ${[...cases, `default: ${pc + table.defaultOffset}`].join(', ')} }`
}
