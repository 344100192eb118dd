/**
 * Local Variable Instructions
 *
 * Typed loads and stores, their _<n> short forms, iinc and the wide prefix
 */

import { FrameFault } from '@tinyjvm/types'
import { OPCODES } from '../config'
import type { ConstantPool } from '../constant-pool'
import type { Frame } from '../frame'
import type { InstructionContext, InstructionResult } from '../types'
import { intValue, type StackType } from '../values'
import { BaseInstruction, CONTINUE } from './base'

const TYPED_PREFIXES: ReadonlyArray<[string, StackType]> = [
  ['i', 'int'],
  ['l', 'long'],
  ['f', 'float'],
  ['d', 'double'],
  ['a', 'reference'],
]

function load(frame: Frame, index: number, type: StackType): void {
  frame.push(frame.getLocal(index, type))
}

function store(frame: Frame, index: number, type: StackType): void {
  frame.setLocal(index, frame.popTyped(type))
}

function increment(frame: Frame, index: number, delta: number): void {
  const current = frame.getLocal(index, 'int')
  if (current.type === 'int') {
    frame.setLocal(index, intValue(current.value + delta))
  }
}

/**
 * <t>load and <t>load_<n>. Without a fixed slot the index is a u1 operand.
 */
export class LoadInstruction extends BaseInstruction {
  protected readonly operandLength: number

  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly type: StackType,
    private readonly slot?: number,
  ) {
    super()
    this.operandLength = slot === undefined ? 1 : 0
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    load(frame, this.slot ?? this.u1(frame.code, frame.pc + 1), this.type)
    return CONTINUE
  }
}

/**
 * <t>store and <t>store_<n>
 */
export class StoreInstruction extends BaseInstruction {
  protected readonly operandLength: number

  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly type: StackType,
    private readonly slot?: number,
  ) {
    super()
    this.operandLength = slot === undefined ? 1 : 0
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    store(frame, this.slot ?? this.u1(frame.code, frame.pc + 1), this.type)
    return CONTINUE
  }
}

export function localInstructions(): Array<LoadInstruction | StoreInstruction> {
  const handlers: Array<LoadInstruction | StoreInstruction> = []
  TYPED_PREFIXES.forEach(([prefix, type], offset) => {
    handlers.push(new LoadInstruction(OPCODES.ILOAD + offset, `${prefix}load`, type))
    handlers.push(new StoreInstruction(OPCODES.ISTORE + offset, `${prefix}store`, type))
    // The _<n> forms are laid out four per type
    for (let n = 0; n < 4; n++) {
      handlers.push(
        new LoadInstruction(OPCODES.ILOAD_0 + offset * 4 + n, `${prefix}load_${n}`, type, n),
      )
      handlers.push(
        new StoreInstruction(
          OPCODES.ISTORE_0 + offset * 4 + n,
          `${prefix}store_${n}`,
          type,
          n,
        ),
      )
    }
  })
  return handlers
}

/**
 * IINC instruction (opcode 0x84)
 * Local u1 incremented by a signed byte
 */
export class IINCInstruction extends BaseInstruction {
  readonly opcode = OPCODES.IINC
  readonly name = 'iinc'
  protected readonly operandLength = 2

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    increment(frame, this.u1(frame.code, frame.pc + 1), this.s1(frame.code, frame.pc + 2))
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    return `${this.name} ${this.u1(code, pc + 1)} ${this.s1(code, pc + 2)}`
  }
}

const WIDE_LOADS = new Map<number, StackType>(
  TYPED_PREFIXES.map(([, type], offset) => [OPCODES.ILOAD + offset, type]),
)
const WIDE_STORES = new Map<number, StackType>(
  TYPED_PREFIXES.map(([, type], offset) => [OPCODES.ISTORE + offset, type]),
)
const WIDE_NAMES = new Map<number, string>([
  ...TYPED_PREFIXES.map(([prefix], offset): [number, string] => [
    OPCODES.ILOAD + offset,
    `${prefix}load`,
  ]),
  ...TYPED_PREFIXES.map(([prefix], offset): [number, string] => [
    OPCODES.ISTORE + offset,
    `${prefix}store`,
  ]),
  [OPCODES.IINC, 'iinc'],
])

/**
 * WIDE instruction (opcode 0xc4)
 * Widens the local index of the following load, store or iinc to u2, and the
 * iinc constant to s2
 */
export class WIDEInstruction extends BaseInstruction {
  readonly opcode = OPCODES.WIDE
  readonly name = 'wide'

  length(code: Uint8Array, pc: number): number {
    return this.u1(code, pc + 1) === OPCODES.IINC ? 6 : 4
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    const { code, pc } = frame
    const modified = this.u1(code, pc + 1)
    const index = this.u2(code, pc + 2)

    const loadType = WIDE_LOADS.get(modified)
    const storeType = WIDE_STORES.get(modified)
    if (loadType) {
      load(frame, index, loadType)
    } else if (storeType) {
      store(frame, index, storeType)
    } else if (modified === OPCODES.IINC) {
      increment(frame, index, this.s2(code, pc + 4))
    } else {
      throw new FrameFault(
        `wide cannot modify opcode 0x${modified.toString(16)} in ${frame.location()}`,
      )
    }
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    const modified = this.u1(code, pc + 1)
    const name = WIDE_NAMES.get(modified) ?? `0x${modified.toString(16)}`
    const index = this.u2(code, pc + 2)
    return modified === OPCODES.IINC
      ? `${this.name} ${name} ${index} ${this.s2(code, pc + 4)}`
      : `${this.name} ${name} ${index}`
  }
}
