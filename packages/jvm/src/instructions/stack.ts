/**
 * Operand Stack Instructions
 *
 * pop, pop2, the dup family and swap. They work on slot units, so a long or
 * double counts as a two-slot group and may never be split.
 */

import { TypeFault, type Value } from '@tinyjvm/types'
import { OPCODES } from '../config'
import type { Frame } from '../frame'
import type { InstructionContext, InstructionResult } from '../types'
import { valueCategory } from '../values'
import { BaseInstruction, CONTINUE } from './base'

type Shuffle = (frame: Frame) => void

/**
 * Pop values covering exactly `slots` slot units, bottom first
 */
function popGroup(frame: Frame, slots: 1 | 2): Value[] {
  const group: Value[] = []
  let taken = 0
  while (taken < slots) {
    const value = frame.pop()
    taken += valueCategory(value)
    group.unshift(value)
  }
  if (taken !== slots) {
    throw new TypeFault(
      `Cannot split a two-slot value for a ${slots}-slot stack operation in ${frame.location()}`,
    )
  }
  return group
}

function pushGroups(frame: Frame, ...groups: Value[][]): void {
  for (const group of groups) {
    for (const value of group) frame.push(value)
  }
}

/**
 * Duplicate the top `top` slots and insert the copy `below` slots further down
 */
function duplicate(top: 1 | 2, below: 0 | 1 | 2): Shuffle {
  return (frame) => {
    const upper = popGroup(frame, top)
    const lower = below === 0 ? [] : popGroup(frame, below)
    pushGroups(frame, upper, lower, upper)
  }
}

export class StackInstruction extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly shuffle: Shuffle,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    this.shuffle(context.frame)
    return CONTINUE
  }
}

export function stackInstructions(): StackInstruction[] {
  return [
    new StackInstruction(OPCODES.POP, 'pop', (frame) => {
      popGroup(frame, 1)
    }),
    new StackInstruction(OPCODES.POP2, 'pop2', (frame) => {
      popGroup(frame, 2)
    }),
    new StackInstruction(OPCODES.DUP, 'dup', duplicate(1, 0)),
    new StackInstruction(OPCODES.DUP_X1, 'dup_x1', duplicate(1, 1)),
    new StackInstruction(OPCODES.DUP_X2, 'dup_x2', duplicate(1, 2)),
    new StackInstruction(OPCODES.DUP2, 'dup2', duplicate(2, 0)),
    new StackInstruction(OPCODES.DUP2_X1, 'dup2_x1', duplicate(2, 1)),
    new StackInstruction(OPCODES.DUP2_X2, 'dup2_x2', duplicate(2, 2)),
    new StackInstruction(OPCODES.SWAP, 'swap', (frame) => {
      const upper = popGroup(frame, 1)
      const lower = popGroup(frame, 1)
      pushGroups(frame, upper, lower)
    }),
  ]
}
