/**
 * Bytecode listing for the CLI's inspect command and for tests
 */

import { tryit } from 'radash'
import type { ClassDefinition, MethodInfo } from './class-definition'
import { InstructionRegistry } from './instructions/registry'

export interface DisassembledInstruction {
  pc: number
  text: string
}

/**
 * Walk the method's code one instruction at a time. An opcode without a
 * handler, or operands cut off by the end of the code, ends the listing with
 * a marker line since the next boundary is unknown.
 */
export function disassembleMethod(
  classDefinition: ClassDefinition,
  method: MethodInfo,
  registry: InstructionRegistry = new InstructionRegistry(),
): DisassembledInstruction[] {
  const lines: DisassembledInstruction[] = []
  const code = method.code?.code
  if (!code) return lines

  let pc = 0
  while (pc < code.length) {
    const opcode = code[pc]
    const handler = opcode === undefined ? undefined : registry.getHandler(opcode)
    if (opcode === undefined || !handler) {
      lines.push({ pc, text: `<unknown 0x${(opcode ?? 0).toString(16).padStart(2, '0')}>` })
      break
    }

    const [error, text] = tryit(() => handler.disassemble(code, pc, classDefinition.pool))()
    if (error) {
      lines.push({ pc, text: `<truncated ${handler.name}>` })
      break
    }
    lines.push({ pc, text })
    pc += handler.length(code, pc)
  }
  return lines
}

/**
 * `pc: text` lines
 */
export function formatListing(lines: readonly DisassembledInstruction[]): string[] {
  return lines.map(({ pc, text }) => `${pc}: ${text}`)
}
