import { describe, expect, it } from 'vitest'
import { OPCODES } from '../config'
import { InstructionRegistry } from '../instructions/registry'

describe('InstructionRegistry', () => {
  const registry = new InstructionRegistry()

  it('files every handler under its own opcode', () => {
    for (const handler of registry.getAllHandlers()) {
      expect(registry.getHandler(handler.opcode)).toBe(handler)
    }
    expect(new Set(registry.getRegisteredOpcodes()).size).toBe(registry.getAllHandlers().length)
  })

  it('names handlers by their mnemonic', () => {
    expect(registry.getHandler(OPCODES.IADD)?.name).toBe('iadd')
    expect(registry.getHandler(OPCODES.LDC)?.name).toBe('ldc')
    expect(registry.getHandler(OPCODES.INVOKESTATIC)?.name).toBe('invokestatic')
  })

  it('leaves dynamic invocation and exception throwing unregistered', () => {
    expect(registry.hasHandler(0xba)).toBe(false)
    expect(registry.hasHandler(0xbf)).toBe(false)
    expect(registry.hasHandler(OPCODES.NOP)).toBe(true)
  })
})
