import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { executeInspectCommand } from '../commands/inspect'
import { captureOutput, HELLO_CODE, writeClassFile } from './fixtures'

describe('inspect command', () => {
  let root = ''
  let hello = ''

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), 'tinyjvm-inspect-'))
    hello = writeClassFile(root, 'demo/Hello', HELLO_CODE)
  })

  afterAll(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('summarises the class and disassembles its methods', () => {
    const { output, sinks } = captureOutput()
    expect(executeInspectCommand(hello, { pool: false, code: true }, sinks)).toBe(0)
    expect(output.stdout.split('\n')).toEqual([
      'public super demo/Hello',
      '  magic: 0xcafebabe',
      '  version: 52.0',
      '  extends: java/lang/Object',
      'fields:',
      'methods:',
      '  public static main([Ljava/lang/String;)V',
      '    max_stack 2, max_locals 1',
      '    0: getstatic #13 // Fieldref java/lang/System.out:Ljava/io/PrintStream;',
      '    3: ldc #15 // String "hello"',
      '    5: invokevirtual #21 // Methodref java/io/PrintStream.println:(Ljava/lang/String;)V',
      '    8: return',
      '',
    ])
  })

  it('lists the constant pool on request', () => {
    const { output, sinks } = captureOutput()
    executeInspectCommand(hello, { pool: true, code: false }, sinks)
    const lines = output.stdout.split('\n')
    expect(lines).toContain('constant pool (count 22):')
    expect(lines).toContain('  #1 = Utf8 "demo/Hello"')
    expect(lines).toContain('  #2 = class demo/Hello')
    expect(lines).toContain('  #12 = NameAndType')
  })

  it('rejects a path that is not a class file', () => {
    const { output, sinks } = captureOutput()
    expect(executeInspectCommand(join(root, 'Nope.txt'), { pool: false, code: false }, sinks)).toBe(1)
    expect(output.stderr).toBe(`Not a class file: ${join(root, 'Nope.txt')}\n`)
  })
})
