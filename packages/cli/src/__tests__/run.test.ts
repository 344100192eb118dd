import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { logger } from '@tinyjvm/core'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { classPathRoot, executeRunCommand, MAIN_DESCRIPTOR } from '../commands/run'
import type { RunOptions } from '../utils/validation'
import { captureOutput, DIVIDE_CODE, HELLO_CODE, writeClassFile } from './fixtures'

function runOptions(overrides: Partial<RunOptions> = {}): RunOptions {
  return {
    trace: false,
    maxDepth: 64,
    maxSteps: 0,
    method: 'main',
    descriptor: MAIN_DESCRIPTOR,
    ...overrides,
  }
}

describe('run command', () => {
  let root = ''
  let hello = ''
  let broken = ''

  beforeAll(() => {
    logger.init()
    root = mkdtempSync(join(tmpdir(), 'tinyjvm-run-'))
    hello = writeClassFile(root, 'demo/Hello', HELLO_CODE)
    broken = writeClassFile(root, 'demo/Broken', DIVIDE_CODE)
  })

  afterAll(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('runs main and forwards guest output to stdout', () => {
    const { output, sinks } = captureOutput()
    expect(executeRunCommand(hello, runOptions(), sinks)).toBe(0)
    expect(output.stdout).toBe('hello\n')
    expect(output.stderr).toBe('')
  })

  it('prints one trace line per executed instruction', () => {
    const { output, sinks } = captureOutput()
    expect(executeRunCommand(hello, runOptions({ trace: true }), sinks)).toBe(0)
    const lines = output.stderr.trimEnd().split('\n')
    expect(lines).toHaveLength(5)
    expect(lines[0]).toBe('     1 demo/Hello.main 0: getstatic []')
    expect(lines[3]).toBe(
      '     4 demo/Hello.main 5: invokevirtual [ref java.io.PrintStream@1, ref "hello"]',
    )
  })

  it('reports a guest fault with its stack trace and exit code 1', () => {
    const { output, sinks } = captureOutput()
    expect(executeRunCommand(broken, runOptions(), sinks)).toBe(1)
    expect(output.stderr).toBe(
      'RuntimeFault: / by zero\n    at demo.Broken.main([Ljava/lang/String;)V (pc 2)\n',
    )
  })

  it('stops at the instruction budget', () => {
    const { output, sinks } = captureOutput()
    expect(executeRunCommand(hello, runOptions({ maxSteps: 3 }), sinks)).toBe(1)
    expect(output.stderr.split('\n')[0]).toBe(
      'ExecutionLimitExceeded: Instruction budget of 3 steps exhausted',
    )
  })

  it('reports a missing entry method', () => {
    const { output, sinks } = captureOutput()
    expect(executeRunCommand(hello, runOptions({ method: 'start' }), sinks)).toBe(1)
    expect(output.stderr).toBe(
      'ResolutionError: Method demo/Hello.start([Ljava/lang/String;)V not found\n',
    )
  })

  it('rejects a path that is not a class file', () => {
    const { output, sinks } = captureOutput()
    expect(executeRunCommand(join(root, 'missing.class'), runOptions(), sinks)).toBe(1)
    expect(output.stderr).toBe(`Not a class file: ${join(root, 'missing.class')}\n`)
  })

  it('finds the package root of a class file', () => {
    expect(classPathRoot('/work/out/demo/Hello.class', 'demo/Hello')).toBe('/work/out')
    expect(classPathRoot('/work/Top.class', 'Top')).toBe('/work')
  })
})
