import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { CLASS_FILE_MAGIC, encodeClassFile } from '@tinyjvm/classfile'
import {
  type ClassFile,
  FormatError,
  RESOLUTION_ERRORS,
  ResolutionError,
  safeResult,
} from '@tinyjvm/types'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'
import { createClassPathLoader, loadClassFile, MapClassRegistry } from '../class-registry'
import { Interpreter } from '../interpreter'
import { intValue } from '../values'
import { captureConsole, defineClass } from './test-utils'

/**
 * demo/Seven with `static int seven()` returning bipush 7
 */
function sevenClassFile(): ClassFile {
  return {
    magic: CLASS_FILE_MAGIC,
    minorVersion: 0,
    majorVersion: 52,
    constantPool: [
      { tag: 'Utf8', text: 'demo/Seven' }, // #1
      { tag: 'Class', nameIndex: 1 }, // #2
      { tag: 'Utf8', text: 'java/lang/Object' }, // #3
      { tag: 'Class', nameIndex: 3 }, // #4
      { tag: 'Utf8', text: 'seven' }, // #5
      { tag: 'Utf8', text: '()I' }, // #6
      { tag: 'Utf8', text: 'Code' }, // #7
    ],
    constantPoolCount: 8,
    accessFlags: 0x0021,
    thisClass: 2,
    superClass: 4,
    interfaces: [],
    fields: [],
    methods: [
      {
        accessFlags: 0x0009,
        nameIndex: 5,
        descriptorIndex: 6,
        attributes: [
          {
            name: 'Code',
            nameIndex: 7,
            code: {
              maxStack: 1,
              maxLocals: 0,
              code: new Uint8Array([0x10, 7, 0xac]),
              exceptionTable: [],
              attributes: [],
            },
          },
        ],
      },
    ],
    attributes: [],
  }
}

describe('MapClassRegistry', () => {
  let directory = ''

  beforeAll(() => {
    directory = mkdtempSync(join(tmpdir(), 'tinyjvm-registry-'))
    mkdirSync(join(directory, 'demo'))
    const bytes = encodeClassFile(sevenClassFile())
    writeFileSync(join(directory, 'demo', 'Seven.class'), bytes)
    writeFileSync(join(directory, 'demo', 'Padded.class'), new Uint8Array([...bytes, 0xaa, 0xbb]))
    mkdirSync(join(directory, 'demo', 'Folder.class'))
  })

  afterAll(() => {
    rmSync(directory, { recursive: true, force: true })
  })

  it('registers the bootstrap classes by default', () => {
    const registry = new MapClassRegistry()
    expect(registry.getClassNames()).toEqual([
      'java/lang/Object',
      'java/lang/String',
      'java/lang/System',
      'java/io/PrintStream',
    ])
    expect(new MapClassRegistry({ bootstrap: false }).getClassNames()).toEqual([])
  })

  it('reports an unknown class', () => {
    const [error] = new MapClassRegistry().resolveClass('demo/Missing')
    expect(error).toBeInstanceOf(ResolutionError)
    expect(error instanceof ResolutionError && error.reason).toBe(
      RESOLUTION_ERRORS.CLASS_NOT_FOUND,
    )
  })

  it('asks the loader once and keeps what it returns', () => {
    let calls = 0
    const registry = new MapClassRegistry({
      loader: (name) => {
        calls++
        return safeResult(name === 'demo/Lazy' ? defineClass({ name }) : null)
      },
    })
    expect(registry.resolveClass('demo/Lazy')[1]?.name).toBe('demo/Lazy')
    expect(registry.resolveClass('demo/Lazy')[1]?.name).toBe('demo/Lazy')
    expect(calls).toBe(1)
  })

  it('rejects a loaded class whose name differs from the one asked for', () => {
    const registry = new MapClassRegistry({
      loader: () => safeResult(defineClass({ name: 'demo/Other' })),
    })
    const [error] = registry.resolveClass('demo/Asked')
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message).toBe('Class file for demo/Asked declares demo/Other')
  })

  it('loads a class file from disk and runs it', () => {
    const [error, classDefinition] = loadClassFile(join(directory, 'demo', 'Seven.class'))
    expect(error).toBeUndefined()
    if (!classDefinition) return

    expect(classDefinition.name).toBe('demo/Seven')
    expect(classDefinition.superName).toBe('java/lang/Object')
    const interpreter = new Interpreter(new MapClassRegistry(), { console: captureConsole() })
    expect(interpreter.execute(classDefinition, 'seven', '()I')[1]?.returnValue).toEqual(
      intValue(7),
    )
  })

  it('finds classes under a class-path directory', () => {
    const loader = createClassPathLoader(directory)
    expect(loader('demo/Seven')[1]?.name).toBe('demo/Seven')
    expect(loader('demo/Absent')).toEqual([undefined, null])
  })

  it('rejects a class file with bytes after its last attribute', () => {
    const path = join(directory, 'demo', 'Padded.class')
    const [error] = loadClassFile(path)
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message).toBe(`${path}: 2 extra bytes after the class file`)
  })

  it('reports an unreadable class file as a format error', () => {
    const path = join(directory, 'demo', 'Folder.class')
    const [error] = loadClassFile(path)
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message.startsWith(`Cannot read ${path}: EISDIR`)).toBe(true)

    const [loaderError] = createClassPathLoader(directory)('demo/Folder')
    expect(loaderError).toBeInstanceOf(FormatError)
  })
})
