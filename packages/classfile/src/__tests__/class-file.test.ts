import { type ClassFile, FormatError } from '@tinyjvm/types'
import { describe, expect, it } from 'vitest'
import { decodeClassFile, encodeClassFile } from '../class-file'
import { CLASS_ACCESS_FLAGS, CLASS_FILE_MAGIC, parseFlags } from '../config'
import {
  constantPoolCount,
  decodeConstantPool,
  layoutConstantSlots,
} from '../constant-pool'
import { ByteCursor } from '../cursor'
import { ByteWriter } from '../writer'

function sampleClassFile(code = new Uint8Array([0x10, 42, 0xac])): ClassFile {
  const constantPool: ClassFile['constantPool'] = [
    { tag: 'Utf8', text: 'Sample' }, // #1
    { tag: 'Class', nameIndex: 1 }, // #2
    { tag: 'Utf8', text: 'java/lang/Object' }, // #3
    { tag: 'Class', nameIndex: 3 }, // #4
    { tag: 'Utf8', text: 'Code' }, // #5
    { tag: 'Utf8', text: 'answer' }, // #6
    { tag: 'Utf8', text: '()I' }, // #7
    { tag: 'Long', value: 1234567890123n }, // #8, #9
    { tag: 'Utf8', text: 'LineNumberTable' }, // #10
    { tag: 'Utf8', text: 'SourceFile' }, // #11
    { tag: 'Utf8', text: 'Sample.java' }, // #12
    { tag: 'Utf8', text: 'Custom' }, // #13
  ]
  return {
    magic: CLASS_FILE_MAGIC,
    minorVersion: 0,
    majorVersion: 52,
    constantPool,
    constantPoolCount: 14,
    accessFlags: 0x0021,
    thisClass: 2,
    superClass: 4,
    interfaces: [],
    fields: [],
    methods: [
      {
        accessFlags: 0x0009,
        nameIndex: 6,
        descriptorIndex: 7,
        attributes: [
          {
            name: 'Code',
            nameIndex: 5,
            code: {
              maxStack: 1,
              maxLocals: 0,
              code,
              exceptionTable: [],
              attributes: [
                {
                  name: 'LineNumberTable',
                  nameIndex: 10,
                  entries: [{ startPc: 0, lineNumber: 3 }],
                },
              ],
            },
          },
        ],
      },
    ],
    attributes: [
      { name: 'SourceFile', nameIndex: 11, sourceFileIndex: 12 },
      {
        name: 'Raw',
        nameIndex: 13,
        attributeName: 'Custom',
        info: new Uint8Array([1, 2, 3]),
      },
    ],
  }
}

describe('Class file codec', () => {
  it('decodes what the encoder wrote', () => {
    const classFile = sampleClassFile()
    const bytes = encodeClassFile(classFile)

    const [error, decoded] = decodeClassFile(bytes)
    expect(error).toBeUndefined()
    expect(decoded?.value).toEqual(classFile)
    expect(decoded?.consumed).toBe(bytes.length)
    expect(decoded?.remaining.length).toBe(0)
  })

  it('returns trailing bytes as remaining', () => {
    const bytes = encodeClassFile(sampleClassFile())
    const padded = new Uint8Array([...bytes, 0xaa, 0xbb])

    const [error, decoded] = decodeClassFile(padded)
    expect(error).toBeUndefined()
    expect(Array.from(decoded?.remaining ?? [])).toEqual([0xaa, 0xbb])
  })

  it('rejects a bad magic number', () => {
    const bytes = encodeClassFile(sampleClassFile())
    bytes.set([0xde, 0xad, 0xbe, 0xef], 0)

    const [error] = decodeClassFile(bytes)
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message).toBe(
      'Invalid magic number 0xdeadbeef: not a class file (at byte 0)',
    )
  })

  it('reports truncation as a FormatError', () => {
    const bytes = encodeClassFile(sampleClassFile())

    const [error, decoded] = decodeClassFile(bytes.subarray(0, 40))
    expect(decoded).toBeUndefined()
    expect(error).toBeInstanceOf(FormatError)
    expect(error?.message).toContain('Unexpected end of data')
  })

  it('rejects a Code attribute with no instructions', () => {
    const bytes = encodeClassFile(sampleClassFile(new Uint8Array(0)))

    const [error] = decodeClassFile(bytes)
    expect(error?.message).toBe('Code attribute with empty code array (at byte 8)')
  })

  it('names class access flags', () => {
    expect(parseFlags(0x0021, CLASS_ACCESS_FLAGS)).toEqual([
      'ACC_PUBLIC',
      'ACC_SUPER',
    ])
  })
})

describe('Constant pool codec', () => {
  it('gives long and double entries two slots', () => {
    const bytes = new ByteWriter()
      .writeU1(5)
      .writeS8(5n)
      .writeU1(1)
      .writeUtf8('x')
      .toBytes()

    const entries = decodeConstantPool(new ByteCursor(bytes), 4)
    expect(entries).toEqual([
      { tag: 'Long', value: 5n },
      { tag: 'Utf8', text: 'x' },
    ])
    expect(constantPoolCount(entries)).toBe(4)
    expect(layoutConstantSlots(entries)).toEqual([
      null,
      { tag: 'Long', value: 5n },
      null,
      { tag: 'Utf8', text: 'x' },
    ])
  })

  it('rejects a wide entry in the last slot', () => {
    const bytes = new ByteWriter().writeU1(6).writeF8(2.5).toBytes()

    expect(() => decodeConstantPool(new ByteCursor(bytes), 2)).toThrow(
      'Double constant at slot 1 overruns a pool of 2 slots (at byte 9)',
    )
  })

  it('rejects unknown and unsupported tags', () => {
    expect(() =>
      decodeConstantPool(new ByteCursor(new Uint8Array([99])), 2),
    ).toThrow('Unknown constant pool tag: 99 (at byte 0)')
    expect(() =>
      decodeConstantPool(new ByteCursor(new Uint8Array([19, 0, 1])), 2),
    ).toThrow('Constant pool tag 19 (Module) is not supported (at byte 0)')
  })
})
