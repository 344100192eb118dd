import { mkdirSync, writeFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { CLASS_FILE_MAGIC, encodeClassFile } from '@tinyjvm/classfile'
import type { ClassFile, ConstantEntry } from '@tinyjvm/types'

/**
 * Pool shared by the fixtures; `main` bodies index into it
 */
const POOL: ConstantEntry[] = [
  { tag: 'Utf8', text: 'demo/Hello' }, // #1 (replaced per class)
  { tag: 'Class', nameIndex: 1 }, // #2
  { tag: 'Utf8', text: 'java/lang/Object' }, // #3
  { tag: 'Class', nameIndex: 3 }, // #4
  { tag: 'Utf8', text: 'main' }, // #5
  { tag: 'Utf8', text: '([Ljava/lang/String;)V' }, // #6
  { tag: 'Utf8', text: 'Code' }, // #7
  { tag: 'Utf8', text: 'java/lang/System' }, // #8
  { tag: 'Class', nameIndex: 8 }, // #9
  { tag: 'Utf8', text: 'out' }, // #10
  { tag: 'Utf8', text: 'Ljava/io/PrintStream;' }, // #11
  { tag: 'NameAndType', nameIndex: 10, descriptorIndex: 11 }, // #12
  { tag: 'Fieldref', classIndex: 9, nameAndTypeIndex: 12 }, // #13
  { tag: 'Utf8', text: 'hello' }, // #14
  { tag: 'String', utf8Index: 14 }, // #15
  { tag: 'Utf8', text: 'java/io/PrintStream' }, // #16
  { tag: 'Class', nameIndex: 16 }, // #17
  { tag: 'Utf8', text: 'println' }, // #18
  { tag: 'Utf8', text: '(Ljava/lang/String;)V' }, // #19
  { tag: 'NameAndType', nameIndex: 18, descriptorIndex: 19 }, // #20
  { tag: 'Methodref', classIndex: 17, nameAndTypeIndex: 20 }, // #21
]

/** getstatic System.out; ldc "hello"; invokevirtual println; return */
export const HELLO_CODE = [0xb2, 0, 13, 0x12, 15, 0xb6, 0, 21, 0xb1]

/** iconst_1; iconst_0; idiv; pop; return */
export const DIVIDE_CODE = [0x04, 0x03, 0x6c, 0x57, 0xb1]

export function mainClassFile(className: string, code: number[]): ClassFile {
  const constantPool = POOL.map(
    (entry, index): ConstantEntry =>
      index === 0 ? { tag: 'Utf8', text: className } : entry,
  )
  return {
    magic: CLASS_FILE_MAGIC,
    minorVersion: 0,
    majorVersion: 52,
    constantPool,
    constantPoolCount: constantPool.length + 1,
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
              maxStack: 2,
              maxLocals: 1,
              code: new Uint8Array(code),
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

/**
 * Write `<root>/<className>.class` and return its path
 */
export function writeClassFile(root: string, className: string, code: number[]): string {
  const path = join(root, `${className}.class`)
  mkdirSync(dirname(path), { recursive: true })
  writeFileSync(path, encodeClassFile(mainClassFile(className, code)))
  return path
}

export function captureOutput() {
  const output = { stdout: '', stderr: '' }
  return {
    output,
    sinks: {
      stdout: { write: (text: string) => void (output.stdout += text) },
      stderr: { write: (text: string) => void (output.stderr += text) },
    },
  }
}
