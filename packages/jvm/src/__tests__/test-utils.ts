import { METHOD_ACCESS_FLAGS } from '@tinyjvm/classfile'
import type { ConstantEntry, LineNumberEntry, Value } from '@tinyjvm/types'
import {
  ClassDefinition,
  type FieldDeclaration,
  type MethodDeclaration,
} from '../class-definition'
import { MapClassRegistry } from '../class-registry'
import { OBJECT_CLASS } from '../config'
import { ConstantPool } from '../constant-pool'
import { Interpreter, type InterpreterOptions } from '../interpreter'
import type { ConsoleSink } from '../types'

export const PUBLIC_STATIC = METHOD_ACCESS_FLAGS.ACC_PUBLIC | METHOD_ACCESS_FLAGS.ACC_STATIC
export const PUBLIC = METHOD_ACCESS_FLAGS.ACC_PUBLIC

/**
 * Appends constants in class-file order, reusing an entry already added
 */
export class PoolBuilder {
  readonly entries: ConstantEntry[] = []
  private next = 1
  private readonly seen = new Map<string, number>()

  utf8(text: string): number {
    return this.add(`Utf8:${text}`, { tag: 'Utf8', text })
  }

  integer(value: number): number {
    return this.add(`Integer:${value}`, { tag: 'Integer', value })
  }

  float(value: number): number {
    return this.add(`Float:${value}`, { tag: 'Float', value })
  }

  long(value: bigint): number {
    return this.add(`Long:${value}`, { tag: 'Long', value })
  }

  double(value: number): number {
    return this.add(`Double:${value}`, { tag: 'Double', value })
  }

  string(text: string): number {
    const utf8Index = this.utf8(text)
    return this.add(`String:${utf8Index}`, { tag: 'String', utf8Index })
  }

  classRef(name: string): number {
    const nameIndex = this.utf8(name)
    return this.add(`Class:${nameIndex}`, { tag: 'Class', nameIndex })
  }

  nameAndType(name: string, descriptor: string): number {
    const nameIndex = this.utf8(name)
    const descriptorIndex = this.utf8(descriptor)
    return this.add(`NameAndType:${nameIndex}:${descriptorIndex}`, {
      tag: 'NameAndType',
      nameIndex,
      descriptorIndex,
    })
  }

  fieldref(className: string, name: string, descriptor: string): number {
    const classIndex = this.classRef(className)
    const nameAndTypeIndex = this.nameAndType(name, descriptor)
    return this.add(`Fieldref:${classIndex}:${nameAndTypeIndex}`, {
      tag: 'Fieldref',
      classIndex,
      nameAndTypeIndex,
    })
  }

  methodref(className: string, name: string, descriptor: string): number {
    const classIndex = this.classRef(className)
    const nameAndTypeIndex = this.nameAndType(name, descriptor)
    return this.add(`Methodref:${classIndex}:${nameAndTypeIndex}`, {
      tag: 'Methodref',
      classIndex,
      nameAndTypeIndex,
    })
  }

  interfaceMethodref(className: string, name: string, descriptor: string): number {
    const classIndex = this.classRef(className)
    const nameAndTypeIndex = this.nameAndType(name, descriptor)
    return this.add(`InterfaceMethodref:${classIndex}:${nameAndTypeIndex}`, {
      tag: 'InterfaceMethodref',
      classIndex,
      nameAndTypeIndex,
    })
  }

  build(): ConstantPool {
    const [error, pool] = ConstantPool.build(this.entries)
    if (error) throw error
    return pool
  }

  private add(key: string, entry: ConstantEntry): number {
    const existing = this.seen.get(key)
    if (existing !== undefined) return existing
    const index = this.next
    this.entries.push(entry)
    this.seen.set(key, index)
    this.next += entry.tag === 'Long' || entry.tag === 'Double' ? 2 : 1
    return index
  }
}

/** Big-endian u2 operand bytes */
export function u2(value: number): [number, number] {
  return [(value >> 8) & 0xff, value & 0xff]
}

/** Big-endian s4 operand bytes */
export function s4(value: number): [number, number, number, number] {
  return [(value >> 24) & 0xff, (value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff]
}

export interface TestMethod {
  name: string
  descriptor: string
  accessFlags?: number
  maxStack?: number
  maxLocals?: number
  /** Omit for a method without code */
  code?: number[]
  lineNumbers?: LineNumberEntry[]
}

export interface TestClass {
  name: string
  superName?: string | null
  accessFlags?: number
  interfaces?: string[]
  pool?: PoolBuilder
  methods?: TestMethod[]
  fields?: FieldDeclaration[]
}

export function defineClass(declared: TestClass): ClassDefinition {
  const methods: MethodDeclaration[] = (declared.methods ?? []).map((method) => ({
    name: method.name,
    descriptor: method.descriptor,
    accessFlags: method.accessFlags ?? PUBLIC_STATIC,
    code: method.code
      ? {
          maxStack: method.maxStack ?? 8,
          maxLocals: method.maxLocals ?? 8,
          code: new Uint8Array(method.code),
          lineNumbers: method.lineNumbers,
        }
      : undefined,
  }))
  const [error, classDefinition] = ClassDefinition.define({
    name: declared.name,
    superName: declared.superName === undefined ? OBJECT_CLASS : declared.superName,
    accessFlags: declared.accessFlags,
    interfaces: declared.interfaces,
    pool: (declared.pool ?? new PoolBuilder()).build(),
    methods,
    fields: declared.fields,
  })
  if (error) throw error
  return classDefinition
}

/**
 * Sink collecting console output as one string
 */
export function captureConsole(): ConsoleSink & { output: string } {
  const sink = {
    output: '',
    write(text: string) {
      sink.output += text
    },
  }
  return sink
}

export function createInterpreter(
  classes: ClassDefinition[] = [],
  options: InterpreterOptions = {},
): Interpreter {
  return new Interpreter(new MapClassRegistry({ classes }), {
    console: captureConsole(),
    ...options,
  })
}

export function returned(value: Value | null | undefined): unknown {
  if (!value) return value
  switch (value.type) {
    case 'null':
      return null
    case 'reference':
      return value.value.kind === 'string' ? value.value.text : value.value
    default:
      return value.value
  }
}
