/**
 * Class Definition
 *
 * The immutable, queryable view of one loaded class: names, members and the
 * constant pool every frame executing its methods resolves operands through.
 */

import { METHOD_ACCESS_FLAGS } from '@tinyjvm/classfile'
import {
  type AttributeInfo,
  type ClassFile,
  type CodeAttribute,
  type ExceptionTableEntry,
  type FieldType,
  FormatError,
  type LineNumberEntry,
  type MethodDescriptor,
  type Safe,
  safeError,
  safeResult,
} from '@tinyjvm/types'
import { tryit } from 'radash'
import { ConstantPool } from './constant-pool'
import { parseFieldDescriptor, parseMethodDescriptor } from './descriptor'

export interface MethodCode {
  maxStack: number
  maxLocals: number
  code: Uint8Array
  exceptionTable: ExceptionTableEntry[]
  lineNumbers: LineNumberEntry[]
}

export interface MethodInfo {
  name: string
  descriptor: string
  parsedDescriptor: MethodDescriptor
  accessFlags: number
  /** null for native and abstract methods */
  code: MethodCode | null
}

export interface FieldInfo {
  name: string
  descriptor: string
  type: FieldType
  accessFlags: number
  /** Pool index of the ConstantValue attribute, static fields only */
  constantValueIndex: number | null
}

export interface MethodDeclaration {
  name: string
  descriptor: string
  accessFlags: number
  code?: Partial<MethodCode> & Pick<MethodCode, 'maxStack' | 'maxLocals' | 'code'>
}

export interface FieldDeclaration {
  name: string
  descriptor: string
  accessFlags: number
  constantValueIndex?: number
}

export interface ClassDeclaration {
  name: string
  /** null only for the root class */
  superName: string | null
  accessFlags?: number
  interfaces?: string[]
  pool?: ConstantPool
  methods?: MethodDeclaration[]
  fields?: FieldDeclaration[]
  sourceFile?: string
}

const ACC_STATIC = METHOD_ACCESS_FLAGS.ACC_STATIC

export function isStatic(member: { accessFlags: number }): boolean {
  return (member.accessFlags & ACC_STATIC) !== 0
}

export function memberKey(name: string, descriptor: string): string {
  return `${name}${descriptor}`
}

export class ClassDefinition {
  readonly name: string
  readonly superName: string | null
  readonly accessFlags: number
  readonly interfaces: readonly string[]
  readonly pool: ConstantPool
  readonly sourceFile: string | undefined
  private readonly methods: ReadonlyMap<string, MethodInfo>
  private readonly fields: ReadonlyMap<string, FieldInfo>

  private constructor(
    declaration: ClassDeclaration,
    pool: ConstantPool,
    methods: MethodInfo[],
    fields: FieldInfo[],
  ) {
    this.name = declaration.name
    this.superName = declaration.superName
    this.accessFlags = declaration.accessFlags ?? 0
    this.interfaces = declaration.interfaces ?? []
    this.pool = pool
    this.sourceFile = declaration.sourceFile
    this.methods = new Map(
      methods.map((method) => [memberKey(method.name, method.descriptor), method]),
    )
    this.fields = new Map(fields.map((field) => [field.name, field]))
  }

  /**
   * Build a class from declarations, parsing every member descriptor
   */
  static define(
    declaration: ClassDeclaration,
  ): Safe<ClassDefinition, FormatError> {
    let pool = declaration.pool
    if (!pool) {
      const [error, empty] = ConstantPool.build([])
      if (error) return safeError(error)
      pool = empty
    }

    const methods: MethodInfo[] = []
    for (const method of declaration.methods ?? []) {
      const [error, parsedDescriptor] = parseMethodDescriptor(method.descriptor)
      if (error) {
        return safeError(
          new FormatError(`${declaration.name}.${method.name}: ${error.message}`),
        )
      }
      methods.push({
        name: method.name,
        descriptor: method.descriptor,
        parsedDescriptor,
        accessFlags: method.accessFlags,
        code: method.code
          ? {
              maxStack: method.code.maxStack,
              maxLocals: method.code.maxLocals,
              code: method.code.code,
              exceptionTable: method.code.exceptionTable ?? [],
              lineNumbers: method.code.lineNumbers ?? [],
            }
          : null,
      })
    }

    const fields: FieldInfo[] = []
    for (const field of declaration.fields ?? []) {
      const [error, type] = parseFieldDescriptor(field.descriptor)
      if (error) {
        return safeError(
          new FormatError(`${declaration.name}.${field.name}: ${error.message}`),
        )
      }
      fields.push({
        name: field.name,
        descriptor: field.descriptor,
        type,
        accessFlags: field.accessFlags,
        constantValueIndex: field.constantValueIndex ?? null,
      })
    }

    return safeResult(new ClassDefinition(declaration, pool, methods, fields))
  }

  /**
   * Build the pool, then name every member through it
   */
  static fromClassFile(
    classFile: ClassFile,
  ): Safe<ClassDefinition, FormatError> {
    const [poolError, pool] = ConstantPool.build(classFile.constantPool)
    if (poolError) return safeError(poolError)

    const [error, declaration] = tryit(readDeclaration)(classFile, pool)
    if (error) {
      return safeError(
        error instanceof FormatError ? error : new FormatError(error.message),
      )
    }
    return ClassDefinition.define(declaration)
  }

  findMethod(name: string, descriptor: string): MethodInfo | undefined {
    return this.methods.get(memberKey(name, descriptor))
  }

  findField(name: string): FieldInfo | undefined {
    return this.fields.get(name)
  }

  getMethods(): MethodInfo[] {
    return [...this.methods.values()]
  }

  getFields(): FieldInfo[] {
    return [...this.fields.values()]
  }
}

/**
 * Source line of the instruction at `pc`, from the LineNumberTable
 */
export function lineNumberAt(method: MethodInfo, pc: number): number | undefined {
  let line: number | undefined
  let bestStart = -1
  for (const entry of method.code?.lineNumbers ?? []) {
    if (entry.startPc <= pc && entry.startPc > bestStart) {
      bestStart = entry.startPc
      line = entry.lineNumber
    }
  }
  return line
}

function orThrow<T>(result: Safe<T, Error>, context: string): T {
  const [error, value] = result
  if (error) {
    throw new FormatError(`${context}: ${error.message}`)
  }
  return value
}

function findAttribute<N extends AttributeInfo['name']>(
  attributes: readonly AttributeInfo[],
  name: N,
): Extract<AttributeInfo, { name: N }> | undefined {
  for (const attribute of attributes) {
    if (isAttribute(attribute, name)) return attribute
  }
  return undefined
}

function isAttribute<N extends AttributeInfo['name']>(
  attribute: AttributeInfo,
  name: N,
): attribute is Extract<AttributeInfo, { name: N }> {
  return attribute.name === name
}

function toMethodCode(code: CodeAttribute): MethodCode {
  return {
    maxStack: code.maxStack,
    maxLocals: code.maxLocals,
    code: code.code,
    exceptionTable: code.exceptionTable,
    lineNumbers: code.attributes.flatMap((attribute) =>
      isAttribute(attribute, 'LineNumberTable') ? attribute.entries : [],
    ),
  }
}

function readDeclaration(
  classFile: ClassFile,
  pool: ConstantPool,
): ClassDeclaration {
  const name = orThrow(pool.resolveClassName(classFile.thisClass), 'this_class')
  const superName =
    classFile.superClass === 0
      ? null
      : orThrow(pool.resolveClassName(classFile.superClass), 'super_class')
  const interfaces = classFile.interfaces.map((index) =>
    orThrow(pool.resolveClassName(index), 'interfaces'),
  )

  const methods = classFile.methods.map((method): MethodDeclaration => {
    const methodName = orThrow(pool.resolveUtf8(method.nameIndex), 'method name')
    const code = findAttribute(method.attributes, 'Code')
    return {
      name: methodName,
      descriptor: orThrow(
        pool.resolveUtf8(method.descriptorIndex),
        `descriptor of ${methodName}`,
      ),
      accessFlags: method.accessFlags,
      code: code ? toMethodCode(code.code) : undefined,
    }
  })

  const fields = classFile.fields.map((field): FieldDeclaration => {
    const fieldName = orThrow(pool.resolveUtf8(field.nameIndex), 'field name')
    return {
      name: fieldName,
      descriptor: orThrow(
        pool.resolveUtf8(field.descriptorIndex),
        `descriptor of ${fieldName}`,
      ),
      accessFlags: field.accessFlags,
      constantValueIndex: findAttribute(field.attributes, 'ConstantValue')
        ?.valueIndex,
    }
  })

  const sourceFile = findAttribute(classFile.attributes, 'SourceFile')
  return {
    name,
    superName,
    accessFlags: classFile.accessFlags,
    interfaces,
    pool,
    methods,
    fields,
    sourceFile: sourceFile
      ? orThrow(pool.resolveUtf8(sourceFile.sourceFileIndex), 'SourceFile')
      : undefined,
  }
}
