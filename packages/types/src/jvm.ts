/**
 * JVM Runtime Types
 *
 * Resolved constants, descriptors and the tagged value model shared by the
 * interpreter, the class registry and the CLI.
 */

import type { ConstantTag } from './classfile'

/**
 * The kind a caller expects to find at a constant-pool index
 */
export type ConstantKind = ConstantTag

export interface MemberReference {
  className: string
  name: string
  descriptor: string
}

/**
 * A constant with every embedded index followed to its final value
 */
export type ResolvedConstant =
  | { kind: 'Utf8'; text: string }
  | { kind: 'Integer'; value: number }
  | { kind: 'Float'; value: number }
  | { kind: 'Long'; value: bigint }
  | { kind: 'Double'; value: number }
  | { kind: 'Class'; className: string }
  | { kind: 'String'; text: string }
  | ({ kind: 'Fieldref' } & MemberReference)
  | ({ kind: 'Methodref' } & MemberReference)
  | ({ kind: 'InterfaceMethodref' } & MemberReference)
  | { kind: 'NameAndType'; name: string; descriptor: string }
  | { kind: 'MethodType'; descriptor: string }
  | { kind: 'MethodHandle'; referenceKind: number; reference: MemberReference }
  | {
      kind: 'InvokeDynamic'
      bootstrapMethodAttrIndex: number
      name: string
      descriptor: string
    }

/**
 * Constants `ldc`, `ldc_w` and `ldc2_w` may push
 */
export type LoadableConstant = Extract<
  ResolvedConstant,
  { kind: 'Integer' | 'Float' | 'Long' | 'Double' | 'String' | 'Class' }
>

export type BaseTypeDescriptor = 'B' | 'C' | 'D' | 'F' | 'I' | 'J' | 'S' | 'Z'

export type FieldType =
  | { kind: 'base'; descriptor: BaseTypeDescriptor }
  | { kind: 'object'; className: string }
  | { kind: 'array'; component: FieldType }

export interface MethodDescriptor {
  raw: string
  parameters: FieldType[]
  /** null for void */
  returnType: FieldType | null
  /** Local-variable slots taken by the parameters (long/double count 2) */
  parameterSlots: number
}

export interface InstanceObject {
  kind: 'instance'
  id: number
  className: string
  fields: Map<string, Value>
}

export interface ArrayObject {
  kind: 'array'
  id: number
  componentType: FieldType
  elements: Value[]
}

export interface StringObject {
  kind: 'string'
  id: number
  text: string
}

export interface ClassObject {
  kind: 'class'
  id: number
  className: string
}

export type HeapObject = InstanceObject | ArrayObject | StringObject | ClassObject

export type Value =
  | { type: 'int'; value: number }
  | { type: 'long'; value: bigint }
  | { type: 'float'; value: number }
  | { type: 'double'; value: number }
  | { type: 'reference'; value: HeapObject }
  | { type: 'null' }

export interface RuntimeOptions {
  /** Deepest call stack allowed before CallStackOverflow */
  maxCallDepth?: number
  /** Instruction budget per execute() call; 0 means unlimited */
  maxSteps?: number
  /** Record an ExecutionLogEntry for every executed instruction */
  trace?: boolean
}

export interface ExecutionLogEntry {
  step: number
  className: string
  methodName: string
  pc: number
  instructionName: string
  opcode: string
  depth: number
  /** Operand stack before the instruction ran, bottom first */
  stack: string[]
}

export interface StackTraceEntry {
  className: string
  methodName: string
  descriptor: string
  pc: number
  line?: number
}

export interface InvocationResult {
  /** null for a void method */
  returnValue: Value | null
  steps: number
}
