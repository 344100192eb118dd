/**
 * Class File Types
 *
 * Raw structures produced by the class-file decoder. Indices are kept exactly
 * as they appear in the file: constant-pool indices are 1-based and a Long or
 * Double entry consumes two slots.
 */

/**
 * Constant-pool entry, one case per tag.
 * Every index field refers to another slot of the same pool.
 */
export type ConstantEntry =
  | { tag: 'Utf8'; text: string }
  | { tag: 'Integer'; value: number }
  | { tag: 'Float'; value: number }
  | { tag: 'Long'; value: bigint }
  | { tag: 'Double'; value: number }
  | { tag: 'Class'; nameIndex: number }
  | { tag: 'String'; utf8Index: number }
  | { tag: 'Fieldref'; classIndex: number; nameAndTypeIndex: number }
  | { tag: 'Methodref'; classIndex: number; nameAndTypeIndex: number }
  | {
      tag: 'InterfaceMethodref'
      classIndex: number
      nameAndTypeIndex: number
    }
  | { tag: 'NameAndType'; nameIndex: number; descriptorIndex: number }
  | { tag: 'MethodHandle'; referenceKind: number; referenceIndex: number }
  | { tag: 'MethodType'; descriptorIndex: number }
  | {
      tag: 'InvokeDynamic'
      bootstrapMethodAttrIndex: number
      nameAndTypeIndex: number
    }

export type ConstantTag = ConstantEntry['tag']

export interface ExceptionTableEntry {
  startPc: number
  endPc: number
  handlerPc: number
  catchType: number
}

export interface LineNumberEntry {
  startPc: number
  lineNumber: number
}

export interface BootstrapMethod {
  methodRef: number
  arguments: number[]
}

/**
 * Decoded attribute. Attributes this codec does not understand are kept as raw
 * bytes so that re-encoding preserves them.
 */
export type AttributeInfo =
  | { name: 'Code'; nameIndex: number; code: CodeAttribute }
  | { name: 'LineNumberTable'; nameIndex: number; entries: LineNumberEntry[] }
  | { name: 'SourceFile'; nameIndex: number; sourceFileIndex: number }
  | { name: 'ConstantValue'; nameIndex: number; valueIndex: number }
  | {
      name: 'BootstrapMethods'
      nameIndex: number
      methods: BootstrapMethod[]
    }
  | { name: 'Raw'; nameIndex: number; attributeName: string; info: Uint8Array }

export interface CodeAttribute {
  maxStack: number
  maxLocals: number
  code: Uint8Array
  exceptionTable: ExceptionTableEntry[]
  attributes: AttributeInfo[]
}

export interface MemberInfo {
  accessFlags: number
  nameIndex: number
  descriptorIndex: number
  attributes: AttributeInfo[]
}

/**
 * The top-level sections of a class file
 */
export interface ClassFile {
  magic: number
  minorVersion: number
  majorVersion: number
  /** Entries in file order; the wide second slot of Long/Double is not listed */
  constantPool: ConstantEntry[]
  /** constant_pool_count as stored in the file (number of slots + 1) */
  constantPoolCount: number
  accessFlags: number
  thisClass: number
  superClass: number
  interfaces: number[]
  fields: MemberInfo[]
  methods: MemberInfo[]
  attributes: AttributeInfo[]
}

export interface DecodingResult<T> {
  value: T
  remaining: Uint8Array
  consumed: number
}
