/**
 * Attribute Codec
 *
 * attribute_info {
 *     u2 attribute_name_index;
 *     u4 attribute_length;
 *     u1 info[attribute_length];
 * }
 *
 * Code, LineNumberTable, SourceFile, ConstantValue and BootstrapMethods are
 * decoded; anything else is carried through as raw bytes.
 */

import {
  type AttributeInfo,
  type BootstrapMethod,
  type CodeAttribute,
  type ExceptionTableEntry,
  FormatError,
  type LineNumberEntry,
} from '@tinyjvm/types'
import type { ConstantSlot } from './constant-pool'
import type { ByteCursor } from './cursor'
import { ByteWriter } from './writer'

function attributeName(slots: readonly ConstantSlot[], index: number): string {
  const entry = slots[index]
  if (!entry || entry.tag !== 'Utf8') {
    throw new FormatError(`Attribute name index ${index} is not a Utf8 constant`)
  }
  return entry.text
}

function decodeCode(cursor: ByteCursor, slots: readonly ConstantSlot[]): CodeAttribute {
  const maxStack = cursor.readU2()
  const maxLocals = cursor.readU2()
  const codeLength = cursor.readU4()
  if (codeLength === 0) {
    throw new FormatError('Code attribute with empty code array', cursor.position)
  }
  const code = cursor.readBytes(codeLength)
  const exceptionTableLength = cursor.readU2()
  const exceptionTable: ExceptionTableEntry[] = []
  for (let i = 0; i < exceptionTableLength; i++) {
    exceptionTable.push({
      startPc: cursor.readU2(),
      endPc: cursor.readU2(),
      handlerPc: cursor.readU2(),
      catchType: cursor.readU2(),
    })
  }
  const attributes = decodeAttributes(cursor, slots)
  return { maxStack, maxLocals, code, exceptionTable, attributes }
}

function decodeAttribute(
  cursor: ByteCursor,
  slots: readonly ConstantSlot[],
): AttributeInfo {
  const nameIndex = cursor.readU2()
  const name = attributeName(slots, nameIndex)
  const length = cursor.readU4()
  const body = cursor.sub(length)

  let attribute: AttributeInfo
  switch (name) {
    case 'Code':
      attribute = { name: 'Code', nameIndex, code: decodeCode(body, slots) }
      break
    case 'LineNumberTable': {
      const count = body.readU2()
      const entries: LineNumberEntry[] = []
      for (let i = 0; i < count; i++) {
        entries.push({ startPc: body.readU2(), lineNumber: body.readU2() })
      }
      attribute = { name: 'LineNumberTable', nameIndex, entries }
      break
    }
    case 'SourceFile':
      attribute = { name: 'SourceFile', nameIndex, sourceFileIndex: body.readU2() }
      break
    case 'ConstantValue':
      attribute = { name: 'ConstantValue', nameIndex, valueIndex: body.readU2() }
      break
    case 'BootstrapMethods': {
      const count = body.readU2()
      const methods: BootstrapMethod[] = []
      for (let i = 0; i < count; i++) {
        const methodRef = body.readU2()
        const argumentCount = body.readU2()
        const args: number[] = []
        for (let j = 0; j < argumentCount; j++) {
          args.push(body.readU2())
        }
        methods.push({ methodRef, arguments: args })
      }
      attribute = { name: 'BootstrapMethods', nameIndex, methods }
      break
    }
    default:
      return {
        name: 'Raw',
        nameIndex,
        attributeName: name,
        info: body.readBytes(body.remaining),
      }
  }

  if (!body.isAtEnd()) {
    throw new FormatError(
      `${name} attribute declares ${length} bytes but ${body.remaining} were not consumed`,
      cursor.position,
    )
  }
  return attribute
}

export function decodeAttributes(
  cursor: ByteCursor,
  slots: readonly ConstantSlot[],
): AttributeInfo[] {
  const count = cursor.readU2()
  const attributes: AttributeInfo[] = []
  for (let i = 0; i < count; i++) {
    attributes.push(decodeAttribute(cursor, slots))
  }
  return attributes
}

function encodeAttributeBody(attribute: AttributeInfo): Uint8Array {
  const body = new ByteWriter()
  switch (attribute.name) {
    case 'Code': {
      const { code } = attribute
      body.writeU2(code.maxStack).writeU2(code.maxLocals)
      body.writeU4(code.code.length).writeBytes(code.code)
      body.writeU2(code.exceptionTable.length)
      for (const entry of code.exceptionTable) {
        body
          .writeU2(entry.startPc)
          .writeU2(entry.endPc)
          .writeU2(entry.handlerPc)
          .writeU2(entry.catchType)
      }
      encodeAttributes(body, code.attributes)
      break
    }
    case 'LineNumberTable':
      body.writeU2(attribute.entries.length)
      for (const entry of attribute.entries) {
        body.writeU2(entry.startPc).writeU2(entry.lineNumber)
      }
      break
    case 'SourceFile':
      body.writeU2(attribute.sourceFileIndex)
      break
    case 'ConstantValue':
      body.writeU2(attribute.valueIndex)
      break
    case 'BootstrapMethods':
      body.writeU2(attribute.methods.length)
      for (const method of attribute.methods) {
        body.writeU2(method.methodRef).writeU2(method.arguments.length)
        for (const arg of method.arguments) body.writeU2(arg)
      }
      break
    case 'Raw':
      body.writeBytes(attribute.info)
      break
  }
  return body.toBytes()
}

export function encodeAttributes(
  writer: ByteWriter,
  attributes: readonly AttributeInfo[],
): void {
  writer.writeU2(attributes.length)
  for (const attribute of attributes) {
    const body = encodeAttributeBody(attribute)
    writer.writeU2(attribute.nameIndex).writeU4(body.length).writeBytes(body)
  }
}
