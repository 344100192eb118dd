/**
 * Class File Codec
 *
 * ClassFile {
 *     u4             magic;
 *     u2             minor_version;
 *     u2             major_version;
 *     u2             constant_pool_count;
 *     cp_info        constant_pool[constant_pool_count-1];
 *     u2             access_flags;
 *     u2             this_class;
 *     u2             super_class;
 *     u2             interfaces_count;
 *     u2             interfaces[interfaces_count];
 *     u2             fields_count;
 *     field_info     fields[fields_count];
 *     u2             methods_count;
 *     method_info    methods[methods_count];
 *     u2             attributes_count;
 *     attribute_info attributes[attributes_count];
 * }
 */

import {
  type ClassFile,
  type DecodingResult,
  FormatError,
  type MemberInfo,
  type Safe,
  safeError,
  safeResult,
} from '@tinyjvm/types'
import { tryit } from 'radash'
import { decodeAttributes, encodeAttributes } from './attributes'
import { CLASS_FILE_MAGIC } from './config'
import {
  type ConstantSlot,
  decodeConstantPool,
  encodeConstantPool,
  layoutConstantSlots,
} from './constant-pool'
import { ByteCursor } from './cursor'
import { ByteWriter } from './writer'

function decodeMembers(
  cursor: ByteCursor,
  slots: readonly ConstantSlot[],
): MemberInfo[] {
  const count = cursor.readU2()
  const members: MemberInfo[] = []
  for (let i = 0; i < count; i++) {
    members.push({
      accessFlags: cursor.readU2(),
      nameIndex: cursor.readU2(),
      descriptorIndex: cursor.readU2(),
      attributes: decodeAttributes(cursor, slots),
    })
  }
  return members
}

function readClassFile(cursor: ByteCursor): ClassFile {
  const magic = cursor.readU4()
  if (magic !== CLASS_FILE_MAGIC) {
    throw new FormatError(
      `Invalid magic number 0x${magic.toString(16)}: not a class file`,
      0,
    )
  }
  const minorVersion = cursor.readU2()
  const majorVersion = cursor.readU2()

  const constantPoolCount = cursor.readU2()
  const constantPool = decodeConstantPool(cursor, constantPoolCount)
  const slots = layoutConstantSlots(constantPool)

  const accessFlags = cursor.readU2()
  const thisClass = cursor.readU2()
  const superClass = cursor.readU2()

  const interfacesCount = cursor.readU2()
  const interfaces: number[] = []
  for (let i = 0; i < interfacesCount; i++) {
    interfaces.push(cursor.readU2())
  }

  const fields = decodeMembers(cursor, slots)
  const methods = decodeMembers(cursor, slots)
  const attributes = decodeAttributes(cursor, slots)

  return {
    magic,
    minorVersion,
    majorVersion,
    constantPool,
    constantPoolCount,
    accessFlags,
    thisClass,
    superClass,
    interfaces,
    fields,
    methods,
    attributes,
  }
}

/**
 * Decode the top-level sections of a class file.
 * Bytes after the final attribute table are returned as `remaining`.
 */
export function decodeClassFile(
  data: Uint8Array,
): Safe<DecodingResult<ClassFile>, FormatError> {
  const cursor = new ByteCursor(data)
  const [error, classFile] = tryit(readClassFile)(cursor)
  if (error) {
    return safeError(
      error instanceof FormatError ? error : new FormatError(error.message),
    )
  }
  return safeResult({
    value: classFile,
    remaining: data.subarray(cursor.position),
    consumed: cursor.position,
  })
}

export function encodeClassFile(classFile: ClassFile): Uint8Array {
  const writer = new ByteWriter()
  writer
    .writeU4(classFile.magic)
    .writeU2(classFile.minorVersion)
    .writeU2(classFile.majorVersion)
  encodeConstantPool(writer, classFile.constantPool)
  writer
    .writeU2(classFile.accessFlags)
    .writeU2(classFile.thisClass)
    .writeU2(classFile.superClass)
  writer.writeU2(classFile.interfaces.length)
  for (const index of classFile.interfaces) writer.writeU2(index)
  for (const members of [classFile.fields, classFile.methods]) {
    writer.writeU2(members.length)
    for (const member of members) {
      writer
        .writeU2(member.accessFlags)
        .writeU2(member.nameIndex)
        .writeU2(member.descriptorIndex)
      encodeAttributes(writer, member.attributes)
    }
  }
  encodeAttributes(writer, classFile.attributes)
  return writer.toBytes()
}
