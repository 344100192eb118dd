/**
 * Constant Pool Codec
 *
 * Entries are decoded in file order. Long and Double take two logical slots;
 * the second one is never listed, so `layoutConstantSlots` rebuilds the
 * original 1-based addressing that instruction operands are encoded against.
 */

import { type ConstantEntry, FormatError } from '@tinyjvm/types'
import { CONSTANT_TAGS, UNSUPPORTED_CONSTANT_TAGS } from './config'
import type { ByteCursor } from './cursor'
import type { ByteWriter } from './writer'

/**
 * Slot 0 and the upper half of a wide entry hold null
 */
export type ConstantSlot = ConstantEntry | null

export function isWideConstant(entry: ConstantEntry): boolean {
  return entry.tag === 'Long' || entry.tag === 'Double'
}

/**
 * Number of logical slots the entries occupy, plus one (constant_pool_count)
 */
export function constantPoolCount(entries: readonly ConstantEntry[]): number {
  return entries.reduce((count, entry) => count + (isWideConstant(entry) ? 2 : 1), 1)
}

export function layoutConstantSlots(
  entries: readonly ConstantEntry[],
): ConstantSlot[] {
  const slots: ConstantSlot[] = [null]
  for (const entry of entries) {
    slots.push(entry)
    if (isWideConstant(entry)) {
      slots.push(null)
    }
  }
  return slots
}

export function decodeConstantEntry(cursor: ByteCursor): ConstantEntry {
  const offset = cursor.position
  const tag = cursor.readU1()
  switch (tag) {
    case CONSTANT_TAGS.Utf8:
      return { tag: 'Utf8', text: cursor.readUtf8() }
    case CONSTANT_TAGS.Integer:
      return { tag: 'Integer', value: cursor.readS4() }
    case CONSTANT_TAGS.Float:
      return { tag: 'Float', value: cursor.readF4() }
    case CONSTANT_TAGS.Long:
      return { tag: 'Long', value: cursor.readS8() }
    case CONSTANT_TAGS.Double:
      return { tag: 'Double', value: cursor.readF8() }
    case CONSTANT_TAGS.Class:
      return { tag: 'Class', nameIndex: cursor.readU2() }
    case CONSTANT_TAGS.String:
      return { tag: 'String', utf8Index: cursor.readU2() }
    case CONSTANT_TAGS.Fieldref:
      return {
        tag: 'Fieldref',
        classIndex: cursor.readU2(),
        nameAndTypeIndex: cursor.readU2(),
      }
    case CONSTANT_TAGS.Methodref:
      return {
        tag: 'Methodref',
        classIndex: cursor.readU2(),
        nameAndTypeIndex: cursor.readU2(),
      }
    case CONSTANT_TAGS.InterfaceMethodref:
      return {
        tag: 'InterfaceMethodref',
        classIndex: cursor.readU2(),
        nameAndTypeIndex: cursor.readU2(),
      }
    case CONSTANT_TAGS.NameAndType:
      return {
        tag: 'NameAndType',
        nameIndex: cursor.readU2(),
        descriptorIndex: cursor.readU2(),
      }
    case CONSTANT_TAGS.MethodHandle:
      return {
        tag: 'MethodHandle',
        referenceKind: cursor.readU1(),
        referenceIndex: cursor.readU2(),
      }
    case CONSTANT_TAGS.MethodType:
      return { tag: 'MethodType', descriptorIndex: cursor.readU2() }
    case CONSTANT_TAGS.InvokeDynamic:
      return {
        tag: 'InvokeDynamic',
        bootstrapMethodAttrIndex: cursor.readU2(),
        nameAndTypeIndex: cursor.readU2(),
      }
    default: {
      const known = UNSUPPORTED_CONSTANT_TAGS[tag]
      throw new FormatError(
        known === undefined
          ? `Unknown constant pool tag: ${tag}`
          : `Constant pool tag ${tag} (${known}) is not supported`,
        offset,
      )
    }
  }
}

/**
 * Read constant_pool_count - 1 slots worth of entries
 */
export function decodeConstantPool(
  cursor: ByteCursor,
  count: number,
): ConstantEntry[] {
  const entries: ConstantEntry[] = []
  for (let i = 1; i < count; i++) {
    const entry = decodeConstantEntry(cursor)
    entries.push(entry)
    if (isWideConstant(entry)) {
      if (i + 1 >= count) {
        throw new FormatError(
          `${entry.tag} constant at slot ${i} overruns a pool of ${count} slots`,
          cursor.position,
        )
      }
      i++ // Takes two slots
    }
  }
  return entries
}

export function encodeConstantEntry(writer: ByteWriter, entry: ConstantEntry): void {
  writer.writeU1(CONSTANT_TAGS[entry.tag])
  switch (entry.tag) {
    case 'Utf8':
      writer.writeUtf8(entry.text)
      break
    case 'Integer':
      writer.writeS4(entry.value)
      break
    case 'Float':
      writer.writeF4(entry.value)
      break
    case 'Long':
      writer.writeS8(entry.value)
      break
    case 'Double':
      writer.writeF8(entry.value)
      break
    case 'Class':
      writer.writeU2(entry.nameIndex)
      break
    case 'String':
      writer.writeU2(entry.utf8Index)
      break
    case 'Fieldref':
    case 'Methodref':
    case 'InterfaceMethodref':
      writer.writeU2(entry.classIndex).writeU2(entry.nameAndTypeIndex)
      break
    case 'NameAndType':
      writer.writeU2(entry.nameIndex).writeU2(entry.descriptorIndex)
      break
    case 'MethodHandle':
      writer.writeU1(entry.referenceKind).writeU2(entry.referenceIndex)
      break
    case 'MethodType':
      writer.writeU2(entry.descriptorIndex)
      break
    case 'InvokeDynamic':
      writer
        .writeU2(entry.bootstrapMethodAttrIndex)
        .writeU2(entry.nameAndTypeIndex)
      break
  }
}

export function encodeConstantPool(
  writer: ByteWriter,
  entries: readonly ConstantEntry[],
): void {
  writer.writeU2(constantPoolCount(entries))
  for (const entry of entries) {
    encodeConstantEntry(writer, entry)
  }
}
