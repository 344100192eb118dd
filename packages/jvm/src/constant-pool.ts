/**
 * Constant Pool Table
 *
 * Slots keep the class-file numbering bit for bit: index 0 is unused and the
 * slot after a Long or Double is unusable, so operand indices decoded from
 * code address the table directly.
 */

import { type ConstantSlot, layoutConstantSlots } from '@tinyjvm/classfile'
import {
  type ConstantEntry,
  type ConstantKind,
  FormatError,
  type LoadableConstant,
  type MemberReference,
  RESOLUTION_ERRORS,
  type ResolvedConstant,
  ResolutionError,
  type Safe,
  safeError,
  safeResult,
} from '@tinyjvm/types'
import { tryit } from 'radash'

type Resolved<K extends ConstantKind> = Extract<ResolvedConstant, { kind: K }>

const LOADABLE_KINDS = [
  'Integer',
  'Float',
  'Long',
  'Double',
  'String',
  'Class',
] as const satisfies readonly ConstantKind[]

/**
 * Indices embedded in an entry, with a label for error messages
 */
function embeddedIndices(entry: ConstantEntry): Array<[string, number]> {
  switch (entry.tag) {
    case 'Class':
      return [['name_index', entry.nameIndex]]
    case 'String':
      return [['string_index', entry.utf8Index]]
    case 'Fieldref':
    case 'Methodref':
    case 'InterfaceMethodref':
      return [
        ['class_index', entry.classIndex],
        ['name_and_type_index', entry.nameAndTypeIndex],
      ]
    case 'NameAndType':
      return [
        ['name_index', entry.nameIndex],
        ['descriptor_index', entry.descriptorIndex],
      ]
    case 'MethodHandle':
      return [['reference_index', entry.referenceIndex]]
    case 'MethodType':
      return [['descriptor_index', entry.descriptorIndex]]
    case 'InvokeDynamic':
      return [['name_and_type_index', entry.nameAndTypeIndex]]
    default:
      return []
  }
}

function isKind<K extends ConstantKind>(
  constant: ResolvedConstant,
  kinds: readonly K[],
): constant is Resolved<K> {
  return kinds.some((kind) => kind === constant.kind)
}

export class ConstantPool {
  /** Composites resolved so far, by index */
  private readonly cache = new Map<number, ResolvedConstant>()

  private constructor(private readonly slots: readonly ConstantSlot[]) {}

  /**
   * Lay the entries out in class-file order and check every embedded index
   * lands on a usable slot
   */
  static build(
    entries: readonly ConstantEntry[],
  ): Safe<ConstantPool, FormatError> {
    const slots = layoutConstantSlots(entries)
    for (let index = 1; index < slots.length; index++) {
      const entry = slots[index]
      if (!entry) continue
      for (const [label, target] of embeddedIndices(entry)) {
        if (target < 1 || target >= slots.length) {
          return safeError(
            new FormatError(
              `Constant #${index} (${entry.tag}) ${label} ${target} is outside [1, ${slots.length})`,
            ),
          )
        }
        if (!slots[target]) {
          return safeError(
            new FormatError(
              `Constant #${index} (${entry.tag}) ${label} ${target} names the unusable half of a wide constant`,
            ),
          )
        }
      }
    }
    return safeResult(new ConstantPool(slots))
  }

  /**
   * constant_pool_count: one more than the highest index
   */
  get size(): number {
    return this.slots.length
  }

  /**
   * Raw entry at `index`; null for slot 0 and the upper half of a wide entry
   */
  entryAt(index: number): ConstantEntry | null {
    return this.slots[index] ?? null
  }

  /**
   * Usable slots in index order
   */
  entries(): Array<[number, ConstantEntry]> {
    const result: Array<[number, ConstantEntry]> = []
    this.slots.forEach((entry, index) => {
      if (entry) result.push([index, entry])
    })
    return result
  }

  /**
   * Resolve `index`, requiring one of `expected`, to a value with every
   * embedded index followed
   */
  resolve<K extends ConstantKind>(
    index: number,
    expected: K | readonly K[],
  ): Safe<Resolved<K>, ResolutionError> {
    const kinds: readonly K[] = typeof expected === 'string' ? [expected] : expected
    const [error, constant] = tryit(() =>
      this.resolveEntry(index, kinds, new Set<number>()),
    )()
    if (error) {
      if (error instanceof ResolutionError) return safeError(error)
      throw error
    }
    return safeResult(constant)
  }

  resolveUtf8(index: number): Safe<string, ResolutionError> {
    const [error, constant] = this.resolve(index, 'Utf8')
    return error ? safeError(error) : safeResult(constant.text)
  }

  resolveClassName(index: number): Safe<string, ResolutionError> {
    const [error, constant] = this.resolve(index, 'Class')
    return error ? safeError(error) : safeResult(constant.className)
  }

  resolveString(index: number): Safe<string, ResolutionError> {
    const [error, constant] = this.resolve(index, 'String')
    return error ? safeError(error) : safeResult(constant.text)
  }

  resolveNameAndType(
    index: number,
  ): Safe<{ name: string; descriptor: string }, ResolutionError> {
    const [error, constant] = this.resolve(index, 'NameAndType')
    return error
      ? safeError(error)
      : safeResult({ name: constant.name, descriptor: constant.descriptor })
  }

  resolveFieldRef(index: number): Safe<MemberReference, ResolutionError> {
    const [error, constant] = this.resolve(index, 'Fieldref')
    return error ? safeError(error) : safeResult(toMember(constant))
  }

  /**
   * Class and interface method references alike
   */
  resolveMethodRef(index: number): Safe<MemberReference, ResolutionError> {
    const [error, constant] = this.resolve(index, [
      'Methodref',
      'InterfaceMethodref',
    ])
    return error ? safeError(error) : safeResult(toMember(constant))
  }

  /**
   * Constants `ldc`, `ldc_w` and `ldc2_w` may push
   */
  resolveLoadable(index: number): Safe<LoadableConstant, ResolutionError> {
    return this.resolve(index, LOADABLE_KINDS)
  }

  private resolveEntry<K extends ConstantKind>(
    index: number,
    expected: readonly K[],
    inProgress: Set<number>,
  ): Resolved<K> {
    if (inProgress.has(index)) {
      throw new ResolutionError(
        RESOLUTION_ERRORS.CYCLE,
        `Constant #${index} refers back to itself`,
        index,
      )
    }

    const constant = this.cache.get(index) ?? this.resolveUncached(index, inProgress)
    if (!isKind(constant, expected)) {
      throw new ResolutionError(
        RESOLUTION_ERRORS.KIND_MISMATCH,
        `Constant #${index} is ${constant.kind}, expected ${expected.join(' or ')}`,
        index,
      )
    }
    return constant
  }

  private resolveUncached(index: number, inProgress: Set<number>): ResolvedConstant {
    if (!Number.isInteger(index) || index < 1 || index >= this.slots.length) {
      throw new ResolutionError(
        RESOLUTION_ERRORS.INDEX_OUT_OF_RANGE,
        `Constant index ${index} is outside [1, ${this.slots.length})`,
        index,
      )
    }
    const entry = this.slots[index]
    if (!entry) {
      throw new ResolutionError(
        RESOLUTION_ERRORS.UNUSABLE_SLOT,
        `Constant index ${index} is the unusable half of a wide constant`,
        index,
      )
    }

    inProgress.add(index)
    const constant = this.dereference(entry, inProgress)
    inProgress.delete(index)

    this.cache.set(index, constant)
    return constant
  }

  private dereference(entry: ConstantEntry, inProgress: Set<number>): ResolvedConstant {
    const utf8 = (index: number) =>
      this.resolveEntry(index, ['Utf8'], inProgress).text
    const nameAndType = (index: number) =>
      this.resolveEntry(index, ['NameAndType'], inProgress)
    const member = (classIndex: number, nameAndTypeIndex: number): MemberReference => {
      const owner = this.resolveEntry(classIndex, ['Class'], inProgress)
      const { name, descriptor } = nameAndType(nameAndTypeIndex)
      return { className: owner.className, name, descriptor }
    }

    switch (entry.tag) {
      case 'Utf8':
        return { kind: 'Utf8', text: entry.text }
      case 'Integer':
        return { kind: 'Integer', value: entry.value }
      case 'Float':
        return { kind: 'Float', value: entry.value }
      case 'Long':
        return { kind: 'Long', value: entry.value }
      case 'Double':
        return { kind: 'Double', value: entry.value }
      case 'Class':
        return { kind: 'Class', className: utf8(entry.nameIndex) }
      case 'String':
        return { kind: 'String', text: utf8(entry.utf8Index) }
      case 'Fieldref':
      case 'Methodref':
      case 'InterfaceMethodref':
        return {
          kind: entry.tag,
          ...member(entry.classIndex, entry.nameAndTypeIndex),
        }
      case 'NameAndType':
        return {
          kind: 'NameAndType',
          name: utf8(entry.nameIndex),
          descriptor: utf8(entry.descriptorIndex),
        }
      case 'MethodType':
        return { kind: 'MethodType', descriptor: utf8(entry.descriptorIndex) }
      case 'MethodHandle': {
        const target = this.resolveEntry(
          entry.referenceIndex,
          ['Fieldref', 'Methodref', 'InterfaceMethodref'],
          inProgress,
        )
        return {
          kind: 'MethodHandle',
          referenceKind: entry.referenceKind,
          reference: toMember(target),
        }
      }
      case 'InvokeDynamic': {
        const { name, descriptor } = nameAndType(entry.nameAndTypeIndex)
        return {
          kind: 'InvokeDynamic',
          bootstrapMethodAttrIndex: entry.bootstrapMethodAttrIndex,
          name,
          descriptor,
        }
      }
    }
  }
}

function toMember(constant: MemberReference): MemberReference {
  return {
    className: constant.className,
    name: constant.name,
    descriptor: constant.descriptor,
  }
}
