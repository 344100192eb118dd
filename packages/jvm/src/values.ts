/**
 * Runtime Value Model
 *
 * Constructors normalise to the width of the category: ints wrap to 32 bits,
 * longs to 64 bits, floats round to single precision. Nothing is coerced
 * between categories.
 */

import type { FieldType, HeapObject, Value } from '@tinyjvm/types'
import { OBJECT_CLASS, STRING_CLASS } from './config'
import { toDescriptor } from './descriptor'

/**
 * Operand category an instruction names: the numeric types plus references
 */
export type StackType = 'int' | 'long' | 'float' | 'double' | 'reference'

export const NULL_VALUE: Value = { type: 'null' }

export function intValue(value: number): Value {
  return { type: 'int', value: value | 0 }
}

export function longValue(value: bigint): Value {
  return { type: 'long', value: BigInt.asIntN(64, value) }
}

export function floatValue(value: number): Extract<Value, { type: 'float' }> {
  return { type: 'float', value: Math.fround(value) }
}

export function doubleValue(value: number): Value {
  return { type: 'double', value }
}

export function referenceValue(object: HeapObject | null): Value {
  return object === null ? NULL_VALUE : { type: 'reference', value: object }
}

export function isCategory2(value: Value): boolean {
  return value.type === 'long' || value.type === 'double'
}

/**
 * Operand-stack units and local slots the value takes
 */
export function valueCategory(value: Value): 1 | 2 {
  return isCategory2(value) ? 2 : 1
}

/**
 * The category a value of `type` lives as on the operand stack.
 * boolean, byte, char and short travel as int.
 */
export function stackTypeOf(type: FieldType): StackType {
  if (type.kind !== 'base') return 'reference'
  switch (type.descriptor) {
    case 'J':
      return 'long'
    case 'F':
      return 'float'
    case 'D':
      return 'double'
    default:
      return 'int'
  }
}

/**
 * null satisfies the reference category
 */
export function matchesStackType(value: Value, type: StackType): boolean {
  if (type === 'reference') {
    return value.type === 'reference' || value.type === 'null'
  }
  return value.type === type
}

export function defaultValueFor(type: FieldType): Value {
  switch (stackTypeOf(type)) {
    case 'int':
      return intValue(0)
    case 'long':
      return longValue(0n)
    case 'float':
      return floatValue(0)
    case 'double':
      return doubleValue(0)
    case 'reference':
      return NULL_VALUE
  }
}

/**
 * Narrow an int to the storage width of a sub-int field or array element
 */
export function narrowInt(value: number, type: FieldType): number {
  if (type.kind !== 'base') return value
  switch (type.descriptor) {
    case 'B':
      return (value << 24) >> 24
    case 'C':
      return value & 0xffff
    case 'S':
      return (value << 16) >> 16
    case 'Z':
      return value & 1
    default:
      return value
  }
}

/**
 * Class whose methods a receiver dispatches to
 */
export function classNameOf(object: HeapObject): string {
  switch (object.kind) {
    case 'instance':
      return object.className
    case 'string':
      return STRING_CLASS
    case 'class':
      return 'java/lang/Class'
    case 'array':
      return OBJECT_CLASS
  }
}

/**
 * Shortest decimal digits that read back as the same value, laid out the way
 * Double.toString does: plain notation in [1e-3, 1e7), E notation outside it
 */
export function formatDouble(value: number): string {
  if (Number.isNaN(value)) return 'NaN'
  if (value === Number.POSITIVE_INFINITY) return 'Infinity'
  if (value === Number.NEGATIVE_INFINITY) return '-Infinity'
  if (value === 0) return Object.is(value, -0) ? '-0.0' : '0.0'

  const magnitude = Math.abs(value)
  if (magnitude >= 1e-3 && magnitude < 1e7) {
    const digits = String(value)
    return digits.includes('.') ? digits : `${digits}.0`
  }
  const [mantissa, exponent] = value.toExponential().split('e')
  const fraction = mantissa.includes('.') ? mantissa : `${mantissa}.0`
  return `${fraction}E${Number(exponent)}`
}

/**
 * Float.toString: the fewest significant digits that survive a round trip
 * through single precision
 */
export function formatFloat(value: number): string {
  if (!Number.isFinite(value) || value === 0) return formatDouble(value)
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision))
    if (Math.fround(candidate) === value) {
      return formatDouble(candidate)
    }
  }
  return formatDouble(value)
}

/**
 * Object.toString for heap objects: strings print their text, the rest
 * `name@hash`
 */
export function objectToString(object: HeapObject): string {
  switch (object.kind) {
    case 'string':
      return object.text
    case 'instance':
      return `${object.className.replace(/\//g, '.')}@${object.id.toString(16)}`
    case 'class':
      return `class ${object.className.replace(/\//g, '.')}`
    case 'array':
      return `[${toDescriptor(object.componentType).replace(/\//g, '.')}@${object.id.toString(16)}`
  }
}

/**
 * String.valueOf over every value category
 */
export function formatValue(value: Value): string {
  switch (value.type) {
    case 'int':
      return String(value.value)
    case 'long':
      return value.value.toString()
    case 'float':
      return formatFloat(value.value)
    case 'double':
      return formatDouble(value.value)
    case 'reference':
      return objectToString(value.value)
    case 'null':
      return 'null'
  }
}

/**
 * Compact tagged rendering used in traces, e.g. `int 5` or `ref "hi"`
 */
export function describeValue(value: Value): string {
  switch (value.type) {
    case 'null':
      return 'null'
    case 'reference':
      return value.value.kind === 'string'
        ? `ref ${JSON.stringify(value.value.text)}`
        : `ref ${objectToString(value.value)}`
    default:
      return `${value.type} ${formatValue(value)}`
  }
}
