/**
 * Field and method descriptors
 *
 *   FieldType  ::= B | C | D | F | I | J | S | Z | L ClassName ; | [ FieldType
 *   Method     ::= ( FieldType* ) ( FieldType | V )
 */

import {
  type BaseTypeDescriptor,
  type FieldType,
  FormatError,
  type MethodDescriptor,
  type Safe,
  safeError,
  safeResult,
} from '@tinyjvm/types'

const BASE_TYPES: ReadonlySet<string> = new Set([
  'B',
  'C',
  'D',
  'F',
  'I',
  'J',
  'S',
  'Z',
])

function isBaseType(char: string): char is BaseTypeDescriptor {
  return BASE_TYPES.has(char)
}

/**
 * Parse one field type starting at `start`; returns the type and the index after it
 */
function readFieldType(raw: string, start: number): [FieldType, number] {
  const char = raw.charAt(start)
  if (isBaseType(char)) {
    return [{ kind: 'base', descriptor: char }, start + 1]
  }
  if (char === 'L') {
    const end = raw.indexOf(';', start)
    if (end <= start + 1) {
      throw new FormatError(`Unterminated class name in descriptor "${raw}"`)
    }
    return [{ kind: 'object', className: raw.slice(start + 1, end) }, end + 1]
  }
  if (char === '[') {
    const [component, next] = readFieldType(raw, start + 1)
    return [{ kind: 'array', component }, next]
  }
  throw new FormatError(
    `Unexpected "${char}" at position ${start} of descriptor "${raw}"`,
  )
}

export function parseFieldDescriptor(raw: string): Safe<FieldType, FormatError> {
  try {
    const [type, next] = readFieldType(raw, 0)
    if (next !== raw.length) {
      return safeError(new FormatError(`Trailing characters in descriptor "${raw}"`))
    }
    return safeResult(type)
  } catch (error) {
    if (error instanceof FormatError) return safeError(error)
    throw error
  }
}

export function parseMethodDescriptor(
  raw: string,
): Safe<MethodDescriptor, FormatError> {
  if (raw.charAt(0) !== '(') {
    return safeError(new FormatError(`Method descriptor "${raw}" must start with "("`))
  }
  try {
    const parameters: FieldType[] = []
    let position = 1
    while (raw.charAt(position) !== ')') {
      if (position >= raw.length) {
        throw new FormatError(`Unterminated parameter list in "${raw}"`)
      }
      const [type, next] = readFieldType(raw, position)
      parameters.push(type)
      position = next
    }
    position++

    let returnType: FieldType | null = null
    if (raw.charAt(position) === 'V') {
      position++
    } else {
      const [type, next] = readFieldType(raw, position)
      returnType = type
      position = next
    }
    if (position !== raw.length) {
      throw new FormatError(`Trailing characters in descriptor "${raw}"`)
    }

    return safeResult({
      raw,
      parameters,
      returnType,
      parameterSlots: parameters.reduce((sum, type) => sum + slotSize(type), 0),
    })
  } catch (error) {
    if (error instanceof FormatError) return safeError(error)
    throw error
  }
}

/**
 * Local-variable slots a value of this type occupies
 */
export function slotSize(type: FieldType): 1 | 2 {
  return type.kind === 'base' && (type.descriptor === 'J' || type.descriptor === 'D')
    ? 2
    : 1
}

export function toDescriptor(type: FieldType): string {
  switch (type.kind) {
    case 'base':
      return type.descriptor
    case 'object':
      return `L${type.className};`
    case 'array':
      return `[${toDescriptor(type.component)}`
  }
}

const BASE_TYPE_NAMES: Record<BaseTypeDescriptor, string> = {
  B: 'byte',
  C: 'char',
  D: 'double',
  F: 'float',
  I: 'int',
  J: 'long',
  S: 'short',
  Z: 'boolean',
}

/**
 * Source-level spelling, e.g. `java.lang.String[]`
 */
export function typeName(type: FieldType): string {
  switch (type.kind) {
    case 'base':
      return BASE_TYPE_NAMES[type.descriptor]
    case 'object':
      return type.className.replace(/\//g, '.')
    case 'array':
      return `${typeName(type.component)}[]`
  }
}

/**
 * The field type an array class name (`[I`, `[Ljava/lang/String;`) or a plain
 * class name (`java/lang/String`) denotes
 */
export function classNameToType(className: string): Safe<FieldType, FormatError> {
  if (className.startsWith('[')) {
    return parseFieldDescriptor(className)
  }
  return safeResult({ kind: 'object', className })
}
