/**
 * Native methods
 *
 * Methods without bytecode that the interpreter runs in TypeScript, keyed by
 * `class.name descriptor`. They run to completion without a frame.
 */

import {
  type HeapObject,
  RUNTIME_FAULTS,
  RuntimeFault,
  type StringObject,
  TypeFault,
  type Value,
} from '@tinyjvm/types'
import { METHOD_ACCESS_FLAGS } from '@tinyjvm/classfile'
import { CLASS_INITIALIZER, INSTANCE_INITIALIZER } from './config'
import type { Runtime } from './runtime'
import {
  formatValue,
  intValue,
  NULL_VALUE,
  objectToString,
  referenceValue,
} from './values'

/**
 * Receiver first for instance methods, then the parameters
 */
export type NativeMethod = (runtime: Runtime, args: Value[]) => Value | null

export interface NativeBinding {
  className: string
  name: string
  descriptor: string
  accessFlags: number
  invoke: NativeMethod
}

export type NativeTable = ReadonlyMap<string, NativeMethod>

const PUBLIC_NATIVE = METHOD_ACCESS_FLAGS.ACC_PUBLIC | METHOD_ACCESS_FLAGS.ACC_NATIVE
const STATIC_NATIVE = PUBLIC_NATIVE | METHOD_ACCESS_FLAGS.ACC_STATIC

export function nativeKey(className: string, name: string, descriptor: string): string {
  return `${className}.${name}${descriptor}`
}

function argument(args: Value[], index: number): Value {
  const value = args[index]
  if (value === undefined) {
    throw new TypeFault(`Native call is missing argument ${index}`)
  }
  return value
}

function objectArgument(args: Value[], index: number): HeapObject | null {
  const value = argument(args, index)
  if (value.type === 'null') return null
  if (value.type !== 'reference') {
    throw new TypeFault(`Native argument ${index} is ${value.type}, expected reference`)
  }
  return value.value
}

function receiverString(args: Value[]): StringObject {
  const receiver = objectArgument(args, 0)
  if (receiver === null) {
    throw new RuntimeFault(RUNTIME_FAULTS.NULL_POINTER, 'String method called on null')
  }
  if (receiver.kind !== 'string') {
    throw new TypeFault(`Receiver is a ${receiver.kind}, expected a string`)
  }
  return receiver
}

function intArgument(args: Value[], index: number): number {
  const value = argument(args, index)
  if (value.type !== 'int') {
    throw new TypeFault(`Native argument ${index} is ${value.type}, expected int`)
  }
  return value.value
}

/**
 * String.valueOf spelling for a println/print argument of type `descriptor`
 */
function printable(descriptor: string, value: Value): string {
  if (value.type === 'int') {
    if (descriptor === 'Z') return value.value !== 0 ? 'true' : 'false'
    if (descriptor === 'C') return String.fromCharCode(value.value)
  }
  if (descriptor === '[C' && value.type === 'reference' && value.value.kind === 'array') {
    return value.value.elements
      .map((element) => (element.type === 'int' ? String.fromCharCode(element.value) : ''))
      .join('')
  }
  return formatValue(value)
}

const PRINTABLE_DESCRIPTORS = [
  'Ljava/lang/String;',
  'Ljava/lang/Object;',
  'I',
  'J',
  'F',
  'D',
  'Z',
  'C',
  '[C',
]

const PRINT_VARIANTS = [
  ['println', '\n'],
  ['print', ''],
] as const

function printStreamBindings(): NativeBinding[] {
  const bindings: NativeBinding[] = [
    {
      className: 'java/io/PrintStream',
      name: 'println',
      descriptor: '()V',
      accessFlags: PUBLIC_NATIVE,
      invoke: (runtime) => {
        runtime.console.write('\n')
        return null
      },
    },
  ]
  for (const descriptor of PRINTABLE_DESCRIPTORS) {
    for (const [name, suffix] of PRINT_VARIANTS) {
      bindings.push({
        className: 'java/io/PrintStream',
        name,
        descriptor: `(${descriptor})V`,
        accessFlags: PUBLIC_NATIVE,
        invoke: (runtime, args) => {
          runtime.console.write(printable(descriptor, argument(args, 1)) + suffix)
          return null
        },
      })
    }
  }
  return bindings
}

/**
 * 31-based polynomial hash over UTF-16 code units, as String.hashCode
 */
function stringHash(text: string): number {
  let hash = 0
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(hash, 31) + text.charCodeAt(i)) | 0
  }
  return hash
}

export const BOOTSTRAP_NATIVES: readonly NativeBinding[] = [
  {
    className: 'java/lang/Object',
    name: INSTANCE_INITIALIZER,
    descriptor: '()V',
    accessFlags: PUBLIC_NATIVE,
    invoke: () => null,
  },
  {
    className: 'java/lang/Object',
    name: 'hashCode',
    descriptor: '()I',
    accessFlags: PUBLIC_NATIVE,
    invoke: (_runtime, args) => {
      const receiver = objectArgument(args, 0)
      return intValue(receiver === null ? 0 : receiver.id)
    },
  },
  {
    className: 'java/lang/Object',
    name: 'equals',
    descriptor: '(Ljava/lang/Object;)Z',
    accessFlags: PUBLIC_NATIVE,
    invoke: (_runtime, args) =>
      intValue(objectArgument(args, 0) === objectArgument(args, 1) ? 1 : 0),
  },
  {
    className: 'java/lang/Object',
    name: 'toString',
    descriptor: '()Ljava/lang/String;',
    accessFlags: PUBLIC_NATIVE,
    invoke: (runtime, args) => {
      const receiver = objectArgument(args, 0)
      return receiver === null
        ? NULL_VALUE
        : referenceValue(runtime.heap.newString(objectToString(receiver)))
    },
  },
  {
    className: 'java/lang/String',
    name: 'length',
    descriptor: '()I',
    accessFlags: PUBLIC_NATIVE,
    invoke: (_runtime, args) => intValue(receiverString(args).text.length),
  },
  {
    className: 'java/lang/String',
    name: 'isEmpty',
    descriptor: '()Z',
    accessFlags: PUBLIC_NATIVE,
    invoke: (_runtime, args) => intValue(receiverString(args).text.length === 0 ? 1 : 0),
  },
  {
    className: 'java/lang/String',
    name: 'charAt',
    descriptor: '(I)C',
    accessFlags: PUBLIC_NATIVE,
    invoke: (_runtime, args) => {
      const { text } = receiverString(args)
      const index = intArgument(args, 1)
      if (index < 0 || index >= text.length) {
        throw new RuntimeFault(
          RUNTIME_FAULTS.ARRAY_INDEX_OUT_OF_BOUNDS,
          `String index ${index} out of bounds for length ${text.length}`,
        )
      }
      return intValue(text.charCodeAt(index))
    },
  },
  {
    className: 'java/lang/String',
    name: 'equals',
    descriptor: '(Ljava/lang/Object;)Z',
    accessFlags: PUBLIC_NATIVE,
    invoke: (_runtime, args) => {
      const { text } = receiverString(args)
      const other = objectArgument(args, 1)
      return intValue(other?.kind === 'string' && other.text === text ? 1 : 0)
    },
  },
  {
    className: 'java/lang/String',
    name: 'hashCode',
    descriptor: '()I',
    accessFlags: PUBLIC_NATIVE,
    invoke: (_runtime, args) => intValue(stringHash(receiverString(args).text)),
  },
  {
    className: 'java/lang/String',
    name: 'concat',
    descriptor: '(Ljava/lang/String;)Ljava/lang/String;',
    accessFlags: PUBLIC_NATIVE,
    invoke: (runtime, args) => {
      const { text } = receiverString(args)
      const other = objectArgument(args, 1)
      if (other === null) {
        throw new RuntimeFault(RUNTIME_FAULTS.NULL_POINTER, 'String.concat(null)')
      }
      return runtime.stringValue(text + objectToString(other))
    },
  },
  {
    className: 'java/lang/String',
    name: 'toString',
    descriptor: '()Ljava/lang/String;',
    accessFlags: PUBLIC_NATIVE,
    invoke: (_runtime, args) => referenceValue(receiverString(args)),
  },
  {
    className: 'java/lang/System',
    name: CLASS_INITIALIZER,
    descriptor: '()V',
    accessFlags: STATIC_NATIVE,
    invoke: (runtime) => {
      const printStream = runtime.newInstance(runtime.resolveClass('java/io/PrintStream'))
      runtime.setStatic('java/lang/System', 'out', referenceValue(printStream))
      return null
    },
  },
  ...printStreamBindings(),
]

export function createNativeTable(
  bindings: readonly NativeBinding[] = BOOTSTRAP_NATIVES,
): Map<string, NativeMethod> {
  return new Map(
    bindings.map((binding) => [
      nativeKey(binding.className, binding.name, binding.descriptor),
      binding.invoke,
    ]),
  )
}
