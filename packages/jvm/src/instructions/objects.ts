/**
 * Object and Array Instructions
 *
 * Allocation (new, newarray, anewarray, multianewarray), arraylength, typed
 * array loads and stores, checkcast, instanceof and the monitor pair.
 */

import { CLASS_ACCESS_FLAGS } from '@tinyjvm/classfile'
import {
  type ArrayObject,
  type BaseTypeDescriptor,
  type FieldType,
  RUNTIME_FAULTS,
  RuntimeFault,
  TypeFault,
} from '@tinyjvm/types'
import { ARRAY_TYPE_CODES, OPCODES, RESULT_CODES } from '../config'
import type { ConstantPool } from '../constant-pool'
import { classNameToType, toDescriptor, typeName } from '../descriptor'
import type { Frame } from '../frame'
import type { Runtime } from '../runtime'
import type { InstructionContext, InstructionResult } from '../types'
import {
  intValue,
  narrowInt,
  objectToString,
  referenceValue,
  type StackType,
} from '../values'
import { BaseInstruction, CONTINUE, describeConstant, PoolInstruction } from './base'

const ARRAY_TYPES = new Map<number, BaseTypeDescriptor>(
  Object.entries(ARRAY_TYPE_CODES).map(([code, descriptor]) => [Number(code), descriptor]),
)

function checkLength(length: number): void {
  if (length < 0) {
    throw new RuntimeFault(RUNTIME_FAULTS.NEGATIVE_ARRAY_SIZE, `Negative array size ${length}`)
  }
}

function popArray(frame: Frame, action: string): ArrayObject {
  const object = frame.popReference()
  if (object === null) {
    throw new RuntimeFault(RUNTIME_FAULTS.NULL_POINTER, `Cannot ${action} of a null array`)
  }
  if (object.kind !== 'array') {
    throw new TypeFault(`Expected an array in ${frame.location()}, found ${objectToString(object)}`)
  }
  return object
}

function checkIndex(array: ArrayObject, index: number): void {
  if (index < 0 || index >= array.elements.length) {
    throw new RuntimeFault(
      RUNTIME_FAULTS.ARRAY_INDEX_OUT_OF_BOUNDS,
      `Index ${index} out of bounds for length ${array.elements.length}`,
    )
  }
}

/**
 * Name isInstanceOf takes for values of `type`: class names for objects,
 * descriptors for arrays
 */
function instanceTarget(type: FieldType): string {
  return type.kind === 'object' ? type.className : toDescriptor(type)
}

/**
 * NEW instruction (opcode 0xbb)
 * Initialises the class first; the instance is left uninitialised for <init>
 */
export class NEWInstruction extends PoolInstruction {
  readonly opcode = OPCODES.NEW
  readonly name = 'new'

  execute(context: InstructionContext): InstructionResult {
    const { frame, runtime } = context
    const className = this.unwrap(frame.pool.resolveClassName(this.poolIndex(context)))
    const classDefinition = runtime.resolveClass(className)
    const abstractFlags = CLASS_ACCESS_FLAGS.ACC_INTERFACE | CLASS_ACCESS_FLAGS.ACC_ABSTRACT
    if ((classDefinition.accessFlags & abstractFlags) !== 0) {
      throw new TypeFault(`Cannot instantiate abstract class ${className}`)
    }

    const initializer = runtime.initialize(classDefinition)
    if (initializer) {
      return { resultCode: RESULT_CODES.INVOKE, invocation: initializer }
    }
    frame.push(referenceValue(runtime.newInstance(classDefinition)))
    return CONTINUE
  }
}

/**
 * NEWARRAY instruction (opcode 0xbc)
 * Primitive component named by the atype operand
 */
export class NEWARRAYInstruction extends BaseInstruction {
  readonly opcode = OPCODES.NEWARRAY
  readonly name = 'newarray'
  protected readonly operandLength = 1

  execute(context: InstructionContext): InstructionResult {
    const { frame, runtime } = context
    const component = this.componentType(frame.code, frame.pc)
    const length = frame.popInt()
    checkLength(length)
    frame.push(referenceValue(runtime.heap.newArray(component, length)))
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, _pool: ConstantPool): string {
    return `${this.name} ${typeName(this.componentType(code, pc))}`
  }

  private componentType(code: Uint8Array, pc: number): FieldType {
    const atype = this.u1(code, pc + 1)
    const descriptor = ARRAY_TYPES.get(atype)
    if (!descriptor) {
      throw new TypeFault(`newarray at pc ${pc} has invalid atype ${atype}`)
    }
    return { kind: 'base', descriptor }
  }
}

/**
 * ANEWARRAY instruction (opcode 0xbd)
 * Reference component named by a Class constant
 */
export class ANEWARRAYInstruction extends PoolInstruction {
  readonly opcode = OPCODES.ANEWARRAY
  readonly name = 'anewarray'

  execute(context: InstructionContext): InstructionResult {
    const { frame, runtime } = context
    const className = this.unwrap(frame.pool.resolveClassName(this.poolIndex(context)))
    const component = this.unwrap(classNameToType(className))
    const length = frame.popInt()
    checkLength(length)
    frame.push(referenceValue(runtime.heap.newArray(component, length)))
    return CONTINUE
  }
}

/**
 * MULTIANEWARRAY instruction (opcode 0xc5)
 * Class constant of the full array type, then the number of dimensions to
 * allocate; counts are popped innermost last
 */
export class MULTIANEWARRAYInstruction extends BaseInstruction {
  readonly opcode = OPCODES.MULTIANEWARRAY
  readonly name = 'multianewarray'
  protected readonly operandLength = 3

  execute(context: InstructionContext): InstructionResult {
    const { frame, runtime } = context
    const index = this.u2(frame.code, frame.pc + 1)
    const dimensions = this.u1(frame.code, frame.pc + 3)
    const arrayType = this.unwrap(classNameToType(this.unwrap(frame.pool.resolveClassName(index))))
    if (dimensions < 1 || arrayDepth(arrayType) < dimensions) {
      throw new TypeFault(
        `multianewarray of ${dimensions} dimensions on ${toDescriptor(arrayType)} at pc ${frame.pc}`,
      )
    }

    const counts: number[] = []
    for (let i = 0; i < dimensions; i++) counts.unshift(frame.popInt())
    counts.forEach(checkLength)
    frame.push(referenceValue(allocate(runtime, arrayType, counts)))
    return CONTINUE
  }

  disassemble(code: Uint8Array, pc: number, pool: ConstantPool): string {
    const index = this.u2(code, pc + 1)
    return `${this.name} #${index} ${this.u1(code, pc + 3)} // ${describeConstant(pool, index)}`
  }
}

function arrayDepth(type: FieldType): number {
  return type.kind === 'array' ? 1 + arrayDepth(type.component) : 0
}

function allocate(runtime: Runtime, arrayType: FieldType, counts: number[]): ArrayObject {
  if (arrayType.kind !== 'array') {
    throw new TypeFault(`Cannot allocate ${toDescriptor(arrayType)} as an array`)
  }
  const [length = 0, ...rest] = counts
  const array = runtime.heap.newArray(arrayType.component, length)
  if (rest.length > 0) {
    array.elements = array.elements.map(() =>
      referenceValue(allocate(runtime, arrayType.component, rest)),
    )
  }
  return array
}

/**
 * ARRAYLENGTH instruction (opcode 0xbe)
 */
export class ARRAYLENGTHInstruction extends BaseInstruction {
  readonly opcode = OPCODES.ARRAYLENGTH
  readonly name = 'arraylength'

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    frame.push(intValue(popArray(frame, 'read the length').elements.length))
    return CONTINUE
  }
}

/**
 * Components an array instruction accepts; null means any reference type
 */
type ComponentSet = readonly BaseTypeDescriptor[] | null

function acceptsComponent(component: FieldType, accepted: ComponentSet): boolean {
  if (accepted === null) return component.kind !== 'base'
  return component.kind === 'base' && accepted.includes(component.descriptor)
}

export class ArrayLoadInstruction extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly accepted: ComponentSet,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    const index = frame.popInt()
    const array = popArray(frame, 'load from an element')
    if (!acceptsComponent(array.componentType, this.accepted)) {
      throw new TypeFault(
        `${this.name} on an array of ${typeName(array.componentType)} in ${frame.location()}`,
      )
    }
    checkIndex(array, index)
    const element = array.elements[index]
    if (element === undefined) {
      throw new TypeFault(`Array element ${index} is missing`)
    }
    frame.push(element)
    return CONTINUE
  }
}

export class ArrayStoreInstruction extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
    private readonly type: StackType,
    private readonly accepted: ComponentSet,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame, runtime } = context
    const value = frame.popTyped(this.type)
    const index = frame.popInt()
    const array = popArray(frame, 'store into an element')
    const component = array.componentType
    if (!acceptsComponent(component, this.accepted)) {
      throw new TypeFault(
        `${this.name} on an array of ${typeName(component)} in ${frame.location()}`,
      )
    }
    checkIndex(array, index)

    if (value.type === 'reference' && !runtime.isInstanceOf(value.value, instanceTarget(component))) {
      throw new TypeFault(
        `Cannot store ${objectToString(value.value)} in an array of ${typeName(component)}`,
      )
    }
    array.elements[index] = value.type === 'int' ? intValue(narrowInt(value.value, component)) : value
    return CONTINUE
  }
}

const ARRAY_ACCESS: ReadonlyArray<[string, StackType, ComponentSet]> = [
  ['i', 'int', ['I']],
  ['l', 'long', ['J']],
  ['f', 'float', ['F']],
  ['d', 'double', ['D']],
  ['a', 'reference', null],
  ['b', 'int', ['B', 'Z']],
  ['c', 'int', ['C']],
  ['s', 'int', ['S']],
]

export function arrayAccessInstructions(): Array<ArrayLoadInstruction | ArrayStoreInstruction> {
  return ARRAY_ACCESS.flatMap(([prefix, type, accepted], offset) => [
    new ArrayLoadInstruction(OPCODES.IALOAD + offset, `${prefix}aload`, accepted),
    new ArrayStoreInstruction(OPCODES.IASTORE + offset, `${prefix}astore`, type, accepted),
  ])
}

/**
 * CHECKCAST instruction (opcode 0xc0)
 * Leaves the reference on the stack; null always passes
 */
export class CHECKCASTInstruction extends PoolInstruction {
  readonly opcode = OPCODES.CHECKCAST
  readonly name = 'checkcast'

  execute(context: InstructionContext): InstructionResult {
    const { frame, runtime } = context
    const className = this.unwrap(frame.pool.resolveClassName(this.poolIndex(context)))
    const object = frame.popReference()
    if (object !== null && !runtime.isInstanceOf(object, className)) {
      throw new RuntimeFault(
        RUNTIME_FAULTS.CLASS_CAST,
        `${objectToString(object)} cannot be cast to ${className.replace(/\//g, '.')}`,
      )
    }
    frame.push(referenceValue(object))
    return CONTINUE
  }
}

/**
 * INSTANCEOF instruction (opcode 0xc1)
 */
export class INSTANCEOFInstruction extends PoolInstruction {
  readonly opcode = OPCODES.INSTANCEOF
  readonly name = 'instanceof'

  execute(context: InstructionContext): InstructionResult {
    const { frame, runtime } = context
    const className = this.unwrap(frame.pool.resolveClassName(this.poolIndex(context)))
    const object = frame.popReference()
    frame.push(intValue(object !== null && runtime.isInstanceOf(object, className) ? 1 : 0))
    return CONTINUE
  }
}

/**
 * monitorenter and monitorexit. Execution is single-threaded, so only the
 * null check remains.
 */
export class MonitorInstruction extends BaseInstruction {
  constructor(
    readonly opcode: number,
    readonly name: string,
  ) {
    super()
  }

  execute(context: InstructionContext): InstructionResult {
    const { frame } = context
    if (frame.popReference() === null) {
      throw new RuntimeFault(RUNTIME_FAULTS.NULL_POINTER, `${this.name} on null`)
    }
    return CONTINUE
  }
}

export function monitorInstructions(): MonitorInstruction[] {
  return [
    new MonitorInstruction(OPCODES.MONITORENTER, 'monitorenter'),
    new MonitorInstruction(OPCODES.MONITOREXIT, 'monitorexit'),
  ]
}
