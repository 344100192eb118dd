import {
  FrameFault,
  type HeapObject,
  TypeFault,
  type Value,
} from '@tinyjvm/types'
import type { ClassDefinition, MethodCode, MethodInfo } from './class-definition'
import type { ConstantPool } from './constant-pool'
import {
  describeValue,
  isCategory2,
  matchesStackType,
  type StackType,
  valueCategory,
} from './values'

/**
 * One method activation.
 *
 * The operand stack is bounded by max_stack counted in slot units (long and
 * double take two); locals follow the class-file slot layout, where a long or
 * double at n also claims n + 1.
 */
export class Frame {
  pc = 0
  /**
   * Bytes to skip once the invocation this frame is waiting on returns;
   * 0 re-executes the instruction at pc
   */
  resumeAdvance = 0

  private readonly stack: Value[] = []
  private depth = 0
  private readonly locals: Array<Value | undefined>

  constructor(
    readonly classDefinition: ClassDefinition,
    readonly method: MethodInfo,
    readonly body: MethodCode,
  ) {
    this.locals = new Array<Value | undefined>(body.maxLocals).fill(undefined)
  }

  get code(): Uint8Array {
    return this.body.code
  }

  get pool(): ConstantPool {
    return this.classDefinition.pool
  }

  /** Values on the operand stack */
  get stackSize(): number {
    return this.stack.length
  }

  /** Slot units in use on the operand stack */
  get stackDepth(): number {
    return this.depth
  }

  push(value: Value): void {
    const size = valueCategory(value)
    if (this.depth + size > this.body.maxStack) {
      throw new FrameFault(
        `Operand stack overflow in ${this.location()}: max_stack is ${this.body.maxStack}`,
      )
    }
    this.stack.push(value)
    this.depth += size
  }

  pop(): Value {
    const value = this.stack.pop()
    if (value === undefined) {
      throw new FrameFault(`Operand stack underflow in ${this.location()}`)
    }
    this.depth -= valueCategory(value)
    return value
  }

  popInt(): number {
    const value = this.pop()
    if (value.type !== 'int') throw this.typeFault('int', value)
    return value.value
  }

  popLong(): bigint {
    const value = this.pop()
    if (value.type !== 'long') throw this.typeFault('long', value)
    return value.value
  }

  popFloat(): number {
    const value = this.pop()
    if (value.type !== 'float') throw this.typeFault('float', value)
    return value.value
  }

  popDouble(): number {
    const value = this.pop()
    if (value.type !== 'double') throw this.typeFault('double', value)
    return value.value
  }

  /**
   * A reference or null
   */
  popReference(): HeapObject | null {
    const value = this.pop()
    if (value.type === 'null') return null
    if (value.type !== 'reference') throw this.typeFault('reference', value)
    return value.value
  }

  /**
   * Pop a value of the named category, returned as is
   */
  popTyped(type: StackType): Value {
    const value = this.pop()
    if (!matchesStackType(value, type)) throw this.typeFault(type, value)
    return value
  }

  getLocal(index: number, type: StackType): Value {
    this.checkSlot(index, 1)
    const value = this.locals[index]
    if (value === undefined) {
      throw new TypeFault(`Local ${index} is unset in ${this.location()}`)
    }
    if (!matchesStackType(value, type)) {
      throw new TypeFault(
        `Local ${index} holds ${describeValue(value)}, expected ${type} in ${this.location()}`,
      )
    }
    return value
  }

  setLocal(index: number, value: Value): void {
    const size = valueCategory(value)
    this.checkSlot(index, size)
    // A wide value below this slot loses its upper half
    const below = index > 0 ? this.locals[index - 1] : undefined
    if (below !== undefined && isCategory2(below)) {
      this.locals[index - 1] = undefined
    }
    this.locals[index] = value
    if (size === 2) {
      this.locals[index + 1] = undefined
    }
  }

  /** Operand stack, bottom first */
  snapshot(): Value[] {
    return [...this.stack]
  }

  location(): string {
    return `${this.classDefinition.name}.${this.method.name}${this.method.descriptor} at pc ${this.pc}`
  }

  private checkSlot(index: number, size: 1 | 2): void {
    if (!Number.isInteger(index) || index < 0 || index + size > this.body.maxLocals) {
      throw new FrameFault(
        `Local slot ${index} is outside max_locals ${this.body.maxLocals} in ${this.location()}`,
      )
    }
  }

  private typeFault(expected: StackType, found: Value): TypeFault {
    return new TypeFault(
      `Expected ${expected} on the operand stack in ${this.location()}, found ${describeValue(found)}`,
    )
  }
}
