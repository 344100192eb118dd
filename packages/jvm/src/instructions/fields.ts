/**
 * Field Access Instructions
 *
 * getstatic, putstatic, getfield and putfield. Field references resolve
 * through the constant pool, then through the class registry to the
 * declaring class.
 */

import {
  type InstanceObject,
  RESOLUTION_ERRORS,
  ResolutionError,
  RUNTIME_FAULTS,
  RuntimeFault,
  TypeFault,
  type Value,
} from '@tinyjvm/types'
import { type FieldInfo, isStatic } from '../class-definition'
import { OPCODES, RESULT_CODES } from '../config'
import { instanceFieldKey, type ResolvedField } from '../runtime'
import type { InstructionContext, InstructionResult } from '../types'
import { intValue, narrowInt, stackTypeOf } from '../values'
import { CONTINUE, PoolInstruction } from './base'

/**
 * Pop a value for `field`, narrowed to its storage width
 */
function popFieldValue(context: InstructionContext, field: FieldInfo): Value {
  const value = context.frame.popTyped(stackTypeOf(field.type))
  return value.type === 'int' ? intValue(narrowInt(value.value, field.type)) : value
}

abstract class FieldInstruction extends PoolInstruction {
  protected abstract readonly staticAccess: boolean

  protected resolve(context: InstructionContext): ResolvedField {
    const { frame, runtime } = context
    const reference = this.unwrap(frame.pool.resolveFieldRef(this.poolIndex(context)))
    const resolved = runtime.resolveField(reference)
    if (isStatic(resolved.field) !== this.staticAccess) {
      throw new TypeFault(
        `${this.name} on ${this.staticAccess ? 'instance' : 'static'} field ${resolved.owner.name}.${resolved.field.name}`,
      )
    }
    return resolved
  }

  /**
   * The receiver an instance field access pops
   */
  protected popInstance(
    context: InstructionContext,
    resolved: ResolvedField,
  ): InstanceObject {
    const object = context.frame.popReference()
    const fieldName = `${resolved.owner.name}.${resolved.field.name}`
    const key = instanceFieldKey(resolved.owner, resolved.field)
    if (object === null) {
      throw new RuntimeFault(
        RUNTIME_FAULTS.NULL_POINTER,
        `Cannot access field ${fieldName} of null`,
      )
    }
    if (object.kind !== 'instance' || !object.fields.has(key)) {
      throw new ResolutionError(
        RESOLUTION_ERRORS.FIELD_NOT_FOUND,
        `Object ${object.kind === 'instance' ? object.className : object.kind} has no field ${fieldName}`,
      )
    }
    return object
  }
}

/**
 * GETSTATIC instruction (opcode 0xb2)
 * Initialises the declaring class first, re-executing once <clinit> returns
 */
export class GETSTATICInstruction extends FieldInstruction {
  readonly opcode = OPCODES.GETSTATIC
  readonly name = 'getstatic'
  protected readonly staticAccess = true

  execute(context: InstructionContext): InstructionResult {
    const { owner, field } = this.resolve(context)
    const initializer = context.runtime.initialize(owner)
    if (initializer) {
      return { resultCode: RESULT_CODES.INVOKE, invocation: initializer }
    }
    context.frame.push(context.runtime.getStatic(owner, field))
    return CONTINUE
  }
}

/**
 * PUTSTATIC instruction (opcode 0xb3)
 */
export class PUTSTATICInstruction extends FieldInstruction {
  readonly opcode = OPCODES.PUTSTATIC
  readonly name = 'putstatic'
  protected readonly staticAccess = true

  execute(context: InstructionContext): InstructionResult {
    const { owner, field } = this.resolve(context)
    const initializer = context.runtime.initialize(owner)
    if (initializer) {
      return { resultCode: RESULT_CODES.INVOKE, invocation: initializer }
    }
    context.runtime.setStatic(owner.name, field.name, popFieldValue(context, field))
    return CONTINUE
  }
}

/**
 * GETFIELD instruction (opcode 0xb4)
 */
export class GETFIELDInstruction extends FieldInstruction {
  readonly opcode = OPCODES.GETFIELD
  readonly name = 'getfield'
  protected readonly staticAccess = false

  execute(context: InstructionContext): InstructionResult {
    const resolved = this.resolve(context)
    const object = this.popInstance(context, resolved)
    const value = object.fields.get(instanceFieldKey(resolved.owner, resolved.field))
    if (value === undefined) {
      throw new TypeFault(`Field ${resolved.field.name} of ${object.className} has no value`)
    }
    context.frame.push(value)
    return CONTINUE
  }
}

/**
 * PUTFIELD instruction (opcode 0xb5)
 * Value on top, receiver below it
 */
export class PUTFIELDInstruction extends FieldInstruction {
  readonly opcode = OPCODES.PUTFIELD
  readonly name = 'putfield'
  protected readonly staticAccess = false

  execute(context: InstructionContext): InstructionResult {
    const resolved = this.resolve(context)
    const value = popFieldValue(context, resolved.field)
    const object = this.popInstance(context, resolved)
    object.fields.set(instanceFieldKey(resolved.owner, resolved.field), value)
    return CONTINUE
  }
}
