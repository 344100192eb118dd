/**
 * Invocation Instructions
 *
 * invokestatic, invokespecial, invokevirtual and invokeinterface. Handlers only
 * resolve the target and pop its arguments; the dispatch loop pushes the frame
 * or runs the native.
 */

import {
  type HeapObject,
  type MemberReference,
  type MethodDescriptor,
  RUNTIME_FAULTS,
  RuntimeFault,
  TypeFault,
  type Value,
} from '@tinyjvm/types'
import { isStatic } from '../class-definition'
import { OPCODES, RESULT_CODES } from '../config'
import type { ConstantPool } from '../constant-pool'
import type { Frame } from '../frame'
import type { ResolvedMethod } from '../runtime'
import type { InstructionContext, InstructionResult } from '../types'
import { classNameOf, referenceValue, stackTypeOf } from '../values'
import { describeConstant, PoolInstruction } from './base'

/**
 * Parameters in declared order; the last one is on top of the stack
 */
function popArguments(frame: Frame, descriptor: MethodDescriptor): Value[] {
  const args: Value[] = []
  for (let i = descriptor.parameters.length - 1; i >= 0; i--) {
    const parameter = descriptor.parameters[i]
    if (parameter === undefined) continue
    args.unshift(frame.popTyped(stackTypeOf(parameter)))
  }
  return args
}

abstract class InvokeInstruction extends PoolInstruction {
  protected reference(context: InstructionContext): MemberReference {
    return this.unwrap(context.frame.pool.resolveMethodRef(this.poolIndex(context)))
  }

  /**
   * The method the reference names, found from its class upwards
   */
  protected resolveDeclared(
    context: InstructionContext,
    reference: MemberReference,
  ): ResolvedMethod {
    const { runtime } = context
    return runtime.resolveMethod(
      runtime.resolveClass(reference.className),
      reference.name,
      reference.descriptor,
    )
  }

  /**
   * Pop parameters then the receiver; the receiver goes first in the result
   */
  protected popReceiverAndArguments(
    context: InstructionContext,
    resolved: ResolvedMethod,
  ): { receiver: HeapObject; args: Value[] } {
    const { frame } = context
    const { method, owner } = resolved
    if (isStatic(method)) {
      throw new TypeFault(
        `${this.name} on static method ${owner.name}.${method.name}${method.descriptor}`,
      )
    }
    const args = popArguments(frame, method.parsedDescriptor)
    const receiver = frame.popReference()
    if (receiver === null) {
      throw new RuntimeFault(
        RUNTIME_FAULTS.NULL_POINTER,
        `Cannot invoke ${owner.name}.${method.name}${method.descriptor} on null`,
      )
    }
    return { receiver, args: [referenceValue(receiver), ...args] }
  }

  /**
   * Resolve against the referenced class, then select the implementation
   * from the receiver's class upwards
   */
  protected dispatchVirtual(context: InstructionContext): InstructionResult {
    const { runtime } = context
    const reference = this.reference(context)
    const declared = this.resolveDeclared(context, reference)
    const { receiver, args } = this.popReceiverAndArguments(context, declared)
    const selected = runtime.resolveMethod(
      runtime.resolveClass(classNameOf(receiver)),
      reference.name,
      reference.descriptor,
    )
    return this.invoke(selected, args)
  }

  protected invoke(resolved: ResolvedMethod, args: Value[]): InstructionResult {
    return {
      resultCode: RESULT_CODES.INVOKE,
      invocation: { owner: resolved.owner, method: resolved.method, args },
    }
  }
}

/**
 * INVOKESTATIC instruction (opcode 0xb8)
 * Initialises the declaring class before popping any argument
 */
export class INVOKESTATICInstruction extends InvokeInstruction {
  readonly opcode = OPCODES.INVOKESTATIC
  readonly name = 'invokestatic'

  execute(context: InstructionContext): InstructionResult {
    const resolved = this.resolveDeclared(context, this.reference(context))
    const { owner, method } = resolved
    if (!isStatic(method)) {
      throw new TypeFault(
        `invokestatic on instance method ${owner.name}.${method.name}${method.descriptor}`,
      )
    }
    const initializer = context.runtime.initialize(owner)
    if (initializer) {
      return { resultCode: RESULT_CODES.INVOKE, invocation: initializer }
    }
    return this.invoke(resolved, popArguments(context.frame, method.parsedDescriptor))
  }
}

/**
 * INVOKESPECIAL instruction (opcode 0xb7)
 * Constructors, private methods and super calls: no virtual selection
 */
export class INVOKESPECIALInstruction extends InvokeInstruction {
  readonly opcode = OPCODES.INVOKESPECIAL
  readonly name = 'invokespecial'

  execute(context: InstructionContext): InstructionResult {
    const resolved = this.resolveDeclared(context, this.reference(context))
    const { args } = this.popReceiverAndArguments(context, resolved)
    return this.invoke(resolved, args)
  }
}

/**
 * INVOKEVIRTUAL instruction (opcode 0xb6)
 * Selects the implementation from the receiver's class upwards
 */
export class INVOKEVIRTUALInstruction extends InvokeInstruction {
  readonly opcode = OPCODES.INVOKEVIRTUAL
  readonly name = 'invokevirtual'

  execute(context: InstructionContext): InstructionResult {
    return this.dispatchVirtual(context)
  }
}

/**
 * INVOKEINTERFACE instruction (opcode 0xb9)
 * u2 index, u1 argument count and a zero byte
 */
export class INVOKEINTERFACEInstruction extends InvokeInstruction {
  readonly opcode = OPCODES.INVOKEINTERFACE
  readonly name = 'invokeinterface'
  protected readonly operandLength = 4

  execute(context: InstructionContext): InstructionResult {
    return this.dispatchVirtual(context)
  }

  disassemble(code: Uint8Array, pc: number, pool: ConstantPool): string {
    const index = this.u2(code, pc + 1)
    return `${this.name} #${index} ${this.u1(code, pc + 3)} // ${describeConstant(pool, index)}`
  }
}
