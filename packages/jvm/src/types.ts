import type { Value } from '@tinyjvm/types'
import type { ClassDefinition, MethodInfo } from './class-definition'
import type { RESULT_CODES } from './config'
import type { Frame } from './frame'
import type { Runtime } from './runtime'

/**
 * Instruction execution context (mutable)
 * Handlers read operands through the frame and may set branchTarget
 */
export interface InstructionContext {
  readonly frame: Frame
  readonly runtime: Runtime
  /** Absolute pc to continue at; null falls through to the next instruction */
  branchTarget: number | null
}

export interface PendingInvocation {
  owner: ClassDefinition
  method: MethodInfo
  /** Receiver first for instance methods, then parameters in declared order */
  args: Value[]
  /** Run the triggering instruction again once the callee returns */
  reexecute?: boolean
}

export type InstructionResult =
  | { resultCode: null }
  | { resultCode: typeof RESULT_CODES.INVOKE; invocation: PendingInvocation }
  | { resultCode: typeof RESULT_CODES.RETURN; returnValue: Value | null }

/**
 * Where guest console output goes
 */
export interface ConsoleSink {
  write(text: string): void
}
