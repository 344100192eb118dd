/**
 * JVM Error Taxonomy
 *
 * Every failure the loader or the interpreter reports is one of these classes.
 * Nothing is recovered silently: the error aborts the enclosing load or
 * execution and is handed back to the caller as the error half of a Safe tuple.
 */

import type { StackTraceEntry } from './jvm'

/**
 * Resolution failure reasons
 */
export const RESOLUTION_ERRORS = {
  INDEX_OUT_OF_RANGE: 'index_out_of_range',
  UNUSABLE_SLOT: 'unusable_slot',
  KIND_MISMATCH: 'kind_mismatch',
  CYCLE: 'cycle',
  CLASS_NOT_FOUND: 'class_not_found',
  FIELD_NOT_FOUND: 'field_not_found',
  METHOD_NOT_FOUND: 'method_not_found',
} as const

export type ResolutionErrorReason =
  (typeof RESOLUTION_ERRORS)[keyof typeof RESOLUTION_ERRORS]

/**
 * Faults a real JVM would raise as guest exceptions
 */
export const RUNTIME_FAULTS = {
  NULL_POINTER: 'null_pointer',
  DIVIDE_BY_ZERO: 'divide_by_zero',
  ARRAY_INDEX_OUT_OF_BOUNDS: 'array_index_out_of_bounds',
  NEGATIVE_ARRAY_SIZE: 'negative_array_size',
  ABSTRACT_METHOD: 'abstract_method',
  CLASS_CAST: 'class_cast',
} as const

export type RuntimeFaultReason =
  (typeof RUNTIME_FAULTS)[keyof typeof RUNTIME_FAULTS]

export type JvmErrorKind =
  | 'FormatError'
  | 'ResolutionError'
  | 'FrameFault'
  | 'TypeFault'
  | 'UnsupportedOperation'
  | 'CallStackOverflow'
  | 'RuntimeFault'
  | 'ExecutionLimitExceeded'

export abstract class JvmError extends Error {
  abstract readonly kind: JvmErrorKind
  /** Guest frames active when the error was raised, innermost first */
  stackTrace: StackTraceEntry[] = []

  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Malformed class-file or constant-pool structure. Always aborts the load.
 */
export class FormatError extends JvmError {
  readonly kind = 'FormatError'
  readonly offset: number | undefined

  constructor(message: string, offset?: number) {
    super(offset === undefined ? message : `${message} (at byte ${offset})`)
    this.offset = offset
  }
}

export class ResolutionError extends JvmError {
  readonly kind = 'ResolutionError'
  readonly reason: ResolutionErrorReason
  /** Constant-pool index involved, when the failure came from the pool */
  readonly index: number | undefined

  constructor(
    reason: ResolutionErrorReason,
    message: string,
    index?: number,
  ) {
    super(message)
    this.reason = reason
    this.index = index
  }
}

/**
 * Operand-stack or local-slot bound violation
 */
export class FrameFault extends JvmError {
  readonly kind = 'FrameFault'
}

/**
 * A value of the wrong category where an instruction names its operand type
 */
export class TypeFault extends JvmError {
  readonly kind = 'TypeFault'
}

export class UnsupportedOperation extends JvmError {
  readonly kind = 'UnsupportedOperation'
  readonly opcode: number
  readonly pc: number

  constructor(opcode: number, pc: number, detail?: string) {
    const hex = `0x${opcode.toString(16).padStart(2, '0')}`
    super(
      detail === undefined
        ? `Unsupported opcode ${hex} at pc ${pc}`
        : `Unsupported opcode ${hex} at pc ${pc}: ${detail}`,
    )
    this.opcode = opcode
    this.pc = pc
  }
}

export class CallStackOverflow extends JvmError {
  readonly kind = 'CallStackOverflow'
  readonly depth: number

  constructor(depth: number) {
    super(`Call stack depth limit of ${depth} exceeded`)
    this.depth = depth
  }
}

export class RuntimeFault extends JvmError {
  readonly kind = 'RuntimeFault'
  readonly reason: RuntimeFaultReason

  constructor(reason: RuntimeFaultReason, message: string) {
    super(message)
    this.reason = reason
  }
}

export class ExecutionLimitExceeded extends JvmError {
  readonly kind = 'ExecutionLimitExceeded'
  readonly steps: number

  constructor(steps: number) {
    super(`Instruction budget of ${steps} steps exhausted`)
    this.steps = steps
  }
}
