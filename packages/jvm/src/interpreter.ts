/**
 * JVM Interpreter
 *
 * Fetch-decode-execute loop over an explicit stack of frames. Handlers come
 * from the InstructionRegistry; invocations they request are either run from
 * the native table or turned into a new frame, and returns hand their value
 * back to the caller, so guest recursion never recurses in the host.
 */

import { byteToHex, logger } from '@tinyjvm/core'
import { METHOD_ACCESS_FLAGS } from '@tinyjvm/classfile'
import {
  ExecutionLimitExceeded,
  type ExecutionLogEntry,
  FrameFault,
  type InvocationResult,
  JvmError,
  RESOLUTION_ERRORS,
  ResolutionError,
  RUNTIME_FAULTS,
  type RuntimeOptions,
  RuntimeFault,
  type Safe,
  safeError,
  safeResult,
  TypeFault,
  UnsupportedOperation,
  type Value,
} from '@tinyjvm/types'
import { tryit } from 'radash'
import { JvmCallStack } from './call-stack'
import {
  type ClassDefinition,
  isStatic,
  lineNumberAt,
  type MethodInfo,
} from './class-definition'
import type { ClassRegistry } from './class-registry'
import { RESULT_CODES, RUNTIME_CONFIG } from './config'
import { Frame } from './frame'
import { InstructionRegistry } from './instructions/registry'
import { createNativeTable, type NativeTable, nativeKey } from './natives'
import { Runtime } from './runtime'
import type { ConsoleSink, InstructionContext, PendingInvocation } from './types'
import {
  describeValue,
  matchesStackType,
  type StackType,
  stackTypeOf,
  valueCategory,
} from './values'

export interface InterpreterOptions extends RuntimeOptions {
  /** Where PrintStream output goes; stdout by default */
  console?: ConsoleSink
  /** Replaces the bootstrap native table */
  natives?: NativeTable
}

const stdoutSink: ConsoleSink = {
  write: (text) => {
    process.stdout.write(text)
  },
}

/**
 * Outcome of entering an invocation: a native already produced its value,
 * or a frame was pushed
 */
type EnterOutcome = { native: true; value: Value | null } | { native: false }

export class Interpreter {
  protected readonly registry: InstructionRegistry
  protected readonly natives: NativeTable
  protected readonly console: ConsoleSink
  protected readonly maxCallDepth: number
  protected readonly maxSteps: number
  protected readonly trace: boolean

  protected callStack: JvmCallStack
  protected runtime: Runtime
  protected executionStep = 0
  protected executionLogs: ExecutionLogEntry[] = []

  constructor(
    private readonly classes: ClassRegistry,
    options: InterpreterOptions = {},
  ) {
    this.registry = new InstructionRegistry()
    this.natives = options.natives ?? createNativeTable()
    this.console = options.console ?? stdoutSink
    this.maxCallDepth = options.maxCallDepth ?? RUNTIME_CONFIG.DEFAULT_MAX_CALL_DEPTH
    this.maxSteps = options.maxSteps ?? RUNTIME_CONFIG.DEFAULT_MAX_STEPS
    this.trace = options.trace ?? false
    this.callStack = new JvmCallStack(this.maxCallDepth)
    this.runtime = new Runtime(classes, this.console)
  }

  /**
   * Run `methodName` of `classDefinition` to completion.
   *
   * Each call starts from a fresh heap and fresh static storage. Failures come
   * back as the error half of the tuple with the guest stack trace attached;
   * the call stack is empty afterwards either way.
   */
  execute(
    classDefinition: ClassDefinition,
    methodName: string,
    descriptor: string,
    args: Value[] = [],
  ): Safe<InvocationResult, JvmError> {
    this.executionLogs = []
    this.executionStep = 0
    this.callStack = new JvmCallStack(this.maxCallDepth)
    this.runtime = new Runtime(this.classes, this.console)
    this.runtime.addClass(classDefinition)

    const [error, returnValue] = tryit(() =>
      this.run(classDefinition, methodName, descriptor, args),
    )()
    if (error) {
      if (!(error instanceof JvmError)) throw error
      this.abort(error)
      return safeError(error)
    }
    return safeResult({ returnValue, steps: this.executionStep })
  }

  /**
   * Get execution logs
   */
  getExecutionLogs(): ExecutionLogEntry[] {
    // logs are already in execution order
    return [...this.executionLogs]
  }

  private run(
    classDefinition: ClassDefinition,
    methodName: string,
    descriptor: string,
    args: Value[],
  ): Value | null {
    const method = classDefinition.findMethod(methodName, descriptor)
    if (!method) {
      throw new ResolutionError(
        RESOLUTION_ERRORS.METHOD_NOT_FOUND,
        `Method ${classDefinition.name}.${methodName}${descriptor} not found`,
      )
    }
    this.checkArguments(classDefinition, method, args)

    for (
      let initializer = this.runtime.initialize(classDefinition);
      initializer;
      initializer = this.runtime.initialize(classDefinition)
    ) {
      if (!this.enter(initializer).native) this.runLoop()
    }

    const outcome = this.enter({ owner: classDefinition, method, args })
    return outcome.native ? outcome.value : this.runLoop()
  }

  /**
   * Receiver first for instance methods, then one value per parameter of the
   * matching category
   */
  private checkArguments(
    owner: ClassDefinition,
    method: MethodInfo,
    args: Value[],
  ): void {
    const expected: StackType[] = method.parsedDescriptor.parameters.map(stackTypeOf)
    if (!isStatic(method)) expected.unshift('reference')

    const target = `${owner.name}.${method.name}${method.descriptor}`
    if (args.length !== expected.length) {
      throw new TypeFault(
        `${target} takes ${expected.length} arguments, got ${args.length}`,
      )
    }
    args.forEach((arg, index) => {
      const type = expected[index]
      if (type !== undefined && !matchesStackType(arg, type)) {
        throw new TypeFault(
          `Argument ${index} of ${target} is ${describeValue(arg)}, expected ${type}`,
        )
      }
    })
    if (!isStatic(method) && args[0]?.type === 'null') {
      throw new RuntimeFault(
        RUNTIME_FAULTS.NULL_POINTER,
        `Cannot invoke ${target} on null`,
      )
    }
  }

  /**
   * Run a native now, or push a frame with the arguments laid out in its
   * locals
   */
  private enter(invocation: PendingInvocation): EnterOutcome {
    const { owner, method, args } = invocation
    const signature = `${owner.name}.${method.name}${method.descriptor}`

    const native = this.natives.get(nativeKey(owner.name, method.name, method.descriptor))
    if (native) {
      if (this.trace) logger.debug('Interpreter: native call', { method: signature })
      return { native: true, value: native(this.runtime, args) }
    }

    if (!method.code) {
      if (method.accessFlags & METHOD_ACCESS_FLAGS.ACC_NATIVE) {
        throw new ResolutionError(
          RESOLUTION_ERRORS.METHOD_NOT_FOUND,
          `No native implementation of ${signature}`,
        )
      }
      throw new RuntimeFault(
        RUNTIME_FAULTS.ABSTRACT_METHOD,
        `Abstract method ${signature} has no code`,
      )
    }

    const frame = new Frame(owner, method, method.code)
    let slot = 0
    for (const arg of args) {
      frame.setLocal(slot, arg)
      slot += valueCategory(arg)
    }
    this.callStack.push(frame)
    if (this.trace) {
      logger.debug('Interpreter: frame pushed', {
        method: signature,
        depth: this.callStack.depth,
      })
    }
    return { native: false }
  }

  /**
   * Step until the call stack is empty; the last frame's return value is the
   * result
   */
  private runLoop(): Value | null {
    let result: Value | null = null

    while (!this.callStack.isEmpty) {
      const frame = this.callStack.current

      if (this.maxSteps > 0 && this.executionStep >= this.maxSteps) {
        throw new ExecutionLimitExceeded(this.maxSteps)
      }

      const opcode = frame.code[frame.pc]
      if (opcode === undefined) {
        throw new FrameFault(`Execution ran off the end of ${frame.location()}`)
      }
      const handler = this.registry.getHandler(opcode)
      if (!handler) {
        throw new UnsupportedOperation(opcode, frame.pc)
      }
      const length = handler.length(frame.code, frame.pc)

      this.executionStep++
      if (this.trace) {
        this.executionLogs.push({
          step: this.executionStep,
          className: frame.classDefinition.name,
          methodName: frame.method.name,
          pc: frame.pc,
          instructionName: handler.name,
          opcode: byteToHex(opcode),
          depth: this.callStack.depth,
          stack: frame.snapshot().map(describeValue),
        })
      }

      const context: InstructionContext = {
        frame,
        runtime: this.runtime,
        branchTarget: null,
      }
      const outcome = handler.execute(context)

      switch (outcome.resultCode) {
        case null:
          frame.pc = context.branchTarget ?? frame.pc + length
          break

        case RESULT_CODES.INVOKE: {
          const advance = outcome.invocation.reexecute ? 0 : length
          const entered = this.enter(outcome.invocation)
          if (entered.native) {
            if (entered.value !== null) frame.push(entered.value)
            frame.pc += advance
          } else {
            frame.resumeAdvance = advance
          }
          break
        }

        case RESULT_CODES.RETURN: {
          this.callStack.pop()
          if (this.callStack.isEmpty) {
            result = outcome.returnValue
            break
          }
          const caller = this.callStack.current
          if (outcome.returnValue !== null) caller.push(outcome.returnValue)
          caller.pc += caller.resumeAdvance
          break
        }
      }
    }

    return result
  }

  /**
   * Record where the guest was, then unwind every frame
   */
  private abort(error: JvmError): void {
    error.stackTrace = this.callStack.innermostFirst().map((frame) => ({
      className: frame.classDefinition.name,
      methodName: frame.method.name,
      descriptor: frame.method.descriptor,
      pc: frame.pc,
      line: lineNumberAt(frame.method, frame.pc),
    }))
    this.callStack.clear()

    logger.error('Interpreter: execution aborted', error, {
      kind: error.kind,
      steps: this.executionStep,
      stackTrace: error.stackTrace,
    })
  }
}
