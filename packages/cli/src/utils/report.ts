/**
 * Text rendering of interpreter traces, guest failures and class summaries
 */

import type {
  ExecutionLogEntry,
  JvmError,
  StackTraceEntry,
} from '@tinyjvm/types'

/**
 * One trace line, indented by call depth:
 * `     3   demo/Calc.add 2: iadd [int 2, int 3]`
 */
export function formatTraceEntry(entry: ExecutionLogEntry): string {
  const indent = '  '.repeat(Math.max(0, entry.depth - 1))
  return `${String(entry.step).padStart(6)} ${indent}${entry.className}.${entry.methodName} ${entry.pc}: ${entry.instructionName} [${entry.stack.join(', ')}]`
}

function formatFrame(frame: StackTraceEntry): string {
  const where =
    frame.line === undefined ? `pc ${frame.pc}` : `pc ${frame.pc}, line ${frame.line}`
  return `    at ${frame.className.replace(/\//g, '.')}.${frame.methodName}${frame.descriptor} (${where})`
}

/**
 * Error kind and message, then the guest frames innermost first
 */
export function formatJvmError(error: JvmError): string[] {
  return [`${error.kind}: ${error.message}`, ...error.stackTrace.map(formatFrame)]
}

/**
 * ACC_PUBLIC -> public
 */
export function flagKeywords(names: readonly string[]): string[] {
  return names.map((name) => name.replace(/^ACC_/, '').toLowerCase())
}
