import { dirname, resolve } from 'node:path'
import { logger, type RuntimeEnv } from '@tinyjvm/core'
import {
  type ClassDefinition,
  type ConsoleSink,
  createClassPathLoader,
  formatValue,
  Heap,
  Interpreter,
  loadClassFile,
  MapClassRegistry,
  referenceValue,
  STRING_CLASS,
} from '@tinyjvm/jvm'
import type { Value } from '@tinyjvm/types'
import { Command } from 'commander'
import { formatJvmError, formatTraceEntry } from '../utils/report'
import {
  isClassFile,
  parseOptions,
  type RunOptions,
  runOptionsSchema,
} from '../utils/validation'

export const MAIN_DESCRIPTOR = '([Ljava/lang/String;)V'

/**
 * Where a command writes: guest output to stdout, diagnostics to stderr
 */
export interface CommandOutput {
  stdout: ConsoleSink
  stderr: ConsoleSink
}

export const processOutput: CommandOutput = {
  stdout: { write: (text) => process.stdout.write(text) },
  stderr: { write: (text) => process.stderr.write(text) },
}

export function createRunCommand(env: RuntimeEnv): Command {
  const command = new Command('run')
    .description('Execute a static method of a class file, main by default')
    .argument('<file>', 'Class file to run')
    .option(
      '--classpath <dir>',
      'Directory other classes are loaded from (default: package root of <file>)',
    )
    .option('--trace', 'Print every executed instruction to stderr', env.JVM_TRACE)
    .option('--max-depth <n>', 'Call stack depth limit', String(env.JVM_MAX_CALL_DEPTH))
    .option('--max-steps <n>', 'Instruction budget, 0 for none', String(env.JVM_MAX_STEPS))
    .option('--method <name>', 'Method to run', 'main')
    .option('--descriptor <descriptor>', 'Descriptor of the method', MAIN_DESCRIPTOR)
    .action((file: string, raw: unknown) => {
      const [error, options] = parseOptions(runOptionsSchema, raw)
      if (error) {
        logger.error('Failed to run class file:', error)
        process.exitCode = 1
        return
      }
      process.exitCode = executeRunCommand(file, options)
    })

  return command
}

/**
 * Directory a class's package tree starts in: `out/demo/Hello.class`
 * holding demo/Hello gives `out`
 */
export function classPathRoot(file: string, className: string): string {
  let root = dirname(resolve(file))
  for (let depth = className.split('/').length - 1; depth > 0; depth--) {
    root = dirname(root)
  }
  return root
}

/**
 * Arguments for the entry method; main gets an empty String[]
 */
function entryArguments(descriptor: string): Value[] {
  if (descriptor !== MAIN_DESCRIPTOR) return []
  const args = new Heap().newArray({ kind: 'object', className: STRING_CLASS }, 0)
  return [referenceValue(args)]
}

/**
 * Load and run; returns the process exit code
 */
export function executeRunCommand(
  file: string,
  options: RunOptions,
  output: CommandOutput = processOutput,
): number {
  if (!isClassFile(file)) {
    output.stderr.write(`Not a class file: ${file}\n`)
    return 1
  }

  const [loadError, classDefinition] = loadClassFile(file)
  if (loadError) {
    output.stderr.write(`${formatJvmError(loadError).join('\n')}\n`)
    return 1
  }

  const classPath = options.classpath ?? classPathRoot(file, classDefinition.name)
  logger.debug('Running class file', {
    file,
    className: classDefinition.name,
    classPath,
    method: `${options.method}${options.descriptor}`,
  })

  const interpreter = new Interpreter(
    new MapClassRegistry({
      classes: [classDefinition],
      loader: createClassPathLoader(classPath),
    }),
    {
      console: output.stdout,
      trace: options.trace,
      maxCallDepth: options.maxDepth,
      maxSteps: options.maxSteps,
    },
  )
  return runEntry(interpreter, classDefinition, options, output)
}

function runEntry(
  interpreter: Interpreter,
  classDefinition: ClassDefinition,
  options: RunOptions,
  output: CommandOutput,
): number {
  const [error, result] = interpreter.execute(
    classDefinition,
    options.method,
    options.descriptor,
    entryArguments(options.descriptor),
  )

  if (options.trace) {
    for (const entry of interpreter.getExecutionLogs()) {
      output.stderr.write(`${formatTraceEntry(entry)}\n`)
    }
  }

  if (error) {
    output.stderr.write(`${formatJvmError(error).join('\n')}\n`)
    return 1
  }

  logger.info('Execution finished', {
    steps: result.steps,
    returnValue: result.returnValue === null ? 'void' : formatValue(result.returnValue),
  })
  return 0
}
