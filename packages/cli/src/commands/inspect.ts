import { readFileSync } from 'node:fs'
import {
  CLASS_ACCESS_FLAGS,
  decodeClassFile,
  FIELD_ACCESS_FLAGS,
  METHOD_ACCESS_FLAGS,
  parseFlags,
} from '@tinyjvm/classfile'
import { logger, u32ToHex } from '@tinyjvm/core'
import {
  ClassDefinition,
  describeConstant,
  disassembleMethod,
  formatListing,
} from '@tinyjvm/jvm'
import {
  type ClassFile,
  FormatError,
  type Safe,
  safeError,
  safeResult,
} from '@tinyjvm/types'
import { Command } from 'commander'
import { flagKeywords, formatJvmError } from '../utils/report'
import {
  type InspectOptions,
  inspectOptionsSchema,
  isClassFile,
  parseOptions,
} from '../utils/validation'
import { type CommandOutput, processOutput } from './run'

export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('Print the structure of a class file')
    .argument('<file>', 'Class file to inspect')
    .option('--pool', 'List the constant pool')
    .option('--code', 'Disassemble method bodies')
    .action((file: string, raw: unknown) => {
      const [error, options] = parseOptions(inspectOptionsSchema, raw)
      if (error) {
        logger.error('Failed to inspect class file:', error)
        process.exitCode = 1
        return
      }
      process.exitCode = executeInspectCommand(file, options)
    })
}

function readClass(file: string): Safe<[ClassFile, ClassDefinition], FormatError> {
  const [decodeError, decoded] = decodeClassFile(new Uint8Array(readFileSync(file)))
  if (decodeError) return safeError(decodeError)
  const [error, classDefinition] = ClassDefinition.fromClassFile(decoded.value)
  if (error) return safeError(error)
  return safeResult([decoded.value, classDefinition])
}

function poolLines(classDefinition: ClassDefinition): string[] {
  const { pool } = classDefinition
  const lines = [`constant pool (count ${pool.size}):`]
  for (const [index, entry] of pool.entries()) {
    const text =
      entry.tag === 'Utf8' ? `Utf8 ${JSON.stringify(entry.text)}` : describeConstant(pool, index)
    lines.push(`  #${index} = ${text}`)
  }
  return lines
}

/**
 * Header, then fields and methods with their flags as keywords
 */
export function describeClass(
  classFile: ClassFile,
  classDefinition: ClassDefinition,
  options: InspectOptions,
): string[] {
  const lines = [
    `${flagKeywords(parseFlags(classDefinition.accessFlags, CLASS_ACCESS_FLAGS)).join(' ')} ${classDefinition.name}`.trim(),
    `  magic: ${u32ToHex(classFile.magic)}`,
    `  version: ${classFile.majorVersion}.${classFile.minorVersion}`,
    `  extends: ${classDefinition.superName ?? '(none)'}`,
  ]
  if (classDefinition.interfaces.length > 0) {
    lines.push(`  implements: ${classDefinition.interfaces.join(', ')}`)
  }
  if (classDefinition.sourceFile !== undefined) {
    lines.push(`  source: ${classDefinition.sourceFile}`)
  }

  if (options.pool) lines.push(...poolLines(classDefinition))

  lines.push('fields:')
  for (const field of classDefinition.getFields()) {
    const flags = flagKeywords(parseFlags(field.accessFlags, FIELD_ACCESS_FLAGS))
    lines.push(`  ${[...flags, field.descriptor, field.name].join(' ')}`)
  }

  lines.push('methods:')
  for (const method of classDefinition.getMethods()) {
    const flags = flagKeywords(parseFlags(method.accessFlags, METHOD_ACCESS_FLAGS))
    lines.push(`  ${[...flags, `${method.name}${method.descriptor}`].join(' ')}`)
    if (options.code && method.code) {
      lines.push(`    max_stack ${method.code.maxStack}, max_locals ${method.code.maxLocals}`)
      for (const line of formatListing(disassembleMethod(classDefinition, method))) {
        lines.push(`    ${line}`)
      }
    }
  }
  return lines
}

export function executeInspectCommand(
  file: string,
  options: InspectOptions,
  output: CommandOutput = processOutput,
): number {
  if (!isClassFile(file)) {
    output.stderr.write(`Not a class file: ${file}\n`)
    return 1
  }
  const [error, decoded] = readClass(file)
  if (error) {
    output.stderr.write(`${formatJvmError(error).join('\n')}\n`)
    return 1
  }
  const [classFile, classDefinition] = decoded
  output.stdout.write(`${describeClass(classFile, classDefinition, options).join('\n')}\n`)
  return 0
}
