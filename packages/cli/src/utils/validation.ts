/**
 * Validation utilities for CLI arguments
 */

import { existsSync, statSync } from 'node:fs'
import { type Safe, safeError, safeResult } from '@tinyjvm/types'
import { z } from 'zod'

/**
 * Validates if a string is a valid file path
 * @param path - The path to validate
 * @returns true if valid path, false otherwise
 */
export function isValidPath(path: string): boolean {
  if (!path) {
    return false
  }

  // Basic path validation - should not be empty and should not contain invalid characters
  return path.length > 0 && !/[<>"|?*]/.test(path)
}

/**
 * An existing regular file with the .class extension
 */
export function isClassFile(path: string): boolean {
  return (
    isValidPath(path) &&
    path.endsWith('.class') &&
    existsSync(path) &&
    statSync(path).isFile()
  )
}

export function isDirectory(path: string): boolean {
  return isValidPath(path) && existsSync(path) && statSync(path).isDirectory()
}

/**
 * Commander hands numeric options over as strings
 */
const count = z.coerce.number().int().nonnegative()

export const runOptionsSchema = z.object({
  classpath: z
    .string()
    .refine(isDirectory, { message: 'Class path must be an existing directory' })
    .optional(),
  trace: z.boolean().default(false),
  maxDepth: count.refine((value) => value > 0, {
    message: 'Call depth limit must be positive',
  }),
  maxSteps: count,
  method: z.string().min(1),
  descriptor: z.string().startsWith('('),
})

export type RunOptions = z.infer<typeof runOptionsSchema>

export const inspectOptionsSchema = z.object({
  pool: z.boolean().default(false),
  code: z.boolean().default(false),
})

export type InspectOptions = z.infer<typeof inspectOptionsSchema>

/**
 * Parse raw option values, joining every issue into one message
 */
export function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
): Safe<z.infer<T>, Error> {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`,
    )
    return safeError(new Error(`Invalid options: ${issues.join('; ')}`))
  }
  return safeResult(parsed.data)
}
