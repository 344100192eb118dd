import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((val) => val === 'true' || val === '1')

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  PINO_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
})

/**
 * Interpreter limits and switches
 */
export const runtimeEnvSchema = baseEnvSchema.extend({
  JVM_MAX_CALL_DEPTH: z.coerce.number().int().positive().default(1024),
  JVM_MAX_STEPS: z.coerce.number().int().nonnegative().default(0),
  JVM_TRACE: booleanFlag,
})

export type RuntimeEnv = z.infer<typeof runtimeEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @returns Validated environment variables
 */
export function loadEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  envPath?: string,
): z.infer<T> {
  dotenvConfig({ path: envPath })
  return schema.parse(process.env)
}

export function loadRuntimeEnv(envPath?: string): RuntimeEnv {
  return loadEnvVariables(runtimeEnvSchema, envPath)
}
