#!/usr/bin/env tsx

import { loadRuntimeEnv, logger } from '@tinyjvm/core'
import { Command } from 'commander'
import { createInspectCommand } from './commands/inspect'
import { createRunCommand } from './commands/run'

// Load environment variables
const env = loadRuntimeEnv()

// Initialize logger
logger.init()
logger.level = env.PINO_LEVEL

const program = new Command('tinyjvm')
  .description('Run and inspect JVM class files')
  .version('0.1.0')
  .addCommand(createRunCommand(env))
  .addCommand(createInspectCommand())

program.parse(process.argv)
