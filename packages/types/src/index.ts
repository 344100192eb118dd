/**
 * Centralized Type Definitions
 *
 * Single source of truth for the structures shared by the class-file codec,
 * the interpreter and the CLI.
 */

export * from './classfile'
export * from './errors'
export * from './jvm'
export * from './safe'
