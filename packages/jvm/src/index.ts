/**
 * JVM Package
 *
 * Constant-pool resolution, class definitions and registries, and the
 * bytecode interpreter
 */

export * from './bootstrap'
export * from './call-stack'
export * from './class-definition'
export * from './class-registry'
export * from './config'
export * from './constant-pool'
export * from './descriptor'
export * from './disassembler'
export * from './frame'
export * from './heap'
export * from './instructions/base'
export * from './instructions/registry'
export * from './interpreter'
export * from './natives'
export * from './runtime'
export * from './types'
export * from './values'
