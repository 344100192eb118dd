/**
 * Core Package
 *
 * Ambient services shared by every package: logging, environment
 * configuration and byte rendering helpers
 */

export * from './env'
// Export logger
export * from './logger'
// Export all utilities
export * from './utils'
