/**
 * Utility exports
 */

export * from './encoding'
