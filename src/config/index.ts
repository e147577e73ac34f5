/**
 * Configuration module
 * Zod-validated engine settings plus environment loaders
 */

export * from './schema'
export * from './environment'
export type * from './types'
