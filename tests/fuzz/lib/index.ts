/**
 * Fuzz testing library - shared utilities.
 */

export * from './utils'
