/**
 * Versioner module.
 *
 * The sync engine, its collaborator contracts and its errors.
 */
export * from './types.js'
export * from './errors.js'
export * from './plan.js'
export { Versioner } from './versioner.js'
