/**
 * schema-versioner
 *
 * Keeps a structure (typically a database schema) at a wanted version by
 * applying the upgrades or rollbacks in between, one recorded step at a time.
 */

// Engine
export * from './core/versioner/index.js'

// Listeners
export * from './core/listeners/index.js'

// Reference backend
export * from './core/db/index.js'

// Ambient
export * from './core/config/index.js'
export * from './core/connection/index.js'
export * from './core/logger/index.js'
export {
    observer,
    VersionerObserver,
    type VersionerEvents,
    type VersionerEventNames,
    type VersionerEventCallback,
} from './core/observer.js'
export { isCi, isDebug } from './core/environment.js'

// SDK
export * from './sdk/index.js'
