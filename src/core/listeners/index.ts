/**
 * Listener variants.
 *
 * Compose them with `BroadcastListener` rather than subclassing.
 */
export { NoOpListener } from './noop.js'
export { BroadcastListener } from './broadcast.js'
export { LoggingListener } from './logging.js'
export { ObserverListener } from './observer.js'
export {
    TransactionalChangesListener,
    TransactionScopeError,
    type TransactionOperation,
} from './transactional.js'
