/**
 * Database connections for the SDK.
 */
export {
    MissingDriverError,
    createConnection,
    isTransientConnectionError,
} from './factory.js';
export type { ConnectionConfig, ConnectionResult, Dialect, DriverOpener } from './types.js';
