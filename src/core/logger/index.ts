/**
 * Logger Module
 *
 * Stream logger used by the logging listener and the SDK.
 */
export { Logger, shouldLog, type LoggerOptions } from './logger.js';
export { formatEntry, formatLine, sanitizeData, serializeEntry } from './formatter.js';
export { formatColorLine } from './color.js';
export * from './types.js';
