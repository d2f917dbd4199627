/**
 * Central export point for tagweave error types.
 */
export { TagweaveError, ErrorSeverity } from './TagweaveError';
export type { BaseErrorDetails, TagweaveErrorOptions } from './TagweaveError';
export { TagErrorCode, isTagErrorCode } from './codes';
export * from './LookupFailedError';
export * from './NestingDepthError';
export * from './ConfigError';
