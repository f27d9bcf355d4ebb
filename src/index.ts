/**
 * typed-endpoints
 *
 * Describe HTTP endpoints as typed data and execute them against a service
 */

// Endpoints and errors
export * from './api';

// Services
export * from './service';

// Encoders and decoders
export * from './codec';

// Request building and response interpretation
export * from './request';
export * from './response';

// Transport (fetch)
export * from './transport';

// Calling conventions
export * from './bridge';

// Utils
export { logger } from './utils/logger';
export type { LogLevel, LoggerConfig, ScopedLogger } from './utils/logger';
