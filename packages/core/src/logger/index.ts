export { BatonLogger, type BatonLoggerConfig } from './baton-logger.js';
export { createLogger, parseLogLevel, type CreateLoggerOptions } from './factory.js';
export { createTransport, createTransports } from './transport-factory.js';
export { ConsoleTransport, type ConsoleTransportConfig } from './transports/console-transport.js';
export { FileTransport, type FileTransportConfig } from './transports/file-transport.js';
export { SilentTransport } from './transports/silent-transport.js';
export { LoggerConfigSchema, LoggerTransportSchema } from './schemas.js';
export type { LoggerConfig, LoggerConfigInput, LoggerTransportConfig } from './schemas.js';
export { LOG_LEVELS, LogComponent } from './types.js';
export type { Logger, LoggerTransport, LogEntry, LogLevel } from './types.js';
export { LoggerError } from './errors.js';
export { LoggerErrorCode } from './error-codes.js';
