export * from './common/errors';
export { Logger, getLogger, configureLogger } from './common/logger';
export type { LogLevel, LogFormat, LoggerOptions } from './common/logger';
export * from './spans';
export * from './crypto';
export * from './operators';
export * from './engine';
export * from './config';
export { createServer } from './api';
export type { ServerOptions } from './api';
