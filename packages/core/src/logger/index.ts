export { createLogger, setLogLevel, resolveDefaultLogLevel, isLogLevel, logger } from './logger';
export type { Logger, LogLevel } from './logger';
