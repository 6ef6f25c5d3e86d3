export { createLogger, logger } from './logger';
export type { Logger, LogLevel } from './logger';
