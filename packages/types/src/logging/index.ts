export type { ILogger, LogContext } from './ILogger.js';
