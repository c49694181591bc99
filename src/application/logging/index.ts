/**
 * @module propinject/application/logging
 * @description Logger port and built-in loggers
 */

export { consoleLogger, silentLogger } from './logger';
export type { ILogger } from './logger';
