import { ConsoleLogger, isLogLevel } from './consoleLogger';
export type { Logger, LogLevel } from './types';
export { LOG_LEVELS } from './types';

export const logger = new ConsoleLogger();
export { ConsoleLogger, isLogLevel };
