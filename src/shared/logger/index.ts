import { ConsoleLogger } from './consoleLogger';
export type { Logger, LogLevel } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export { ConsoleLogger };
