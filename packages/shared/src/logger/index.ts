import { ConsoleLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { SilentLogger } from './silentLogger';
export type { Logger, LogLevel, MaybePromise } from './types';
export { LOG_LEVEL_ORDER, formatBindings } from './types';
export type { ConsoleLoggerOptions } from './consoleLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, SilentLogger };
