export type { Logger, LogLevel } from './Logger';
export { ConsoleLogger, measureTime } from './ConsoleLogger';
export { NULL_LOGGER } from './NullLogger';
export { fail, failIf, failIfNullish } from './helpers';
