export { Logger, createLogger, createJsonLogger, getGlobalLogger, resetGlobalLogger } from './logger';
export type { LogLevel, LogEntry, LoggerOptions } from './logger';
export { EventBus } from './event-bus';
export { createRNG, randomInt } from './random';
export type { RNG } from './random';
