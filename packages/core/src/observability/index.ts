export { logger, log, setLogLevel, resetLogLevel, errorFields } from './logger';
export type { LogLevel, LogEntry, LogFields } from './logger';
export { ObservabilityDrizzleLogger } from './drizzle-logger';
