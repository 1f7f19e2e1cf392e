export { logger, log, setLogLevel, resetLogLevel, errorFields, ObservabilityDrizzleLogger } from './observability';
export type { LogLevel, LogEntry, LogFields } from './observability';
export { getHotelConfig, loadHotelConfig, resetHotelConfig } from './config';
export type { HotelConfig } from './config';
