export * from './fetcher';
export * from './extraction';
export { normalizeNumber, getLocaleDefaults } from './normalization/number';
export { createLogger, PipelineLogger } from './utils/logger';
export type { LogLevel, LogContext, LoggerOptions } from './utils/logger';
