export * from './common/errors';
export { IgnoreMatcher, compileGlobToRegExp, parseIgnorePatterns } from './common/ignore';
export { Logger, configureLogger, getLogger } from './common/logger';
export type { LogFormat, LogLevel, LoggerOptions } from './common/logger';
export * from './config';
export * from './rules';
export * from './sanitizer';
export { FilesystemTree, comparePaths } from './ingest';
export { getMetricsSnapshot, metricsContentType } from './observability';
