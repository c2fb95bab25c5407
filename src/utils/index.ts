export { logger, createComponentLogger, setLogLevel, flushLogs } from './logger';
export { config, getEnvVar, getEnvVarAsNumber } from './config';
export type { Config, LoggingConfig, AnalysisConfig } from './config';
export { IgnoreRules, DEFAULT_IGNORE_PATTERNS, IGNORE_FILE_NAME } from './ignore-rules';
