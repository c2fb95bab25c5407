import { config as dotenvConfig } from 'dotenv';

// Load environment variables
dotenvConfig();

export interface LoggingConfig {
  level: string;
  file?: string;
}

export interface AnalysisConfig {
  maxConcurrency: number;
  maxFileSize: number;
  outputDir: string;
}

export interface Config {
  logging: LoggingConfig;
  analysis: AnalysisConfig;
  nodeEnv: string;
}

export function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (!value) {
    throw new Error(`Environment variable ${key} is required but not set`);
  }
  return value;
}

export function getEnvVarAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive number`);
  }
  return parsed;
}

export const config: Config = {
  logging: {
    level: getEnvVar('LOG_LEVEL', 'info'),
    file: process.env.LOG_FILE || undefined,
  },
  analysis: {
    maxConcurrency: getEnvVarAsNumber('MODSCOPE_MAX_CONCURRENCY', 10),
    maxFileSize: getEnvVarAsNumber('MODSCOPE_MAX_FILE_SIZE', 1024 * 1024),
    outputDir: getEnvVar('MODSCOPE_OUTPUT_DIR', 'output'),
  },
  nodeEnv: getEnvVar('NODE_ENV', 'development'),
};
