/**
 * Environment configuration types
 */

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export interface EnvironmentConfig {
  environment: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  /** Preset used by the CLI when --preset is not given */
  defaultPreset: string;
}
