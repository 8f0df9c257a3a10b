import { EnvironmentConfig, LogLevel } from '../types/environment';

/**
 * Default values for environment configuration
 */
const DEFAULTS = {
  NODE_ENV: 'development' as const,
  LOG_LEVEL: LogLevel.INFO,
  REPORT_PRESET: 'category',
} as const;

const ALLOWED_ENVIRONMENTS = ['development', 'production', 'test'] as const;
type AllowedEnvironment = typeof ALLOWED_ENVIRONMENTS[number];

const isAllowedEnvironment = (value: string): value is AllowedEnvironment =>
  ALLOWED_ENVIRONMENTS.some((env) => env === value);

const isLogLevel = (value: string): value is LogLevel =>
  Object.values<string>(LogLevel).includes(value);

/**
 * Reads LOG_LEVEL, accepting any letter case
 * @throws {Error} When LOG_LEVEL is not one of the known levels
 */
const resolveLogLevel = (raw: string | undefined): LogLevel => {
  if (!raw) {
    return DEFAULTS.LOG_LEVEL;
  }

  const level = raw.trim().toUpperCase();
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid LOG_LEVEL: "${raw}". Must be one of: ${Object.values(LogLevel).join(', ')}`
    );
  }
  return level;
};

/**
 * Gets the current environment configuration with validation and defaults
 * @returns {EnvironmentConfig} Validated environment configuration
 * @throws {Error} When an environment variable holds an invalid value
 */
export const getEnvironmentConfig = (
  env: NodeJS.ProcessEnv = process.env
): EnvironmentConfig => {
  const nodeEnv = env.NODE_ENV || DEFAULTS.NODE_ENV;

  if (!isAllowedEnvironment(nodeEnv)) {
    throw new Error(
      `Invalid NODE_ENV: "${nodeEnv}". Must be one of: ${ALLOWED_ENVIRONMENTS.join(', ')}`
    );
  }

  return {
    environment: nodeEnv,
    logLevel: resolveLogLevel(env.LOG_LEVEL),
    defaultPreset: env.REPORT_PRESET?.trim() || DEFAULTS.REPORT_PRESET,
  };
};

/**
 * Environment configuration instance with validation and defaults applied
 * @throws {Error} When environment validation fails
 */
export const environmentConfig = getEnvironmentConfig();
