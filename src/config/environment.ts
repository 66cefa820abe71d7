import { EnvironmentConfig, LogLevelName, RuntimeEnvironment } from '../types/environment';

/**
 * Default values for environment configuration
 */
const DEFAULTS = {
  NODE_ENV: 'development',
  LOG_LEVEL: 'INFO',
} as const;

/**
 * Log level used when LOG_LEVEL is unset; test runs only surface warnings
 */
const DEFAULT_LOG_LEVELS: Record<RuntimeEnvironment, LogLevelName> = {
  development: DEFAULTS.LOG_LEVEL,
  production: DEFAULTS.LOG_LEVEL,
  test: 'WARN',
};

const ALLOWED_ENVIRONMENTS: readonly RuntimeEnvironment[] = ['development', 'production', 'test'];

const ALLOWED_LOG_LEVELS: readonly LogLevelName[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

const isRuntimeEnvironment = (value: string): value is RuntimeEnvironment =>
  ALLOWED_ENVIRONMENTS.some(env => env === value);

const isLogLevelName = (value: string): value is LogLevelName =>
  ALLOWED_LOG_LEVELS.some(level => level === value);

/**
 * Gets the current environment configuration with validation and defaults
 * @throws {Error} When NODE_ENV or LOG_LEVEL hold a value outside the allowed set
 */
export const getEnvironmentConfig = (env: NodeJS.ProcessEnv = process.env): EnvironmentConfig => {
  const nodeEnv = env.NODE_ENV || DEFAULTS.NODE_ENV;
  if (!isRuntimeEnvironment(nodeEnv)) {
    throw new Error(
      `Invalid NODE_ENV: "${nodeEnv}". Must be one of: ${ALLOWED_ENVIRONMENTS.join(', ')}`
    );
  }

  const logLevel = (env.LOG_LEVEL || DEFAULT_LOG_LEVELS[nodeEnv]).toUpperCase();
  if (!isLogLevelName(logLevel)) {
    throw new Error(
      `Invalid LOG_LEVEL: "${logLevel}". Must be one of: ${ALLOWED_LOG_LEVELS.join(', ')}`
    );
  }

  return {
    environment: nodeEnv,
    logLevel,
  };
};

/**
 * Environment configuration instance with validation and defaults applied
 * @throws {Error} When environment validation fails
 */
export const environmentConfig = getEnvironmentConfig();
