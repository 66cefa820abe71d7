/**
 * Environment configuration types
 */

export type RuntimeEnvironment = 'development' | 'production' | 'test';

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface EnvironmentConfig {
  environment: RuntimeEnvironment;
  logLevel: LogLevelName;
}
