/**
 * Logging Configuration
 *
 * Centralized configuration for structured logging with Pino.
 * Supports different log levels and formats for development, test and production.
 */

export interface LoggingConfig {
  level: string;
  isDevelopment: boolean;
  enablePrettyPrint: boolean;
  redactSensitiveFields: string[];
}

/**
 * Get logging configuration from environment variables
 */
export function getLoggingConfig(source: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const nodeEnv = source.NODE_ENV || 'development';
  const isDevelopment = nodeEnv === 'development';
  // Tests stay quiet unless a level is asked for explicitly
  const defaultLevel = nodeEnv === 'test' ? 'silent' : isDevelopment ? 'debug' : 'info';

  return {
    level: source.LOG_LEVEL || defaultLevel,
    isDevelopment,
    enablePrettyPrint: isDevelopment && source.LOG_PRETTY !== 'false',
    redactSensitiveFields: [
      'apiKey',
      'api_key',
      'authorization',
      'token',
      'secret',
    ],
  };
}
