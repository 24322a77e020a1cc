/**
 * Logger Configuration
 * Defines configuration schema and defaults for the pino-based Logger
 */

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type LogFormat = "json" | "pretty";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  source?: string;
}

/**
 * Default logger configuration
 */
const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  format: "json",
};

/**
 * Create logger configuration with defaults
 */
export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
  };
}

export function isValidLogLevel(level: string): level is LogLevel {
  return LOG_LEVELS.some((l) => l === level);
}
