export { Logger, silentLogger } from "./logger";
export type { LogBindings } from "./logger";
export { createLoggerConfig, isValidLogLevel, LOG_LEVELS } from "./config";
export type { LoggerConfig, LogLevel, LogFormat } from "./config";
