/**
 * Pino-based structured logger
 * Pretty dev output or JSON lines, with optional EventBus mirroring.
 */

import pino from "pino";
import type { EventBus } from "../eventBus";
import { createLoggerConfig, LoggerConfig, LogLevel } from "./config";

export type LogBindings = Record<string, unknown>;

type EmittingLevel = Exclude<LogLevel, "silent">;

export class Logger {
  private logger: pino.Logger;
  private config: LoggerConfig;
  private eventBus?: EventBus;

  constructor(config: Partial<LoggerConfig> = {}, eventBus?: EventBus) {
    this.config = createLoggerConfig(config);
    this.eventBus = eventBus;
    this.logger = this.createPinoLogger();
  }

  private createPinoLogger(): pino.Logger {
    const source = this.config.source;
    const pinoConfig: pino.LoggerOptions = {
      level: this.config.level,
      formatters: {
        level: (label) => ({ level: label }),
        log: (obj) => (source ? { ...obj, source } : obj),
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
    };

    if (this.config.format === "pretty") {
      pinoConfig.transport = {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,source",
        },
      };
    }

    return pino(pinoConfig);
  }

  /**
   * Create a child logger with additional bindings
   */
  child(bindings: LogBindings): Logger {
    const childLogger = new Logger(this.config, this.eventBus);
    childLogger.logger = this.logger.child(bindings);
    return childLogger;
  }

  /**
   * Create a logger for a specific source (data-store, tool-registry, agent, ...)
   */
  static forSource(source: string, config: Partial<LoggerConfig> = {}, eventBus?: EventBus): Logger {
    return new Logger({ ...config, source }, eventBus);
  }

  trace(objOrMsg: LogBindings | string, msg?: string): void {
    this.write("trace", objOrMsg, msg);
  }

  debug(objOrMsg: LogBindings | string, msg?: string): void {
    this.write("debug", objOrMsg, msg);
  }

  info(objOrMsg: LogBindings | string, msg?: string): void {
    this.write("info", objOrMsg, msg);
  }

  warn(objOrMsg: LogBindings | string, msg?: string): void {
    this.write("warn", objOrMsg, msg);
  }

  error(objOrMsg: LogBindings | string, msg?: string): void {
    this.write("error", objOrMsg, msg);
  }

  fatal(objOrMsg: LogBindings | string, msg?: string): void {
    this.write("fatal", objOrMsg, msg);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.logger.isLevelEnabled(level);
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  private write(level: EmittingLevel, objOrMsg: LogBindings | string, msg?: string): void {
    if (typeof objOrMsg === "string") {
      this.logger[level](objOrMsg);
    } else {
      this.logger[level](objOrMsg, msg);
    }
    this.emitEvent(level, objOrMsg, msg);
  }

  /**
   * Mirror enabled log lines to the EventBus
   */
  private emitEvent(level: EmittingLevel, objOrMsg: LogBindings | string, msg?: string): void {
    if (!this.eventBus || !this.logger.isLevelEnabled(level)) return;

    this.eventBus.emit("LogEvent", {
      level,
      source: this.config.source,
      message: typeof objOrMsg === "string" ? objOrMsg : msg ?? "",
      data: typeof objOrMsg === "string" ? undefined : objOrMsg,
    });
  }
}

/**
 * Logger that writes nothing. Default for library components constructed without one.
 */
export function silentLogger(): Logger {
  return new Logger({ level: "silent" });
}
