import * as winston from "winston";

export type LogContext = Record<string, unknown>;

const isProduction = process.env.NODE_ENV === "production";

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
  winston.format.printf(({ timestamp, level, message, namespace, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `[${String(timestamp)}] ${level} [${String(namespace)}]: ${String(message)}${metaStr}`;
  })
);

const baseLogger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: structuredFormat,
  defaultMeta: { service: "cycle-datalog" },
  transports: [
    new winston.transports.Console({
      format: isProduction ? structuredFormat : consoleFormat
    })
  ],
  silent: process.env.NODE_ENV === "test",
  exitOnError: false
});

export const setLogLevel = (level: string): void => {
  baseLogger.level = level;
};

export class Logger {
  private namespace: string;

  constructor(namespace: string) {
    this.namespace = namespace;
  }

  private meta(context?: LogContext): LogContext {
    return { namespace: this.namespace, ...context };
  }

  warn(message: string, context?: LogContext): void {
    baseLogger.warn(message, this.meta(context));
  }

  info(message: string, context?: LogContext): void {
    baseLogger.info(message, this.meta(context));
  }

  debug(message: string, context?: LogContext): void {
    baseLogger.debug(message, this.meta(context));
  }
}

export const createLogger = (namespace: string): Logger => new Logger(namespace);
