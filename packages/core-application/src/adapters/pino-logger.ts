import pino from "pino";
import type { Logger as PinoLogger } from "pino";

import type { LogContext, Logger } from "../ports/logger";
import type { LogLevel } from "../config/inventory-config";

export type PinoLoggerOptions = {
  level?: LogLevel;
  name?: string;
};

class PinoLoggerAdapter implements Logger {
  constructor(private readonly pinoLogger: PinoLogger) {}

  debug(message: string, context?: LogContext): void {
    if (context) this.pinoLogger.debug(context, message);
    else this.pinoLogger.debug(message);
  }

  info(message: string, context?: LogContext): void {
    if (context) this.pinoLogger.info(context, message);
    else this.pinoLogger.info(message);
  }

  warn(message: string, context?: LogContext): void {
    if (context) this.pinoLogger.warn(context, message);
    else this.pinoLogger.warn(message);
  }

  error(message: string, context?: LogContext): void {
    if (context) this.pinoLogger.error(context, message);
    else this.pinoLogger.error(message);
  }
}

export function createPinoLogger(options: PinoLoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  return new PinoLoggerAdapter(
    pino({
      name: options.name ?? "file-inventory",
      level,
    })
  );
}
