import winston from "winston";
import { Logger, LogMeta } from "../../application/interfaces/Logger";

export interface WinstonLoggerOptions {
  level?: string;
  /** Also write JSON lines to this file. */
  file?: string;
  silent?: boolean;
}

/**
 * Diagnostics for the shipper itself. Console output goes to stderr so it
 * never mixes with data a host process writes to stdout.
 */
export class WinstonLogger implements Logger {
  private readonly logger: winston.Logger;

  constructor(options: WinstonLoggerOptions = {}) {
    const transports: Array<winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance> = [
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            let logMessage = `${timestamp} [${level}]: ${message}`;
            if (Object.keys(meta).length > 0) {
              logMessage += ` ${JSON.stringify(meta)}`;
            }
            return logMessage;
          })
        ),
      }),
    ];

    if (options.file) {
      transports.push(
        new winston.transports.File({
          filename: options.file,
          format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.level ?? "info",
      silent: options.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports,
    });
  }

  public info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  public warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  public error(message: string, meta?: LogMeta): void {
    this.logger.error(message, meta);
  }

  public debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  public setLevel(level: string): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}
