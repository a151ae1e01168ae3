import { Logger, LogMeta } from "../../application/interfaces/Logger";
import { LogShipper } from "../../application/services/LogShipper";
import { FieldValue, LogRecord } from "../../domain/entities/LogRecord";
import { LogLevel } from "../../domain/value-objects/LogLevel";

export type RecordSink = Pick<LogShipper, "accept">;

export interface RemoteLoggerOptions {
  /** Written to the record's `target`, e.g. the component name. */
  target?: string;
}

function toFieldValue(value: unknown): FieldValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "bigint"
  ) {
    return value;
  }
  if (value === undefined) {
    return null;
  }
  if (value instanceof Error) {
    return value.message;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Logger that writes locally and also ships each call through a LogShipper.
 * Meta entries become record fields.
 */
export class RemoteLogger implements Logger {
  constructor(
    private readonly shipper: RecordSink,
    private readonly local: Logger,
    private readonly options: RemoteLoggerOptions = {}
  ) {}

  public info(message: string, meta?: LogMeta): void {
    this.local.info(message, meta);
    this.forward("info", message, meta);
  }

  public warn(message: string, meta?: LogMeta): void {
    this.local.warn(message, meta);
    this.forward("warn", message, meta);
  }

  public error(message: string, meta?: LogMeta): void {
    this.local.error(message, meta);
    this.forward("error", message, meta);
  }

  public debug(message: string, meta?: LogMeta): void {
    this.local.debug(message, meta);
    this.forward("debug", message, meta);
  }

  private forward(level: LogLevel, message: string, meta?: LogMeta): void {
    const fields: Array<[string, FieldValue]> = Object.entries(meta ?? {}).map(([key, value]) => [
      key,
      toFieldValue(value),
    ]);

    try {
      this.shipper.accept(
        LogRecord.create({ level, message, fields, target: this.options.target })
      );
    } catch (error) {
      // local only
      this.local.error("Failed to ship log record", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
