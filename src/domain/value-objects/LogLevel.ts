export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error"];

export class LogLevelFilter {
  public static isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
  }

  public static parse(value: string): LogLevel {
    const normalized = value.trim().toLowerCase();
    if (!LogLevelFilter.isLogLevel(normalized)) {
      throw new Error(`Invalid log level "${value}". Must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    return normalized;
  }

  public static isEnabled(level: LogLevel, minimum: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimum);
  }
}
