import { LogRecord } from "../entities/LogRecord";

/**
 * Renders one record into the line text stored in a stream. Implementations
 * must be deterministic and keep the record's field order. Throwing drops
 * only the record being formatted.
 */
export interface Formatter {
  format(record: LogRecord): string;
}
