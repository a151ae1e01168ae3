import { FieldValue, LogRecord } from "../../domain/entities/LogRecord";
import { Formatter } from "../../domain/services/Formatter";

type JsonScalar = string | number | boolean | null;

function toJsonValue(value: FieldValue): JsonScalar {
  return typeof value === "bigint" ? value.toString() : value;
}

/**
 * One JSON object per line. Record attributes come first, then the
 * structured fields; a field never replaces an attribute.
 */
export class JsonFormatter implements Formatter {
  public format(record: LogRecord): string {
    const line: Record<string, JsonScalar> = {
      level: record.level,
      message: record.message,
    };
    if (record.target !== undefined) line.target = record.target;
    if (record.module !== undefined) line.module = record.module;
    if (record.file !== undefined) line.file = record.file;
    if (record.line !== undefined) line.line = record.line;

    for (const [key, value] of record.fields) {
      if (!Object.prototype.hasOwnProperty.call(line, key)) {
        line[key] = toJsonValue(value);
      }
    }

    return JSON.stringify(line);
  }
}
