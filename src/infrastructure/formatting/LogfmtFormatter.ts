import { fieldValueToString, LogRecord } from "../../domain/entities/LogRecord";
import { Formatter } from "../../domain/services/Formatter";

/**
 * Which parts of a record are written, combined as bit flags:
 * `LogfmtFields.LEVEL | LogfmtFields.MESSAGE`.
 */
export enum LogfmtFields {
  LEVEL = 1,
  MESSAGE = 1 << 1,
  TARGET = 1 << 2,
  MODULE = 1 << 3,
  FILE = 1 << 4,
  LINE = 1 << 5,
  /** The record's structured fields, in insertion order. */
  FIELDS = 1 << 6,
}

export const DEFAULT_LOGFMT_FIELDS =
  LogfmtFields.LEVEL | LogfmtFields.MESSAGE | LogfmtFields.MODULE | LogfmtFields.FIELDS;

export interface LogfmtFormatterOptions {
  fields?: number;
  /** Write \n, \r and \t as escape sequences instead of raw characters. */
  escapeNewlines?: boolean;
}

const INVALID_KEY_CHARS = /[ ="]/g;
const CONTROL_CHAR = /[\u0000-\u001f\u007f-\u009f]/;

/**
 * Renders records as logfmt (`level=info message="disk full" module=store`).
 * The first occurrence of a key wins; later duplicates are skipped.
 */
export class LogfmtFormatter implements Formatter {
  private readonly fields: number;
  private readonly escapeNewlines: boolean;

  constructor(options: LogfmtFormatterOptions = {}) {
    this.fields = options.fields ?? DEFAULT_LOGFMT_FIELDS;
    this.escapeNewlines = options.escapeNewlines ?? false;
  }

  public format(record: LogRecord): string {
    const pairs: string[] = [];
    const used = new Set<string>();
    const write = (key: string, value: string) => {
      const pair = this.formatPair(key, value, used);
      if (pair !== null) pairs.push(pair);
    };

    if (this.includes(LogfmtFields.LEVEL)) {
      write("level", record.level);
    }
    if (this.includes(LogfmtFields.MESSAGE) && record.message !== "") {
      write("message", record.message);
    }
    if (this.includes(LogfmtFields.TARGET) && record.target) {
      write("target", record.target);
    }
    if (this.includes(LogfmtFields.MODULE) && record.module !== undefined) {
      write("module", record.module);
    }
    if (this.includes(LogfmtFields.FILE) && record.file !== undefined) {
      write("file", record.file);
    }
    if (this.includes(LogfmtFields.LINE) && record.line !== undefined) {
      write("line", String(record.line));
    }
    if (this.includes(LogfmtFields.FIELDS)) {
      for (const [key, value] of record.fields) {
        write(key, fieldValueToString(value));
      }
    }

    return pairs.join(" ");
  }

  private includes(field: LogfmtFields): boolean {
    return (this.fields & field) !== 0;
  }

  private formatPair(rawKey: string, value: string, used: Set<string>): string | null {
    const key = rawKey.replace(INVALID_KEY_CHARS, "") || "_";
    if (used.has(key)) {
      return null;
    }
    used.add(key);

    const { text, quoted } = this.escapeValue(value);
    return quoted ? `${key}="${text}"` : `${key}=${text}`;
  }

  private escapeValue(value: string): { text: string; quoted: boolean } {
    let text = "";
    let quoted = false;

    for (const chr of value) {
      switch (chr) {
        case "\\":
        case '"':
          quoted = true;
          text += `\\${chr}`;
          break;
        case " ":
        case "=":
          quoted = true;
          text += chr;
          break;
        case "\n":
        case "\r":
        case "\t":
          quoted = true;
          text += this.escapeNewlines ? JSON.stringify(chr).slice(1, -1) : chr;
          break;
        default:
          if (CONTROL_CHAR.test(chr)) {
            quoted = true;
            text += `\\u{${chr.codePointAt(0)?.toString(16) ?? "0"}}`;
          } else {
            text += chr;
          }
      }
    }

    return { text, quoted };
  }
}
