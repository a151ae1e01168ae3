import { LogLevel } from "../value-objects/LogLevel";

export type FieldValue = string | number | boolean | bigint | null;

export type LogField = readonly [key: string, value: FieldValue];

export interface LogRecordProps {
  level: LogLevel;
  message: string;
  /** Nanoseconds since the Unix epoch. Defaults to the current wall clock. */
  timestamp?: bigint;
  fields?: Record<string, FieldValue> | ReadonlyArray<LogField>;
  target?: string;
  module?: string;
  file?: string;
  line?: number;
}

const NANOS_PER_MILLI = BigInt(1_000_000);

export function nowInNanos(clock: () => number = Date.now): bigint {
  return BigInt(clock()) * NANOS_PER_MILLI;
}

export class LogRecord {
  private constructor(
    private readonly _timestamp: bigint,
    private readonly _level: LogLevel,
    private readonly _message: string,
    private readonly _fields: ReadonlyArray<LogField>,
    private readonly _target?: string,
    private readonly _module?: string,
    private readonly _file?: string,
    private readonly _line?: number
  ) {
    Object.freeze(this);
  }

  public static create(props: LogRecordProps): LogRecord {
    const fields = LogRecord.toFields(props.fields);
    return new LogRecord(
      props.timestamp ?? nowInNanos(),
      props.level,
      props.message,
      fields,
      props.target,
      props.module,
      props.file,
      props.line
    );
  }

  public get timestamp(): bigint {
    return this._timestamp;
  }

  public get level(): LogLevel {
    return this._level;
  }

  public get message(): string {
    return this._message;
  }

  public get fields(): ReadonlyArray<LogField> {
    return this._fields;
  }

  public get target(): string | undefined {
    return this._target;
  }

  public get module(): string | undefined {
    return this._module;
  }

  public get file(): string | undefined {
    return this._file;
  }

  public get line(): number | undefined {
    return this._line;
  }

  public field(key: string): FieldValue | undefined {
    const found = this._fields.find(([name]) => name === key);
    return found ? found[1] : undefined;
  }

  private static toFields(
    fields: Record<string, FieldValue> | ReadonlyArray<LogField> | undefined
  ): ReadonlyArray<LogField> {
    if (!fields) {
      return Object.freeze([]);
    }
    const entries: LogField[] = LogRecord.isFieldList(fields)
      ? fields.map(([key, value]) => Object.freeze([key, value] as const))
      : Object.entries(fields).map(([key, value]) => Object.freeze([key, value] as const));
    return Object.freeze(entries);
  }

  private static isFieldList(
    fields: Record<string, FieldValue> | ReadonlyArray<LogField>
  ): fields is ReadonlyArray<LogField> {
    return Array.isArray(fields);
  }
}

export function fieldValueToString(value: FieldValue): string {
  if (value === null) {
    return "null";
  }
  return typeof value === "string" ? value : String(value);
}
