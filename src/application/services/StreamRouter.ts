import { fieldValueToString, LogRecord } from "../../domain/entities/LogRecord";
import { LabelSet } from "../../domain/value-objects/LabelSet";
import { StructuredLabelOptions } from "../ShipperOptions";

/**
 * Resolves the label set a record belongs to. Only fields named in
 * `labelFields` become labels; every other field stays in the line text,
 * so a field sharing a name with a global label never changes the stream
 * it lands in.
 */
export class StreamRouter {
  private readonly labelFields: ReadonlySet<string>;

  constructor(private readonly options: StructuredLabelOptions) {
    this.labelFields = new Set(options.labelFields);
  }

  public route(record: LogRecord, globalLabels: LabelSet): LabelSet {
    if (!this.options.enabled || this.labelFields.size === 0) {
      return globalLabels;
    }

    const overrides: Record<string, string> = {};
    for (const [key, value] of record.fields) {
      if (this.labelFields.has(key) && !Object.prototype.hasOwnProperty.call(overrides, key)) {
        overrides[key] = fieldValueToString(value);
      }
    }

    return globalLabels.merge(overrides);
  }
}
