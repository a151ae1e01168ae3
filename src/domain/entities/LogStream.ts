import { LabelSet } from "../value-objects/LabelSet";

export type StreamEntry = readonly [timestamp: bigint, line: string];

/**
 * Entries for one label set within one generation. Timestamps are kept
 * strictly increasing: a colliding or earlier timestamp is moved to 1ns
 * after the previous entry.
 */
export class LogStream {
  private readonly _entries: StreamEntry[] = [];
  private _lastTimestamp?: bigint;

  constructor(private readonly _labels: LabelSet, previousTimestamp?: bigint) {
    this._lastTimestamp = previousTimestamp;
  }

  public append(timestamp: bigint, line: string): bigint {
    const assigned =
      this._lastTimestamp !== undefined && timestamp <= this._lastTimestamp
        ? this._lastTimestamp + BigInt(1)
        : timestamp;
    this._entries.push(Object.freeze([assigned, line] as const));
    this._lastTimestamp = assigned;
    return assigned;
  }

  public get labels(): LabelSet {
    return this._labels;
  }

  public get entries(): ReadonlyArray<StreamEntry> {
    return this._entries;
  }

  public get size(): number {
    return this._entries.length;
  }

  public get lastTimestamp(): bigint | undefined {
    return this._lastTimestamp;
  }
}
