import { randomBytes } from "crypto";
import { LabelSet } from "../value-objects/LabelSet";
import { LogStream, StreamEntry } from "./LogStream";

export interface SealedStream {
  readonly labels: LabelSet;
  readonly entries: ReadonlyArray<StreamEntry>;
}

export interface SealedBatch {
  readonly id: string;
  readonly sequence: number;
  readonly streams: ReadonlyArray<SealedStream>;
  readonly entryCount: number;
  readonly firstEntryAt: number;
  readonly sealedAt: number;
}

/**
 * One buffering cycle. Accumulates entries per label set until it is
 * sealed, after which it only exists as the SealedBatch it produced.
 */
export class Generation {
  private readonly streams = new Map<string, LogStream>();
  private _entryCount = 0;
  private _firstEntryAt?: number;
  private _sealed = false;

  constructor(public readonly sequence: number) {}

  public append(
    labels: LabelSet,
    timestamp: bigint,
    line: string,
    acceptedAt: number,
    previousTimestamp?: bigint
  ): bigint {
    if (this._sealed) {
      throw new Error(`Generation ${this.sequence} is sealed`);
    }

    let stream = this.streams.get(labels.key);
    if (!stream) {
      stream = new LogStream(labels, previousTimestamp);
      this.streams.set(labels.key, stream);
    }

    const assigned = stream.append(timestamp, line);
    this._entryCount++;
    if (this._firstEntryAt === undefined) {
      this._firstEntryAt = acceptedAt;
    }
    return assigned;
  }

  public seal(sealedAt: number): SealedBatch {
    if (this._sealed) {
      throw new Error(`Generation ${this.sequence} is already sealed`);
    }
    this._sealed = true;

    const streams = Array.from(this.streams.values()).map((stream) =>
      Object.freeze({ labels: stream.labels, entries: Object.freeze([...stream.entries]) })
    );

    return Object.freeze({
      id: `batch_${this.sequence}_${randomBytes(4).toString("hex")}`,
      sequence: this.sequence,
      streams: Object.freeze(streams),
      entryCount: this._entryCount,
      firstEntryAt: this._firstEntryAt ?? sealedAt,
      sealedAt,
    });
  }

  public get entryCount(): number {
    return this._entryCount;
  }

  public get streamCount(): number {
    return this.streams.size;
  }

  public get firstEntryAt(): number | undefined {
    return this._firstEntryAt;
  }

  public get isEmpty(): boolean {
    return this._entryCount === 0;
  }

  public get isSealed(): boolean {
    return this._sealed;
  }
}
