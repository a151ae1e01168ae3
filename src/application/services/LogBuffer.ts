import { Generation, SealedBatch } from "../../domain/entities/Generation";
import { LogRecord } from "../../domain/entities/LogRecord";
import { FormatError } from "../../domain/errors/ShipperErrors";
import { Formatter } from "../../domain/services/Formatter";
import { LabelSet } from "../../domain/value-objects/LabelSet";
import { StreamRouter } from "./StreamRouter";

export type AddOutcome =
  | { added: true; labels: LabelSet; timestamp: bigint }
  | { added: false; error: FormatError };

export interface LogBufferStats {
  generation: number;
  count: number;
  streams: number;
  formatErrors: number;
  trackedStreams: number;
  firstEntryAt?: number;
}

/**
 * Holds the live generation. Records are formatted when they are added so a
 * failing record is dropped on its own; the generation is swapped for an
 * empty one in a single synchronous step when sealed.
 */
export class LogBuffer {
  private live: Generation;
  private formatErrors = 0;
  // Last timestamp per label set, for the live and the last sealed generation
  private readonly lastTimestamps = new Map<string, bigint>();

  constructor(
    private readonly globalLabels: LabelSet,
    private readonly router: StreamRouter,
    private readonly formatter: Formatter,
    private readonly clock: () => number = Date.now
  ) {
    this.live = new Generation(1);
  }

  public add(record: LogRecord): AddOutcome {
    const labels = this.router.route(record, this.globalLabels);

    let line: string;
    try {
      line = this.formatter.format(record);
    } catch (error) {
      this.formatErrors++;
      return { added: false, error: new FormatError(error) };
    }

    const timestamp = this.live.append(
      labels,
      record.timestamp,
      line,
      this.clock(),
      this.lastTimestamps.get(labels.key)
    );
    this.lastTimestamps.set(labels.key, timestamp);
    return { added: true, labels, timestamp };
  }

  /**
   * Seals the live generation and installs a fresh one. Returns null, and
   * leaves the live generation in place, when there is nothing to seal.
   */
  public seal(): SealedBatch | null {
    if (this.live.isEmpty) {
      return null;
    }
    const sealed = this.live.seal(this.clock());
    this.live = new Generation(sealed.sequence + 1);
    this.forgetStreamsOutside(sealed);
    return sealed;
  }

  public get count(): number {
    return this.live.entryCount;
  }

  public get firstEntryAt(): number | undefined {
    return this.live.firstEntryAt;
  }

  public getStats(): LogBufferStats {
    return {
      generation: this.live.sequence,
      count: this.live.entryCount,
      streams: this.live.streamCount,
      formatErrors: this.formatErrors,
      trackedStreams: this.lastTimestamps.size,
      firstEntryAt: this.live.firstEntryAt,
    };
  }

  private forgetStreamsOutside(batch: SealedBatch): void {
    const kept = new Set(batch.streams.map((stream) => stream.labels.key));
    for (const key of this.lastTimestamps.keys()) {
      if (!kept.has(key)) {
        this.lastTimestamps.delete(key);
      }
    }
  }
}
