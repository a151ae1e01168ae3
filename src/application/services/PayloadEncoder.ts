import { promisify } from "util";
import { gunzip, gzip } from "zlib";
import { SealedBatch } from "../../domain/entities/Generation";
import { CompressionMode } from "../ShipperOptions";

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

export const CONTENT_TYPE = "application/json";

export interface PushPayload {
  readonly body: Buffer;
  readonly contentType: typeof CONTENT_TYPE;
  readonly contentEncoding?: "gzip";
  readonly batchId: string;
  readonly streams: number;
  readonly entries: number;
  readonly uncompressedBytes: number;
}

export interface PushStream {
  stream: Record<string, string>;
  values: Array<[string, string]>;
}

export interface PushBody {
  streams: PushStream[];
}

/**
 * Builds the push API body for a sealed batch:
 *
 * ```json
 * {"streams":[{"stream":{"app":"web"},"values":[["1700000000000000000","level=info message=hi"]]}]}
 * ```
 *
 * Timestamps are rendered as decimal nanosecond strings. With gzip enabled
 * the whole document is wrapped in one gzip member.
 */
export class PayloadEncoder {
  constructor(private readonly compression: CompressionMode = "none") {}

  public toBody(batch: SealedBatch): PushBody {
    return {
      streams: batch.streams.map((stream) => ({
        stream: stream.labels.toJSON(),
        values: stream.entries.map(([timestamp, line]): [string, string] => [timestamp.toString(), line]),
      })),
    };
  }

  public async encode(batch: SealedBatch): Promise<PushPayload> {
    const json = Buffer.from(JSON.stringify(this.toBody(batch)), "utf8");
    const body = this.compression === "gzip" ? await gzipAsync(json) : json;

    return Object.freeze({
      body,
      contentType: CONTENT_TYPE,
      contentEncoding: this.compression === "gzip" ? "gzip" : undefined,
      batchId: batch.id,
      streams: batch.streams.length,
      entries: batch.entryCount,
      uncompressedBytes: json.length,
    });
  }

  /**
   * Reverses `encode`. Used for debugging and tests.
   */
  public static async decode(payload: Pick<PushPayload, "body" | "contentEncoding">): Promise<PushBody> {
    const raw = payload.contentEncoding === "gzip" ? await gunzipAsync(payload.body) : payload.body;
    const parsed: unknown = JSON.parse(raw.toString("utf8"));
    if (!PayloadEncoder.isPushBody(parsed)) {
      throw new Error("Payload is not a push API body");
    }
    return parsed;
  }

  private static isPushBody(value: unknown): value is PushBody {
    if (typeof value !== "object" || value === null || !("streams" in value)) {
      return false;
    }
    const { streams } = value;
    return (
      Array.isArray(streams) &&
      streams.every(
        (stream: unknown) =>
          typeof stream === "object" &&
          stream !== null &&
          "stream" in stream &&
          "values" in stream &&
          Array.isArray(stream.values)
      )
    );
  }
}
