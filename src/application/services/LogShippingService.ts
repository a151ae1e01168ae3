import { TransportError } from "../../domain/errors/ShipperErrors";
import { PushClient } from "../../domain/services/PushClient";
import { Logger } from "../interfaces/Logger";
import { RetryOptions } from "../ShipperOptions";
import { PushPayload } from "./PayloadEncoder";

export type DeliveryOutcome =
  | "delivered"
  | "empty"
  | "permanent-failure"
  | "retries-exhausted"
  | "aborted";

export interface DeliveryResult {
  success: boolean;
  outcome: DeliveryOutcome;
  batchId?: string;
  streams: number;
  entries: number;
  attempts: number;
  error?: TransportError;
  /** Set when the batch was kept for another delivery cycle. */
  requeued?: boolean;
}

export interface LogShippingServiceOptions {
  endpoint: URL;
  headers: Record<string, string>;
  retry: RetryOptions;
  requestTimeoutMs: number;
  random?: () => number;
}

export const EMPTY_DELIVERY: Readonly<DeliveryResult> = Object.freeze({
  success: true,
  outcome: "empty",
  streams: 0,
  entries: 0,
  attempts: 0,
});

class AbortedError extends Error {
  constructor() {
    super("Delivery aborted");
  }
}

/**
 * Sends push payloads. 2xx succeeds; 5xx, 408, 429 and network errors are
 * retried with exponential backoff until `maxAttempts`; any other status
 * fails the batch at once.
 */
export class LogShippingService {
  private readonly random: () => number;

  constructor(
    private readonly options: LogShippingServiceOptions,
    private readonly client: PushClient,
    private readonly logger: Logger
  ) {
    this.random = options.random ?? Math.random;
  }

  public async send(payload: PushPayload, signal?: AbortSignal): Promise<DeliveryResult> {
    const maxAttempts = this.options.retry.enabled ? this.options.retry.maxAttempts : 1;
    const base = { batchId: payload.batchId, streams: payload.streams, entries: payload.entries };
    let attempt = 0;

    while (true) {
      if (signal?.aborted) {
        return this.aborted(base, attempt);
      }
      attempt++;

      let error: TransportError;
      try {
        const response = await this.client.post({
          url: this.options.endpoint,
          headers: this.buildHeaders(payload),
          body: payload.body,
          timeoutMs: this.options.requestTimeoutMs,
          signal,
        });

        if (response.status >= 200 && response.status < 300) {
          if (attempt > 1) {
            this.logger.info(`Successfully shipped batch after ${attempt} attempts`, base);
          }
          return { ...base, success: true, outcome: "delivered", attempts: attempt };
        }
        error = TransportError.fromStatus(response.status, response.statusText, response.body);
      } catch (caught) {
        if (signal?.aborted) {
          return this.aborted(base, attempt);
        }
        error = TransportError.fromNetworkError(caught);
      }

      if (!error.retryable) {
        this.logger.error(`Failed to push batch of ${payload.entries} logs: ${error.message}; dropping`, base);
        return { ...base, success: false, outcome: "permanent-failure", attempts: attempt, error };
      }

      if (attempt >= maxAttempts) {
        this.logger.error(
          `Failed to push batch of ${payload.entries} logs: ${error.message}; exceeded ${maxAttempts} attempts`,
          base
        );
        return { ...base, success: false, outcome: "retries-exhausted", attempts: attempt, error };
      }

      const delay = this.backoff(attempt);
      this.logger.warn(
        `Failed to push batch of ${payload.entries} logs: ${error.message}; attempt ${attempt} of ${maxAttempts}, retrying in ${delay}ms`,
        base
      );

      try {
        await this.sleep(delay, signal);
      } catch (caught) {
        if (caught instanceof AbortedError) {
          return this.aborted(base, attempt);
        }
        throw caught;
      }
    }
  }

  public backoff(attempt: number): number {
    const { initialBackoffMs, multiplier, maxBackoffMs, jitter } = this.options.retry;
    const exponential = Math.min(initialBackoffMs * Math.pow(multiplier, attempt - 1), maxBackoffMs);
    const factor = jitter ? 0.5 + this.random() * 0.5 : 1;
    return Math.round(exponential * factor);
  }

  public close(): void {
    this.client.close();
  }

  private buildHeaders(payload: PushPayload): Record<string, string> {
    const headers: Record<string, string> = {
      ...this.options.headers,
      "Content-Type": payload.contentType,
    };
    if (payload.contentEncoding) {
      headers["Content-Encoding"] = payload.contentEncoding;
    }
    return headers;
  }

  private aborted(
    base: { batchId: string; streams: number; entries: number },
    attempts: number
  ): DeliveryResult {
    this.logger.warn(`Delivery of batch ${base.batchId} aborted after ${attempts} attempts`, base);
    return {
      ...base,
      success: false,
      outcome: "aborted",
      attempts,
      error: new TransportError("Delivery aborted", "permanent"),
    };
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortedError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new AbortedError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      timer.unref?.();
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
