import { SealedBatch } from "../../domain/entities/Generation";
import { LogRecord } from "../../domain/entities/LogRecord";
import { CapacityError, ShipperError, TransportError } from "../../domain/errors/ShipperErrors";
import { GenerationState, GenerationStateValidator } from "../../domain/value-objects/GenerationState";
import { Logger } from "../interfaces/Logger";
import { CapacityOptions, ErrorContext, ExhaustedPolicy } from "../ShipperOptions";
import { AddOutcome, LogBuffer } from "./LogBuffer";
import { DeliveryResult, EMPTY_DELIVERY, LogShippingService } from "./LogShippingService";
import { PayloadEncoder } from "./PayloadEncoder";

export type SealReason = "count" | "lifetime" | "capacity" | "flush" | "shutdown";

export interface FlushSchedulerOptions {
  maxLogs: number;
  maxLogLifetimeMs: number;
  capacity?: CapacityOptions;
  onExhausted: ExhaustedPolicy;
  maxRequeuedBatches: number;
}

export interface SchedulerStats {
  state: GenerationState;
  running: boolean;
  generation: number;
  bufferedEntries: number;
  bufferedStreams: number;
  pendingBatches: number;
  pendingEntries: number;
  requeuedBatches: number;
  deliveredBatches: number;
  deliveredEntries: number;
  failedBatches: number;
  droppedEntries: number;
  formatErrors: number;
}

export type ErrorReporter = (error: ShipperError, context: ErrorContext) => void;

/**
 * Decides when the live generation is sealed and runs delivery.
 *
 * Producers only ever touch the buffer synchronously. Sealed batches go
 * through a single promise chain, so batch N settles before batch N+1 is
 * encoded and sent, and a new generation keeps filling meanwhile.
 */
export class FlushScheduler {
  private state = GenerationState.IDLE;
  private running = false;
  private timer?: NodeJS.Timeout;
  private retryTimer?: NodeJS.Timeout;
  private tail: Promise<void> = Promise.resolve();
  private readonly abortController = new AbortController();
  private readonly requeued: SealedBatch[] = [];

  private pendingBatches = 0;
  private pendingEntries = 0;
  private deliveredBatches = 0;
  private deliveredEntries = 0;
  private failedBatches = 0;
  private droppedEntries = 0;

  constructor(
    private readonly buffer: LogBuffer,
    private readonly encoder: PayloadEncoder,
    private readonly shipping: LogShippingService,
    private readonly options: FlushSchedulerOptions,
    private readonly logger: Logger,
    private readonly report: ErrorReporter,
    private readonly clock: () => number = Date.now
  ) {}

  public start(): void {
    if (this.running) return;
    this.running = true;

    const firstEntryAt = this.buffer.firstEntryAt;
    if (firstEntryAt !== undefined) {
      const elapsed = this.clock() - firstEntryAt;
      this.armTimer(Math.max(0, this.options.maxLogLifetimeMs - elapsed));
    }
    if (this.requeued.length > 0) {
      this.armRetryTimer();
    }
  }

  public stop(): void {
    this.running = false;
    this.clearTimer();
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
  }

  /**
   * Cancels the in-flight request and any backoff wait.
   */
  public abort(): void {
    this.abortController.abort();
  }

  public accept(record: LogRecord): AddOutcome {
    this.enforceCapacity();

    const outcome = this.buffer.add(record);
    if (!outcome.added) {
      this.logger.warn(outcome.error.message, { level: record.level });
      this.report(outcome.error, { record });
      return outcome;
    }

    if (this.state === GenerationState.IDLE) {
      this.transition(GenerationState.ACCUMULATING);
      if (this.running) {
        this.armTimer(this.options.maxLogLifetimeMs);
      }
    }

    if (this.buffer.count >= this.options.maxLogs) {
      this.sealInBackground("count");
    } else if (this.lifetimeElapsed()) {
      this.sealInBackground("lifetime");
    }

    return outcome;
  }

  /**
   * Seals the live generation and resolves once its delivery, and every
   * delivery queued before it, has settled. With nothing buffered it only
   * waits for deliveries already queued.
   */
  public flush(reason: SealReason = "flush"): Promise<DeliveryResult> {
    const batch = this.seal(reason);
    if (batch) {
      return this.dispatch(batch);
    }
    return this.enqueue(async () => {
      await this.deliverRequeued();
      return { ...EMPTY_DELIVERY };
    });
  }

  public getStats(): SchedulerStats {
    const bufferStats = this.buffer.getStats();
    return {
      state: this.state,
      running: this.running,
      generation: bufferStats.generation,
      bufferedEntries: bufferStats.count,
      bufferedStreams: bufferStats.streams,
      pendingBatches: this.pendingBatches,
      pendingEntries: this.pendingEntries,
      requeuedBatches: this.requeued.length,
      deliveredBatches: this.deliveredBatches,
      deliveredEntries: this.deliveredEntries,
      failedBatches: this.failedBatches,
      droppedEntries: this.droppedEntries,
      formatErrors: bufferStats.formatErrors,
    };
  }

  private enforceCapacity(): void {
    const capacity = this.options.capacity;
    if (!capacity) return;

    if (capacity.overflow === "reject") {
      const buffered = this.buffer.count + this.pendingEntries;
      if (buffered >= capacity.maxBufferedEntries) {
        throw new CapacityError(capacity.maxBufferedEntries, buffered);
      }
      return;
    }

    // Only the live generation counts towards the ceiling here
    if (this.buffer.count >= capacity.maxBufferedEntries) {
      this.sealInBackground("capacity");
    }
  }

  private lifetimeElapsed(): boolean {
    const firstEntryAt = this.buffer.firstEntryAt;
    return firstEntryAt !== undefined && this.clock() - firstEntryAt >= this.options.maxLogLifetimeMs;
  }

  private seal(reason: SealReason): SealedBatch | null {
    this.clearTimer();
    const batch = this.buffer.seal();
    if (!batch) {
      return null;
    }

    this.transition(GenerationState.SEALING);
    this.logger.debug(`Sealed generation ${batch.sequence}`, {
      reason,
      batchId: batch.id,
      entries: batch.entryCount,
      streams: batch.streams.length,
    });
    this.transition(GenerationState.IDLE);
    return batch;
  }

  private sealInBackground(reason: SealReason): void {
    const batch = this.seal(reason);
    if (!batch) return;
    this.dispatch(batch).catch((error) => {
      this.logger.error("Unexpected failure while delivering batch", {
        batchId: batch.id,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  private dispatch(batch: SealedBatch): Promise<DeliveryResult> {
    this.pendingBatches++;
    this.pendingEntries += batch.entryCount;
    return this.enqueue(async () => {
      await this.deliverRequeued();
      return this.deliver(batch);
    });
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const run = this.tail.then(work);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async deliverRequeued(): Promise<void> {
    const batches = this.requeued.splice(0, this.requeued.length);
    for (const batch of batches) {
      this.logger.info(`Retrying requeued batch ${batch.id}`, { entries: batch.entryCount });
      await this.deliver(batch);
    }
  }

  private async deliver(batch: SealedBatch): Promise<DeliveryResult> {
    let result: DeliveryResult;
    try {
      const payload = await this.encoder.encode(batch);
      result = await this.shipping.send(payload, this.abortController.signal);
    } catch (error) {
      result = {
        success: false,
        outcome: "permanent-failure",
        batchId: batch.id,
        streams: batch.streams.length,
        entries: batch.entryCount,
        attempts: 0,
        error: new TransportError(
          `Failed to encode batch: ${error instanceof Error ? error.message : String(error)}`,
          "permanent",
          undefined,
          { cause: error }
        ),
      };
    }

    return this.settle(batch, result);
  }

  private settle(batch: SealedBatch, result: DeliveryResult): DeliveryResult {
    if (result.success) {
      this.release(batch);
      this.deliveredBatches++;
      this.deliveredEntries += batch.entryCount;
      return result;
    }

    if (result.outcome === "retries-exhausted" && this.options.onExhausted === "requeue") {
      this.requeued.push(batch);
      this.logger.warn(`Requeued batch ${batch.id} after exhausting retries`, { entries: batch.entryCount });
      this.trimRequeued();
      this.armRetryTimer();
      return { ...result, requeued: true };
    }

    this.release(batch);
    this.failedBatches++;
    this.droppedEntries += batch.entryCount;
    if (result.error) {
      this.report(result.error, { batchId: batch.id, entries: batch.entryCount });
    }
    return result;
  }

  private trimRequeued(): void {
    while (this.requeued.length > this.options.maxRequeuedBatches) {
      const dropped = this.requeued.shift();
      if (!dropped) return;
      this.release(dropped);
      this.failedBatches++;
      this.droppedEntries += dropped.entryCount;
      this.logger.error(`Dropped requeued batch ${dropped.id}; more than ${this.options.maxRequeuedBatches} batches waiting`, {
        entries: dropped.entryCount,
      });
      this.report(
        new TransportError(`Requeue limit reached, dropped batch ${dropped.id}`, "permanent"),
        { batchId: dropped.id, entries: dropped.entryCount }
      );
    }
  }

  private release(batch: SealedBatch): void {
    this.pendingBatches--;
    this.pendingEntries -= batch.entryCount;
  }

  private armTimer(delayMs: number): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.sealInBackground("lifetime");
    }, delayMs);
    this.timer.unref?.();
  }

  /**
   * Requeued batches also go out ahead of the next dispatch or flush; this
   * covers a shipper that receives nothing more.
   */
  private armRetryTimer(): void {
    if (!this.running || this.retryTimer) return;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      this.enqueue(() => this.deliverRequeued()).catch((error) => {
        this.logger.error("Unexpected failure while retrying requeued batches", {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.options.maxLogLifetimeMs);
    this.retryTimer.unref?.();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private transition(to: GenerationState): void {
    if (!GenerationStateValidator.isValidTransition(this.state, to)) {
      throw new Error(`Invalid generation state transition from ${this.state} to ${to}`);
    }
    this.state = to;
  }
}
