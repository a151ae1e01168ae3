import { LogRecord } from "../../domain/entities/LogRecord";
import { FlushTimeoutError, ShipperError } from "../../domain/errors/ShipperErrors";
import { PushClient } from "../../domain/services/PushClient";
import { LogLevelFilter } from "../../domain/value-objects/LogLevel";
import { NodeHttpPushClient } from "../../infrastructure/http/NodeHttpPushClient";
import { WinstonLogger } from "../../infrastructure/logging/WinstonLogger";
import { Logger } from "../interfaces/Logger";
import { ErrorContext, ResolvedShipperOptions, resolveShipperOptions, ShipperOptions } from "../ShipperOptions";
import { FlushScheduler, SchedulerStats } from "./FlushScheduler";
import { LogBuffer } from "./LogBuffer";
import { DeliveryResult, EMPTY_DELIVERY, LogShippingService } from "./LogShippingService";
import { PayloadEncoder } from "./PayloadEncoder";
import { StreamRouter } from "./StreamRouter";

export type ShipperLifecycle = "created" | "running" | "stopped";

export interface LogShipperDependencies {
  pushClient?: PushClient;
  logger?: Logger;
  clock?: () => number;
  random?: () => number;
}

export interface FlushOptions {
  /** Grace period; defaults to the shipper's `flushTimeoutMs`. */
  timeoutMs?: number;
}

export interface ShipperStats extends SchedulerStats {
  lifecycle: ShipperLifecycle;
}

/**
 * Entry point handed to the code that produces log records.
 *
 * ```ts
 * const shipper = new LogShipper({
 *   endpoint: "https://logs.example.com/loki/api/v1/push",
 *   labels: { app: "billing" },
 *   formatter: new LogfmtFormatter(),
 * });
 * shipper.start();
 * shipper.accept(LogRecord.create({ level: "info", message: "ready" }));
 * await shipper.shutdown();
 * ```
 */
export class LogShipper {
  private readonly options: ResolvedShipperOptions;
  private readonly logger: Logger;
  private readonly shipping: LogShippingService;
  private readonly scheduler: FlushScheduler;
  private lifecycle: ShipperLifecycle = "created";
  private shutdownPromise?: Promise<DeliveryResult>;

  constructor(options: ShipperOptions, dependencies: LogShipperDependencies = {}) {
    this.options = resolveShipperOptions(options);
    this.logger = dependencies.logger ?? new WinstonLogger({ level: "warn" });

    const pushClient = dependencies.pushClient ?? new NodeHttpPushClient({ tls: this.options.tls });
    this.shipping = new LogShippingService(
      {
        endpoint: this.options.endpoint,
        headers: this.options.headers,
        retry: this.options.retry,
        requestTimeoutMs: this.options.requestTimeoutMs,
        random: dependencies.random,
      },
      pushClient,
      this.logger
    );

    const buffer = new LogBuffer(
      this.options.labels,
      new StreamRouter(this.options.structuredLabels),
      this.options.formatter,
      dependencies.clock
    );

    this.scheduler = new FlushScheduler(
      buffer,
      new PayloadEncoder(this.options.compression),
      this.shipping,
      {
        maxLogs: this.options.maxLogs,
        maxLogLifetimeMs: this.options.maxLogLifetimeMs,
        capacity: this.options.capacity,
        onExhausted: this.options.onExhausted,
        maxRequeuedBatches: this.options.maxRequeuedBatches,
      },
      this.logger,
      (error, context) => this.reportError(error, context),
      dependencies.clock
    );
  }

  public get isRunning(): boolean {
    return this.lifecycle === "running";
  }

  public start(): void {
    if (this.lifecycle === "stopped") {
      throw new Error("Cannot start a shipper that has been shut down");
    }
    if (this.lifecycle === "running") return;

    this.lifecycle = "running";
    this.scheduler.start();
    this.logger.debug("Log shipper started", {
      endpoint: this.options.endpoint.toString(),
      labels: this.options.labels.toJSON(),
    });
  }

  /**
   * Buffers a record. Returns false when the record is filtered out by
   * level, fails to format, or arrives after shutdown. Throws CapacityError
   * only when the reject overflow policy is configured.
   */
  public accept(record: LogRecord): boolean {
    if (this.lifecycle === "stopped") {
      this.logger.debug("Ignoring record accepted after shutdown");
      return false;
    }
    if (!LogLevelFilter.isEnabled(record.level, this.options.level)) {
      return false;
    }
    return this.scheduler.accept(record).added;
  }

  /**
   * Seals what is buffered and waits for its delivery. On FlushTimeoutError
   * the delivery itself carries on in the background.
   */
  public flush(options: FlushOptions = {}): Promise<DeliveryResult> {
    if (this.lifecycle === "stopped") {
      return Promise.resolve({ ...EMPTY_DELIVERY });
    }
    return this.withTimeout(this.scheduler.flush(), options.timeoutMs ?? this.options.flushTimeoutMs);
  }

  /**
   * Stops the lifetime timer, delivers what is buffered and releases the
   * HTTP client. When the grace period elapses first, the in-flight request
   * is aborted and FlushTimeoutError is thrown.
   */
  public shutdown(options: FlushOptions = {}): Promise<DeliveryResult> {
    if (!this.shutdownPromise) {
      this.lifecycle = "stopped";
      this.scheduler.stop();
      this.shutdownPromise = this.runShutdown(options.timeoutMs ?? this.options.flushTimeoutMs);
    }
    return this.shutdownPromise;
  }

  public getStats(): ShipperStats {
    return { ...this.scheduler.getStats(), lifecycle: this.lifecycle };
  }

  private async runShutdown(timeoutMs: number): Promise<DeliveryResult> {
    try {
      const result = await this.withTimeout(this.scheduler.flush("shutdown"), timeoutMs);
      this.logger.debug("Log shipper shut down", { outcome: result.outcome });
      return result;
    } catch (error) {
      if (error instanceof FlushTimeoutError) {
        this.scheduler.abort();
      }
      throw error;
    } finally {
      this.shipping.close();
    }
  }

  private withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(new FlushTimeoutError(timeoutMs)), timeoutMs);
      work.then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  private reportError(error: ShipperError, context: ErrorContext): void {
    if (!this.options.onError) return;
    try {
      this.options.onError(error, context);
    } catch (hookError) {
      this.logger.error("Error hook threw", {
        error: hookError instanceof Error ? hookError.message : String(hookError),
      });
    }
  }
}
