import { Formatter } from "../domain/services/Formatter";
import { PushClient } from "../domain/services/PushClient";
import { LogLevel } from "../domain/value-objects/LogLevel";
import { Logger } from "./interfaces/Logger";
import { LogShipper, LogShipperDependencies } from "./services/LogShipper";
import {
  CompressionMode,
  ErrorHook,
  ExhaustedPolicy,
  OverflowPolicy,
  RetryOptions,
  ShipperOptions,
  TlsOptions,
} from "./ShipperOptions";

/**
 * Fluent construction of a LogShipper. Nothing is checked until `build()`,
 * which reports every invalid option in a single ConfigError.
 *
 * ```ts
 * const shipper = ShipperBuilder.create("http://localhost:3100/loki/api/v1/push")
 *   .label("app", "billing")
 *   .formatter(new LogfmtFormatter())
 *   .maxLogs(1000)
 *   .build();
 * ```
 */
export class ShipperBuilder {
  private readonly labels: Record<string, string> = {};
  private readonly headers: Record<string, string> = {};
  private options: Partial<Omit<ShipperOptions, "labels" | "headers">> = {};
  private readonly dependencies: LogShipperDependencies = {};

  private constructor(private readonly endpoint: string | URL) {}

  public static create(endpoint: string | URL): ShipperBuilder {
    return new ShipperBuilder(endpoint);
  }

  public label(name: string, value: string): this {
    this.labels[name] = value;
    return this;
  }

  public labelsFrom(labels: Record<string, string>): this {
    Object.assign(this.labels, labels);
    return this;
  }

  public addHeader(name: string, value: string): this {
    this.headers[name] = value;
    return this;
  }

  public formatter(formatter: Formatter): this {
    return this.set({ formatter });
  }

  public maxLogs(maxLogs: number): this {
    return this.set({ maxLogs });
  }

  public maxLogLifetime(ms: number): this {
    return this.set({ maxLogLifetimeMs: ms });
  }

  public level(level: LogLevel): this {
    return this.set({ level });
  }

  public tls(tls: TlsOptions): this {
    return this.set({ tls });
  }

  public compression(compression: CompressionMode): this {
    return this.set({ compression });
  }

  public retry(retry: Partial<RetryOptions>): this {
    return this.set({ retry: { ...this.options.retry, ...retry } });
  }

  public disableRetry(): this {
    return this.retry({ enabled: false });
  }

  /** What happens to a batch whose retries are exhausted, and how many may wait. */
  public failurePolicy(onExhausted: ExhaustedPolicy, maxRequeuedBatches?: number): this {
    return this.set({ onExhausted, maxRequeuedBatches });
  }

  public capacity(maxBufferedEntries: number, overflow: OverflowPolicy = "reject"): this {
    return this.set({ capacity: { maxBufferedEntries, overflow } });
  }

  public structuredLabels(labelFields: string[]): this {
    return this.set({ structuredLabels: { enabled: true, labelFields } });
  }

  public timeouts(timeouts: { requestTimeoutMs?: number; flushTimeoutMs?: number }): this {
    return this.set(timeouts);
  }

  public onError(hook: ErrorHook): this {
    return this.set({ onError: hook });
  }

  public logger(logger: Logger): this {
    this.dependencies.logger = logger;
    return this;
  }

  public pushClient(client: PushClient): this {
    this.dependencies.pushClient = client;
    return this;
  }

  public clock(clock: () => number): this {
    this.dependencies.clock = clock;
    return this;
  }

  public toOptions(): ShipperOptions {
    return {
      ...this.options,
      endpoint: this.endpoint,
      labels: { ...this.labels },
      headers: { ...this.headers },
    };
  }

  /** Returns a shipper that is already started. */
  public build(): LogShipper {
    const shipper = new LogShipper(this.toOptions(), { ...this.dependencies });
    shipper.start();
    return shipper;
  }

  private set(options: Partial<Omit<ShipperOptions, "labels" | "headers">>): this {
    this.options = { ...this.options, ...options };
    return this;
  }
}
