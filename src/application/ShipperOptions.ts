import { LogRecord } from "../domain/entities/LogRecord";
import { ConfigError, ShipperError } from "../domain/errors/ShipperErrors";
import { Formatter } from "../domain/services/Formatter";
import { LabelSet } from "../domain/value-objects/LabelSet";
import { LogLevel, LogLevelFilter } from "../domain/value-objects/LogLevel";

export type CompressionMode = "none" | "gzip";

/** What `accept()` does once the buffered entry ceiling is reached. */
export type OverflowPolicy = "reject" | "flush";

/**
 * What happens to a batch whose retries are exhausted. Requeued batches are
 * sent again ahead of the next batch, on `flush()`, at shutdown, or once
 * `maxLogLifetimeMs` passes with nothing else sent.
 */
export type ExhaustedPolicy = "drop" | "requeue";

export interface TlsOptions {
  cert?: string | Buffer;
  key?: string | Buffer;
  ca?: string | Buffer | Array<string | Buffer>;
  passphrase?: string;
  rejectUnauthorized?: boolean;
}

export interface RetryOptions {
  enabled: boolean;
  /** Total attempts per batch, the first one included. */
  maxAttempts: number;
  initialBackoffMs: number;
  maxBackoffMs: number;
  multiplier: number;
  jitter: boolean;
}

export interface StructuredLabelOptions {
  enabled: boolean;
  /** Record fields promoted into the stream's label set. */
  labelFields: string[];
}

export interface CapacityOptions {
  maxBufferedEntries: number;
  overflow: OverflowPolicy;
}

export interface ErrorContext {
  batchId?: string;
  entries?: number;
  record?: LogRecord;
}

export type ErrorHook = (error: ShipperError, context: ErrorContext) => void;

export interface ShipperOptions {
  endpoint: string | URL;
  labels: Record<string, string>;
  /** Required; leaving it out is reported as a ConfigError. */
  formatter?: Formatter;
  maxLogs?: number;
  maxLogLifetimeMs?: number;
  headers?: Record<string, string>;
  tls?: TlsOptions;
  compression?: CompressionMode;
  level?: LogLevel;
  structuredLabels?: Partial<StructuredLabelOptions>;
  capacity?: { maxBufferedEntries: number; overflow?: OverflowPolicy };
  retry?: Partial<RetryOptions>;
  onExhausted?: ExhaustedPolicy;
  maxRequeuedBatches?: number;
  requestTimeoutMs?: number;
  flushTimeoutMs?: number;
  onError?: ErrorHook;
}

export interface ResolvedShipperOptions {
  endpoint: URL;
  labels: LabelSet;
  formatter: Formatter;
  maxLogs: number;
  maxLogLifetimeMs: number;
  headers: Record<string, string>;
  tls?: TlsOptions;
  compression: CompressionMode;
  level: LogLevel;
  structuredLabels: StructuredLabelOptions;
  capacity?: CapacityOptions;
  retry: RetryOptions;
  onExhausted: ExhaustedPolicy;
  maxRequeuedBatches: number;
  requestTimeoutMs: number;
  flushTimeoutMs: number;
  onError?: ErrorHook;
}

export const DEFAULT_RETRY_OPTIONS: Readonly<RetryOptions> = Object.freeze({
  enabled: true,
  maxAttempts: 7,
  initialBackoffMs: 1000,
  maxBackoffMs: 60000,
  multiplier: 2,
  jitter: true,
});

export const DEFAULTS: Readonly<{
  maxLogs: number;
  maxLogLifetimeMs: number;
  compression: CompressionMode;
  level: LogLevel;
  onExhausted: ExhaustedPolicy;
  maxRequeuedBatches: number;
  requestTimeoutMs: number;
  flushTimeoutMs: number;
}> = Object.freeze({
  maxLogs: 4096,
  maxLogLifetimeMs: 300000,
  compression: "none",
  level: "trace",
  onExhausted: "drop",
  maxRequeuedBatches: 10,
  requestTimeoutMs: 30000,
  flushTimeoutMs: 30000,
});

// Headers the encoder owns
const RESERVED_HEADERS = ["content-type", "content-encoding", "content-length"];

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

function isPositiveDuration(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function parseEndpoint(endpoint: string | URL, problems: string[]): URL | undefined {
  let url: URL;
  try {
    url = typeof endpoint === "string" ? new URL(endpoint) : endpoint;
  } catch {
    problems.push(`endpoint "${String(endpoint)}" is not a valid URL`);
    return undefined;
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    problems.push(`endpoint must use http or https, got ${url.protocol}`);
    return undefined;
  }
  return url;
}

/**
 * Applies defaults and checks every option, throwing one ConfigError that
 * lists all problems found.
 */
export function resolveShipperOptions(options: ShipperOptions): ResolvedShipperOptions {
  const problems: string[] = [];

  const endpoint = parseEndpoint(options.endpoint, problems);

  const labelEntries = Object.entries(options.labels ?? {});
  const labelProblems = LabelSet.validate(labelEntries);
  problems.push(...labelProblems.map((problem) => `labels: ${problem}`));

  const formatter = options.formatter;
  if (!formatter || typeof formatter.format !== "function") {
    problems.push("a formatter must be provided");
  }

  const maxLogs = options.maxLogs ?? DEFAULTS.maxLogs;
  if (!isPositiveInteger(maxLogs)) {
    problems.push("maxLogs must be a positive integer");
  }

  const maxLogLifetimeMs = options.maxLogLifetimeMs ?? DEFAULTS.maxLogLifetimeMs;
  if (!isPositiveDuration(maxLogLifetimeMs)) {
    problems.push("maxLogLifetimeMs must be positive");
  }

  const headers: Record<string, string> = { ...(options.headers ?? {}) };
  for (const name of Object.keys(headers)) {
    if (RESERVED_HEADERS.includes(name.toLowerCase())) {
      problems.push(`header "${name}" is set by the shipper and cannot be overridden`);
    }
  }

  const tls = options.tls;
  if (tls) {
    if (endpoint && endpoint.protocol !== "https:") {
      problems.push("tls options require an https endpoint");
    }
    if ((tls.cert === undefined) !== (tls.key === undefined)) {
      problems.push("tls client identity needs both cert and key");
    }
  }

  const compression = options.compression ?? DEFAULTS.compression;
  if (compression !== "none" && compression !== "gzip") {
    problems.push(`compression must be "none" or "gzip", got "${String(compression)}"`);
  }

  const level = options.level ?? DEFAULTS.level;
  if (!LogLevelFilter.isLogLevel(level)) {
    problems.push(`invalid level "${String(level)}"`);
  }

  const structuredLabels: StructuredLabelOptions = {
    enabled: options.structuredLabels?.enabled ?? false,
    labelFields: [...(options.structuredLabels?.labelFields ?? [])],
  };
  if (structuredLabels.enabled) {
    if (structuredLabels.labelFields.length === 0) {
      problems.push("structuredLabels.enabled requires at least one label field");
    }
    const fieldProblems = LabelSet.validate(structuredLabels.labelFields.map((name): [string, string] => [name, ""]));
    problems.push(
      ...fieldProblems
        .filter((problem) => problem.startsWith("invalid label name"))
        .map((problem) => `structuredLabels: ${problem}`)
    );
  }

  let capacity: CapacityOptions | undefined;
  if (options.capacity) {
    capacity = {
      maxBufferedEntries: options.capacity.maxBufferedEntries,
      overflow: options.capacity.overflow ?? "reject",
    };
    if (!isPositiveInteger(capacity.maxBufferedEntries)) {
      problems.push("capacity.maxBufferedEntries must be a positive integer");
    } else if (capacity.overflow === "reject" && capacity.maxBufferedEntries < maxLogs) {
      problems.push("capacity.maxBufferedEntries is below maxLogs, so the count threshold can never be reached");
    }
    if (capacity.overflow !== "reject" && capacity.overflow !== "flush") {
      problems.push(`capacity.overflow must be "reject" or "flush"`);
    }
  }

  const retry: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...(options.retry ?? {}) };
  if (!isPositiveInteger(retry.maxAttempts)) {
    problems.push("retry.maxAttempts must be a positive integer");
  }
  if (!(retry.initialBackoffMs >= 0)) {
    problems.push("retry.initialBackoffMs must not be negative");
  }
  if (!(retry.maxBackoffMs >= retry.initialBackoffMs)) {
    problems.push("retry.maxBackoffMs must be at least retry.initialBackoffMs");
  }
  if (!(retry.multiplier >= 1)) {
    problems.push("retry.multiplier must be at least 1");
  }

  const onExhausted = options.onExhausted ?? DEFAULTS.onExhausted;
  if (onExhausted !== "drop" && onExhausted !== "requeue") {
    problems.push(`onExhausted must be "drop" or "requeue"`);
  }

  const maxRequeuedBatches = options.maxRequeuedBatches ?? DEFAULTS.maxRequeuedBatches;
  if (!isPositiveInteger(maxRequeuedBatches)) {
    problems.push("maxRequeuedBatches must be a positive integer");
  }

  const requestTimeoutMs = options.requestTimeoutMs ?? DEFAULTS.requestTimeoutMs;
  if (!isPositiveDuration(requestTimeoutMs)) {
    problems.push("requestTimeoutMs must be positive");
  }

  const flushTimeoutMs = options.flushTimeoutMs ?? DEFAULTS.flushTimeoutMs;
  if (!isPositiveDuration(flushTimeoutMs)) {
    problems.push("flushTimeoutMs must be positive");
  }

  if (problems.length > 0 || !endpoint || !formatter) {
    throw new ConfigError(problems);
  }

  return {
    endpoint,
    labels: LabelSet.create(labelEntries),
    formatter,
    maxLogs,
    maxLogLifetimeMs,
    headers,
    tls,
    compression,
    level,
    structuredLabels,
    capacity,
    retry,
    onExhausted,
    maxRequeuedBatches,
    requestTimeoutMs,
    flushTimeoutMs,
    onError: options.onError,
  };
}
