import * as dotenv from "dotenv";
import { readFileSync } from "fs";
import {
  CompressionMode,
  ExhaustedPolicy,
  OverflowPolicy,
  RetryOptions,
  ShipperOptions,
  TlsOptions,
} from "../../application/ShipperOptions";
import { ConfigError } from "../../domain/errors/ShipperErrors";
import { Formatter } from "../../domain/services/Formatter";
import { LogLevel, LogLevelFilter } from "../../domain/value-objects/LogLevel";
import { JsonFormatter } from "../formatting/JsonFormatter";
import { LogfmtFormatter } from "../formatting/LogfmtFormatter";

export type FormatName = "logfmt" | "json";

export interface AppConfig {
  shipper: {
    endpoint: string;
    labels: Record<string, string>;
    headers: Record<string, string>;
    format: FormatName;
    maxLogs?: number;
    maxLogLifetimeMs?: number;
    compression?: CompressionMode;
    level?: LogLevel;
    labelFields: string[];
    capacity?: { maxBufferedEntries: number; overflow?: OverflowPolicy };
    retry: Partial<RetryOptions>;
    onExhausted?: ExhaustedPolicy;
    tls?: TlsOptions;
  };
  logging: {
    level: string;
    file?: string;
  };
}

type Env = Record<string, string | undefined>;
type FileReader = (path: string) => Buffer;

/**
 * Settings for the command, read from `SHIPPER_*` variables (and `.env`
 * through dotenv). Parse problems are collected and raised together by
 * `validate()`.
 */
export class Config {
  private static instance?: Config;
  private readonly problems: string[] = [];
  private readonly config: AppConfig;

  private constructor(private readonly env: Env, private readonly readFile: FileReader) {
    this.config = this.loadConfig();
  }

  public static getInstance(): Config {
    if (!Config.instance) {
      // Variables already set in the environment win over .env
      dotenv.config();
      const config = Config.fromEnv(process.env);
      config.validate();
      Config.instance = config;
    }
    return Config.instance;
  }

  public static fromEnv(env: Env, readFile: FileReader = (path) => readFileSync(path)): Config {
    return new Config(env, readFile);
  }

  public get(): AppConfig {
    return this.config;
  }

  public validate(): void {
    const errors = [...this.problems];

    if (!this.config.shipper.endpoint) {
      errors.push("SHIPPER_ENDPOINT is required");
    }
    if (Object.keys(this.config.shipper.labels).length === 0) {
      errors.push("SHIPPER_LABELS is required");
    }

    if (errors.length > 0) {
      throw new ConfigError(errors);
    }
  }

  public toShipperOptions(): ShipperOptions {
    const shipper = this.config.shipper;
    return {
      endpoint: shipper.endpoint,
      labels: shipper.labels,
      headers: shipper.headers,
      formatter: this.createFormatter(shipper.format),
      maxLogs: shipper.maxLogs,
      maxLogLifetimeMs: shipper.maxLogLifetimeMs,
      compression: shipper.compression,
      level: shipper.level,
      structuredLabels:
        shipper.labelFields.length > 0 ? { enabled: true, labelFields: shipper.labelFields } : undefined,
      capacity: shipper.capacity,
      retry: shipper.retry,
      onExhausted: shipper.onExhausted,
      tls: shipper.tls,
    };
  }

  private loadConfig(): AppConfig {
    const maxBufferedEntries = this.getNumber("SHIPPER_MAX_BUFFERED_ENTRIES");
    const retry: Partial<RetryOptions> = {};
    const maxAttempts = this.getNumber("SHIPPER_MAX_ATTEMPTS");
    if (maxAttempts !== undefined) retry.maxAttempts = maxAttempts;
    const initialBackoffMs = this.getNumber("SHIPPER_INITIAL_BACKOFF_MS");
    if (initialBackoffMs !== undefined) retry.initialBackoffMs = initialBackoffMs;
    const maxBackoffMs = this.getNumber("SHIPPER_MAX_BACKOFF_MS");
    if (maxBackoffMs !== undefined) retry.maxBackoffMs = maxBackoffMs;

    return {
      shipper: {
        endpoint: this.getEnvVar("SHIPPER_ENDPOINT", ""),
        labels: this.getPairs("SHIPPER_LABELS"),
        headers: this.getPairs("SHIPPER_HEADERS"),
        format: this.getChoice("SHIPPER_FORMAT", ["logfmt", "json"] as const) ?? "logfmt",
        maxLogs: this.getNumber("SHIPPER_MAX_LOGS"),
        maxLogLifetimeMs: this.getNumber("SHIPPER_MAX_LOG_LIFETIME_MS"),
        compression: this.getChoice("SHIPPER_COMPRESSION", ["none", "gzip"] as const),
        level: this.getLevel("SHIPPER_LEVEL"),
        labelFields: this.getList("SHIPPER_LABEL_FIELDS"),
        capacity:
          maxBufferedEntries !== undefined
            ? {
                maxBufferedEntries,
                overflow: this.getChoice("SHIPPER_OVERFLOW", ["reject", "flush"] as const),
              }
            : undefined,
        retry,
        onExhausted: this.getChoice("SHIPPER_ON_EXHAUSTED", ["drop", "requeue"] as const),
        tls: this.loadTls(),
      },
      logging: {
        level: this.getEnvVar("LOG_LEVEL", "info"),
        file: this.getEnvVar("LOG_FILE", "") || undefined,
      },
    };
  }

  private loadTls(): TlsOptions | undefined {
    const cert = this.getFile("SHIPPER_TLS_CERT_FILE");
    const key = this.getFile("SHIPPER_TLS_KEY_FILE");
    const ca = this.getFile("SHIPPER_TLS_CA_FILE");
    if (cert === undefined && key === undefined && ca === undefined) {
      return undefined;
    }
    return { cert, key, ca };
  }

  private createFormatter(format: FormatName): Formatter {
    return format === "json" ? new JsonFormatter() : new LogfmtFormatter();
  }

  private getEnvVar(key: string, defaultValue: string): string {
    const value = this.env[key];
    if (value === undefined || value.trim() === "") {
      return defaultValue;
    }
    return value.trim();
  }

  private getNumber(key: string): number | undefined {
    const raw = this.getEnvVar(key, "");
    if (raw === "") return undefined;

    const value = Number(raw);
    if (!Number.isFinite(value)) {
      this.problems.push(`${key} must be a number, got "${raw}"`);
      return undefined;
    }
    return value;
  }

  private getChoice<T extends string>(key: string, choices: readonly T[]): T | undefined {
    const raw = this.getEnvVar(key, "");
    if (raw === "") return undefined;

    const match = choices.find((choice) => choice === raw);
    if (match === undefined) {
      this.problems.push(`${key} must be one of ${choices.join(", ")}, got "${raw}"`);
    }
    return match;
  }

  private getLevel(key: string): LogLevel | undefined {
    const raw = this.getEnvVar(key, "");
    if (raw === "") return undefined;

    try {
      return LogLevelFilter.parse(raw);
    } catch (error) {
      this.problems.push(`${key}: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }

  private getList(key: string): string[] {
    return this.getEnvVar(key, "")
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }

  // k=v,k=v
  private getPairs(key: string): Record<string, string> {
    const pairs: Record<string, string> = {};
    for (const item of this.getList(key)) {
      const separator = item.indexOf("=");
      if (separator <= 0) {
        this.problems.push(`${key} entry "${item}" is not in name=value form`);
        continue;
      }
      pairs[item.slice(0, separator).trim()] = item.slice(separator + 1).trim();
    }
    return pairs;
  }

  private getFile(key: string): Buffer | undefined {
    const path = this.getEnvVar(key, "");
    if (path === "") return undefined;

    try {
      return this.readFile(path);
    } catch (error) {
      this.problems.push(`${key} could not be read: ${error instanceof Error ? error.message : String(error)}`);
      return undefined;
    }
  }
}
