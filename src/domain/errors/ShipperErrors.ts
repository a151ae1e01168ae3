export type ShipperErrorCode =
  | "CONFIG_ERROR"
  | "CAPACITY_ERROR"
  | "FORMAT_ERROR"
  | "TRANSPORT_ERROR"
  | "FLUSH_TIMEOUT";

export abstract class ShipperError extends Error {
  public abstract readonly code: ShipperErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    if (options && options.cause !== undefined) {
      Object.defineProperty(this, "cause", {
        value: options.cause,
        enumerable: false,
        writable: true,
        configurable: true,
      });
    }
  }
}

/**
 * Raised while building a shipper. Carries every problem found, not only the first.
 */
export class ConfigError extends ShipperError {
  public readonly code = "CONFIG_ERROR" as const;

  constructor(public readonly problems: string[]) {
    super(`Configuration validation failed: ${problems.join(", ")}`);
  }
}

export class CapacityError extends ShipperError {
  public readonly code = "CAPACITY_ERROR" as const;

  constructor(public readonly limit: number, public readonly buffered: number) {
    super(`Buffer capacity of ${limit} entries reached (${buffered} buffered)`);
  }
}

export class FormatError extends ShipperError {
  public readonly code = "FORMAT_ERROR" as const;

  constructor(cause: unknown) {
    super(
      `Failed to format log record: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export type TransportErrorKind = "retryable" | "permanent";

export class TransportError extends ShipperError {
  public readonly code = "TRANSPORT_ERROR" as const;

  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  public get retryable(): boolean {
    return this.kind === "retryable";
  }

  public static fromStatus(status: number, statusText: string, body?: string): TransportError {
    const detail = body && body.trim().length > 0 ? ` - ${body.trim().slice(0, 200)}` : "";
    return new TransportError(
      `HTTP ${status}: ${statusText}${detail}`,
      TransportError.isRetryableStatus(status) ? "retryable" : "permanent",
      status
    );
  }

  public static fromNetworkError(error: unknown): TransportError {
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(message, "retryable", undefined, { cause: error });
  }

  // 408 and 429 are client statuses the push API uses for transient conditions
  public static isRetryableStatus(status: number): boolean {
    return status >= 500 || status === 408 || status === 429;
  }
}

export class FlushTimeoutError extends ShipperError {
  public readonly code = "FLUSH_TIMEOUT" as const;

  constructor(public readonly timeoutMs: number) {
    super(`Delivery did not complete within ${timeoutMs}ms`);
  }
}
