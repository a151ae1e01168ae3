export interface PushRequest {
  url: URL;
  headers: Record<string, string>;
  body: Buffer;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface PushResponse {
  status: number;
  statusText: string;
  body: string;
}

/**
 * Performs a single HTTP POST. Rejects on network failure, timeout or
 * abort; any HTTP status resolves.
 */
export interface PushClient {
  post(request: PushRequest): Promise<PushResponse>;
  close(): void;
}
