import * as http from "http";
import * as https from "https";
import { PushClient, PushRequest, PushResponse } from "../../domain/services/PushClient";
import { TlsOptions } from "../../application/ShipperOptions";

export interface NodeHttpPushClientOptions {
  /** Client identity for mutual TLS and an optional trust store override. */
  tls?: TlsOptions;
  keepAlive?: boolean;
}

/**
 * PushClient over Node's http/https modules. Connections are pooled per
 * protocol and released by `close()`.
 */
export class NodeHttpPushClient implements PushClient {
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(options: NodeHttpPushClientOptions = {}) {
    const keepAlive = options.keepAlive ?? true;
    const tls = options.tls ?? {};
    this.httpAgent = new http.Agent({ keepAlive });
    this.httpsAgent = new https.Agent({
      keepAlive,
      cert: tls.cert,
      key: tls.key,
      ca: tls.ca,
      passphrase: tls.passphrase,
      rejectUnauthorized: tls.rejectUnauthorized ?? true,
    });
  }

  public post(request: PushRequest): Promise<PushResponse> {
    return new Promise((resolve, reject) => {
      const headers = {
        ...request.headers,
        "Content-Length": String(request.body.length),
      };

      const onResponse = (response: http.IncomingMessage) => {
        const chunks: Buffer[] = [];
        response.on("data", (chunk: Buffer) => chunks.push(chunk));
        response.on("end", () => {
          resolve({
            status: response.statusCode ?? 0,
            statusText: response.statusMessage ?? "",
            body: Buffer.concat(chunks).toString("utf8"),
          });
        });
        response.on("error", reject);
      };

      const req =
        request.url.protocol === "https:"
          ? https.request(
              request.url,
              { method: "POST", headers, agent: this.httpsAgent, timeout: request.timeoutMs, signal: request.signal },
              onResponse
            )
          : http.request(
              request.url,
              { method: "POST", headers, agent: this.httpAgent, timeout: request.timeoutMs, signal: request.signal },
              onResponse
            );

      req.on("timeout", () => {
        req.destroy(new Error(`Request timed out after ${request.timeoutMs}ms`));
      });
      req.on("error", reject);
      req.end(request.body);
    });
  }

  public close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
