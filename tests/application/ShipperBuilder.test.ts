import { Logger } from "../../src/application/interfaces/Logger";
import { ShipperBuilder } from "../../src/application/ShipperBuilder";
import { LogRecord } from "../../src/domain/entities/LogRecord";
import { ConfigError } from "../../src/domain/errors/ShipperErrors";
import { JsonFormatter } from "../../src/infrastructure/formatting/JsonFormatter";
import { createMockLogger, FakePushClient } from "../helpers/fakes";

describe("ShipperBuilder", () => {
  let client: FakePushClient;
  let mockLogger: jest.Mocked<Logger>;

  beforeEach(() => {
    client = new FakePushClient();
    mockLogger = createMockLogger();
  });

  it("should collect fluent settings into options", () => {
    const onError = jest.fn();
    const options = ShipperBuilder.create("https://logs.local/push")
      .label("app", "web")
      .labelsFrom({ env: "prod" })
      .addHeader("X-Scope-OrgID", "tenant-1")
      .maxLogs(100)
      .maxLogLifetime(5000)
      .level("info")
      .compression("gzip")
      .retry({ maxAttempts: 3 })
      .retry({ jitter: false })
      .failurePolicy("requeue", 4)
      .capacity(1000, "flush")
      .structuredLabels(["tenant"])
      .timeouts({ requestTimeoutMs: 2000 })
      .onError(onError)
      .toOptions();

    expect(options).toEqual({
      endpoint: "https://logs.local/push",
      labels: { app: "web", env: "prod" },
      headers: { "X-Scope-OrgID": "tenant-1" },
      maxLogs: 100,
      maxLogLifetimeMs: 5000,
      level: "info",
      compression: "gzip",
      retry: { maxAttempts: 3, jitter: false },
      onExhausted: "requeue",
      maxRequeuedBatches: 4,
      capacity: { maxBufferedEntries: 1000, overflow: "flush" },
      structuredLabels: { enabled: true, labelFields: ["tenant"] },
      requestTimeoutMs: 2000,
      onError,
    });
  });

  it("should build a started shipper", async () => {
    const shipper = ShipperBuilder.create("http://logs.local/push")
      .label("app", "web")
      .formatter(new JsonFormatter())
      .logger(mockLogger)
      .pushClient(client)
      .build();

    expect(shipper.isRunning).toBe(true);
    shipper.accept(LogRecord.create({ level: "info", message: "built", timestamp: BigInt(7) }));
    await shipper.shutdown();

    const [body] = await client.bodies();
    expect(body.streams[0].values).toEqual([["7", '{"level":"info","message":"built"}']]);
  });

  it("should report a missing formatter as a configuration error", () => {
    const builder = ShipperBuilder.create("http://logs.local/push").label("app", "web").pushClient(client);

    expect(() => builder.build()).toThrow(ConfigError);
    expect(() => builder.build()).toThrow("Configuration validation failed: a formatter must be provided");
  });

  it("should turn retries off", () => {
    const options = ShipperBuilder.create("http://logs.local/push").disableRetry().toOptions();

    expect(options.retry).toEqual({ enabled: false });
  });
});
