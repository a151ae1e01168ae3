import { Logger } from "../../../src/application/interfaces/Logger";
import { LogShipper } from "../../../src/application/services/LogShipper";
import { ShipperOptions } from "../../../src/application/ShipperOptions";
import { LogRecord } from "../../../src/domain/entities/LogRecord";
import {
  CapacityError,
  FlushTimeoutError,
  FormatError,
  TransportError,
} from "../../../src/domain/errors/ShipperErrors";
import { LogfmtFormatter } from "../../../src/infrastructure/formatting/LogfmtFormatter";
import { createMockLogger, FakePushClient, settle } from "../../helpers/fakes";

describe("LogShipper", () => {
  let client: FakePushClient;
  let mockLogger: jest.Mocked<Logger>;
  let onError: jest.Mock;
  let timestamp: number;

  const record = (message: string, fields?: Record<string, string>) =>
    LogRecord.create({ level: "info", message, timestamp: BigInt(++timestamp), fields });

  const createShipper = (options: Partial<ShipperOptions> = {}) => {
    const shipper = new LogShipper(
      {
        endpoint: "http://logs.local:3100/loki/api/v1/push",
        labels: { app: "web", env: "prod" },
        formatter: new LogfmtFormatter(),
        maxLogs: 5,
        maxLogLifetimeMs: 60000,
        retry: { initialBackoffMs: 1, maxBackoffMs: 1, jitter: false },
        onError,
        ...options,
      },
      { pushClient: client, logger: mockLogger }
    );
    shipper.start();
    return shipper;
  };

  beforeEach(() => {
    client = new FakePushClient();
    mockLogger = createMockLogger();
    onError = jest.fn();
    timestamp = 1000;
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe("count trigger", () => {
    it("should not flush automatically below maxLogs", async () => {
      const shipper = createShipper();
      for (let i = 0; i < 4; i++) {
        expect(shipper.accept(record(`line ${i}`))).toBe(true);
      }
      await settle();

      expect(client.requests).toHaveLength(0);

      const result = await shipper.flush();
      expect(result.outcome).toBe("delivered");
      expect(result.entries).toBe(4);
      expect(client.requests).toHaveLength(1);
      await shipper.shutdown();
    });

    it("should flush exactly once with five entries on the fifth accept", async () => {
      const shipper = createShipper();
      for (let i = 0; i < 5; i++) {
        shipper.accept(record(`line ${i}`));
      }

      expect(shipper.getStats().bufferedEntries).toBe(0);
      await settle();

      expect(client.requests).toHaveLength(1);
      const [body] = await client.bodies();
      expect(body.streams).toHaveLength(1);
      expect(body.streams[0].values.map(([, line]) => line)).toEqual([
        'level=info message="line 0"',
        'level=info message="line 1"',
        'level=info message="line 2"',
        'level=info message="line 3"',
        'level=info message="line 4"',
      ]);
      expect(shipper.getStats().deliveredEntries).toBe(5);
      await shipper.shutdown();
    });
  });

  describe("lifetime trigger", () => {
    beforeEach(() => {
      jest.useFakeTimers({ doNotFake: ["setImmediate", "nextTick"] });
    });

    it("should flush after the lifetime elapses even below maxLogs", async () => {
      const shipper = createShipper({ maxLogLifetimeMs: 100 });
      shipper.accept(record("first"));
      shipper.accept(record("second"));

      await jest.advanceTimersByTimeAsync(99);
      expect(client.requests).toHaveLength(0);

      await jest.advanceTimersByTimeAsync(1);
      await settle();

      expect(client.requests).toHaveLength(1);
      const [body] = await client.bodies();
      expect(body.streams[0].values.map(([, line]) => line)).toEqual([
        "level=info message=first",
        "level=info message=second",
      ]);
      await shipper.shutdown();
    });

    it("should arm the timer again for the next generation", async () => {
      const shipper = createShipper({ maxLogLifetimeMs: 100 });
      shipper.accept(record("first"));
      await jest.advanceTimersByTimeAsync(100);
      await settle();

      await jest.advanceTimersByTimeAsync(500);
      expect(client.requests).toHaveLength(1);

      shipper.accept(record("second"));
      await jest.advanceTimersByTimeAsync(100);
      await settle();

      expect(client.requests).toHaveLength(2);
      await shipper.shutdown();
    });

    it("should not arm a timer while nothing is buffered", () => {
      createShipper({ maxLogLifetimeMs: 100 });

      expect(jest.getTimerCount()).toBe(0);
    });

    it("should leave no timer behind after shutdown", async () => {
      const shipper = createShipper({ maxLogLifetimeMs: 100 });
      shipper.accept(record("pending"));
      expect(jest.getTimerCount()).toBe(1);

      const result = await shipper.shutdown();

      expect(result.entries).toBe(1);
      expect(jest.getTimerCount()).toBe(0);
      expect(shipper.isRunning).toBe(false);
    });
  });

  describe("flush", () => {
    it("should return at once without a request when nothing is buffered", async () => {
      const shipper = createShipper();

      const result = await shipper.flush();

      expect(result).toEqual({ success: true, outcome: "empty", streams: 0, entries: 0, attempts: 0 });
      expect(client.requests).toHaveLength(0);
      await shipper.shutdown();
    });

    it("should deliver once after two server errors without reporting", async () => {
      client.reply(500, 500, 200);
      const shipper = createShipper();
      shipper.accept(record("a"));
      shipper.accept(record("b"));

      const result = await shipper.flush();

      expect(result.outcome).toBe("delivered");
      expect(result.attempts).toBe(3);
      expect(onError).not.toHaveBeenCalled();
      const bodies = await client.bodies();
      expect(bodies.map((body) => body.streams.length)).toEqual([1, 1, 1]);
      expect(shipper.getStats().deliveredBatches).toBe(1);
      await shipper.shutdown();
    });

    it("should report a permanent failure to the error hook", async () => {
      client.reply(400);
      const shipper = createShipper();
      shipper.accept(record("a"));

      const result = await shipper.flush();

      expect(result.outcome).toBe("permanent-failure");
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError).toHaveBeenCalledWith(expect.any(TransportError), {
        batchId: result.batchId,
        entries: 1,
      });
      expect(shipper.getStats().droppedEntries).toBe(1);
      await shipper.shutdown();
    });

    it("should log an error hook that throws", async () => {
      client.reply(400);
      onError.mockImplementation(() => {
        throw new Error("hook failed");
      });
      const shipper = createShipper();
      shipper.accept(record("a"));

      await shipper.flush();

      expect(mockLogger.error).toHaveBeenCalledWith("Error hook threw", { error: "hook failed" });
      await shipper.shutdown();
    });

    it("should time out a flush and keep shipping afterwards", async () => {
      client.reply("hang");
      const shipper = createShipper();
      shipper.accept(record("slow"));

      await expect(shipper.flush({ timeoutMs: 20 })).rejects.toBeInstanceOf(FlushTimeoutError);
      expect(shipper.accept(record("after"))).toBe(true);

      client.release();
      const result = await shipper.flush();

      expect(result.outcome).toBe("delivered");
      expect(result.entries).toBe(1);
      const bodies = await client.bodies();
      expect(bodies.map((body) => body.streams[0].values[0][1])).toEqual([
        "level=info message=slow",
        "level=info message=after",
      ]);
      expect(shipper.getStats().deliveredBatches).toBe(2);
      await shipper.shutdown();
    });

    it("should gzip request bodies when configured", async () => {
      const shipper = createShipper({ compression: "gzip" });
      shipper.accept(record("zipped"));

      await shipper.flush();

      expect(client.requests[0].headers["Content-Encoding"]).toBe("gzip");
      const [body] = await client.bodies();
      expect(body.streams[0].values[0][1]).toBe("level=info message=zipped");
      await shipper.shutdown();
    });
  });

  describe("streams", () => {
    it("should keep the global label for stream identity when a field shares its name", async () => {
      const shipper = createShipper();
      shipper.accept(record("hello", { env: "dev" }));

      await shipper.flush();

      const [body] = await client.bodies();
      expect(body.streams).toEqual([
        { stream: { app: "web", env: "prod" }, values: [["1001", "level=info message=hello env=dev"]] },
      ]);
      await shipper.shutdown();
    });

    it("should keep streams and entry order through encoding", async () => {
      const shipper = createShipper({
        maxLogs: 100,
        structuredLabels: { enabled: true, labelFields: ["tenant"] },
      });
      for (let entry = 0; entry < 4; entry++) {
        for (const tenant of ["a", "b", "c"]) {
          shipper.accept(record(`${tenant}${entry}`, { tenant }));
        }
      }

      await shipper.flush();

      const [body] = await client.bodies();
      expect(body.streams.map((stream) => stream.stream)).toEqual([
        { app: "web", env: "prod", tenant: "a" },
        { app: "web", env: "prod", tenant: "b" },
        { app: "web", env: "prod", tenant: "c" },
      ]);
      expect(body.streams[1].values).toEqual([
        ["1002", "level=info message=b0 tenant=b"],
        ["1005", "level=info message=b1 tenant=b"],
        ["1008", "level=info message=b2 tenant=b"],
        ["1011", "level=info message=b3 tenant=b"],
      ]);
      await shipper.shutdown();
    });

    it("should route equal label pairs in any order to one stream", async () => {
      const shipper = createShipper({
        maxLogs: 100,
        structuredLabels: { enabled: true, labelFields: ["tenant", "region"] },
      });
      shipper.accept(LogRecord.create({ level: "info", message: "x", fields: { tenant: "t", region: "eu" } }));
      shipper.accept(LogRecord.create({ level: "info", message: "y", fields: { region: "eu", tenant: "t" } }));

      await shipper.flush();

      const [body] = await client.bodies();
      expect(body.streams).toHaveLength(1);
      expect(body.streams[0].values).toHaveLength(2);
      await shipper.shutdown();
    });
  });

  describe("accept", () => {
    it("should drop records below the configured level", async () => {
      const shipper = createShipper({ level: "warn" });

      expect(shipper.accept(LogRecord.create({ level: "debug", message: "noise" }))).toBe(false);
      expect(shipper.accept(LogRecord.create({ level: "error", message: "kept" }))).toBe(true);
      expect(shipper.getStats().bufferedEntries).toBe(1);
      await shipper.shutdown();
    });

    it("should drop and report a record the formatter fails on", () => {
      const shipper = createShipper({
        formatter: {
          format: () => {
            throw new Error("cannot render");
          },
        },
      });
      const failing = record("x");

      expect(shipper.accept(failing)).toBe(false);
      expect(onError).toHaveBeenCalledWith(expect.any(FormatError), { record: failing });
      expect(shipper.getStats().formatErrors).toBe(1);
    });

    it("should reject records once capacity is reached", async () => {
      client.reply("hang");
      const shipper = createShipper({
        maxLogs: 2,
        capacity: { maxBufferedEntries: 3, overflow: "reject" },
      });
      shipper.accept(record("a"));
      shipper.accept(record("b"));
      shipper.accept(record("c"));

      expect(() => shipper.accept(record("d"))).toThrow(CapacityError);
      expect(() => shipper.accept(record("d"))).toThrow("Buffer capacity of 3 entries reached (3 buffered)");

      await expect(shipper.shutdown({ timeoutMs: 20 })).rejects.toBeInstanceOf(FlushTimeoutError);
      await settle();
      expect(shipper.getStats().pendingEntries).toBe(0);
      expect(client.closed).toBe(true);
    });

    it("should seal early when capacity is reached with the flush policy", async () => {
      const shipper = createShipper({
        maxLogs: 10,
        capacity: { maxBufferedEntries: 3, overflow: "flush" },
      });
      for (const message of ["a", "b", "c", "d"]) {
        expect(shipper.accept(record(message))).toBe(true);
      }
      await settle();

      const [body] = await client.bodies();
      expect(body.streams[0].values).toHaveLength(3);
      expect(shipper.getStats().bufferedEntries).toBe(1);
      await shipper.shutdown();
    });

    it("should keep filling one generation behind a stalled delivery with the flush policy", async () => {
      client.reply("hang");
      const shipper = createShipper({
        maxLogs: 10,
        capacity: { maxBufferedEntries: 10, overflow: "flush" },
      });
      for (let i = 0; i < 15; i++) {
        expect(shipper.accept(record(`line ${i}`))).toBe(true);
      }
      await settle();

      expect(client.requests).toHaveLength(1);
      expect(shipper.getStats().pendingBatches).toBe(1);
      expect(shipper.getStats().bufferedEntries).toBe(5);

      await expect(shipper.shutdown({ timeoutMs: 20 })).rejects.toBeInstanceOf(FlushTimeoutError);
      await settle();
      expect(shipper.getStats().pendingEntries).toBe(0);
    });

    it("should ignore records after shutdown", async () => {
      const shipper = createShipper();
      await shipper.shutdown();

      expect(shipper.accept(record("late"))).toBe(false);
      expect((await shipper.flush()).outcome).toBe("empty");
      expect(() => shipper.start()).toThrow("Cannot start a shipper that has been shut down");
    });
  });

  describe("failure policy", () => {
    it("should drop a batch whose retries are exhausted by default", async () => {
      client.reply(503, 503);
      const shipper = createShipper({ retry: { maxAttempts: 2, initialBackoffMs: 1, maxBackoffMs: 1 } });
      shipper.accept(record("a"));

      const result = await shipper.flush();

      expect(result.outcome).toBe("retries-exhausted");
      expect(result.requeued).toBeUndefined();
      expect(onError).toHaveBeenCalledTimes(1);
      expect(shipper.getStats().requeuedBatches).toBe(0);
      await shipper.shutdown();
    });

    it("should requeue and deliver on the next flush", async () => {
      client.reply(503);
      const shipper = createShipper({ retry: { enabled: false }, onExhausted: "requeue" });
      shipper.accept(record("a"));

      const first = await shipper.flush();
      expect(first.requeued).toBe(true);
      expect(shipper.getStats().requeuedBatches).toBe(1);
      expect(onError).not.toHaveBeenCalled();

      const second = await shipper.flush();
      expect(second.outcome).toBe("empty");
      expect(client.requests).toHaveLength(2);
      expect(shipper.getStats().requeuedBatches).toBe(0);
      expect(shipper.getStats().deliveredBatches).toBe(1);
      await shipper.shutdown();
    });

    it("should retry a requeued batch once the lifetime passes without further records", async () => {
      jest.useFakeTimers({ doNotFake: ["setImmediate", "nextTick"] });
      client.reply(503);
      const shipper = createShipper({
        maxLogLifetimeMs: 100,
        retry: { enabled: false },
        onExhausted: "requeue",
      });
      shipper.accept(record("a"));

      const first = await shipper.flush();
      expect(first.requeued).toBe(true);
      expect(jest.getTimerCount()).toBe(1);

      await jest.advanceTimersByTimeAsync(100);
      await settle();

      expect(client.requests).toHaveLength(2);
      expect(shipper.getStats().requeuedBatches).toBe(0);
      expect(shipper.getStats().deliveredBatches).toBe(1);
      expect(jest.getTimerCount()).toBe(0);
      await shipper.shutdown();
    });

    it("should drop the oldest requeued batch beyond the limit", async () => {
      client.reply(503, 503, 503);
      const shipper = createShipper({
        retry: { enabled: false },
        onExhausted: "requeue",
        maxRequeuedBatches: 1,
      });
      shipper.accept(record("a"));
      const first = await shipper.flush();
      shipper.accept(record("b"));

      const second = await shipper.flush();

      expect(second.requeued).toBe(true);
      expect(shipper.getStats().requeuedBatches).toBe(1);
      expect(shipper.getStats().droppedEntries).toBe(1);
      expect(onError).toHaveBeenCalledWith(expect.any(TransportError), { batchId: first.batchId, entries: 1 });
      expect(onError.mock.calls[0][0].message).toBe(`Requeue limit reached, dropped batch ${first.batchId}`);
      await shipper.shutdown();
    });
  });

  describe("shutdown", () => {
    it("should deliver buffered records and close the client", async () => {
      const shipper = createShipper();
      shipper.accept(record("last words"));

      const result = await shipper.shutdown();

      expect(result.outcome).toBe("delivered");
      expect(client.requests).toHaveLength(1);
      expect(client.closed).toBe(true);
      expect(shipper.getStats().lifecycle).toBe("stopped");
    });

    it("should return the same result when called twice", async () => {
      const shipper = createShipper();
      shipper.accept(record("once"));

      const [first, second] = await Promise.all([shipper.shutdown(), shipper.shutdown()]);

      expect(second).toBe(first);
      expect(client.requests).toHaveLength(1);
    });
  });

  it("should reject invalid options with every problem listed", () => {
    expect(
      () =>
        new LogShipper(
          { endpoint: "ftp://logs.local", labels: {}, formatter: new LogfmtFormatter(), maxLogs: 0 },
          { pushClient: client, logger: mockLogger }
        )
    ).toThrow(
      "Configuration validation failed: endpoint must use http or https, got ftp:, " +
        "labels: at least one label must be specified, maxLogs must be a positive integer"
    );
  });
});
