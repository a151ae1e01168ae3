import { Logger } from "../../../src/application/interfaces/Logger";
import { LogRecord } from "../../../src/domain/entities/LogRecord";
import { CapacityError } from "../../../src/domain/errors/ShipperErrors";
import { RemoteLogger } from "../../../src/infrastructure/logging/RemoteLogger";
import { createMockLogger } from "../../helpers/fakes";

describe("RemoteLogger", () => {
  let accept: jest.Mock<boolean, [LogRecord]>;
  let mockLogger: jest.Mocked<Logger>;
  let logger: RemoteLogger;

  beforeEach(() => {
    accept = jest.fn<boolean, [LogRecord]>().mockReturnValue(true);
    mockLogger = createMockLogger();
    logger = new RemoteLogger({ accept }, mockLogger, { target: "worker" });
  });

  it("should log locally and forward a record", () => {
    logger.warn("queue is slow", { depth: 12 });

    expect(mockLogger.warn).toHaveBeenCalledWith("queue is slow", { depth: 12 });
    expect(accept).toHaveBeenCalledTimes(1);
    const record = accept.mock.calls[0][0];
    expect(record.level).toBe("warn");
    expect(record.message).toBe("queue is slow");
    expect(record.target).toBe("worker");
    expect(record.fields).toEqual([["depth", 12]]);
  });

  it("should turn meta values into fields", () => {
    logger.error("failed", {
      nested: { a: 1 },
      cause: new Error("disk full"),
      missing: undefined,
      big: BigInt(5),
    });

    expect(accept.mock.calls[0][0].fields).toEqual([
      ["nested", '{"a":1}'],
      ["cause", "disk full"],
      ["missing", null],
      ["big", BigInt(5)],
    ]);
  });

  it("should forward every level", () => {
    logger.info("i");
    logger.debug("d");

    expect(accept.mock.calls.map(([record]) => record.level)).toEqual(["info", "debug"]);
    expect(accept.mock.calls[0][0].fields).toEqual([]);
  });

  it("should log locally when the shipper refuses a record", () => {
    accept.mockImplementation(() => {
      throw new CapacityError(10, 10);
    });

    logger.info("dropped");

    expect(mockLogger.error).toHaveBeenCalledWith("Failed to ship log record", {
      error: "Buffer capacity of 10 entries reached (10 buffered)",
    });
  });
});
