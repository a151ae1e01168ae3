#!/usr/bin/env node
import * as readline from "readline";
import { LogShipper } from "./application/services/LogShipper";
import { Logger } from "./application/interfaces/Logger";
import { LogRecord } from "./domain/entities/LogRecord";
import { Config } from "./infrastructure/config/Config";
import { WinstonLogger } from "./infrastructure/logging/WinstonLogger";

/**
 * Ships every line read from stdin as an info record, using settings from
 * the environment.
 */
class Application {
  private shipper?: LogShipper;
  private input?: readline.Interface;
  private stopping?: Promise<void>;

  constructor(private readonly config: Config, private readonly logger: Logger) {}

  public start(): void {
    this.shipper = new LogShipper(this.config.toShipperOptions(), { logger: this.logger });
    this.shipper.start();
    this.logger.info("Shipping stdin", { endpoint: this.config.get().shipper.endpoint });

    this.input = readline.createInterface({ input: process.stdin, crlfDelay: Infinity });
    this.input.on("line", (line) => this.acceptLine(line));
    this.input.on("close", () => this.requestStop("end of input", false));

    this.setupGracefulShutdown();
  }

  private acceptLine(line: string): void {
    if (!this.shipper || line.length === 0) return;
    try {
      this.shipper.accept(LogRecord.create({ level: "info", message: line, target: "stdin" }));
    } catch (error) {
      this.logger.warn("Dropped input line", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private stop(reason: string): Promise<void> {
    if (!this.stopping) {
      // Deferred: closing the input below emits "close" synchronously
      this.stopping = Promise.resolve().then(() => this.runStop(reason));
    }
    return this.stopping;
  }

  private async runStop(reason: string): Promise<void> {
    if (!this.shipper) return;
    this.logger.info(`Shutting down (${reason})`);
    this.input?.close();

    try {
      const result = await this.shipper.shutdown();
      this.logger.info("Shutdown completed", { outcome: result.outcome, entries: result.entries });
      process.exitCode = result.success ? 0 : 1;
    } catch (error) {
      this.logger.error("Error during shutdown", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    }
  }

  private requestStop(reason: string, exit: boolean): void {
    this.stop(reason)
      .then(() => {
        if (exit) process.exit();
      })
      .catch((error: unknown) => {
        this.logger.error("Shutdown failed", { error: String(error) });
        process.exit(1);
      });
  }

  private setupGracefulShutdown(): void {
    const onSignal = (signal: NodeJS.Signals) => this.requestStop(signal, true);

    process.on("SIGTERM", onSignal);
    process.on("SIGINT", onSignal);

    process.on("unhandledRejection", (reason) => {
      this.logger.error("Unhandled rejection", { reason: String(reason) });
      process.exitCode = 1;
    });
  }
}

try {
  // Loads .env before anything reads the environment
  const config = Config.getInstance();
  const { logging } = config.get();
  const logger = new WinstonLogger({ level: logging.level, file: logging.file });
  new Application(config, logger).start();
} catch (error) {
  console.error("Failed to start:", error instanceof Error ? error.message : error);
  process.exit(1);
}
