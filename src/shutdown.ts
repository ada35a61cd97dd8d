import { Logger, type LogSink } from "./logger.js";

export interface Stoppable {
  stop(): Promise<void>;
}

export type Exit = (code: number) => void;

export class ShutdownManager {
  private bot: Stoppable;
  private exit: Exit;
  private log: LogSink;
  private inProgress = false;

  constructor(bot: Stoppable, exit: Exit = code => process.exit(code), log: LogSink = Logger.scoped("shutdown")) {
    this.bot = bot;
    this.exit = exit;
    this.log = log;
  }

  setup(): void {
    process.on("SIGTERM", () => { void this.shutdown("SIGTERM"); });
    process.on("SIGINT", () => { void this.shutdown("SIGINT"); });
  }

  /** Stops the bot and exits 0, or 1 when stopping failed. A second signal forces exit 1. */
  async shutdown(signal: string): Promise<void> {
    if (this.inProgress) {
      this.log.warn(`Received ${signal} again. Forcing exit.`);
      this.exit(1);
      return;
    }
    this.inProgress = true;
    this.log.info(`Received ${signal}. Shutting down gracefully...`);
    try {
      await this.bot.stop();
      this.log.info("Shutdown complete. Exiting.");
      this.exit(0);
    } catch (err) {
      this.log.error("Error during shutdown", err);
      this.exit(1);
    }
  }
}
