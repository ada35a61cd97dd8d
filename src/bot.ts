import { Events } from "discord.js";
import type { InflightTracker } from "./inflight.js";
import { Logger, type LogSink } from "./logger.js";

export type BotState = "stopped" | "connecting" | "ready" | "shutting_down";

const TRANSITIONS: Readonly<Record<BotState, ReadonlyArray<BotState>>> = {
  stopped: ["connecting"],
  connecting: ["ready", "shutting_down", "stopped"],
  ready: ["shutting_down"],
  shutting_down: ["stopped"]
};

export class InvalidTransitionError extends Error {
  constructor(readonly from: BotState, readonly to: BotState) {
    super(`invalid lifecycle transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

/** The gateway calls the lifecycle drives; a discord.js `Client` satisfies it. */
export interface GatewayClient {
  login(token: string): Promise<string>;
  destroy(): Promise<void>;
  once(event: Events.ClientReady, listener: () => void): unknown;
}

export interface BotSteps {
  /** Load cogs and wire dispatchers; runs before login. */
  setup(): Promise<void> | void;
  /** Publish the command catalog once connected. */
  sync(): Promise<unknown>;
  /** Unload cogs; runs after in-flight handlers drained. */
  teardown(): Promise<void> | void;
}

export interface BotOptions {
  token: string;
  shutdownTimeoutMs: number;
}

export class Bot {
  private current: BotState = "stopped";
  private stopping: Promise<void> | null = null;
  private client: GatewayClient;
  private options: BotOptions;
  private steps: BotSteps;
  private inflight: InflightTracker;
  private log: LogSink;

  constructor(client: GatewayClient, options: BotOptions, steps: BotSteps, inflight: InflightTracker, log: LogSink = Logger.scoped("lifecycle")) {
    this.client = client;
    this.options = options;
    this.steps = steps;
    this.inflight = inflight;
    this.log = log;
  }

  get state(): BotState {
    return this.current;
  }

  /**
   * Connects and resolves once the gateway session is ready and the catalog
   * has been published. Anything failing before that leaves the bot stopped
   * with the client destroyed, and rethrows.
   */
  async start(): Promise<void> {
    this.transition("connecting");
    try {
      await this.steps.setup();
      const ready = new Promise<void>(resolve => {
        this.client.once(Events.ClientReady, () => resolve());
      });
      await this.client.login(this.options.token);
      await ready;
      await this.steps.sync();
      if (this.current === "connecting") this.transition("ready");
    } catch (err) {
      this.log.error("startup failed", err);
      if (this.current === "connecting") {
        await this.destroyClient();
        this.transition("stopped");
      }
      throw err;
    }
  }

  /** Graceful stop. Calling it again while stopping returns the same promise. */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this.current === "stopped") return Promise.resolve();
    this.transition("shutting_down");
    this.stopping = this.shutdown().finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    const { drained, abandoned } = await this.inflight.drain(this.options.shutdownTimeoutMs);
    if (!drained) this.log.warn(`abandoning ${abandoned} in-flight handler(s) after ${this.options.shutdownTimeoutMs}ms`);
    try {
      await this.steps.teardown();
      await this.client.destroy();
    } finally {
      this.transition("stopped");
    }
  }

  private async destroyClient(): Promise<void> {
    try {
      await this.client.destroy();
    } catch (err) {
      this.log.error("failed to destroy client", err);
    }
  }

  private transition(to: BotState): void {
    const from = this.current;
    if (!TRANSITIONS[from].includes(to)) throw new InvalidTransitionError(from, to);
    this.current = to;
    this.log.info(`state ${from} -> ${to}`);
  }
}
