import type { Client } from "discord.js";
import { CommandRegistry } from "./command-registry.js";
import { ErrorHandler } from "./commands/error-handler.js";
import { Cooldowns } from "./commands/guards.js";
import type { BotConfig } from "./config.js";
import { InflightTracker } from "./inflight.js";
import { Logger, type LogSink } from "./logger.js";

/** Everything a handler may reach, passed explicitly instead of through module globals. */
export interface AppContext {
  readonly config: BotConfig;
  readonly client: Client;
  readonly registry: CommandRegistry;
  readonly errors: ErrorHandler;
  readonly cooldowns: Cooldowns;
  readonly inflight: InflightTracker;
  readonly log: LogSink;
}

export type ContextOverrides = Partial<Omit<AppContext, "config" | "client">>;

class Container implements AppContext {
  readonly config: BotConfig;
  readonly client: Client;
  readonly log: LogSink;
  readonly registry: CommandRegistry;
  readonly errors: ErrorHandler;
  readonly cooldowns: Cooldowns;
  readonly inflight: InflightTracker;

  constructor(config: BotConfig, client: Client, overrides: ContextOverrides) {
    this.config = config;
    this.client = client;
    this.log = overrides.log ?? Logger.scoped("bot");
    this.registry = overrides.registry ?? new CommandRegistry(Logger.scoped("registry"));
    this.errors = overrides.errors ?? new ErrorHandler(Logger.scoped("dispatch"), config.prefix);
    this.cooldowns = overrides.cooldowns ?? new Cooldowns();
    this.inflight = overrides.inflight ?? new InflightTracker();
  }
}

export function createContext(config: BotConfig, client: Client, overrides: ContextOverrides = {}): AppContext {
  return new Container(config, client, overrides);
}
