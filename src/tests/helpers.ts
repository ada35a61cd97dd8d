import {
  Client,
  InteractionType,
  PermissionsBitField,
  type AutocompleteInteraction,
  type ButtonInteraction,
  type ChatInputCommandInteraction,
  type MessageContextMenuCommandInteraction,
  type ModalSubmitInteraction,
  type PermissionResolvable,
  type StringSelectMenuInteraction,
  type UserContextMenuCommandInteraction
} from "discord.js";
import { CommandRegistry } from "../command-registry.js";
import { ErrorHandler } from "../commands/error-handler.js";
import { Cooldowns } from "../commands/guards.js";
import type { RoutableInteraction } from "../commands/slash-router.js";
import type { Choice, IncomingMessage, InteractionPayload, InteractionTarget, InvocationContext, ReplyPayload } from "../commands/types.js";
import type { BotConfig } from "../config.js";
import { createContext, type AppContext } from "../di.js";
import type { LogLevel, LogSink } from "../logger.js";

export const APP_ID = "100000000000000001";
export const OWNER_ID = "200000000000000001";
export const USER_ID = "200000000000000002";
export const GUILD_ID = "300000000000000001";
export const CHANNEL_ID = "400000000000000001";

export interface LogEntry { level: LogLevel; message: string; meta?: unknown }

export class RecordingLog implements LogSink {
  readonly entries: LogEntry[] = [];
  debug(message: string, meta?: unknown): void { this.entries.push({ level: "debug", message, meta }); }
  info(message: string, meta?: unknown): void { this.entries.push({ level: "info", message, meta }); }
  warn(message: string, meta?: unknown): void { this.entries.push({ level: "warn", message, meta }); }
  error(message: string, meta?: unknown): void { this.entries.push({ level: "error", message, meta }); }
  at(level: LogLevel): LogEntry[] { return this.entries.filter(e => e.level === level); }
}

export function testConfig(over: Partial<BotConfig> = {}): BotConfig {
  return {
    token: "test-token",
    applicationId: APP_ID,
    devGuildId: null,
    prefix: "!",
    syncCommands: true,
    ownerIds: [OWNER_ID],
    welcomeChannelId: null,
    healthPort: null,
    shutdownTimeoutMs: 50,
    ...over
  };
}

export interface TestApp {
  app: AppContext;
  /** Records what the error funnel logs */
  errorLog: RecordingLog;
}

/** A context around an offline client; the clock pins cooldown arithmetic. */
export function testApp(opts: { config?: Partial<BotConfig>; now?: () => number } = {}): TestApp {
  const config = testConfig(opts.config);
  const errorLog = new RecordingLog();
  const app = createContext(config, new Client({ intents: [] }), {
    log: new RecordingLog(),
    registry: new CommandRegistry(new RecordingLog()),
    errors: new ErrorHandler(errorLog, config.prefix),
    cooldowns: new Cooldowns(opts.now ?? (() => 1_000))
  });
  return { app, errorLog };
}

export function invocation(commandName: string, over: Partial<InvocationContext> = {}): InvocationContext {
  return {
    commandName,
    user: { id: USER_ID, tag: "tester" },
    guildId: GUILD_ID,
    channelId: CHANNEL_ID,
    memberPermissions: null,
    guildOwnerId: null,
    ...over
  };
}

export function perms(...p: PermissionResolvable[]): Readonly<PermissionsBitField> {
  return new PermissionsBitField(p);
}

export interface FakeMessage extends IncomingMessage {
  replies: ReplyPayload[];
}

export function fakeMessage(content: string, over: Partial<IncomingMessage> = {}): FakeMessage {
  const replies: ReplyPayload[] = [];
  return {
    content,
    author: { id: USER_ID, tag: "tester", bot: false },
    guildId: GUILD_ID,
    channelId: CHANNEL_ID,
    member: null,
    guild: { ownerId: OWNER_ID },
    ...over,
    replies,
    reply: async options => {
      replies.push(options);
    }
  };
}

export class FakeInteraction implements InteractionTarget {
  replied = false;
  deferred = false;
  failReply = false;
  failFollowUp = false;
  readonly replies: InteractionPayload[] = [];
  readonly followUps: InteractionPayload[] = [];

  async reply(options: InteractionPayload): Promise<void> {
    if (this.failReply) throw new Error("Unknown interaction");
    this.replies.push(options);
    this.replied = true;
  }

  async followUp(options: InteractionPayload): Promise<void> {
    if (this.failFollowUp) throw new Error("Unknown webhook");
    this.followUps.push(options);
  }
}

export type GatewayKind = "autocomplete" | "chat" | "message-menu" | "user-menu" | "button" | "select" | "modal" | "ping";

/**
 * Stands in for a gateway interaction of one kind. `name` is the command name
 * for commands and autocomplete, the custom id for components and modals.
 */
export class FakeGatewayInteraction extends FakeInteraction implements RoutableInteraction {
  readonly type: InteractionType;
  readonly user = { id: USER_ID, tag: "tester" };
  readonly guildId: string | null = GUILD_ID;
  readonly channelId: string | null = CHANNEL_ID;
  readonly memberPermissions: Readonly<PermissionsBitField> | null = null;
  readonly guild = { ownerId: OWNER_ID };
  readonly commandName: string;
  readonly customId: string;
  focused = { name: "", value: "" };
  readonly options = { getFocused: (_full: true) => this.focused };
  readonly responses: Choice[][] = [];
  responded = false;
  failRespond = false;

  constructor(readonly kind: GatewayKind, name: string) {
    super();
    this.type = kind === "autocomplete" ? InteractionType.ApplicationCommandAutocomplete
      : kind === "ping" ? InteractionType.Ping
      : InteractionType.ApplicationCommand;
    this.commandName = name;
    this.customId = name;
  }

  async respond(choices: ReadonlyArray<Choice>): Promise<void> {
    if (this.failRespond) throw new Error("Unknown interaction");
    this.responses.push([...choices]);
    this.responded = true;
  }

  isAutocomplete(): this is AutocompleteInteraction { return this.kind === "autocomplete"; }
  isChatInputCommand(): this is ChatInputCommandInteraction { return this.kind === "chat"; }
  isMessageContextMenuCommand(): this is MessageContextMenuCommandInteraction { return this.kind === "message-menu"; }
  isUserContextMenuCommand(): this is UserContextMenuCommandInteraction { return this.kind === "user-menu"; }
  isButton(): this is ButtonInteraction { return this.kind === "button"; }
  isStringSelectMenu(): this is StringSelectMenuInteraction { return this.kind === "select"; }
  isModalSubmit(): this is ModalSubmitInteraction { return this.kind === "modal"; }
}

/** First embed of a payload, as plain data. */
export function firstEmbed(payload: ReplyPayload | undefined): unknown {
  return payload?.embeds?.[0];
}
