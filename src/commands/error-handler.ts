import { MessageFlags, type APIEmbed } from "discord.js";
import { errorEmbed, warningEmbed } from "../embeds.js";
import {
  BadArgumentError,
  CheckFailedError,
  CooldownError,
  MissingArgumentError,
  PermissionDeniedError,
  UnknownCommandError,
  classifyError,
  type ErrorKind
} from "../errors.js";
import { serializeError, type LogSink } from "../logger.js";
import type { InteractionPayload, InteractionTarget, InvocationContext, ReplyPayload } from "./types.js";

export interface PrefixErrorContext extends InvocationContext {
  reply(payload: ReplyPayload): Promise<unknown>;
}

export interface AppErrorContext extends InvocationContext {
  interaction: InteractionTarget;
}

export type Delivery = "reply" | "followUp" | "none";
export interface HandledError { kind: ErrorKind; delivery: Delivery }

const GENERIC_TEXT = "An unexpected error occurred. Please try again later.";

/**
 * The single place command failures end up. Classifies, replies in user-safe
 * language, and writes one log record per failure.
 */
export class ErrorHandler {
  private readonly log: LogSink;
  private readonly prefix: string;

  constructor(log: LogSink, prefix: string) {
    this.log = log;
    this.prefix = prefix;
  }

  async handlePrefixError(ctx: PrefixErrorContext, error: unknown): Promise<HandledError> {
    const kind = this.record(ctx, error);
    try {
      await ctx.reply({ embeds: [this.embedFor(kind, error)] });
      return { kind, delivery: "reply" };
    } catch (sendErr) {
      this.deliveryFailed(ctx, kind, [sendErr]);
      return { kind, delivery: "none" };
    }
  }

  /**
   * Interactions take one primary response; anything after that must be a
   * follow-up. A failed primary attempt falls back to a follow-up once.
   */
  async handleAppCommandError(ctx: AppErrorContext, error: unknown): Promise<HandledError> {
    const kind = this.record(ctx, error);
    const payload: InteractionPayload = { embeds: [this.embedFor(kind, error)], flags: MessageFlags.Ephemeral };
    const it = ctx.interaction;
    if (it.replied || it.deferred) {
      try {
        await it.followUp(payload);
        return { kind, delivery: "followUp" };
      } catch (followErr) {
        this.deliveryFailed(ctx, kind, [followErr]);
        return { kind, delivery: "none" };
      }
    }
    try {
      await it.reply(payload);
      return { kind, delivery: "reply" };
    } catch (replyErr) {
      try {
        await it.followUp(payload);
        return { kind, delivery: "followUp" };
      } catch (followErr) {
        this.deliveryFailed(ctx, kind, [replyErr, followErr]);
        return { kind, delivery: "none" };
      }
    }
  }

  embedFor(kind: ErrorKind, error: unknown): APIEmbed {
    switch (kind) {
      case "unknown_command": {
        const name = error instanceof UnknownCommandError ? error.commandName : "that";
        return warningEmbed("Command Not Found", `No command named \`${name}\` exists. Use \`${this.prefix}help\` to see available commands.`);
      }
      case "missing_argument": {
        const param = error instanceof MissingArgumentError ? error.param : "required";
        const usage = error instanceof MissingArgumentError ? error.usage : undefined;
        return errorEmbed("Missing Required Argument", `You're missing the \`${param}\` argument.`, usage ? { fields: [{ name: "Usage", value: `\`${usage}\`` }] } : {});
      }
      case "bad_argument": {
        if (error instanceof BadArgumentError) return errorEmbed("Invalid Argument", `The \`${error.param}\` argument ${error.reason}.`);
        return errorEmbed("Invalid Argument", "One of the arguments could not be understood.");
      }
      case "permission_denied": {
        const missing = error instanceof PermissionDeniedError ? error.missing : [];
        return errorEmbed("Missing Permissions", "You don't have permission to use this command.", missing.length > 0 ? { fields: [{ name: "Required", value: missing.join(", ") }] } : {});
      }
      case "cooldown_active": {
        const seconds = error instanceof CooldownError ? error.retryAfterMs / 1000 : 0;
        return warningEmbed("Command on Cooldown", `Please wait ${seconds.toFixed(2)} seconds before using this command again.`);
      }
      case "check_failed": {
        const text = error instanceof CheckFailedError && error.userMessage ? error.userMessage : "You can't use this command here.";
        return errorEmbed("Check Failed", text);
      }
      case "generic_failure":
        return errorEmbed("An Error Occurred", GENERIC_TEXT);
    }
  }

  private record(ctx: InvocationContext, error: unknown): ErrorKind {
    const kind = classifyError(error);
    const entry = {
      kind,
      command: ctx.commandName,
      user: ctx.user.id,
      userTag: ctx.user.tag,
      guild: ctx.guildId,
      channel: ctx.channelId,
      cause: serializeError(error)
    };
    if (kind === "generic_failure") this.log.error("command failed", entry);
    else this.log.warn("command rejected", entry);
    return kind;
  }

  private deliveryFailed(ctx: InvocationContext, kind: ErrorKind, errors: ReadonlyArray<unknown>): void {
    this.log.error("failed to deliver error notice", {
      kind,
      command: ctx.commandName,
      user: ctx.user.id,
      attempts: errors.map(serializeError)
    });
  }
}
