import type { ClientEvents } from "discord.js";
import type { AppContext } from "../di.js";
import { BadArgumentError, MissingArgumentError } from "../errors.js";
import { Logger, type LogSink } from "../logger.js";
import type { ArgValue, IncomingMessage, InteractionOrigin, InvocationContext, Listener, PrefixArgsView, PrefixParam } from "./types.js";

export interface Token {
  value: string;
  /** Offset of the token (or its opening quote) in the line */
  start: number;
}

/**
 * Splits a command line on whitespace, keeping "double quoted" runs together.
 * An unterminated quote runs to the end of the line.
 */
export function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  const re = /"([^"]*)"?|(\S+)/g;
  for (const m of line.matchAll(re)) {
    tokens.push({ value: m[1] ?? m[2] ?? "", start: m.index ?? 0 });
  }
  return tokens;
}

const TRUE_WORDS = new Set(["yes", "y", "true", "t", "1", "enable", "on"]);
const FALSE_WORDS = new Set(["no", "n", "false", "f", "0", "disable", "off"]);

/** Converts one raw token; throws BadArgumentError when it does not fit `param.kind`. */
export function convertArg(param: PrefixParam, raw: string): ArgValue {
  switch (param.kind) {
    case "string":
    case "text":
      return raw;
    case "integer":
      if (!/^[-+]?\d+$/.test(raw)) throw new BadArgumentError(param.name, "must be a whole number", raw);
      return Number(raw);
    case "number": {
      const n = Number(raw);
      if (raw.trim() === "" || !Number.isFinite(n)) throw new BadArgumentError(param.name, "must be a number", raw);
      return n;
    }
    case "boolean": {
      const s = raw.toLowerCase();
      if (TRUE_WORDS.has(s)) return true;
      if (FALSE_WORDS.has(s)) return false;
      throw new BadArgumentError(param.name, "must be yes or no", raw);
    }
    case "user": {
      const m = /^<@!?(\d{17,20})>$/.exec(raw) ?? /^(\d{17,20})$/.exec(raw);
      if (!m?.[1]) throw new BadArgumentError(param.name, "must be a user mention or ID", raw);
      return m[1];
    }
  }
}

export class PrefixArgs implements PrefixArgsView {
  private readonly values: ReadonlyMap<string, ArgValue>;
  constructor(values: ReadonlyMap<string, ArgValue>) { this.values = values; }
  string(name: string): string | undefined { const v = this.values.get(name); return typeof v === "string" ? v : undefined; }
  number(name: string): number | undefined { const v = this.values.get(name); return typeof v === "number" ? v : undefined; }
  boolean(name: string): boolean | undefined { const v = this.values.get(name); return typeof v === "boolean" ? v : undefined; }
  get size(): number { return this.values.size; }
}

export function usageOf(prefix: string, name: string, params: ReadonlyArray<PrefixParam> = []): string {
  const parts = params.map(p => (p.required ? `<${p.name}>` : `[${p.name}]`));
  return [`${prefix}${name}`, ...parts].join(" ");
}

/**
 * Maps tokens of `line` onto declared params in order. A `text` param takes
 * the rest of the line as written, quotes and newlines included. Extra tokens
 * are ignored.
 */
export function parsePrefixArgs(params: ReadonlyArray<PrefixParam>, line: string, usage?: string): PrefixArgs {
  const tokens = tokenize(line);
  const values = new Map<string, ArgValue>();
  let i = 0;
  for (const p of params) {
    if (p.kind === "text") {
      const from = tokens[i];
      const rest = from ? line.slice(from.start).trimEnd() : "";
      i = tokens.length;
      if (!rest) {
        if (p.required) throw new MissingArgumentError(p.name, usage);
        continue;
      }
      values.set(p.name, rest);
      continue;
    }
    const token = tokens[i];
    if (token === undefined) {
      if (p.required) throw new MissingArgumentError(p.name, usage);
      continue;
    }
    values.set(p.name, convertArg(p, token.value));
    i++;
  }
  return new PrefixArgs(values);
}

export function contextFromMessage(message: IncomingMessage, commandName: string): InvocationContext {
  return {
    commandName,
    user: { id: message.author.id, tag: message.author.tag },
    guildId: message.guildId,
    channelId: message.channelId,
    memberPermissions: message.member?.permissions ?? null,
    guildOwnerId: message.guild?.ownerId ?? null
  };
}

export function contextFromInteraction(interaction: InteractionOrigin, commandName: string): InvocationContext {
  return {
    commandName,
    user: { id: interaction.user.id, tag: interaction.user.tag },
    guildId: interaction.guildId,
    channelId: interaction.channelId,
    memberPermissions: interaction.memberPermissions,
    guildOwnerId: interaction.guild?.ownerId ?? null
  };
}

/**
 * Wraps a gateway event handler as a cog listener. Failures are logged and
 * never reach the client's emitter.
 */
export function listen<E extends keyof ClientEvents>(
  event: E,
  run: (app: AppContext, ...args: ClientEvents[E]) => Promise<void> | void,
  log: LogSink = Logger.scoped("events")
): Listener {
  return {
    event,
    attach(client, app) {
      const handler = async (...args: ClientEvents[E]): Promise<void> => {
        try {
          await run(app, ...args);
        } catch (err) {
          log.error(`listener for ${String(event)} failed`, err);
        }
      };
      client.on(event, handler);
      return () => { client.off(event, handler); };
    }
  };
}
