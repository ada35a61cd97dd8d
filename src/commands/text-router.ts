import type { AppContext } from "../di.js";
import { UnknownCommandError } from "../errors.js";
import { runGuards } from "./guards.js";
import type { IncomingMessage, PrefixContext } from "./types.js";
import { contextFromMessage, parsePrefixArgs, usageOf } from "./utils.js";

/** Routes prefixed guild and DM messages to prefix command descriptors */
export class PrefixDispatcher {
  private app: AppContext;
  constructor(app: AppContext) { this.app = app; }

  async handleMessage(message: IncomingMessage): Promise<void> {
    if (message.author.bot) return;
    const { prefix } = this.app.config;
    if (!message.content.startsWith(prefix)) return;
    const match = /^(\S+)\s*([\s\S]*)$/.exec(message.content.slice(prefix.length));
    if (!match?.[1]) return;
    const name = match[1];
    const rest = match[2] ?? "";

    const command = this.app.registry.getPrefix(name);
    const ctx: PrefixContext = {
      ...contextFromMessage(message, command?.name ?? name),
      prefix,
      reply: async payload => { await message.reply(payload); }
    };
    try {
      if (!command) throw new UnknownCommandError(name);
      await runGuards(command, ctx, this.app);
      const args = parsePrefixArgs(command.params ?? [], rest, usageOf(prefix, command.name, command.params));
      this.app.log.debug(`prefix command ${command.name}`, { user: ctx.user.id, guild: ctx.guildId });
      await command.run(ctx, args, this.app);
    } catch (err) {
      await this.app.errors.handlePrefixError(ctx, err);
    }
  }
}
