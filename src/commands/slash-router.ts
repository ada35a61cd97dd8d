import type {
  AutocompleteInteraction,
  ButtonInteraction,
  ChatInputCommandInteraction,
  InteractionType,
  MessageContextMenuCommandInteraction,
  ModalSubmitInteraction,
  StringSelectMenuInteraction,
  UserContextMenuCommandInteraction
} from "discord.js";
import type { AppContext } from "../di.js";
import { UnknownCommandError } from "../errors.js";
import { Logger, serializeError, type LogSink } from "../logger.js";
import { runGuards } from "./guards.js";
import type { Guarded, InteractionOrigin, InteractionTarget, InvocationContext } from "./types.js";
import { contextFromInteraction } from "./utils.js";

/** A resolved descriptor with its arguments already bound. */
export interface Invocable extends Guarded {
  run(): Promise<void>;
}

/** A gateway interaction before it is narrowed to one kind. */
export interface RoutableInteraction extends InteractionOrigin {
  readonly type: InteractionType;
  isAutocomplete(): this is AutocompleteInteraction;
  isChatInputCommand(): this is ChatInputCommandInteraction;
  isMessageContextMenuCommand(): this is MessageContextMenuCommandInteraction;
  isUserContextMenuCommand(): this is UserContextMenuCommandInteraction;
  isButton(): this is ButtonInteraction;
  isStringSelectMenu(): this is StringSelectMenuInteraction;
  isModalSubmit(): this is ModalSubmitInteraction;
}

const MAX_CHOICES = 25;

/** Handles slash commands, context menus, components, modals and autocomplete */
export class InteractionDispatcher {
  private app: AppContext;
  private log: LogSink;

  constructor(app: AppContext, log: LogSink = Logger.scoped("interactions")) {
    this.app = app;
    this.log = log;
  }

  async handleInteraction(interaction: RoutableInteraction): Promise<void> {
    const { registry } = this.app;
    if (interaction.isAutocomplete()) {
      await this.autocomplete(interaction);
      return;
    }
    if (interaction.isChatInputCommand()) {
      const cmd = registry.getSlash(interaction.commandName);
      await this.invoke(interaction, contextFromInteraction(interaction, interaction.commandName),
        cmd && { checks: cmd.checks, cooldown: cmd.cooldown, run: () => cmd.run(interaction, this.app) });
      return;
    }
    if (interaction.isMessageContextMenuCommand()) {
      const menu = registry.getMessageMenu(interaction.commandName);
      await this.invoke(interaction, contextFromInteraction(interaction, interaction.commandName),
        menu && { checks: menu.checks, cooldown: menu.cooldown, run: () => menu.run(interaction, this.app) });
      return;
    }
    if (interaction.isUserContextMenuCommand()) {
      const menu = registry.getUserMenu(interaction.commandName);
      await this.invoke(interaction, contextFromInteraction(interaction, interaction.commandName),
        menu && { checks: menu.checks, cooldown: menu.cooldown, run: () => menu.run(interaction, this.app) });
      return;
    }
    if (interaction.isButton()) {
      const h = registry.findButton(interaction.customId);
      await this.invoke(interaction, contextFromInteraction(interaction, h?.customId ?? interaction.customId),
        h && { checks: h.checks, cooldown: h.cooldown, run: () => h.run(interaction, this.app) });
      return;
    }
    if (interaction.isStringSelectMenu()) {
      const h = registry.findSelect(interaction.customId);
      await this.invoke(interaction, contextFromInteraction(interaction, h?.customId ?? interaction.customId),
        h && { checks: h.checks, cooldown: h.cooldown, run: () => h.run(interaction, this.app) });
      return;
    }
    if (interaction.isModalSubmit()) {
      const h = registry.findModal(interaction.customId);
      await this.invoke(interaction, contextFromInteraction(interaction, h?.customId ?? interaction.customId),
        h && { checks: h.checks, cooldown: h.cooldown, run: () => h.run(interaction, this.app) });
      return;
    }
    this.log.debug("ignoring unsupported interaction", { type: interaction.type, user: interaction.user.id });
  }

  /**
   * Runs guards then the handler; every failure, including an unresolved
   * descriptor, goes through the application error funnel.
   */
  async invoke(target: InteractionTarget, ctx: InvocationContext, entry: Invocable | undefined): Promise<void> {
    try {
      if (!entry) throw new UnknownCommandError(ctx.commandName);
      await runGuards(entry, ctx, this.app);
      this.log.debug(`interaction ${ctx.commandName}`, { user: ctx.user.id, guild: ctx.guildId });
      await entry.run();
    } catch (err) {
      await this.app.errors.handleAppCommandError({ ...ctx, interaction: target }, err);
    }
  }

  private async autocomplete(interaction: AutocompleteInteraction): Promise<void> {
    const focused = interaction.options.getFocused(true);
    const option = this.app.registry.getSlash(interaction.commandName)?.options?.find(o => o.name === focused.name);
    try {
      const choices = option?.autocomplete ? await option.autocomplete(focused.value, interaction, this.app) : [];
      await interaction.respond(choices.slice(0, MAX_CHOICES));
    } catch (err) {
      this.log.error("autocomplete failed", { command: interaction.commandName, option: focused.name, cause: serializeError(err) });
      if (interaction.responded) return;
      try {
        await interaction.respond([]);
      } catch (respondErr) {
        this.log.error("failed to answer autocomplete", { command: interaction.commandName, cause: serializeError(respondErr) });
      }
    }
  }
}
