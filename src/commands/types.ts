import type {
  AutocompleteInteraction,
  BaseMessageOptions,
  ButtonInteraction,
  ChatInputCommandInteraction,
  ClientEvents,
  Client,
  MessageContextMenuCommandInteraction,
  MessageFlags,
  ModalSubmitInteraction,
  PermissionResolvable,
  PermissionsBitField,
  StringSelectMenuInteraction,
  UserContextMenuCommandInteraction
} from "discord.js";
import type { AppContext } from "../di.js";

export interface Invoker { id: string; tag: string }

/** One incoming user action, independent of how it arrived. */
export interface InvocationContext {
  commandName: string;
  user: Invoker;
  guildId: string | null;
  channelId: string | null;
  /** Null outside guilds */
  memberPermissions: Readonly<PermissionsBitField> | null;
  guildOwnerId: string | null;
}

export type ReplyPayload = Pick<BaseMessageOptions, "content" | "embeds" | "components" | "allowedMentions">;
export type InteractionPayload = ReplyPayload & { flags?: MessageFlags.Ephemeral };

/** The slice of a gateway message the prefix path reads. */
export interface IncomingMessage {
  content: string;
  author: { id: string; tag: string; bot: boolean };
  guildId: string | null;
  channelId: string;
  member: { permissions: Readonly<PermissionsBitField> } | null;
  guild: { ownerId: string } | null;
  reply(options: ReplyPayload): Promise<unknown>;
}

/** Who and where, as every gateway interaction carries it. */
export interface InteractionOrigin {
  readonly user: { id: string; tag: string };
  readonly guildId: string | null;
  readonly channelId: string | null;
  readonly memberPermissions: Readonly<PermissionsBitField> | null;
  readonly guild: { ownerId: string } | null;
}

/** The slice of a repliable interaction the error funnel needs. */
export interface InteractionTarget {
  readonly replied: boolean;
  readonly deferred: boolean;
  reply(options: InteractionPayload): Promise<unknown>;
  followUp(options: InteractionPayload): Promise<unknown>;
}

export type Check = (ctx: InvocationContext, app: AppContext) => boolean | Promise<boolean>;

export interface CooldownSpec {
  uses: number;
  perMs: number;
  scope?: "user" | "guild" | "channel";
}

/** Shared precondition fields for every invocable descriptor. */
export interface Guarded {
  checks?: ReadonlyArray<Check>;
  cooldown?: CooldownSpec;
}

export type PrefixParamKind = "string" | "integer" | "number" | "boolean" | "user" | "text";
export interface PrefixParam { name: string; kind: PrefixParamKind; required: boolean }
export type ArgValue = string | number | boolean;

export interface PrefixContext extends InvocationContext {
  prefix: string;
  reply(payload: ReplyPayload): Promise<void>;
}

export interface PrefixArgsView {
  string(name: string): string | undefined;
  number(name: string): number | undefined;
  boolean(name: string): boolean | undefined;
}

export interface PrefixCommand extends Guarded {
  name: string;
  description: string;
  aliases?: ReadonlyArray<string>;
  params?: ReadonlyArray<PrefixParam>;
  run(ctx: PrefixContext, args: PrefixArgsView, app: AppContext): Promise<void>;
}

export type SlashOptionKind = "string" | "integer" | "number" | "boolean" | "user" | "channel" | "role";
export interface Choice { name: string; value: string }
export type AutocompleteProvider = (current: string, interaction: AutocompleteInteraction, app: AppContext) => Promise<ReadonlyArray<Choice>> | ReadonlyArray<Choice>;

export interface SlashOption {
  name: string;
  kind: SlashOptionKind;
  description: string;
  required: boolean;
  /** Only for string options */
  autocomplete?: AutocompleteProvider;
  maxLength?: number;
}

export interface SlashCommand extends Guarded {
  name: string;
  description: string;
  options?: ReadonlyArray<SlashOption>;
  defaultMemberPermissions?: PermissionResolvable;
  guildOnly?: boolean;
  run(interaction: ChatInputCommandInteraction, app: AppContext): Promise<void>;
}

export type ContextMenuCommand =
  | (Guarded & { type: "message"; name: string; run(interaction: MessageContextMenuCommandInteraction, app: AppContext): Promise<void> })
  | (Guarded & { type: "user"; name: string; run(interaction: UserContextMenuCommandInteraction, app: AppContext): Promise<void> });

/** `customId` matches exactly, or as the head of `customId:anything`. */
export type ComponentHandler =
  | (Guarded & { kind: "button"; customId: string; run(interaction: ButtonInteraction, app: AppContext): Promise<void> })
  | (Guarded & { kind: "select"; customId: string; run(interaction: StringSelectMenuInteraction, app: AppContext): Promise<void> })
  | (Guarded & { kind: "modal"; customId: string; run(interaction: ModalSubmitInteraction, app: AppContext): Promise<void> });

export type ComponentKind = ComponentHandler["kind"];

export interface Listener {
  event: keyof ClientEvents;
  /** Subscribes on `client` and returns the matching unsubscribe. */
  attach(client: Client, app: AppContext): () => void;
}

export interface Cog {
  name: string;
  description?: string;
  prefixCommands?: ReadonlyArray<PrefixCommand>;
  slashCommands?: ReadonlyArray<SlashCommand>;
  contextMenus?: ReadonlyArray<ContextMenuCommand>;
  components?: ReadonlyArray<ComponentHandler>;
  listeners?: ReadonlyArray<Listener>;
}
