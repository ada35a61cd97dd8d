import {
  ApplicationCommandType,
  ContextMenuCommandBuilder,
  PermissionsBitField,
  SlashCommandBuilder,
  type RESTPostAPIApplicationCommandsJSONBody
} from "discord.js";
import type { AppContext } from "./di.js";
import { Logger, type LogSink } from "./logger.js";
import type { Cog, ComponentHandler, ContextMenuCommand, PrefixCommand, SlashCommand } from "./commands/types.js";

type MessageMenu = Extract<ContextMenuCommand, { type: "message" }>;
type UserMenu = Extract<ContextMenuCommand, { type: "user" }>;
type Button = Extract<ComponentHandler, { kind: "button" }>;
type Select = Extract<ComponentHandler, { kind: "select" }>;
type Modal = Extract<ComponentHandler, { kind: "modal" }>;

interface Owned<T> { cog: string; item: T }

export class DuplicateCommandError extends Error {
  constructor(readonly namespace: string, readonly key: string, readonly cog: string, readonly owner: string) {
    super(`${namespace} "${key}" from cog ${cog} is already registered by ${owner}`);
    this.name = "DuplicateCommandError";
  }
}

interface Claim { namespace: string; key: string; taken: ReadonlyMap<string, { cog: string }> }

/**
 * Cogs and the descriptors they contribute, keyed per namespace. A cog loads
 * whole or not at all.
 */
export class CommandRegistry {
  private readonly known = new Map<string, Cog>();
  private readonly loaded = new Map<string, Array<() => void>>();
  private readonly prefix = new Map<string, Owned<PrefixCommand>>();
  private readonly slash = new Map<string, Owned<SlashCommand>>();
  private readonly messageMenus = new Map<string, Owned<MessageMenu>>();
  private readonly userMenus = new Map<string, Owned<UserMenu>>();
  private readonly buttons = new Map<string, Owned<Button>>();
  private readonly selects = new Map<string, Owned<Select>>();
  private readonly modals = new Map<string, Owned<Modal>>();
  private app: AppContext | null = null;
  private readonly log: LogSink;

  constructor(log: LogSink = Logger.scoped("registry")) {
    this.log = log;
  }

  loadCog(cog: Cog): void {
    if (this.loaded.has(cog.name)) throw new Error(`cog already loaded: ${cog.name}`);
    const seen = new Map<string, string>();
    for (const claim of this.claims(cog)) {
      const id = `${claim.namespace}\u0000${claim.key}`;
      const owner = claim.taken.get(claim.key)?.cog ?? seen.get(id);
      if (owner !== undefined) throw new DuplicateCommandError(claim.namespace, claim.key, cog.name, owner);
      seen.set(id, cog.name);
    }

    const own = <T>(item: T): Owned<T> => ({ cog: cog.name, item });
    for (const c of cog.prefixCommands ?? []) {
      for (const key of prefixKeys(c)) this.prefix.set(key, own(c));
    }
    for (const c of cog.slashCommands ?? []) this.slash.set(c.name, own(c));
    for (const m of cog.contextMenus ?? []) {
      if (m.type === "message") this.messageMenus.set(m.name, own(m));
      else this.userMenus.set(m.name, own(m));
    }
    for (const h of cog.components ?? []) {
      switch (h.kind) {
        case "button": this.buttons.set(h.customId, own(h)); break;
        case "select": this.selects.set(h.customId, own(h)); break;
        case "modal": this.modals.set(h.customId, own(h)); break;
      }
    }

    this.known.set(cog.name, cog);
    const detach: Array<() => void> = [];
    this.loaded.set(cog.name, detach);
    if (this.app) this.attachListeners(cog, this.app, detach);
    this.log.info(`loaded cog ${cog.name}`);
  }

  /**
   * Loads each cog on its own; one that fails is logged and skipped.
   * Returns the names that loaded.
   */
  loadAll(cogs: Iterable<Cog>): string[] {
    const ok: string[] = [];
    for (const cog of cogs) {
      try {
        this.loadCog(cog);
        ok.push(cog.name);
      } catch (err) {
        this.log.error(`failed to load cog ${cog.name}`, err);
      }
    }
    return ok;
  }

  /** Loads a cog this registry has seen before, by name. */
  loadByName(name: string): void {
    const cog = this.known.get(name);
    if (!cog) throw new Error(`unknown cog: ${name}`);
    this.loadCog(cog);
  }

  unloadCog(name: string): boolean {
    const detach = this.loaded.get(name);
    if (!detach) return false;
    for (const off of detach) off();
    for (const map of this.namespaces()) {
      for (const [key, entry] of map) if (entry.cog === name) map.delete(key);
    }
    this.loaded.delete(name);
    this.log.info(`unloaded cog ${name}`);
    return true;
  }

  reloadCog(name: string): void {
    const cog = this.known.get(name);
    if (!cog) throw new Error(`unknown cog: ${name}`);
    this.unloadCog(name);
    this.loadCog(cog);
  }

  unloadAll(): void {
    for (const name of [...this.loaded.keys()].reverse()) this.unloadCog(name);
  }

  /** Subscribes listeners of every loaded cog; later loads subscribe immediately. */
  attach(app: AppContext): void {
    this.app = app;
    for (const [name, detach] of this.loaded) {
      const cog = this.known.get(name);
      if (cog && detach.length === 0) this.attachListeners(cog, app, detach);
    }
  }

  isLoaded(name: string): boolean { return this.loaded.has(name); }
  loadedCogs(): string[] { return [...this.loaded.keys()]; }
  knownCogs(): string[] { return [...this.known.keys()]; }

  getPrefix(nameOrAlias: string): PrefixCommand | undefined { return this.prefix.get(nameOrAlias.toLowerCase())?.item; }
  getSlash(name: string): SlashCommand | undefined { return this.slash.get(name)?.item; }
  getMessageMenu(name: string): MessageMenu | undefined { return this.messageMenus.get(name)?.item; }
  getUserMenu(name: string): UserMenu | undefined { return this.userMenus.get(name)?.item; }
  findButton(customId: string): Button | undefined { return matchCustomId(this.buttons, customId); }
  findSelect(customId: string): Select | undefined { return matchCustomId(this.selects, customId); }
  findModal(customId: string): Modal | undefined { return matchCustomId(this.modals, customId); }

  /** Distinct prefix commands in load order. */
  listPrefix(): PrefixCommand[] {
    return [...new Set([...this.prefix.values()].map(e => e.item))];
  }

  listSlash(): SlashCommand[] {
    return [...this.slash.values()].map(e => e.item);
  }

  /** The platform catalog for every loaded slash command and context menu. */
  toApplicationCommands(): RESTPostAPIApplicationCommandsJSONBody[] {
    const body: RESTPostAPIApplicationCommandsJSONBody[] = this.listSlash().map(buildSlashCommand);
    for (const { item } of this.messageMenus.values()) {
      body.push(new ContextMenuCommandBuilder().setName(item.name).setType(ApplicationCommandType.Message).toJSON());
    }
    for (const { item } of this.userMenus.values()) {
      body.push(new ContextMenuCommandBuilder().setName(item.name).setType(ApplicationCommandType.User).toJSON());
    }
    return body;
  }

  private attachListeners(cog: Cog, app: AppContext, detach: Array<() => void>): void {
    for (const l of cog.listeners ?? []) detach.push(l.attach(app.client, app));
  }

  private namespaces(): Array<Map<string, { cog: string }>> {
    return [this.prefix, this.slash, this.messageMenus, this.userMenus, this.buttons, this.selects, this.modals];
  }

  private claims(cog: Cog): Claim[] {
    const out: Claim[] = [];
    for (const c of cog.prefixCommands ?? []) {
      for (const key of prefixKeys(c)) out.push({ namespace: "prefix command", key, taken: this.prefix });
    }
    for (const c of cog.slashCommands ?? []) out.push({ namespace: "slash command", key: c.name, taken: this.slash });
    for (const m of cog.contextMenus ?? []) {
      out.push(m.type === "message"
        ? { namespace: "message context menu", key: m.name, taken: this.messageMenus }
        : { namespace: "user context menu", key: m.name, taken: this.userMenus });
    }
    for (const h of cog.components ?? []) {
      const taken = h.kind === "button" ? this.buttons : h.kind === "select" ? this.selects : this.modals;
      out.push({ namespace: `${h.kind} handler`, key: h.customId, taken });
    }
    return out;
  }
}

function prefixKeys(c: PrefixCommand): string[] {
  return [c.name, ...(c.aliases ?? [])].map(k => k.toLowerCase());
}

/** Exact id first, then the head of `head:rest`. */
function matchCustomId<T>(map: ReadonlyMap<string, Owned<T>>, customId: string): T | undefined {
  const exact = map.get(customId);
  if (exact) return exact.item;
  const sep = customId.indexOf(":");
  return sep > 0 ? map.get(customId.slice(0, sep))?.item : undefined;
}

export function buildSlashCommand(cmd: SlashCommand): RESTPostAPIApplicationCommandsJSONBody {
  const b = new SlashCommandBuilder().setName(cmd.name).setDescription(cmd.description);
  if (cmd.defaultMemberPermissions !== undefined) {
    b.setDefaultMemberPermissions(new PermissionsBitField(cmd.defaultMemberPermissions).bitfield);
  }
  if (cmd.guildOnly) b.setDMPermission(false);
  for (const o of cmd.options ?? []) {
    switch (o.kind) {
      case "string":
        b.addStringOption(x => {
          x.setName(o.name).setDescription(o.description).setRequired(o.required).setAutocomplete(o.autocomplete !== undefined);
          if (o.maxLength !== undefined) x.setMaxLength(o.maxLength);
          return x;
        });
        break;
      case "integer": b.addIntegerOption(x => x.setName(o.name).setDescription(o.description).setRequired(o.required)); break;
      case "number": b.addNumberOption(x => x.setName(o.name).setDescription(o.description).setRequired(o.required)); break;
      case "boolean": b.addBooleanOption(x => x.setName(o.name).setDescription(o.description).setRequired(o.required)); break;
      case "user": b.addUserOption(x => x.setName(o.name).setDescription(o.description).setRequired(o.required)); break;
      case "channel": b.addChannelOption(x => x.setName(o.name).setDescription(o.description).setRequired(o.required)); break;
      case "role": b.addRoleOption(x => x.setName(o.name).setDescription(o.description).setRequired(o.required)); break;
    }
  }
  return b.toJSON();
}
