import {
  ChannelType,
  Events,
  PermissionFlagsBits,
  type APIEmbed,
  type CategoryChannel,
  type Guild,
  type TextChannel
} from "discord.js";
import { infoEmbed, warningEmbed, type EmbedField } from "../embeds.js";
import type { Cog } from "../commands/types.js";
import { listen } from "../commands/utils.js";
import { Logger } from "../logger.js";

const log = Logger.scoped("server-logs");

export const LOGS_CATEGORY = "Server Logs";
export const MEMBER_LOGS = "member-logs";
export const MESSAGE_LOGS = "message-logs";
const CONTENT_LIMIT = 1024;

export interface LoggedMember {
  id: string;
  username: string;
  avatarUrl: string;
  createdTimestamp: number;
  memberCount: number;
}

export function memberJoinedEmbed(m: LoggedMember, now: Date = new Date()): APIEmbed {
  return infoEmbed("Member Joined", `<@${m.id}> (\`${m.username}\`)`, {
    thumbnailUrl: m.avatarUrl,
    fields: [
      { name: "User ID", value: `\`${m.id}\``, inline: true },
      { name: "Account Created", value: `<t:${Math.floor(m.createdTimestamp / 1000)}:R>`, inline: true },
      { name: "Member Count", value: m.memberCount.toLocaleString("en-US"), inline: true }
    ],
    footer: `User ID: ${m.id}`,
    timestamp: now.toISOString()
  });
}

/** `roleIds` excludes @everyone. */
export function memberLeftEmbed(m: LoggedMember, roleIds: ReadonlyArray<string>, now: Date = new Date()): APIEmbed {
  const roles = roleIds.map(id => `<@&${id}>`).join(", ") || "None";
  return warningEmbed("Member Left", `<@${m.id}> (\`${m.username}\`) left the server`, {
    thumbnailUrl: m.avatarUrl,
    fields: [
      { name: "User ID", value: `\`${m.id}\``, inline: true },
      { name: "Roles", value: roles.length <= CONTENT_LIMIT ? roles : `${roleIds.length} roles` },
      { name: "Member Count", value: m.memberCount.toLocaleString("en-US"), inline: true }
    ],
    footer: `User ID: ${m.id}`,
    timestamp: now.toISOString()
  });
}

export interface DeletedMessage {
  id: string;
  channelId: string;
  authorId: string;
  authorName: string;
  content: string;
  attachments: ReadonlyArray<{ name: string; size: number }>;
  embedCount: number;
  createdTimestamp: number;
}

export function messageDeletedEmbed(m: DeletedMessage): APIEmbed {
  const fields: EmbedField[] = [
    { name: "Author", value: `<@${m.authorId}> (\`${m.authorName}\`)`, inline: true },
    { name: "Channel", value: `<#${m.channelId}>`, inline: true },
    {
      name: "Content",
      value: m.content
        ? m.content.slice(0, CONTENT_LIMIT) + (m.content.length > CONTENT_LIMIT ? "..." : "")
        : "*No text content*"
    }
  ];
  if (m.attachments.length > 0) {
    fields.push({ name: "Attachments", value: m.attachments.map(a => `- ${a.name} (${a.size} bytes)`).join("\n").slice(0, CONTENT_LIMIT) });
  }
  if (m.embedCount > 0) fields.push({ name: "Embeds", value: `${m.embedCount} embed(s)`, inline: true });
  return warningEmbed("Message Deleted", `Message deleted in <#${m.channelId}>`, {
    fields,
    footer: `Message ID: ${m.id} | User ID: ${m.authorId}`,
    timestamp: new Date(m.createdTimestamp).toISOString()
  });
}

/**
 * One pending lookup per key: callers that arrive while it runs share its
 * result. Settled results are dropped, so a later call looks again.
 */
export class SharedLookups<T> {
  private readonly pending = new Map<string, Promise<T>>();

  run(key: string, lookup: () => Promise<T>): Promise<T> {
    const existing = this.pending.get(key);
    if (existing) return existing;
    const next = lookup().finally(() => { this.pending.delete(key); });
    this.pending.set(key, next);
    return next;
  }
}

/**
 * Finds or creates the log channels per guild. Found channels come from the
 * guild's channel cache; a guild where the bot could not manage channels is
 * asked again on the next event.
 */
class LogChannels {
  private readonly channels = new SharedLookups<TextChannel | null>();
  private readonly categories = new SharedLookups<CategoryChannel>();

  get(guild: Guild, name: string): Promise<TextChannel | null> {
    return this.channels.run(`${guild.id}:${name}`, () => this.resolve(guild, name));
  }

  private async resolve(guild: Guild, name: string): Promise<TextChannel | null> {
    const existing = guild.channels.cache.find((c): c is TextChannel => c.type === ChannelType.GuildText && c.name === name);
    if (existing) return existing;
    const me = guild.members.me;
    if (!me?.permissions.has(PermissionFlagsBits.ManageChannels)) {
      log.warn(`Missing Manage Channels in ${guild.name}; cannot create ${name}.`, { guild: guild.id });
      return null;
    }
    try {
      const category = await this.categories.run(guild.id, () => this.category(guild));
      const channel = await guild.channels.create({
        name,
        type: ChannelType.GuildText,
        parent: category.id,
        permissionOverwrites: [
          { id: guild.roles.everyone.id, deny: [PermissionFlagsBits.ViewChannel] },
          { id: me.id, allow: [PermissionFlagsBits.ViewChannel, PermissionFlagsBits.SendMessages] }
        ],
        reason: "Automatic logs channel creation"
      });
      log.info(`Created logs channel ${name} in ${guild.name}`, { guild: guild.id });
      return channel;
    } catch (err) {
      log.error(`Failed to create logs channel ${name} in ${guild.name}`, err);
      return null;
    }
  }

  private async category(guild: Guild): Promise<CategoryChannel> {
    const existing = guild.channels.cache.find((c): c is CategoryChannel => c.type === ChannelType.GuildCategory && c.name === LOGS_CATEGORY);
    if (existing) return existing;
    const created = await guild.channels.create({ name: LOGS_CATEGORY, type: ChannelType.GuildCategory, reason: "Automatic logs category creation" });
    log.info(`Created logs category in ${guild.name}`, { guild: guild.id });
    return created;
  }
}

function canSend(guild: Guild, channel: TextChannel): boolean {
  return guild.members.me?.permissionsIn(channel).has(PermissionFlagsBits.SendMessages) ?? false;
}

export function serverLogsCog(): Cog {
  const channels = new LogChannels();
  return {
    name: "server-logs",
    description: "Member and message audit channels",
    listeners: [
      listen(Events.GuildMemberAdd, async (_app, member) => {
        const channel = await channels.get(member.guild, MEMBER_LOGS);
        if (!channel || !canSend(member.guild, channel)) return;
        await channel.send({
          embeds: [memberJoinedEmbed({
            id: member.id,
            username: member.user.username,
            avatarUrl: member.displayAvatarURL(),
            createdTimestamp: member.user.createdTimestamp,
            memberCount: member.guild.memberCount
          })]
        });
      }, log),
      listen(Events.GuildMemberRemove, async (_app, member) => {
        const channel = await channels.get(member.guild, MEMBER_LOGS);
        if (!channel || !canSend(member.guild, channel)) return;
        const roleIds = [...member.roles.cache.keys()].filter(id => id !== member.guild.id);
        await channel.send({
          embeds: [memberLeftEmbed({
            id: member.id,
            username: member.user.username,
            avatarUrl: member.displayAvatarURL(),
            createdTimestamp: member.user.createdTimestamp,
            memberCount: member.guild.memberCount
          }, roleIds)]
        });
      }, log),
      listen(Events.MessageDelete, async (_app, message) => {
        const { guild, author } = message;
        if (!guild || !author || author.bot) return;
        const channel = await channels.get(guild, MESSAGE_LOGS);
        if (!channel || channel.id === message.channelId || !canSend(guild, channel)) return;
        await channel.send({
          embeds: [messageDeletedEmbed({
            id: message.id,
            channelId: message.channelId,
            authorId: author.id,
            authorName: author.username,
            content: message.content ?? "",
            attachments: [...message.attachments.values()].map(a => ({ name: a.name, size: a.size })),
            embedCount: message.embeds.length,
            createdTimestamp: message.createdTimestamp
          })]
        });
      }, log)
    ]
  };
}
