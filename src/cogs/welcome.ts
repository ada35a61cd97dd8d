import { Events, PermissionFlagsBits, type APIEmbed, type GuildBasedChannel } from "discord.js";
import { successEmbed } from "../embeds.js";
import type { Cog } from "../commands/types.js";
import { listen } from "../commands/utils.js";
import { Logger } from "../logger.js";

const log = Logger.scoped("welcome");

export interface JoinedMember {
  id: string;
  guildName: string;
  memberCount: number;
  createdTimestamp: number;
  avatarUrl: string;
}

export function welcomeEmbed(m: JoinedMember, now: Date = new Date()): APIEmbed {
  return successEmbed(`Welcome to ${m.guildName}!`, `<@${m.id}> has joined the server!`, {
    thumbnailUrl: m.avatarUrl,
    fields: [
      { name: "Member Count", value: m.memberCount.toLocaleString("en-US"), inline: true },
      { name: "Account Created", value: `<t:${Math.floor(m.createdTimestamp / 1000)}:R>`, inline: true }
    ],
    footer: `User ID: ${m.id}`,
    timestamp: now.toISOString()
  });
}

/** Posts to the configured welcome channel when it belongs to the member's guild. */
export const welcomeCog: Cog = {
  name: "welcome",
  description: "Greets new members",
  listeners: [
    listen(Events.GuildMemberAdd, async (app, member) => {
      const channelId = app.config.welcomeChannelId;
      if (!channelId) return;
      let channel: GuildBasedChannel | null;
      try {
        channel = member.guild.channels.cache.get(channelId) ?? await member.guild.channels.fetch(channelId);
      } catch (err) {
        log.warn(`Welcome channel ${channelId} not reachable. Skipping welcome for ${member.user.tag}.`, err);
        return;
      }
      if (!channel?.isTextBased()) {
        log.debug(`welcome channel ${channelId} is not a text channel in ${member.guild.id}`);
        return;
      }
      const me = member.guild.members.me;
      if (!me?.permissionsIn(channel).has(PermissionFlagsBits.SendMessages)) {
        log.warn(`Missing permission to send messages in welcome channel ${channelId}.`);
        return;
      }
      await channel.send({
        embeds: [welcomeEmbed({
          id: member.id,
          guildName: member.guild.name,
          memberCount: member.guild.memberCount,
          createdTimestamp: member.user.createdTimestamp,
          avatarUrl: member.displayAvatarURL()
        })]
      });
      log.info(`Sent welcome message for ${member.user.tag}`, { user: member.id, guild: member.guild.id });
    }, log)
  ]
};
