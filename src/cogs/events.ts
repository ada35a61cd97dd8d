import { ActivityType, Events, version } from "discord.js";
import type { Cog } from "../commands/types.js";
import { listen } from "../commands/utils.js";
import { Logger } from "../logger.js";

const log = Logger.scoped("events");

export const eventsCog: Cog = {
  name: "events",
  description: "Core gateway event logging and presence",
  listeners: [
    listen(Events.ClientReady, (app, client) => {
      log.info(`${client.user.username} is ready!`, {
        id: client.user.id,
        discordjs: version,
        guilds: client.guilds.cache.size,
        users: client.users.cache.size
      });
      client.user.setPresence({ activities: [{ name: `${app.config.prefix}help`, type: ActivityType.Playing }], status: "online" });
    }, log),
    listen(Events.GuildCreate, (_app, guild) => {
      log.info(`Joined guild: ${guild.name}`, { guild: guild.id });
    }, log),
    listen(Events.GuildDelete, (_app, guild) => {
      log.info(`Left guild: ${guild.name}`, { guild: guild.id });
    }, log),
    listen(Events.ShardDisconnect, (_app, event, shardId) => {
      log.warn("Disconnected from Discord", { shard: shardId, code: event.code });
    }, log),
    listen(Events.ShardResume, (_app, shardId, replayedEvents) => {
      log.info("Reconnected to Discord", { shard: shardId, replayed: replayedEvents });
    }, log),
    listen(Events.Error, (_app, err) => {
      log.error("client error", err);
    }, log),
    listen(Events.Warn, (_app, message) => {
      log.warn(message);
    }, log)
  ]
};
