import { Routes, type RESTPostAPIApplicationCommandsJSONBody } from "discord.js";
import { serializeError, type LogSink } from "./logger.js";

/** The one REST call catalog publishing needs; discord.js `REST` satisfies it. */
export interface CommandCatalog {
  put(route: `/${string}`, options: { body: unknown }): Promise<unknown>;
}

export interface PublishOptions {
  applicationId: string;
  devGuildId: string | null;
  enabled: boolean;
}

/**
 * Replaces the application's command catalog in one bulk overwrite, scoped to the
 * dev guild when one is configured. Returns the number of commands published,
 * 0 when sync is disabled, or null when the platform rejected the call.
 */
export async function publishCommands(
  rest: CommandCatalog,
  opts: PublishOptions,
  commands: ReadonlyArray<RESTPostAPIApplicationCommandsJSONBody>,
  log: LogSink
): Promise<number | null> {
  if (!opts.enabled) {
    log.info("command sync disabled; skipping");
    return 0;
  }
  const scope = opts.devGuildId ? `guild ${opts.devGuildId}` : "global";
  const route = opts.devGuildId
    ? Routes.applicationGuildCommands(opts.applicationId, opts.devGuildId)
    : Routes.applicationCommands(opts.applicationId);
  try {
    const res = await rest.put(route, { body: commands });
    const count = Array.isArray(res) ? res.length : commands.length;
    log.info(`synced ${count} application command(s)`, { scope });
    return count;
  } catch (err) {
    log.error("failed to sync application commands", { scope, cause: serializeError(err) });
    return null;
  }
}
