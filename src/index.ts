import { Client, Events, GatewayIntentBits, REST } from "discord.js";
import { Bot } from "./bot.js";
import { defaultCogs } from "./cogs/index.js";
import { InteractionDispatcher } from "./commands/slash-router.js";
import { PrefixDispatcher } from "./commands/text-router.js";
import { ConfigError, loadConfig, type BotConfig } from "./config.js";
import { createContext } from "./di.js";
import { startHealthServer } from "./health.js";
import { Logger } from "./logger.js";
import { ShutdownManager } from "./shutdown.js";
import { publishCommands } from "./sync.js";

function readConfig(): BotConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      Logger.error("invalid configuration", { problems: err.problems });
    } else {
      Logger.error("failed to load configuration", err);
    }
    process.exit(1);
  }
}

async function start(): Promise<void> {
  const config = readConfig();
  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent, GatewayIntentBits.GuildMembers]
  });
  const app = createContext(config, client);
  const prefixDispatcher = new PrefixDispatcher(app);
  const interactionDispatcher = new InteractionDispatcher(app);
  const rest = new REST().setToken(config.token);

  const bot = new Bot(client, { token: config.token, shutdownTimeoutMs: config.shutdownTimeoutMs }, {
    setup: () => {
      const cogs = defaultCogs();
      const loaded = app.registry.loadAll(cogs);
      if (loaded.length < cogs.length) app.log.warn(`loaded ${loaded.length} of ${cogs.length} cogs`);
      app.registry.attach(app);
      client.on(Events.MessageCreate, async message => {
        try {
          await app.inflight.track(prefixDispatcher.handleMessage(message));
        } catch (err) {
          app.log.error("message handler error", err);
        }
      });
      client.on(Events.InteractionCreate, async interaction => {
        try {
          await app.inflight.track(interactionDispatcher.handleInteraction(interaction));
        } catch (err) {
          app.log.error("interaction handler error", err);
        }
      });
    },
    sync: () => publishCommands(
      rest,
      { applicationId: config.applicationId, devGuildId: config.devGuildId, enabled: config.syncCommands },
      app.registry.toApplicationCommands(),
      Logger.scoped("sync")
    ),
    teardown: () => {
      app.registry.unloadAll();
      app.log.debug("clearing cooldowns", { windows: app.cooldowns.size });
      app.cooldowns.clear();
    }
  }, app.inflight);

  new ShutdownManager(bot).setup();
  if (config.healthPort !== null) startHealthServer(config.healthPort, bot);

  Logger.info("starting", { prefix: config.prefix, devGuild: config.devGuildId, sync: config.syncCommands });
  await bot.start();
}

start().catch(err => {
  Logger.error("startup error", err);
  process.exit(1);
});
