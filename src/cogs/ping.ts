import type { APIEmbed } from "discord.js";
import { infoEmbed } from "../embeds.js";
import type { Cog } from "../commands/types.js";

/** `latencyMs` is the gateway heartbeat round trip, shown to two decimals; negative or null before the first beat. */
export function pongEmbed(latencyMs: number | null): APIEmbed {
  const shown = latencyMs === null || latencyMs < 0 ? "n/a" : `${Math.round(latencyMs * 100) / 100}ms`;
  return infoEmbed("🏓 Pong!", `Bot latency: **${shown}**`);
}

export const pingCog: Cog = {
  name: "ping",
  description: "Latency check",
  prefixCommands: [
    {
      name: "ping",
      aliases: ["p"],
      description: "Check the bot's latency",
      run: async (ctx, _args, app) => {
        await ctx.reply({ embeds: [pongEmbed(app.client.ws.ping)] });
      }
    }
  ],
  slashCommands: [
    {
      name: "ping",
      description: "Check the bot's latency",
      run: async (interaction, app) => {
        await interaction.reply({ embeds: [pongEmbed(app.client.ws.ping)] });
      }
    }
  ]
};
