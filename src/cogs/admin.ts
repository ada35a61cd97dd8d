import { PermissionFlagsBits } from "discord.js";
import { DuplicateCommandError } from "../command-registry.js";
import { errorEmbed, infoEmbed, successEmbed } from "../embeds.js";
import { BadArgumentError } from "../errors.js";
import { guildOnly, isBotOwner, requirePermissions } from "../commands/guards.js";
import type { Cog, CooldownSpec, PrefixContext } from "../commands/types.js";
import type { AppContext } from "../di.js";

const SAY_COOLDOWN: CooldownSpec = { uses: 1, perMs: 10_000, scope: "user" };
const NO_MENTIONS = { parse: [] };

type CogAction = "load" | "unload" | "reload";

/** Applies `action` to a named cog; refuses to unload the cog that hosts these commands. */
export async function manageCog(ctx: PrefixContext, app: AppContext, action: CogAction, name: string): Promise<void> {
  const { registry } = app;
  if (!registry.knownCogs().includes(name)) throw new BadArgumentError("cog", "is not a known cog", name);
  if (action === "unload" && name === adminCog.name) throw new BadArgumentError("cog", "can't be unloaded while its commands are in use", name);
  switch (action) {
    case "load":
      if (registry.isLoaded(name)) {
        await ctx.reply({ embeds: [infoEmbed("Already Loaded", `Cog \`${name}\` is already loaded.`)] });
        return;
      }
      try {
        registry.loadByName(name);
      } catch (err) {
        if (!(err instanceof DuplicateCommandError)) throw err;
        await ctx.reply({ embeds: [errorEmbed("Load Failed", err.message)] });
        return;
      }
      break;
    case "unload":
      if (!registry.unloadCog(name)) {
        await ctx.reply({ embeds: [infoEmbed("Not Loaded", `Cog \`${name}\` is not loaded.`)] });
        return;
      }
      break;
    case "reload":
      registry.reloadCog(name);
      break;
  }
  app.log.info(`cog ${name} ${action}ed by ${ctx.user.tag}`, { user: ctx.user.id });
  await ctx.reply({ embeds: [successEmbed("Done", `Cog \`${name}\` ${action}ed.`)] });
}

const cogParam = [{ name: "cog", kind: "string", required: true }] as const;

export const adminCog: Cog = {
  name: "admin",
  description: "Moderation and cog management",
  prefixCommands: [
    {
      name: "say",
      description: "Make the bot repeat a message",
      params: [{ name: "text", kind: "text", required: true }],
      checks: [guildOnly(), requirePermissions(PermissionFlagsBits.ManageMessages)],
      cooldown: SAY_COOLDOWN,
      run: async (ctx, args) => {
        await ctx.reply({ content: args.string("text") ?? "", allowedMentions: NO_MENTIONS });
      }
    },
    {
      name: "cogs",
      description: "List loaded and available cogs",
      checks: [isBotOwner()],
      run: async (ctx, _args, app) => {
        const loaded = app.registry.loadedCogs();
        const idle = app.registry.knownCogs().filter(n => !loaded.includes(n));
        await ctx.reply({
          embeds: [infoEmbed("Cogs", "", {
            fields: [
              { name: "Loaded", value: loaded.map(n => `\`${n}\``).join(", ") || "None" },
              { name: "Unloaded", value: idle.map(n => `\`${n}\``).join(", ") || "None" }
            ]
          })]
        });
      }
    },
    {
      name: "load",
      description: "Load a cog",
      params: cogParam,
      checks: [isBotOwner()],
      run: (ctx, args, app) => manageCog(ctx, app, "load", args.string("cog") ?? "")
    },
    {
      name: "unload",
      description: "Unload a cog",
      params: cogParam,
      checks: [isBotOwner()],
      run: (ctx, args, app) => manageCog(ctx, app, "unload", args.string("cog") ?? "")
    },
    {
      name: "reload",
      description: "Reload a cog",
      params: cogParam,
      checks: [isBotOwner()],
      run: (ctx, args, app) => manageCog(ctx, app, "reload", args.string("cog") ?? "")
    }
  ],
  slashCommands: [
    {
      name: "say",
      description: "Make the bot repeat a message",
      options: [{ name: "text", kind: "string", description: "What to say", required: true, maxLength: 2000 }],
      defaultMemberPermissions: PermissionFlagsBits.ManageMessages,
      guildOnly: true,
      checks: [guildOnly(), requirePermissions(PermissionFlagsBits.ManageMessages)],
      cooldown: SAY_COOLDOWN,
      run: async interaction => {
        await interaction.reply({ content: interaction.options.getString("text", true), allowedMentions: NO_MENTIONS });
      }
    }
  ]
};
