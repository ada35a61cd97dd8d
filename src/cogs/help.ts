import { MessageFlags, type APIEmbed } from "discord.js";
import type { CommandRegistry } from "../command-registry.js";
import { infoEmbed } from "../embeds.js";
import { UnknownCommandError } from "../errors.js";
import type { Cog } from "../commands/types.js";
import { usageOf } from "../commands/utils.js";

export function helpOverview(registry: CommandRegistry, prefix: string): APIEmbed {
  const prefixLines = registry.listPrefix().map(c => `\`${prefix}${c.name}\` - ${c.description}`);
  const slashLines = registry.listSlash().map(c => `\`/${c.name}\` - ${c.description}`);
  return infoEmbed("Help", `Use \`${prefix}help <command>\` for details on a command.`, {
    fields: [
      { name: "Prefix Commands", value: prefixLines.join("\n") || "None" },
      { name: "Slash Commands", value: slashLines.join("\n") || "None" }
    ]
  });
}

/** Throws UnknownCommandError when `name` matches no prefix command or alias. */
export function helpDetail(registry: CommandRegistry, prefix: string, name: string): APIEmbed {
  const cmd = registry.getPrefix(name);
  if (!cmd) throw new UnknownCommandError(name);
  const fields = [{ name: "Usage", value: `\`${usageOf(prefix, cmd.name, cmd.params)}\`` }];
  if (cmd.aliases && cmd.aliases.length > 0) {
    fields.push({ name: "Aliases", value: cmd.aliases.map(a => `\`${prefix}${a}\``).join(", ") });
  }
  return infoEmbed(`${prefix}${cmd.name}`, cmd.description, { fields });
}

export const helpCog: Cog = {
  name: "help",
  description: "Command listing",
  prefixCommands: [
    {
      name: "help",
      description: "List commands or show details for one",
      params: [{ name: "command", kind: "string", required: false }],
      run: async (ctx, args, app) => {
        const name = args.string("command");
        const embed = name ? helpDetail(app.registry, ctx.prefix, name) : helpOverview(app.registry, ctx.prefix);
        await ctx.reply({ embeds: [embed] });
      }
    }
  ],
  slashCommands: [
    {
      name: "help",
      description: "List commands or show details for one",
      options: [
        {
          name: "command",
          kind: "string",
          description: "Prefix command to describe",
          required: false,
          autocomplete: (current, _interaction, app) => {
            const q = current.toLowerCase();
            return app.registry.listPrefix()
              .filter(c => c.name.includes(q))
              .map(c => ({ name: c.name, value: c.name }));
          }
        }
      ],
      run: async (interaction, app) => {
        const { prefix } = app.config;
        const name = interaction.options.getString("command");
        const embed = name ? helpDetail(app.registry, prefix, name) : helpOverview(app.registry, prefix);
        await interaction.reply({ embeds: [embed], flags: MessageFlags.Ephemeral });
      }
    }
  ]
};
