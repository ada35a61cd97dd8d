import {
  ActionRowBuilder,
  ButtonBuilder,
  ButtonStyle,
  MessageFlags,
  ModalBuilder,
  StringSelectMenuBuilder,
  TextInputBuilder,
  TextInputStyle,
  type APIEmbed
} from "discord.js";
import { errorEmbed, infoEmbed, successEmbed } from "../embeds.js";
import type { Choice, Cog, ReplyPayload } from "../commands/types.js";

export const DEMO_OPTIONS: ReadonlyArray<string> = ["Option 1", "Option 2", "Option 3", "Option 4", "Option 5"];

export const DemoIds = {
  primary: "demo:primary",
  danger: "demo:danger",
  disabled: "demo:disabled",
  select: "demo:select",
  modal: "demo:modal",
  nameInput: "name",
  messageInput: "message"
} as const;

/** Case-insensitive substring match, capped at the platform's 25 choices. */
export function filterDemoOptions(current: string): Choice[] {
  const q = current.toLowerCase();
  return DEMO_OPTIONS.filter(o => o.toLowerCase().includes(q)).slice(0, 25).map(o => ({ name: o, value: o }));
}

export function demoPanel(): ReplyPayload {
  const buttons = new ActionRowBuilder<ButtonBuilder>().addComponents(
    new ButtonBuilder().setCustomId(DemoIds.primary).setLabel("Click Me!").setEmoji("✅").setStyle(ButtonStyle.Primary),
    new ButtonBuilder().setCustomId(DemoIds.danger).setLabel("Danger!").setEmoji("⚠️").setStyle(ButtonStyle.Danger),
    new ButtonBuilder().setCustomId(DemoIds.disabled).setLabel("Disabled").setStyle(ButtonStyle.Secondary).setDisabled(true)
  );
  const select = new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(
    new StringSelectMenuBuilder()
      .setCustomId(DemoIds.select)
      .setPlaceholder("Choose an option...")
      .addOptions(
        { label: "Option 1", value: "1", description: "First option" },
        { label: "Option 2", value: "2", description: "Second option" },
        { label: "Option 3", value: "3", description: "Third option" }
      )
  );
  return {
    embeds: [infoEmbed("🎮 Demo UI Components", "Click the buttons or select an option from the dropdown menu below!")],
    components: [buttons, select]
  };
}

export function demoModal(): ModalBuilder {
  return new ModalBuilder()
    .setCustomId(DemoIds.modal)
    .setTitle("Demo Form")
    .addComponents(
      new ActionRowBuilder<TextInputBuilder>().addComponents(
        new TextInputBuilder().setCustomId(DemoIds.nameInput).setLabel("Your Name").setPlaceholder("Enter your name here...")
          .setStyle(TextInputStyle.Short).setRequired(true).setMaxLength(100)
      ),
      new ActionRowBuilder<TextInputBuilder>().addComponents(
        new TextInputBuilder().setCustomId(DemoIds.messageInput).setLabel("Your Message").setPlaceholder("Enter a message...")
          .setStyle(TextInputStyle.Paragraph).setRequired(false).setMaxLength(500)
      )
    );
}

export function formSubmittedEmbed(name: string, message: string): APIEmbed {
  return successEmbed("Form Submitted!", `**Name:** ${name}\n**Message:** ${message || "None"}`);
}

export function userInfoEmbed(user: { id: string; username: string; bot: boolean; createdAt: Date; avatarUrl: string }): APIEmbed {
  const created = user.createdAt.toISOString().slice(0, 19).replace("T", " ");
  return infoEmbed(`User Info: ${user.username}`, `**ID:** ${user.id}\n**Created:** ${created}\n**Bot:** ${user.bot ? "Yes" : "No"}`, {
    thumbnailUrl: user.avatarUrl
  });
}

export function contextMenuEmbed(authorId: string, content: string): APIEmbed {
  return infoEmbed(
    "Context Menu Used!",
    `You right-clicked on a message from <@${authorId}>\nMessage content: ${content.slice(0, 100)}...`
  );
}

export const demoCog: Cog = {
  name: "demo",
  description: "Buttons, select menus, modals, autocomplete and context menus",
  prefixCommands: [
    {
      name: "demo",
      aliases: ["d"],
      description: "Demonstrate buttons and select menus",
      run: async ctx => {
        await ctx.reply(demoPanel());
      }
    }
  ],
  slashCommands: [
    {
      name: "demo",
      description: "Demonstrate buttons and select menus",
      run: async interaction => {
        await interaction.reply(demoPanel());
      }
    },
    {
      name: "modal",
      description: "Demonstrate a modal form",
      run: async interaction => {
        await interaction.showModal(demoModal());
      }
    },
    {
      name: "autocomplete-demo",
      description: "Demonstrate autocomplete",
      options: [{ name: "option", kind: "string", description: "Pick one of the demo options", required: true, autocomplete: filterDemoOptions }],
      run: async interaction => {
        const option = interaction.options.getString("option", true);
        await interaction.reply({ embeds: [successEmbed("Autocomplete Selected!", `You selected: **${option}**`)] });
      }
    }
  ],
  contextMenus: [
    {
      type: "message",
      name: "Demo Context Menu",
      run: async interaction => {
        const { author, content } = interaction.targetMessage;
        await interaction.reply({ embeds: [contextMenuEmbed(author.id, content)], flags: MessageFlags.Ephemeral });
      }
    },
    {
      type: "user",
      name: "Get User Info",
      run: async interaction => {
        const user = interaction.targetUser;
        const embed = userInfoEmbed({
          id: user.id,
          username: user.username,
          bot: user.bot,
          createdAt: user.createdAt,
          avatarUrl: user.displayAvatarURL()
        });
        await interaction.reply({ embeds: [embed], flags: MessageFlags.Ephemeral });
      }
    }
  ],
  components: [
    {
      kind: "button",
      customId: DemoIds.primary,
      run: async interaction => {
        await interaction.reply({ embeds: [successEmbed("Button Clicked!", "You clicked the primary button!")], flags: MessageFlags.Ephemeral });
      }
    },
    {
      kind: "button",
      customId: DemoIds.danger,
      run: async interaction => {
        await interaction.reply({ embeds: [errorEmbed("Danger!", "You clicked the danger button!")], flags: MessageFlags.Ephemeral });
      }
    },
    {
      kind: "select",
      customId: DemoIds.select,
      run: async interaction => {
        const selected = interaction.values[0] ?? "?";
        await interaction.reply({ embeds: [infoEmbed("Selection Made!", `You selected: **Option ${selected}**`)], flags: MessageFlags.Ephemeral });
      }
    },
    {
      kind: "modal",
      customId: DemoIds.modal,
      run: async interaction => {
        const name = interaction.fields.getTextInputValue(DemoIds.nameInput);
        const message = interaction.fields.getTextInputValue(DemoIds.messageInput);
        await interaction.reply({ embeds: [formSubmittedEmbed(name, message)], flags: MessageFlags.Ephemeral });
      }
    }
  ]
};
