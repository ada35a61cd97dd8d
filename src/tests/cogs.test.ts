import { Events, PermissionFlagsBits } from "discord.js";
import { afterEach, describe, expect, it, vi } from "vitest";
import { adminCog } from "../cogs/admin.js";
import { demoPanel, filterDemoOptions, formSubmittedEmbed, userInfoEmbed } from "../cogs/demo.js";
import { helpCog, helpDetail, helpOverview } from "../cogs/help.js";
import { eventsCog } from "../cogs/events.js";
import { defaultCogs } from "../cogs/index.js";
import { pingCog, pongEmbed } from "../cogs/ping.js";
import { SharedLookups, memberLeftEmbed, messageDeletedEmbed } from "../cogs/server-logs.js";
import { welcomeEmbed } from "../cogs/welcome.js";
import { PrefixDispatcher } from "../commands/text-router.js";
import { UnknownCommandError } from "../errors.js";
import { CHANNEL_ID, OWNER_ID, USER_ID, fakeMessage, firstEmbed, perms, testApp } from "./helpers.js";

describe("ping", () => {
  it("shows the latency to two decimals", () => {
    expect(pongEmbed(42.456).description).toBe("Bot latency: **42.46ms**");
    expect(pongEmbed(42).description).toBe("Bot latency: **42ms**");
    expect(pongEmbed(-1).description).toBe("Bot latency: **n/a**");
    expect(pongEmbed(null).title).toBe("🏓 Pong!");
  });
});

describe("events", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("logs gateway resumes", () => {
    vi.stubEnv("LOG_LEVEL", "info");
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const { app } = testApp();
    app.registry.loadCog(eventsCog);
    app.registry.attach(app);

    app.client.emit(Events.ShardResume, 0, 3);

    expect(out).toHaveBeenCalledTimes(1);
    const line: unknown = JSON.parse(String(out.mock.calls[0]?.[0]));
    expect(line).toMatchObject({ level: "info", scope: "events", message: "Reconnected to Discord", meta: { shard: 0, replayed: 3 } });
    app.registry.unloadAll();
  });
});

describe("help", () => {
  const { app } = testApp();
  app.registry.loadCog(helpCog);
  app.registry.loadCog(pingCog);

  it("lists prefix and slash commands in load order", () => {
    expect(helpOverview(app.registry, "!").fields).toEqual([
      { name: "Prefix Commands", value: "`!help` - List commands or show details for one\n`!ping` - Check the bot's latency", inline: false },
      { name: "Slash Commands", value: "`/help` - List commands or show details for one\n`/ping` - Check the bot's latency", inline: false }
    ]);
  });

  it("describes one command found by alias", () => {
    expect(helpDetail(app.registry, "!", "p")).toMatchObject({
      title: "!ping",
      description: "Check the bot's latency",
      fields: [
        { name: "Usage", value: "`!ping`", inline: false },
        { name: "Aliases", value: "`!p`", inline: false }
      ]
    });
  });

  it("treats an unknown name as an unknown command", () => {
    expect(() => helpDetail(app.registry, "!", "nope")).toThrow(UnknownCommandError);
  });
});

describe("demo", () => {
  it("filters autocomplete options by substring, ignoring case", () => {
    expect(filterDemoOptions("3")).toEqual([{ name: "Option 3", value: "Option 3" }]);
    expect(filterDemoOptions("OPTION")).toHaveLength(5);
    expect(filterDemoOptions("zzz")).toEqual([]);
  });

  it("sends a panel with a button row and a select row", () => {
    const panel = demoPanel();
    expect(panel.components).toHaveLength(2);
    expect(firstEmbed(panel)).toMatchObject({ title: "🎮 Demo UI Components" });
  });

  it("echoes the form, defaulting an empty message", () => {
    expect(formSubmittedEmbed("Ada", "").description).toBe("**Name:** Ada\n**Message:** None");
  });

  it("formats user info", () => {
    const embed = userInfoEmbed({
      id: USER_ID,
      username: "tester",
      bot: false,
      createdAt: new Date("2020-05-06T07:08:09.000Z"),
      avatarUrl: "https://cdn.example.test/avatar.png"
    });
    expect(embed.title).toBe("User Info: tester");
    expect(embed.description).toBe(`**ID:** ${USER_ID}\n**Created:** 2020-05-06 07:08:09\n**Bot:** No`);
    expect(embed.thumbnail).toEqual({ url: "https://cdn.example.test/avatar.png" });
  });
});

describe("welcome and server logs", () => {
  const member = {
    id: USER_ID,
    username: "tester",
    guildName: "Test Guild",
    memberCount: 1234,
    createdTimestamp: 1_600_000_000_123,
    avatarUrl: "https://cdn.example.test/avatar.png"
  };

  it("builds the welcome card", () => {
    const embed = welcomeEmbed(member, new Date("2024-01-02T03:04:05.000Z"));
    expect(embed.title).toBe("Welcome to Test Guild!");
    expect(embed.fields).toEqual([
      { name: "Member Count", value: "1,234", inline: true },
      { name: "Account Created", value: "<t:1600000000:R>", inline: true }
    ]);
    expect(embed.footer).toEqual({ text: `User ID: ${USER_ID}` });
    expect(embed.timestamp).toBe("2024-01-02T03:04:05.000Z");
  });

  it("shows None for a member without roles", () => {
    const embed = memberLeftEmbed(member, []);
    expect(embed.fields?.[1]).toEqual({ name: "Roles", value: "None", inline: false });
  });

  it("truncates long deleted content and lists attachments", () => {
    const embed = messageDeletedEmbed({
      id: "600000000000000001",
      channelId: CHANNEL_ID,
      authorId: USER_ID,
      authorName: "tester",
      content: "a".repeat(1100),
      attachments: [{ name: "cat.png", size: 2048 }],
      embedCount: 0,
      createdTimestamp: 0
    });
    expect(embed.fields?.[2]?.value).toBe(`${"a".repeat(1024)}...`);
    expect(embed.fields?.[3]).toEqual({ name: "Attachments", value: "- cat.png (2048 bytes)", inline: false });
    expect(embed.fields).toHaveLength(4);
    expect(embed.timestamp).toBe("1970-01-01T00:00:00.000Z");
  });

  it("marks a deletion without text", () => {
    const embed = messageDeletedEmbed({
      id: "600000000000000001",
      channelId: CHANNEL_ID,
      authorId: USER_ID,
      authorName: "tester",
      content: "",
      attachments: [],
      embedCount: 2,
      createdTimestamp: 0
    });
    expect(embed.fields?.[2]?.value).toBe("*No text content*");
    expect(embed.fields?.[3]).toEqual({ name: "Embeds", value: "2 embed(s)", inline: true });
  });
});

describe("log channel lookups", () => {
  /** A guild's channel list where creating takes a tick. */
  function guildChannels() {
    const names: string[] = [];
    const created: string[] = [];
    const findOrCreate = async (name: string): Promise<string | null> => {
      if (names.includes(name)) return name;
      await Promise.resolve();
      created.push(name);
      names.push(name);
      return name;
    };
    return { created, findOrCreate };
  }

  it("creates a channel once when events arrive together", async () => {
    const lookups = new SharedLookups<string | null>();
    const guild = guildChannels();
    const results = await Promise.all([
      lookups.run("g1:member-logs", () => guild.findOrCreate("member-logs")),
      lookups.run("g1:member-logs", () => guild.findOrCreate("member-logs"))
    ]);
    expect(results).toEqual(["member-logs", "member-logs"]);
    expect(guild.created).toEqual(["member-logs"]);
  });

  it("asks again once a lookup has settled", async () => {
    const lookups = new SharedLookups<string | null>();
    let calls = 0;
    const denied = async (): Promise<string | null> => { calls++; return null; };
    expect(await lookups.run("g1:member-logs", denied)).toBeNull();
    expect(await lookups.run("g1:member-logs", async () => { calls++; return "member-logs"; })).toBe("member-logs");
    expect(calls).toBe(2);
  });

  it("does not keep a failed lookup", async () => {
    const lookups = new SharedLookups<string | null>();
    await expect(lookups.run("g1:message-logs", async () => { throw new Error("Missing Access"); })).rejects.toThrow("Missing Access");
    expect(await lookups.run("g1:message-logs", async () => "message-logs")).toBe("message-logs");
  });
});

describe("admin", () => {
  function setup() {
    const { app } = testApp();
    for (const cog of defaultCogs()) app.registry.loadCog(cog);
    return { app, dispatcher: new PrefixDispatcher(app) };
  }
  const asOwner = { author: { id: OWNER_ID, tag: "owner", bot: false } };

  it("repeats text without pinging anyone, once per cooldown", async () => {
    const { dispatcher } = setup();
    const member = { permissions: perms(PermissionFlagsBits.ManageMessages) };
    const first = fakeMessage("!say hi @everyone", { member });
    await dispatcher.handleMessage(first);
    expect(first.replies).toEqual([{ content: "hi @everyone", allowedMentions: { parse: [] } }]);

    const second = fakeMessage("!say again", { member });
    await dispatcher.handleMessage(second);
    expect(firstEmbed(second.replies[0])).toMatchObject({
      title: "Command on Cooldown",
      description: "Please wait 10.00 seconds before using this command again."
    });
  });

  it("repeats quotes, spacing and line breaks as written", async () => {
    const { dispatcher } = setup();
    const message = fakeMessage('!say He said "hi   there"\nline two', { member: { permissions: perms(PermissionFlagsBits.ManageMessages) } });
    await dispatcher.handleMessage(message);
    expect(message.replies).toEqual([{ content: 'He said "hi   there"\nline two', allowedMentions: { parse: [] } }]);
  });

  it("requires Manage Messages to say anything", async () => {
    const { dispatcher } = setup();
    const message = fakeMessage("!say hi", { member: { permissions: perms(PermissionFlagsBits.SendMessages) } });
    await dispatcher.handleMessage(message);
    expect(firstEmbed(message.replies[0])).toMatchObject({ title: "Missing Permissions" });
  });

  it("lets owners unload and load cogs", async () => {
    const { app, dispatcher } = setup();
    const unload = fakeMessage("!unload ping", asOwner);
    await dispatcher.handleMessage(unload);
    expect(app.registry.isLoaded("ping")).toBe(false);
    expect(firstEmbed(unload.replies[0])).toMatchObject({ title: "Done", description: "Cog `ping` unloaded." });

    await dispatcher.handleMessage(fakeMessage("!load ping", asOwner));
    expect(app.registry.getPrefix("ping")?.name).toBe("ping");
  });

  it("keeps cog management away from everyone else", async () => {
    const { app, dispatcher } = setup();
    const message = fakeMessage("!unload ping");
    await dispatcher.handleMessage(message);
    expect(app.registry.isLoaded("ping")).toBe(true);
    expect(firstEmbed(message.replies[0])).toMatchObject({ title: "Missing Permissions" });
  });

  it("rejects unknown cogs and unloading itself", async () => {
    const { dispatcher } = setup();
    const unknown = fakeMessage("!load nope", asOwner);
    await dispatcher.handleMessage(unknown);
    expect(firstEmbed(unknown.replies[0])).toMatchObject({ description: "The `cog` argument is not a known cog." });

    const self = fakeMessage(`!unload ${adminCog.name}`, asOwner);
    await dispatcher.handleMessage(self);
    expect(firstEmbed(self.replies[0])).toMatchObject({ description: "The `cog` argument can't be unloaded while its commands are in use." });
  });
});
