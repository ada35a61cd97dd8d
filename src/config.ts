import dotenv from "dotenv";
import { existsSync, readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";

dotenv.config();

export interface BotConfig {
  token: string;
  applicationId: string;
  devGuildId: string | null;
  prefix: string;
  syncCommands: boolean;
  ownerIds: ReadonlyArray<string>;
  welcomeChannelId: string | null;
  healthPort: number | null;
  shutdownTimeoutMs: number;
}

export class ConfigError extends Error {
  readonly problems: ReadonlyArray<string>;
  constructor(problems: ReadonlyArray<string>) {
    super(`invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

const snowflake = z.string().regex(/^\d{17,20}$/, "must be a numeric Discord ID");

const schema = z.object({
  token: z.string({ required_error: "is required" }).min(1, "is required"),
  applicationId: snowflake,
  devGuildId: snowflake.nullable(),
  prefix: z.string().min(1).max(5),
  syncCommands: z.boolean(),
  ownerIds: z.array(snowflake),
  welcomeChannelId: snowflake.nullable(),
  healthPort: z.number().int().min(0).max(65535).nullable(),
  shutdownTimeoutMs: z.number().int().nonnegative()
});

/** Raw key in config.json → env variable consulted when the file has no value. */
const KEYS = {
  token: ["token", "DISCORD_TOKEN"],
  applicationId: ["application_id", "DISCORD_APPLICATION_ID"],
  devGuildId: ["dev_guild_id", "DISCORD_DEV_GUILD_ID"],
  prefix: ["prefix", "DISCORD_PREFIX"],
  syncCommands: ["sync_commands", "DISCORD_SYNC_COMMANDS"],
  ownerIds: ["owner_ids", "DISCORD_OWNER_IDS"],
  welcomeChannelId: ["welcome_channel_id", "DISCORD_WELCOME_CHANNEL_ID"]
} as const;

type FileConfig = Record<string, unknown>;

function pick(file: FileConfig | null, env: NodeJS.ProcessEnv, key: keyof typeof KEYS): unknown {
  const [fileKey, envKey] = KEYS[key];
  const fromFile = file?.[fileKey];
  if (fromFile !== undefined && fromFile !== null && fromFile !== "") return fromFile;
  const fromEnv = env[envKey]?.trim();
  return fromEnv ? fromEnv : undefined;
}

function asText(v: unknown): string | undefined {
  if (v === undefined) return undefined;
  return typeof v === "number" ? String(v) : typeof v === "string" ? v.trim() : undefined;
}

export function parseFlag(v: unknown, fallback: boolean): boolean {
  if (typeof v === "boolean") return v;
  if (typeof v !== "string") return fallback;
  const s = v.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(s)) return true;
  if (["false", "0", "no", "off"].includes(s)) return false;
  return fallback;
}

/** Comma-separated list in env, or a JSON array in config.json. */
export function parseList(v: unknown): string[] {
  if (Array.isArray(v)) return v.map(x => String(x).trim()).filter(Boolean);
  if (typeof v !== "string") return [];
  return v.split(",").map(s => s.trim()).filter(Boolean);
}

function parseNumber(v: string | undefined): number | null {
  if (v === undefined || v.trim() === "") return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : Number.NaN;
}

/**
 * Merges config.json values (preferred) with environment variables and validates
 * the result. Throws ConfigError listing every problem at once.
 */
export function resolveConfig(file: FileConfig | null, env: NodeJS.ProcessEnv): BotConfig {
  const candidate = {
    token: asText(pick(file, env, "token")) ?? "",
    applicationId: asText(pick(file, env, "applicationId")) ?? "",
    devGuildId: asText(pick(file, env, "devGuildId")) ?? null,
    prefix: asText(pick(file, env, "prefix")) ?? "!",
    syncCommands: parseFlag(pick(file, env, "syncCommands"), true),
    ownerIds: parseList(pick(file, env, "ownerIds")),
    welcomeChannelId: asText(pick(file, env, "welcomeChannelId")) ?? null,
    healthPort: parseNumber(env.HEALTH_PORT),
    shutdownTimeoutMs: parseNumber(env.SHUTDOWN_TIMEOUT_MS) ?? 10_000
  };
  const parsed = schema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".") || "config"} ${i.message}`));
  }
  return parsed.data;
}

export function readConfigFile(path: string): FileConfig | null {
  if (!existsSync(path)) return null;
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError([`${path} is not valid JSON (${err instanceof Error ? err.message : String(err)})`]);
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new ConfigError([`${path} must contain a JSON object`]);
  }
  return Object.fromEntries(Object.entries(data));
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const path = env.CONFIG_PATH ?? resolve(process.cwd(), "config.json");
  return resolveConfig(readConfigFile(path), env);
}
