import { Colors, type APIEmbed, type APIEmbedField } from "discord.js";

export type Severity = "success" | "error" | "info" | "warning";

export const SEVERITY_COLORS: Readonly<Record<Severity, number>> = {
  success: Colors.Green,
  error: Colors.Red,
  info: 0x3fa9f5,
  warning: Colors.Yellow
};

/** Platform limits for embed parts. */
export const EMBED_LIMITS = { title: 256, description: 4096, fieldName: 256, fieldValue: 1024, fields: 25, footer: 2048 } as const;

export interface EmbedField { name: string; value: string; inline?: boolean }

export interface EmbedInput {
  title: string;
  description?: string;
  severity?: Severity;
  fields?: ReadonlyArray<EmbedField>;
  footer?: string;
  thumbnailUrl?: string;
  /** ISO-8601; omitted unless the caller passes one so output stays deterministic */
  timestamp?: string;
}

export function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`;
}

/**
 * Builds the standard reply envelope. Pure: same input, same payload.
 */
export function buildEmbed(input: EmbedInput): APIEmbed {
  const embed: APIEmbed = {
    title: truncate(input.title, EMBED_LIMITS.title),
    color: SEVERITY_COLORS[input.severity ?? "info"]
  };
  if (input.description) embed.description = truncate(input.description, EMBED_LIMITS.description);
  if (input.fields && input.fields.length > 0) {
    embed.fields = input.fields.slice(0, EMBED_LIMITS.fields).map((f): APIEmbedField => ({
      name: truncate(f.name, EMBED_LIMITS.fieldName),
      value: truncate(f.value, EMBED_LIMITS.fieldValue),
      inline: f.inline ?? false
    }));
  }
  if (input.footer) embed.footer = { text: truncate(input.footer, EMBED_LIMITS.footer) };
  if (input.thumbnailUrl) embed.thumbnail = { url: input.thumbnailUrl };
  if (input.timestamp) embed.timestamp = input.timestamp;
  return embed;
}

type Shorthand = Omit<EmbedInput, "title" | "description" | "severity">;

export const successEmbed = (title: string, description = "", extra: Shorthand = {}): APIEmbed => buildEmbed({ ...extra, title, description, severity: "success" });
export const errorEmbed = (title: string, description = "", extra: Shorthand = {}): APIEmbed => buildEmbed({ ...extra, title, description, severity: "error" });
export const infoEmbed = (title: string, description = "", extra: Shorthand = {}): APIEmbed => buildEmbed({ ...extra, title, description, severity: "info" });
export const warningEmbed = (title: string, description = "", extra: Shorthand = {}): APIEmbed => buildEmbed({ ...extra, title, description, severity: "warning" });
