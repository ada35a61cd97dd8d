import { PermissionsBitField, type PermissionResolvable } from "discord.js";
import type { AppContext } from "../di.js";
import { CheckFailedError, CooldownError, PermissionDeniedError } from "../errors.js";
import { RateLimiter } from "../rate-limit.js";
import type { Check, CooldownSpec, Guarded, InvocationContext } from "./types.js";

/** Denies unless the member holds every permission; outside a guild it always denies. */
export function requirePermissions(...perms: PermissionResolvable[]): Check {
  const required = new PermissionsBitField(perms);
  return ctx => {
    if (!ctx.memberPermissions) throw new PermissionDeniedError(required.toArray());
    const missing = ctx.memberPermissions.missing(required);
    if (missing.length > 0) throw new PermissionDeniedError(missing);
    return true;
  };
}

export function guildOnly(): Check {
  return ctx => {
    if (ctx.guildId) return true;
    throw new CheckFailedError("guild_only", "This command can only be used inside a server.");
  };
}

export function isGuildOwner(): Check {
  return ctx => {
    if (ctx.guildOwnerId !== null && ctx.guildOwnerId === ctx.user.id) return true;
    throw new PermissionDeniedError();
  };
}

/** Invoker must be listed in the configured owner ids. */
export function isBotOwner(): Check {
  return (ctx, app) => {
    if (app.config.ownerIds.includes(ctx.user.id)) return true;
    throw new PermissionDeniedError();
  };
}

/** Per-command rate limits, one limiter per command name. */
export class Cooldowns {
  private readonly limiters = new Map<string, RateLimiter>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Throws CooldownError when `ctx` has used up `spec` for its command. */
  consume(ctx: InvocationContext, spec: CooldownSpec): void {
    let limiter = this.limiters.get(ctx.commandName);
    if (!limiter) {
      limiter = new RateLimiter(spec.uses, spec.perMs, this.now);
      this.limiters.set(ctx.commandName, limiter);
    }
    const res = limiter.hit(cooldownKey(ctx, spec));
    if (!res.allowed) throw new CooldownError(res.retryAfterMs);
  }

  /** Open windows across every command */
  get size(): number {
    let n = 0;
    for (const l of this.limiters.values()) n += l.size;
    return n;
  }

  clear(): void {
    this.limiters.clear();
  }
}

function cooldownKey(ctx: InvocationContext, spec: CooldownSpec): string {
  switch (spec.scope ?? "user") {
    case "guild": return `g:${ctx.guildId ?? `dm:${ctx.user.id}`}`;
    case "channel": return `c:${ctx.channelId ?? `dm:${ctx.user.id}`}`;
    case "user": return `u:${ctx.user.id}`;
  }
}

/**
 * Runs every check in order, then the cooldown. The first failing check wins;
 * a check that returns false (instead of throwing its own error) is reported
 * as check_failed.
 */
export async function runGuards(entry: Guarded, ctx: InvocationContext, app: AppContext): Promise<void> {
  for (const [i, check] of (entry.checks ?? []).entries()) {
    const ok = await check(ctx, app);
    if (!ok) throw new CheckFailedError(check.name || `check_${i}`);
  }
  if (entry.cooldown) app.cooldowns.consume(ctx, entry.cooldown);
}
