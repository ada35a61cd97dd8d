import { Events } from "discord.js";
import { describe, expect, it } from "vitest";
import { Bot, InvalidTransitionError, type BotSteps, type GatewayClient } from "../bot.js";
import { InflightTracker } from "../inflight.js";
import { RecordingLog } from "./helpers.js";

class FakeGateway implements GatewayClient {
  loginError: Error | null = null;
  private onReady: (() => void) | null = null;
  constructor(private readonly order: string[]) {}

  async login(token: string): Promise<string> {
    this.order.push("login");
    if (this.loginError) throw this.loginError;
    queueMicrotask(() => this.onReady?.());
    return token;
  }

  async destroy(): Promise<void> {
    this.order.push("destroy");
  }

  once(_event: Events.ClientReady, listener: () => void): this {
    this.onReady = listener;
    return this;
  }
}

function build(shutdownTimeoutMs = 50) {
  const order: string[] = [];
  const gateway = new FakeGateway(order);
  const steps: BotSteps = {
    setup: () => { order.push("setup"); },
    sync: async () => { order.push("sync"); return 0; },
    teardown: () => { order.push("teardown"); }
  };
  const inflight = new InflightTracker();
  const log = new RecordingLog();
  const bot = new Bot(gateway, { token: "test-token", shutdownTimeoutMs }, steps, inflight, log);
  return { bot, gateway, order, inflight, log };
}

describe("Bot lifecycle", () => {
  it("goes stopped -> connecting -> ready on start", async () => {
    const { bot, order, log } = build();
    expect(bot.state).toBe("stopped");
    await bot.start();
    expect(bot.state).toBe("ready");
    expect(order).toEqual(["setup", "login", "sync"]);
    expect(log.at("info").map(e => e.message)).toEqual(["state stopped -> connecting", "state connecting -> ready"]);
  });

  it("destroys the client and ends stopped when login fails", async () => {
    const { bot, gateway, order } = build();
    gateway.loginError = new Error("An invalid token was provided.");
    await expect(bot.start()).rejects.toThrow("An invalid token was provided.");
    expect(bot.state).toBe("stopped");
    expect(order).toEqual(["setup", "login", "destroy"]);
  });

  it("refuses to start twice", async () => {
    const { bot } = build();
    await bot.start();
    await expect(bot.start()).rejects.toBeInstanceOf(InvalidTransitionError);
    expect(bot.state).toBe("ready");
  });

  it("tears down then destroys on stop, once", async () => {
    const { bot, order } = build();
    await bot.start();
    const first = bot.stop();
    const second = bot.stop();
    expect(second).toBe(first);
    expect(bot.state).toBe("shutting_down");
    await first;
    expect(bot.state).toBe("stopped");
    expect(order).toEqual(["setup", "login", "sync", "teardown", "destroy"]);
    await bot.stop();
    expect(order.filter(s => s === "teardown")).toHaveLength(1);
  });

  it("abandons handlers still running after the shutdown timeout", async () => {
    const { bot, inflight, log } = build(20);
    await bot.start();
    void inflight.track(new Promise<void>(() => {}));
    await bot.stop();
    expect(bot.state).toBe("stopped");
    expect(log.at("warn").map(e => e.message)).toEqual(["abandoning 1 in-flight handler(s) after 20ms"]);
  });
});
