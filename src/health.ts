import { createServer, type Server } from "http";
import type { BotState } from "./bot.js";
import { Logger, type LogSink } from "./logger.js";

export interface StateSource {
  readonly state: BotState;
}

export interface HealthResponse {
  status: number;
  contentType: string;
  body: string;
}

const STATE_COLORS: Record<BotState, string> = {
  ready: "#22c55e",
  connecting: "#eab308",
  shutting_down: "#eab308",
  stopped: "#ef4444"
};

export function healthResponse(url: string | undefined, source: StateSource): HealthResponse {
  const { state } = source;
  if (url === "/healthz") {
    return state === "ready"
      ? { status: 200, contentType: "text/plain; charset=utf-8", body: "ok" }
      : { status: 503, contentType: "text/plain; charset=utf-8", body: state };
  }
  if (url === "/") {
    return {
      status: 200,
      contentType: "text/html; charset=utf-8",
      body:
        "<!DOCTYPE html>" +
        "<html><head><meta charset=\"utf-8\"/><meta name=\"viewport\" content=\"width=device-width, initial-scale=1\"/>" +
        "<title>cogbot</title>" +
        "<style>body{font-family:system-ui,-apple-system,Segoe UI,Roboto,Ubuntu,Arial,sans-serif;background:#0f172a;color:#e2e8f0;margin:0;padding:2rem}main{max-width:760px;margin:0 auto}h1{margin:0 0 1rem;font-size:1.75rem}p{margin:.5rem 0}a{color:#93c5fd}</style>" +
        "</head><body><main>" +
        "<h1>cogbot</h1>" +
        "<p>Bot web service is running.</p>" +
        `<p>Gateway: <span style="color:${STATE_COLORS[state]}">${state}</span></p>` +
        "<p>Health check: <a href=\"/healthz\">/healthz</a></p>" +
        "</main></body></html>"
    };
  }
  return { status: 404, contentType: "text/plain; charset=utf-8", body: "not found" };
}

export function startHealthServer(port: number, source: StateSource, log: LogSink = Logger.scoped("health")): Server {
  const server = createServer((req, res) => {
    const out = healthResponse(req.url, source);
    res.statusCode = out.status;
    res.setHeader("Content-Type", out.contentType);
    res.end(out.body);
  });
  server.on("error", err => log.error("health server error", err));
  server.listen(port, () => log.info(`health server listening on ${port}`));
  return server;
}
