// src/webhook/server.ts
import http from "http";
import { appendLog } from "../logger.js";

export interface WebhookServerOptions {
  port: number;
  path: string;
  verifyToken?: string;
  onPost: (payload: unknown) => Promise<void>;
}

function readRawBody(req: http.IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (c: Buffer) => chunks.push(c));
    req.on("end", () => resolve(Buffer.concat(chunks)));
    req.on("error", reject);
  });
}

function reply(res: http.ServerResponse, status: number, body: string): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "text/plain");
  res.end(body);
}

function errorData(err: unknown): Record<string, unknown> {
  return { message: err instanceof Error ? err.stack || err.message : String(err) };
}

export async function handleWebhookRequest(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  opts: WebhookServerOptions
): Promise<void> {
  const u = new URL(req.url || "/", `http://${req.headers.host || "localhost"}`);
  if (u.pathname !== opts.path) return reply(res, 404, "Not found");

  if (req.method === "GET") {
    const mode = u.searchParams.get("hub.mode");
    const token = u.searchParams.get("hub.verify_token");
    const challenge = u.searchParams.get("hub.challenge");
    if (mode === "subscribe" && challenge && opts.verifyToken && token === opts.verifyToken) {
      return reply(res, 200, challenge);
    }
    return reply(res, 403, "Forbidden");
  }

  if (req.method === "POST") {
    const raw = await readRawBody(req);
    let payload: unknown;
    try {
      payload = JSON.parse(raw.toString("utf8"));
    } catch {
      return reply(res, 400, "Invalid JSON");
    }

    // Meta retries unacknowledged deliveries, so answer before processing.
    reply(res, 200, "OK");
    void opts.onPost(payload).catch((err: unknown) => appendLog("ERROR", "webhook.process_failed", errorData(err)));
    return;
  }

  reply(res, 405, "Method not allowed");
}

export function createWebhookServer(opts: WebhookServerOptions): Promise<http.Server> {
  const server = http.createServer((req, res) => {
    void handleWebhookRequest(req, res, opts).catch(async (err: unknown) => {
      if (!res.headersSent) reply(res, 500, "Server error");
      await appendLog("ERROR", "webhook.request_failed", errorData(err));
    });
  });

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port, () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
