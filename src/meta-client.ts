// src/meta-client.ts
import type { OutboundMessage } from "./outbound.js";
import type { AgentConfig } from "./types.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface MessageSender {
  sendMessage(message: OutboundMessage): Promise<unknown>;
}

export class MetaClient implements MessageSender {
  constructor(
    private readonly cfg: Pick<AgentConfig, "token" | "phoneNumberId" | "graphVersion" | "baseUrl">,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  private base(pathname: string): string {
    const root = `${this.cfg.baseUrl.replace(/\/+$/, "")}/${this.cfg.graphVersion}`;
    return `${root}/${pathname.replace(/^\/+/, "")}`;
  }

  private async request(pathname: string, init: RequestInit = {}): Promise<unknown> {
    const res = await this.fetchImpl(this.base(pathname), {
      ...init,
      headers: {
        Authorization: `Bearer ${this.cfg.token}`,
        "Content-Type": "application/json",
        ...(init.headers || {})
      }
    });
    const txt = await res.text();
    let data: unknown;
    try {
      data = JSON.parse(txt);
    } catch {
      data = { raw: txt };
    }
    if (!res.ok) throw new Error(`Meta API ${res.status}: ${JSON.stringify(data)}`);
    return data;
  }

  async sendMessage(message: OutboundMessage): Promise<unknown> {
    return this.request(`${this.cfg.phoneNumberId}/messages`, {
      method: "POST",
      body: JSON.stringify(message)
    });
  }
}
