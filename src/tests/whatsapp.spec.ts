// src/tests/whatsapp.spec.ts
import assert from "node:assert/strict";
import test from "node:test";
import { createWhatsAppChannel } from "../channel.js";
import { packagesCatalog, SKIP_NOTES } from "../domain/client-intake/catalog.js";
import { MemoryClientStore } from "../domain/client-intake/client-store.js";
import { DialogEngine } from "../domain/client-intake/engine.js";
import { SessionStore } from "../domain/client-intake/session-store.js";
import { MetaClient, type MessageSender } from "../meta-client.js";
import { buildOutboundMessage, type OutboundMessage } from "../outbound.js";
import { extractInboundMessages } from "../webhook/parse.js";

const FROM = "5511988887777";

function payload(messages: unknown[]): unknown {
  return { object: "whatsapp_business_account", entry: [{ changes: [{ field: "messages", value: { messages } }] }] };
}

class RecordingSender implements MessageSender {
  readonly sent: OutboundMessage[] = [];

  async sendMessage(message: OutboundMessage): Promise<unknown> {
    this.sent.push(message);
    return { messages: [{ id: `wamid.${this.sent.length}` }] };
  }
}

test("webhook parsing reads text bodies and interactive reply titles", () => {
  const out = extractInboundMessages(
    payload([
      { from: FROM, id: "m1", timestamp: "1760000000", type: "text", text: { body: "Maria" } },
      {
        from: FROM,
        id: "m2",
        timestamp: "1760000001",
        type: "interactive",
        interactive: { type: "list_reply", list_reply: { id: "opt_0", title: "📅 MENSAL" } }
      },
      {
        from: FROM,
        id: "m3",
        timestamp: "1760000002",
        type: "interactive",
        interactive: { type: "button_reply", button_reply: { id: "opt_0", title: SKIP_NOTES } }
      },
      { from: FROM, id: "m4", timestamp: "1760000003", type: "button", button: { text: "30", payload: "30" } }
    ])
  );
  assert.deepEqual(
    out.map((m) => [m.id, m.type, m.text]),
    [
      ["m1", "text", "Maria"],
      ["m2", "interactive", "📅 MENSAL"],
      ["m3", "interactive", SKIP_NOTES],
      ["m4", "button", "30"]
    ]
  );
});

test("webhook parsing skips media, senderless messages and status updates", () => {
  const statusOnly = { entry: [{ changes: [{ value: { statuses: [{ id: "wamid.1", status: "delivered" }] } }] }] };
  assert.deepEqual(extractInboundMessages(statusOnly), []);
  assert.deepEqual(extractInboundMessages(null), []);
  assert.deepEqual(
    extractInboundMessages(
      payload([
        { from: FROM, id: "m1", type: "image", image: { id: "media-1" } },
        { id: "m2", type: "text", text: { body: "sem remetente" } },
        { from: FROM, id: "m3", type: "text", text: {} }
      ])
    ).map((m) => [m.id, m.text]),
    [["m3", ""]]
  );
});

test("prompts without options go out as plain text", () => {
  assert.deepEqual(buildOutboundMessage(FROM, "Digite o nome", null), {
    messaging_product: "whatsapp",
    recipient_type: "individual",
    to: FROM,
    type: "text",
    text: { body: "Digite o nome" }
  });
});

test("up to three short options become reply buttons", () => {
  const msg = buildOutboundMessage(FROM, "Observações?", [SKIP_NOTES]);
  assert.equal(msg.type, "interactive");
  assert.deepEqual(msg.type === "interactive" ? msg.interactive : null, {
    type: "button",
    body: { text: "Observações?" },
    action: { buttons: [{ type: "reply", reply: { id: "opt_0", title: SKIP_NOTES } }] }
  });
});

test("catalogs of up to ten options become a list", () => {
  const msg = buildOutboundMessage(FROM, "Escolha o pacote", packagesCatalog());
  assert.ok(msg.type === "interactive" && msg.interactive.type === "list");
  const rows = msg.interactive.action.sections[0].rows;
  assert.deepEqual(
    rows.map((r) => r.title),
    packagesCatalog()
  );
  assert.equal(rows[4].id, "opt_4");
});

test("options beyond interactive limits are enumerated in text", () => {
  const many = Array.from({ length: 11 }, (_, i) => `opção ${i + 1}`);
  const msg = buildOutboundMessage(FROM, "Escolha", many);
  assert.ok(msg.type === "text");
  const lines = msg.text.body.split("\n");
  assert.equal(lines[0], "Escolha");
  assert.equal(lines[2], "Responda com uma das opções:");
  assert.equal(lines[3], "• opção 1");
  assert.equal(lines.length, 14);

  const longTitle = buildOutboundMessage(FROM, "Escolha", ["uma opção com título comprido demais"]);
  assert.equal(longTitle.type, "text");
});

test("meta client posts messages to the phone number endpoint", async () => {
  const calls: Array<{ url: string; init?: RequestInit }> = [];
  const client = new MetaClient(
    { token: "test-token", phoneNumberId: "123", graphVersion: "v20.0", baseUrl: "https://graph.example.test/" },
    async (url, init) => {
      calls.push({ url, init });
      return new Response(JSON.stringify({ messages: [{ id: "wamid.1" }] }), { status: 200 });
    }
  );
  const out = await client.sendMessage(buildOutboundMessage(FROM, "oi", null));
  assert.deepEqual(out, { messages: [{ id: "wamid.1" }] });
  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, "https://graph.example.test/v20.0/123/messages");
  assert.equal(calls[0].init?.method, "POST");
  assert.deepEqual(calls[0].init?.headers, { Authorization: "Bearer test-token", "Content-Type": "application/json" });
  assert.equal(JSON.parse(String(calls[0].init?.body)).text.body, "oi");
});

test("meta client surfaces API errors with status and body", async () => {
  const client = new MetaClient(
    { token: "test-token", phoneNumberId: "123", graphVersion: "v20.0", baseUrl: "https://graph.example.test" },
    async () => new Response(JSON.stringify({ error: { code: 190 } }), { status: 401 })
  );
  await assert.rejects(client.sendMessage(buildOutboundMessage(FROM, "oi", null)), /Meta API 401: \{"error":\{"code":190\}\}/);
});

test("the channel answers every inbound message with the next prompt", async () => {
  const store = new MemoryClientStore();
  const engine = new DialogEngine({ sessions: new SessionStore(), store, now: () => new Date("2026-01-15T12:00:00Z") });
  const sender = new RecordingSender();
  const events: string[] = [];
  const onPost = createWhatsAppChannel(engine, sender, async (_level, event) => {
    events.push(event);
  });

  await onPost(
    payload([
      { from: FROM, id: "m1", type: "text", text: { body: "oi" } },
      { from: FROM, id: "m2", type: "text", text: { body: "Maria" } },
      { from: FROM, id: "m3", type: "text", text: { body: "11999999999" } }
    ])
  );

  assert.equal(sender.sent.length, 3);
  assert.deepEqual(
    sender.sent.map((m) => m.to),
    [FROM, FROM, FROM]
  );
  const first = sender.sent[0];
  assert.ok(first.type === "text");
  assert.match(first.text.body, /^📝 \*Cadastro de novo cliente\*/);
  const second = sender.sent[1];
  assert.ok(second.type === "text");
  assert.equal(second.text.body.split("\n")[0], "✅ 📝 Nome: Maria");
  const third = sender.sent[2];
  assert.ok(third.type === "interactive" && third.interactive.type === "list");
  assert.equal(third.interactive.body.text.split("\n")[0], "✅ 📱 Telefone: 11999999999");
  assert.deepEqual(events, []);
});

test("the channel logs send failures and keeps going", async () => {
  const engine = new DialogEngine({ sessions: new SessionStore(), store: new MemoryClientStore() });
  const events: Array<[string, Record<string, unknown> | undefined]> = [];
  let attempts = 0;
  const sender: MessageSender = {
    async sendMessage() {
      attempts += 1;
      if (attempts === 1) throw new Error("network down");
      return {};
    }
  };
  const onPost = createWhatsAppChannel(engine, sender, async (_level, event, data) => {
    events.push([event, data]);
  });

  await onPost(
    payload([
      { from: FROM, id: "m1", type: "text", text: { body: "oi" } },
      { from: FROM, id: "m2", type: "text", text: { body: "Maria" } }
    ])
  );
  assert.equal(attempts, 2);
  assert.deepEqual(events, [["channel.send_failed", { actorId: FROM, messageId: "m1", message: "network down" }]]);
});
