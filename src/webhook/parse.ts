// src/webhook/parse.ts
export interface InboundMessage {
  from: string;
  id: string;
  timestamp: string;
  type: string;
  text: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function field(obj: unknown, key: string): unknown {
  return isRecord(obj) ? obj[key] : undefined;
}

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

// Interactive replies carry the option label as their title, which is what the dialog matches on.
function messageText(m: Record<string, unknown>): string {
  const type = str(m.type);
  if (type === "text") return str(field(m.text, "body"));
  if (type === "button") return str(field(m.button, "text"));
  if (type === "interactive") {
    const interactive = m.interactive;
    const kind = str(field(interactive, "type"));
    if (kind === "button_reply") return str(field(field(interactive, "button_reply"), "title"));
    if (kind === "list_reply") return str(field(field(interactive, "list_reply"), "title"));
  }
  return "";
}

export function extractInboundMessages(payload: unknown): InboundMessage[] {
  const out: InboundMessage[] = [];
  for (const entry of records(field(payload, "entry"))) {
    for (const change of records(entry.changes)) {
      for (const m of records(field(change.value, "messages"))) {
        const from = str(m.from);
        if (!from) continue;
        const type = str(m.type);
        const text = messageText(m);
        if (type !== "text" && !text) continue;
        out.push({ from, id: str(m.id), timestamp: str(m.timestamp), type, text });
      }
    }
  }
  return out;
}
