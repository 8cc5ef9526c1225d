// src/outbound.ts
import type { ReplyOutcome } from "./domain/client-intake/types.js";

const MAX_BUTTONS = 3;
const MAX_BUTTON_TITLE = 20;
const MAX_LIST_ROWS = 10;
const MAX_ROW_TITLE = 24;
const MAX_INTERACTIVE_BODY = 1024;

interface Envelope {
  messaging_product: "whatsapp";
  recipient_type: "individual";
  to: string;
}

export interface TextMessage extends Envelope {
  type: "text";
  text: { body: string };
}

export interface ButtonMessage extends Envelope {
  type: "interactive";
  interactive: {
    type: "button";
    body: { text: string };
    action: { buttons: Array<{ type: "reply"; reply: { id: string; title: string } }> };
  };
}

export interface ListMessage extends Envelope {
  type: "interactive";
  interactive: {
    type: "list";
    body: { text: string };
    action: { button: string; sections: Array<{ title: string; rows: Array<{ id: string; title: string }> }> };
  };
}

export type OutboundMessage = TextMessage | ButtonMessage | ListMessage;

function charLength(s: string): number {
  return [...s].length;
}

function envelope(to: string): Envelope {
  return { messaging_product: "whatsapp", recipient_type: "individual", to };
}

export function outcomeText(outcome: Pick<ReplyOutcome, "notice" | "prompt">): string {
  return [outcome.notice, outcome.prompt.text].filter(Boolean).join("\n\n");
}

/**
 * Builds the Graph API payload for a prompt. Options become reply buttons or
 * a list when WhatsApp's limits allow, otherwise they are enumerated in text.
 */
export function buildOutboundMessage(to: string, body: string, options: string[] | null): OutboundMessage {
  const opts = options ?? [];
  const fitsInteractive = body.length > 0 && charLength(body) <= MAX_INTERACTIVE_BODY;

  if (opts.length && fitsInteractive && opts.length <= MAX_BUTTONS && opts.every((o) => charLength(o) <= MAX_BUTTON_TITLE)) {
    return {
      ...envelope(to),
      type: "interactive",
      interactive: {
        type: "button",
        body: { text: body },
        action: {
          buttons: opts.map((title, i) => ({ type: "reply", reply: { id: `opt_${i}`, title } }))
        }
      }
    };
  }

  if (opts.length && fitsInteractive && opts.length <= MAX_LIST_ROWS && opts.every((o) => charLength(o) <= MAX_ROW_TITLE)) {
    return {
      ...envelope(to),
      type: "interactive",
      interactive: {
        type: "list",
        body: { text: body },
        action: {
          button: "Opções",
          sections: [{ title: "Opções", rows: opts.map((title, i) => ({ id: `opt_${i}`, title })) }]
        }
      }
    };
  }

  const lines = opts.length ? [body, "", "Responda com uma das opções:", ...opts.map((o) => `• ${o}`)] : [body];
  return { ...envelope(to), type: "text", text: { body: lines.join("\n") } };
}

export function outcomeMessage(to: string, outcome: ReplyOutcome): OutboundMessage {
  return buildOutboundMessage(to, outcomeText(outcome), outcome.prompt.options);
}
