// src/channel.ts
import type { DialogEngine } from "./domain/client-intake/engine.js";
import type { EventSink } from "./logger.js";
import type { MessageSender } from "./meta-client.js";
import { outcomeMessage } from "./outbound.js";
import { extractInboundMessages } from "./webhook/parse.js";

/**
 * Feeds webhook deliveries into the dialog engine and sends each resulting
 * prompt back to the sender. Messages of one payload are handled in order.
 */
export function createWhatsAppChannel(engine: DialogEngine, sender: MessageSender, log: EventSink) {
  return async function onPost(payload: unknown): Promise<void> {
    for (const m of extractInboundMessages(payload)) {
      const outcome = await engine.handleReply(m.from, m.text);
      if (outcome.status === "save_failed") {
        await log("ERROR", "channel.save_failed", { actorId: m.from, message: outcome.error?.message });
      }
      try {
        await sender.sendMessage(outcomeMessage(m.from, outcome));
      } catch (err) {
        await log("ERROR", "channel.send_failed", {
          actorId: m.from,
          messageId: m.id,
          message: err instanceof Error ? err.message : String(err)
        });
      }
    }
  };
}
