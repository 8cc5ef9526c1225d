// src/domain/client-intake/finalizer.ts
import type { ClientStore } from "./client-store.js";
import type { SessionStore } from "./session-store.js";
import type { ActorSession, ClientDraft, ClientRecord, StoredClient } from "./types.js";

export class PersistenceFailure extends Error {
  constructor(actorId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not save client for actor ${actorId}: ${reason}`, { cause });
    this.name = "PersistenceFailure";
  }
}

export type FinalizeResult = { ok: true; record: StoredClient } | { ok: false; error: PersistenceFailure };

const REQUIRED: Array<Exclude<keyof ClientDraft, "notes">> = ["name", "phone", "package", "price", "dueDate", "server"];

export function missingFields(draft: ClientDraft): string[] {
  return REQUIRED.filter((key) => !draft[key]);
}

export function toClientRecord(actorId: string, draft: ClientDraft): ClientRecord {
  const missing = missingFields(draft);
  if (missing.length) throw new Error(`Draft is incomplete: missing ${missing.join(", ")}.`);
  return {
    ownerActorId: actorId,
    name: draft.name ?? "",
    phone: draft.phone ?? "",
    package: draft.package ?? "",
    price: draft.price ?? "",
    dueDate: draft.dueDate ?? "",
    server: draft.server ?? "",
    notes: draft.notes ?? ""
  };
}

/**
 * Hands a completed draft to the store. A failed save leaves the session
 * exactly as it was so a later attempt can reuse the same draft.
 */
export class RecordFinalizer {
  constructor(
    private readonly store: ClientStore,
    private readonly sessions: SessionStore
  ) {}

  async finalize(session: ActorSession): Promise<FinalizeResult> {
    const record = toClientRecord(session.actorId, session.draft);
    let stored: StoredClient;
    try {
      stored = await this.store.save(record);
    } catch (err) {
      return { ok: false, error: new PersistenceFailure(session.actorId, err) };
    }
    this.sessions.delete(session.actorId);
    return { ok: true, record: stored };
  }
}
