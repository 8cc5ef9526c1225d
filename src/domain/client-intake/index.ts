// src/domain/client-intake/index.ts
import type { EventSink } from "../../logger.js";
import type { AgentConfig } from "../../types.js";
import type { ClientStore } from "./client-store.js";
import { DialogEngine } from "./engine.js";
import { SessionStore } from "./session-store.js";

export function createIntakeEngine(cfg: AgentConfig, store: ClientStore, log?: EventSink): DialogEngine {
  const sessions = new SessionStore({ idleMs: cfg.sessionIdleMinutes * 60_000 });
  return new DialogEngine({
    sessions,
    store,
    log,
    dueDates: { offsets: cfg.dueDateOffsets, timezone: cfg.timezone }
  });
}
