// src/domain/client-intake/session-store.ts
import type { ActorSession } from "./types.js";

export interface SessionStoreOptions {
  /** Sessions untouched for longer than this are dropped on lookup. 0 keeps them forever. */
  idleMs?: number;
  now?: () => Date;
}

/**
 * In-memory sessions keyed by actor. Each entry is replaced as a whole, and
 * work for one actor runs strictly one task at a time through `runExclusive`.
 */
export class SessionStore {
  private readonly sessions = new Map<string, ActorSession>();
  private readonly chains = new Map<string, Promise<void>>();
  private readonly idleMs: number;
  private readonly now: () => Date;

  constructor(opts: SessionStoreOptions = {}) {
    this.idleMs = Math.max(0, opts.idleMs ?? 0);
    this.now = opts.now ?? (() => new Date());
  }

  get(actorId: string): ActorSession | null {
    const session = this.sessions.get(actorId);
    if (!session) return null;
    if (this.isIdle(session)) {
      this.sessions.delete(actorId);
      return null;
    }
    return session;
  }

  create(actorId: string): ActorSession {
    const ts = this.now().toISOString();
    const session: ActorSession = {
      actorId,
      step: { id: "AWAIT_NAME" },
      draft: {},
      startedAt: ts,
      updatedAt: ts
    };
    this.sessions.set(actorId, session);
    return session;
  }

  put(session: Omit<ActorSession, "updatedAt">): ActorSession {
    const next: ActorSession = { ...session, updatedAt: this.now().toISOString() };
    this.sessions.set(next.actorId, next);
    return next;
  }

  delete(actorId: string): boolean {
    return this.sessions.delete(actorId);
  }

  size(): number {
    return this.sessions.size;
  }

  runExclusive<T>(actorId: string, task: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(actorId) ?? Promise.resolve();
    const run = prev.then(task);
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.chains.get(actorId) === tail) this.chains.delete(actorId);
      });
    this.chains.set(actorId, tail);
    return run;
  }

  private isIdle(session: ActorSession): boolean {
    if (!this.idleMs) return false;
    return this.now().getTime() - Date.parse(session.updatedAt) > this.idleMs;
  }
}
