// src/domain/client-intake/engine.ts
import type { EventSink } from "../../logger.js";
import { CUSTOM_DUE_DATE, CUSTOM_PACKAGE, CUSTOM_PRICE, CUSTOM_SERVER, packagesCatalog, pricesCatalog, serversCatalog, SKIP_NOTES } from "./catalog.js";
import type { ClientStore } from "./client-store.js";
import { DEFAULT_DUE_DATE_POLICY, suggestDueDates, type DueDatePolicy } from "./due-dates.js";
import { RecordFinalizer } from "./finalizer.js";
import { acceptedNotice, cancelledPrompt, promptFor, rejectedNotice, savedPrompt, saveFailedPrompt, STEP_FIELD } from "./prompts.js";
import type { SessionStore } from "./session-store.js";
import type { ActorSession, CatalogStepId, ClientDraft, DialogStep, ReplyOutcome, StepId } from "./types.js";

const ORDER: StepId[] = [
  "AWAIT_NAME",
  "AWAIT_PHONE",
  "AWAIT_PACKAGE",
  "AWAIT_PRICE",
  "AWAIT_DUE_DATE",
  "AWAIT_SERVER",
  "AWAIT_NOTES",
  "COMPLETE"
];

const SENTINEL: Record<CatalogStepId, string> = {
  AWAIT_PACKAGE: CUSTOM_PACKAGE,
  AWAIT_PRICE: CUSTOM_PRICE,
  AWAIT_DUE_DATE: CUSTOM_DUE_DATE,
  AWAIT_SERVER: CUSTOM_SERVER
};

const CANCEL_COMMANDS = new Set(["/cancelar", "/cancel"]);
const SKIP_WORDS = new Set(["skip", "pular"]);

export interface DialogEngineDeps {
  sessions: SessionStore;
  store: ClientStore;
  dueDates?: DueDatePolicy;
  now?: () => Date;
  log?: EventSink;
}

type Transition =
  | { kind: "rejected" }
  | { kind: "next"; step: DialogStep; draft: ClientDraft; notice: string | null };

function noopSink(): Promise<void> {
  return Promise.resolve();
}

function isSkip(text: string): boolean {
  return text === SKIP_NOTES || SKIP_WORDS.has(text.toLowerCase());
}

export class DialogEngine {
  private readonly sessions: SessionStore;
  private readonly finalizer: RecordFinalizer;
  private readonly dueDates: DueDatePolicy;
  private readonly now: () => Date;
  private readonly log: EventSink;

  constructor(deps: DialogEngineDeps) {
    this.sessions = deps.sessions;
    this.finalizer = new RecordFinalizer(deps.store, deps.sessions);
    this.dueDates = deps.dueDates ?? DEFAULT_DUE_DATE_POLICY;
    this.now = deps.now ?? (() => new Date());
    const sink = deps.log ?? noopSink;
    this.log = (level, event, data) => sink(level, event, data).catch(() => undefined);
  }

  handleReply(actorId: string, text: string): Promise<ReplyOutcome> {
    return this.sessions.runExclusive(actorId, () => this.transition(actorId, text));
  }

  /** Re-attempts the save of a dialog whose last finalization failed. Null when nothing is pending. */
  retryFinalize(actorId: string): Promise<ReplyOutcome | null> {
    return this.sessions.runExclusive(actorId, async () => {
      const session = this.sessions.get(actorId);
      if (!session || session.step.id !== "COMPLETE") return null;
      return this.complete(session);
    });
  }

  private async transition(actorId: string, raw: string): Promise<ReplyOutcome> {
    const text = raw.trim();
    const session = this.sessions.get(actorId);

    if (!session) {
      const created = this.sessions.create(actorId);
      void this.log("INFO", "dialog.started", { actorId });
      return this.outcome(created, "started", null);
    }

    if (CANCEL_COMMANDS.has(text.toLowerCase())) {
      this.sessions.delete(actorId);
      void this.log("INFO", "dialog.cancelled", { actorId, step: session.step.id });
      return { actorId, status: "cancelled", step: null, notice: null, prompt: cancelledPrompt() };
    }

    if (session.step.id === "COMPLETE") return this.complete(session);

    const result = this.apply(session.step, session.draft, text);
    if (result.kind === "rejected") {
      this.sessions.put({ ...session });
      void this.log("DEBUG", "dialog.rejected", { actorId, step: session.step.id });
      return this.outcome(session, "rejected", rejectedNotice(session.step));
    }

    const next = this.sessions.put({ ...session, step: result.step, draft: result.draft });
    if (next.step.id === "COMPLETE") return this.complete(next, result.notice);
    return this.outcome(next, "advanced", result.notice);
  }

  private apply(step: DialogStep, draft: ClientDraft, text: string): Transition {
    switch (step.id) {
      case "COMPLETE":
        return { kind: "rejected" };
      case "AWAIT_NAME":
      case "AWAIT_PHONE":
        if (!text) return { kind: "rejected" };
        return this.advance(step.id, draft, text);
      case "AWAIT_NOTES":
        if (!text) return { kind: "rejected" };
        return this.advance(step.id, draft, isSkip(text) ? "" : text);
      default:
        if (step.mode === "custom") {
          if (!text) return { kind: "rejected" };
          return this.advance(step.id, draft, text);
        }
        if (text === SENTINEL[step.id]) {
          return { kind: "next", step: { id: step.id, mode: "custom" }, draft, notice: null };
        }
        if (!step.options.includes(text)) return { kind: "rejected" };
        return this.advance(step.id, draft, text);
    }
  }

  private advance(from: Exclude<StepId, "COMPLETE">, draft: ClientDraft, value: string): Transition {
    const field = STEP_FIELD[from];
    const nextDraft: ClientDraft = { ...draft, [field]: value };
    const nextId = ORDER[ORDER.indexOf(from) + 1] ?? "COMPLETE";
    return { kind: "next", step: this.enter(nextId, nextDraft), draft: nextDraft, notice: acceptedNotice(field, value) };
  }

  private enter(id: StepId, draft: ClientDraft): DialogStep {
    switch (id) {
      case "AWAIT_PACKAGE":
        return { id, mode: "selecting", options: packagesCatalog() };
      case "AWAIT_PRICE":
        return { id, mode: "selecting", options: pricesCatalog() };
      case "AWAIT_DUE_DATE":
        return { id, mode: "selecting", options: suggestDueDates(draft.package ?? "", this.now(), this.dueDates) };
      case "AWAIT_SERVER":
        return { id, mode: "selecting", options: serversCatalog() };
      default:
        return { id };
    }
  }

  private async complete(session: ActorSession, notice: string | null = null): Promise<ReplyOutcome> {
    const result = await this.finalizer.finalize(session);
    if (!result.ok) {
      void this.log("ERROR", "dialog.save_failed", { actorId: session.actorId, message: result.error.message });
      return {
        actorId: session.actorId,
        status: "save_failed",
        step: "COMPLETE",
        notice,
        prompt: saveFailedPrompt(),
        error: result.error
      };
    }
    void this.log("INFO", "dialog.saved", { actorId: session.actorId, clientId: result.record.id });
    return {
      actorId: session.actorId,
      status: "saved",
      step: "COMPLETE",
      notice,
      prompt: savedPrompt(result.record),
      record: result.record
    };
  }

  private outcome(session: ActorSession, status: ReplyOutcome["status"], notice: string | null): ReplyOutcome {
    return { actorId: session.actorId, status, step: session.step.id, notice, prompt: promptFor(session.step) };
  }
}
