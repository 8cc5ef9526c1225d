// src/domain/client-intake/types.ts
import type { BillingPeriod } from "../../types.js";

export type CatalogStepId = "AWAIT_PACKAGE" | "AWAIT_PRICE" | "AWAIT_DUE_DATE" | "AWAIT_SERVER";

export type StepId = "AWAIT_NAME" | "AWAIT_PHONE" | CatalogStepId | "AWAIT_NOTES" | "COMPLETE";

/**
 * Position of an actor in the dialog. Catalog steps are either offering a
 * frozen list of options or waiting for a single free-text override.
 */
export type DialogStep =
  | { id: "AWAIT_NAME" }
  | { id: "AWAIT_PHONE" }
  | { id: CatalogStepId; mode: "selecting"; options: string[] }
  | { id: CatalogStepId; mode: "custom" }
  | { id: "AWAIT_NOTES" }
  | { id: "COMPLETE" };

export interface ClientDraft {
  name?: string;
  phone?: string;
  package?: string;
  price?: string;
  dueDate?: string;
  server?: string;
  notes?: string;
}

export type DraftField = keyof ClientDraft;

export interface ClientRecord {
  ownerActorId: string;
  name: string;
  phone: string;
  package: string;
  price: string;
  dueDate: string;
  server: string;
  notes: string;
}

export interface StoredClient extends ClientRecord {
  id: string;
  createdAt: string;
}

export interface ActorSession {
  actorId: string;
  step: DialogStep;
  draft: ClientDraft;
  startedAt: string;
  updatedAt: string;
}

export interface PackageOption {
  label: string;
  period: BillingPeriod;
}

export interface Prompt {
  text: string;
  options: string[] | null;
}

export type ReplyStatus = "started" | "advanced" | "rejected" | "saved" | "save_failed" | "cancelled";

export interface ReplyOutcome {
  actorId: string;
  status: ReplyStatus;
  /** Step the actor is at after the reply; null once the session is gone. */
  step: StepId | null;
  /** Acknowledgement or rejection line shown before the prompt. */
  notice: string | null;
  prompt: Prompt;
  record?: StoredClient;
  error?: Error;
}
