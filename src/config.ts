// src/config.ts
import fs from "fs-extra";
import os from "os";
import path from "path";
import { DEFAULT_DUE_DATE_OFFSETS, DEFAULT_TIMEZONE } from "./domain/client-intake/due-dates.js";
import type { AgentConfig, BillingPeriod, DueDateOffsets } from "./types.js";

const PERIODS: BillingPeriod[] = ["monthly", "quarterly", "semiannual", "yearly"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function envOr(current: string | undefined, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = process.env[key];
    if (value !== undefined && value !== "") return value;
  }
  return current;
}

export function intakeAgentHome(): string {
  return process.env.INTAKE_AGENT_HOME || path.join(os.homedir(), ".intake-agent");
}

export function configPath(): string {
  return path.join(intakeAgentHome(), "config.json");
}

export function logsPath(): string {
  return path.join(intakeAgentHome(), "logs", "events.jsonl");
}

export function clientsPath(): string {
  return path.join(intakeAgentHome(), "clients.jsonl");
}

function parseWholeNumber(key: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${key}: expected a whole number >= ${min}, got "${raw}".`);
  }
  return value;
}

function parseTimezone(raw: string): string {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: raw });
  } catch {
    throw new Error(`Invalid timezone: "${raw}" is not an IANA time zone.`);
  }
  return raw;
}

export function parseDueDateOffsets(raw: unknown): DueDateOffsets {
  if (raw === undefined || raw === null) return DEFAULT_DUE_DATE_OFFSETS;
  if (!isRecord(raw)) throw new Error("Invalid dueDateOffsets: expected an object keyed by billing period.");
  const out: DueDateOffsets = { ...DEFAULT_DUE_DATE_OFFSETS };
  for (const period of PERIODS) {
    const value = raw[period];
    if (value === undefined) continue;
    const ok =
      Array.isArray(value) &&
      value.length > 0 &&
      value.every((d) => typeof d === "number" && Number.isInteger(d) && d > 0);
    if (!ok) throw new Error(`Invalid dueDateOffsets.${period}: expected a non-empty list of positive whole days.`);
    out[period] = value.map((d) => Number(d));
  }
  return out;
}

async function readRawConfig(): Promise<Record<string, unknown>> {
  const p = configPath();
  if (!(await fs.pathExists(p))) return {};
  const data: unknown = await fs.readJson(p);
  return isRecord(data) ? data : {};
}

function str(value: unknown): string {
  return value === undefined || value === null ? "" : String(value);
}

export async function readConfig(): Promise<AgentConfig> {
  const raw = await readRawConfig();

  const verifyToken = envOr(str(raw.webhookVerifyToken), ["WHATSAPP_VERIFY_TOKEN"]);
  const webhookPath = str(raw.webhookPath) || "/webhook";

  return {
    token: envOr(str(raw.token), ["WHATSAPP_TOKEN"]) || "",
    phoneNumberId: envOr(str(raw.phoneNumberId), ["WHATSAPP_PHONE_ID"]) || "",
    graphVersion: envOr(str(raw.graphVersion) || "v20.0", ["WHATSAPP_GRAPH_VERSION"]) || "v20.0",
    baseUrl: envOr(str(raw.baseUrl) || "https://graph.facebook.com", ["WHATSAPP_BASE_URL"]) || "https://graph.facebook.com",
    webhookVerifyToken: verifyToken || undefined,
    webhookPort: parseWholeNumber("webhookPort", envOr(str(raw.webhookPort), ["PORT"]), 3000, 1),
    webhookPath: webhookPath.startsWith("/") ? webhookPath : `/${webhookPath}`,
    timezone: parseTimezone(envOr(str(raw.timezone), ["INTAKE_TIMEZONE"]) || DEFAULT_TIMEZONE),
    sessionIdleMinutes: parseWholeNumber(
      "sessionIdleMinutes",
      envOr(str(raw.sessionIdleMinutes), ["INTAKE_SESSION_IDLE_MINUTES"]),
      0,
      0
    ),
    dueDateOffsets: parseDueDateOffsets(raw.dueDateOffsets)
  };
}

export async function writeConfig(next: Partial<AgentConfig>): Promise<string> {
  const p = configPath();
  const prev = await readRawConfig();
  const merged: Record<string, unknown> = { ...prev };
  for (const [key, value] of Object.entries(next)) {
    if (value !== undefined) merged[key] = value;
  }
  await fs.ensureDir(path.dirname(p));
  await fs.writeJson(p, merged, { spaces: 2 });
  return p;
}
