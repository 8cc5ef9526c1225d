// src/logger.ts
import fs from "fs-extra";
import path from "path";
import { logsPath } from "./config.js";

export type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

/** Receives structured events. Implementations must not reject. */
export type EventSink = (level: LogLevel, event: string, data?: Record<string, unknown>) => Promise<void>;

export async function appendLog(level: LogLevel, event: string, data?: Record<string, unknown>): Promise<void> {
  const item: LogEvent = {
    ts: new Date().toISOString(),
    level,
    event,
    data
  };
  const p = logsPath();
  try {
    await fs.ensureDir(path.dirname(p));
    await fs.appendFile(p, `${JSON.stringify(item)}\n`, "utf8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.warn(`[WARN] log write skipped: ${msg}`);
  }
}

export function logConsole(level: LogLevel, msg: string): void {
  const prefix = `[${level}]`;
  if (level === "ERROR") console.error(`${prefix} ${msg}`);
  else if (level === "WARN") console.warn(`${prefix} ${msg}`);
  else console.log(`${prefix} ${msg}`);
}

/** Last `count` non-empty lines; a count that is not a positive number means one line. */
export function tailLines(raw: string, count: number): string[] {
  const n = Number.isFinite(count) ? Math.max(1, Math.floor(count)) : 1;
  return raw.split("\n").filter(Boolean).slice(-n);
}
