// src/domain/client-intake/client-store.ts
import crypto from "crypto";
import fs from "fs-extra";
import path from "path";
import { clientsPath } from "../../config.js";
import type { ClientRecord, StoredClient } from "./types.js";

/** Append-only persistence for finalized client records. */
export interface ClientStore {
  save(record: ClientRecord): Promise<StoredClient>;
  list(limit?: number): Promise<StoredClient[]>;
}

const TEXT_FIELDS = ["id", "createdAt", "ownerActorId", "name", "phone", "package", "price", "dueDate", "server", "notes"] as const;

function isStoredClient(value: unknown): value is StoredClient {
  if (!value || typeof value !== "object") return false;
  const row: Record<string, unknown> = { ...value };
  return TEXT_FIELDS.every((key) => typeof row[key] === "string");
}

// A crash mid-append leaves a truncated last line behind.
function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

function stamp(record: ClientRecord): StoredClient {
  return { id: crypto.randomUUID(), createdAt: new Date().toISOString(), ...record };
}

function newestFirst(rows: StoredClient[], limit: number): StoredClient[] {
  return rows.slice(-Math.max(1, limit)).reverse();
}

export class JsonlClientStore implements ClientStore {
  constructor(private readonly filePath: string = clientsPath()) {}

  async save(record: ClientRecord): Promise<StoredClient> {
    const row = stamp(record);
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.appendFile(this.filePath, `${JSON.stringify(row)}\n`, "utf8");
    return row;
  }

  async list(limit = 100): Promise<StoredClient[]> {
    if (!(await fs.pathExists(this.filePath))) return [];
    const raw = await fs.readFile(this.filePath, "utf8");
    const rows = raw
      .split("\n")
      .map((line: string) => line.trim())
      .filter(Boolean)
      .map(parseLine)
      .filter(isStoredClient);
    return newestFirst(rows, limit);
  }
}

export class MemoryClientStore implements ClientStore {
  readonly rows: StoredClient[] = [];

  async save(record: ClientRecord): Promise<StoredClient> {
    const row = stamp(record);
    this.rows.push(row);
    return row;
  }

  async list(limit = 100): Promise<StoredClient[]> {
    return newestFirst(this.rows, limit);
  }
}
