import { mkdirSync } from "node:fs";
import { join } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import {
  type OperationKind,
  operationKindSchema,
  type ReceivedOperation,
  type User,
} from "../lib/types.ts";

let db: Database.Database | undefined;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase first.");
  }
  return db;
}

export async function initDatabase(dataDir: string): Promise<void> {
  mkdirSync(dataDir, { recursive: true });
  const dbPath = join(dataDir, "stockline.db");

  db?.close();
  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  runMigrations(db);
}

export function closeDatabase(): void {
  db?.close();
  db = undefined;
}

function runMigrations(database: Database.Database): void {
  const migrations = [
    `CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      name TEXT,
      created_at TEXT NOT NULL DEFAULT (datetime('now'))
    )`,

    `CREATE TABLE IF NOT EXISTS received_operations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      local_id TEXT NOT NULL UNIQUE,
      kind TEXT NOT NULL,
      user_id TEXT NOT NULL REFERENCES users(id),
      payload TEXT NOT NULL,
      received_at TEXT NOT NULL DEFAULT (datetime('now'))
    )`,

    `CREATE INDEX IF NOT EXISTS idx_received_operations_user ON received_operations(user_id)`,
  ];

  for (const sql of migrations) {
    database.exec(sql);
  }
}

// SQLite stores datetime('now') as "YYYY-MM-DD HH:MM:SS" in UTC
function parseSqliteDate(value: string): Date {
  return new Date(`${value.replace(" ", "T")}Z`);
}

const userRowSchema = z.object({
  id: z.string(),
  name: z.string().nullable(),
  created_at: z.string(),
});

const operationRowSchema = z.object({
  id: z.number(),
  local_id: z.string(),
  kind: operationKindSchema,
  user_id: z.string(),
  payload: z.string(),
  received_at: z.string(),
});

function rowToUser(row: unknown): User {
  const parsed = userRowSchema.parse(row);
  return {
    id: parsed.id,
    name: parsed.name,
    createdAt: parseSqliteDate(parsed.created_at),
  };
}

function rowToOperation(row: unknown): ReceivedOperation {
  const parsed = operationRowSchema.parse(row);
  const payload: unknown = JSON.parse(parsed.payload);
  return {
    id: parsed.id,
    localId: parsed.local_id,
    kind: parsed.kind,
    userId: parsed.user_id,
    payload,
    receivedAt: parseSqliteDate(parsed.received_at),
  };
}

// User operations
export function createUser(user: { id: string; name?: string | null }): User {
  const stmt = getDb().prepare(`
    INSERT INTO users (id, name)
    VALUES (?, ?)
    ON CONFLICT(id) DO UPDATE SET name = excluded.name
    RETURNING *
  `);

  return rowToUser(stmt.get(user.id, user.name ?? null));
}

export function getUser(id: string): User | null {
  const row: unknown = getDb().prepare("SELECT * FROM users WHERE id = ?").get(id);
  return row ? rowToUser(row) : null;
}

export function getAllUsers(limit = 100, offset = 0): User[] {
  const rows: unknown[] = getDb()
    .prepare("SELECT * FROM users ORDER BY created_at DESC, id LIMIT ? OFFSET ?")
    .all(limit, offset);
  return rows.map(rowToUser);
}

// Received operations
export type RecordResult =
  | { status: "created"; operation: ReceivedOperation }
  | { status: "duplicate"; operation: ReceivedOperation };

/**
 * Record an operation unless its localId was already received.
 */
export function recordOperation(input: {
  localId: string;
  kind: OperationKind;
  userId: string;
  payload: unknown;
}): RecordResult {
  const inserted: unknown = getDb()
    .prepare(`
      INSERT INTO received_operations (local_id, kind, user_id, payload)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(local_id) DO NOTHING
      RETURNING *
    `)
    .get(input.localId, input.kind, input.userId, JSON.stringify(input.payload));

  if (inserted) {
    return { status: "created", operation: rowToOperation(inserted) };
  }

  const existing = getOperationByLocalId(input.localId);
  if (!existing) {
    throw new Error(`Operation ${input.localId} vanished after a conflicting insert`);
  }
  return { status: "duplicate", operation: existing };
}

export function getOperationByLocalId(localId: string): ReceivedOperation | null {
  const row: unknown = getDb()
    .prepare("SELECT * FROM received_operations WHERE local_id = ?")
    .get(localId);
  return row ? rowToOperation(row) : null;
}

export function listOperations(limit = 100, offset = 0): ReceivedOperation[] {
  const rows: unknown[] = getDb()
    .prepare("SELECT * FROM received_operations ORDER BY id DESC LIMIT ? OFFSET ?")
    .all(limit, offset);
  return rows.map(rowToOperation);
}
