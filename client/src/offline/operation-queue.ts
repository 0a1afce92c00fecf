/**
 * Durable queue of business operations captured while offline.
 *
 * Records live in IndexedDB so they survive reloads and browser restarts.
 * All status changes go through the transition methods below, each of which
 * runs inside a single readwrite transaction.
 */

import type {
  OperationKind,
  OperationPayloads,
  OperationStatus,
  QueuedOperation,
} from "../types.ts";
import { DuplicateOperationError, QueueStorageError } from "./errors.ts";

export const DB_NAME = "stockline_offline";
const DB_VERSION = 1;
const STORE_NAME = "operation_queue";

const OPERATION_KINDS: readonly OperationKind[] = ["sale", "stockPurchase", "cashOutflow"];
const OPERATION_STATUSES: readonly OperationStatus[] = ["pending", "synced", "failed"];

interface NewOperationRecord<K extends OperationKind> {
  localId: string;
  kind: K;
  payload: OperationPayloads[K];
  status: OperationStatus;
  queuedAt: string;
  updatedAt: string;
}

export interface EnqueueOptions {
  /** Idempotency token; generated when omitted. */
  localId?: string;
}

/**
 * Narrow the surface of the queue used by code that only captures operations.
 */
export interface OperationSink {
  enqueue<K extends OperationKind>(
    kind: K,
    payload: OperationPayloads[K],
    options?: EnqueueOptions,
  ): Promise<number>;
  count(status: OperationStatus): Promise<number>;
  listPending(): Promise<QueuedOperation[]>;
}

export function isQueuedOperation(value: unknown): value is QueuedOperation {
  if (typeof value !== "object" || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.id === "number" &&
    typeof record.localId === "string" &&
    typeof record.queuedAt === "string" &&
    typeof record.payload === "object" &&
    record.payload !== null &&
    OPERATION_KINDS.some((kind) => kind === record.kind) &&
    OPERATION_STATUSES.some((status) => status === record.status)
  );
}

export function generateLocalId(): string {
  return crypto.randomUUID();
}

export class OperationQueue implements OperationSink {
  private db: IDBDatabase | null = null;
  private dbPromise: Promise<IDBDatabase> | null = null;

  constructor(private dbName: string = DB_NAME) {}

  private async getDb(): Promise<IDBDatabase> {
    if (this.db) {
      return this.db;
    }

    if (this.dbPromise) {
      return this.dbPromise;
    }

    this.dbPromise = new Promise<IDBDatabase>((resolve, reject) => {
      let request: IDBOpenDBRequest;
      try {
        request = indexedDB.open(this.dbName, DB_VERSION);
      } catch (error) {
        reject(new QueueStorageError("IndexedDB is not available", error));
        return;
      }

      request.onerror = () => {
        reject(
          new QueueStorageError(
            `Failed to open IndexedDB: ${request.error?.message}`,
            request.error,
          ),
        );
      };

      request.onupgradeneeded = () => {
        const db = request.result;
        if (!db.objectStoreNames.contains(STORE_NAME)) {
          const store = db.createObjectStore(STORE_NAME, {
            keyPath: "id",
            autoIncrement: true,
          });
          store.createIndex("status", "status", { unique: false });
          store.createIndex("localId", "localId", { unique: true });
        }
      };

      request.onsuccess = () => {
        const db = request.result;
        // Let other tabs (or a test teardown) upgrade or delete the database.
        db.onversionchange = () => {
          db.close();
          this.db = null;
          this.dbPromise = null;
        };
        this.db = db;
        resolve(db);
      };
    }).catch((error: unknown) => {
      this.dbPromise = null;
      throw error;
    });

    return this.dbPromise;
  }

  /**
   * Run one transaction against the queue store. The promise settles once
   * the transaction has committed, so a resolved write is durable.
   */
  private async withStore<T>(
    mode: IDBTransactionMode,
    action: string,
    body: (store: IDBObjectStore, done: (value: T) => void) => void,
  ): Promise<T> {
    const db = await this.getDb();

    return new Promise<T>((resolve, reject) => {
      let outcome: { value: T } | null = null;
      let transaction: IDBTransaction;

      try {
        transaction = db.transaction(STORE_NAME, mode);
      } catch (error) {
        reject(new QueueStorageError(`Failed to ${action}`, error));
        return;
      }

      transaction.oncomplete = () => {
        if (outcome) {
          resolve(outcome.value);
        } else {
          reject(new QueueStorageError(`Failed to ${action}: no result`));
        }
      };

      transaction.onabort = () => {
        reject(
          new QueueStorageError(
            `Failed to ${action}: ${transaction.error?.message ?? "transaction aborted"}`,
            transaction.error,
          ),
        );
      };

      try {
        body(transaction.objectStore(STORE_NAME), (value) => {
          outcome = { value };
        });
      } catch (error) {
        transaction.abort();
        reject(new QueueStorageError(`Failed to ${action}`, error));
      }
    });
  }

  /**
   * Persist a new pending operation and return its store id.
   */
  async enqueue<K extends OperationKind>(
    kind: K,
    payload: OperationPayloads[K],
    options: EnqueueOptions = {},
  ): Promise<number> {
    const now = new Date().toISOString();
    const record: NewOperationRecord<K> = {
      localId: options.localId ?? generateLocalId(),
      kind,
      payload,
      status: "pending",
      queuedAt: now,
      updatedAt: now,
    };

    try {
      return await this.withStore<number>("readwrite", "enqueue operation", (store, done) => {
        const request = store.add(record);
        request.onsuccess = () => {
          const key: unknown = request.result;
          if (typeof key === "number") {
            done(key);
          }
        };
      });
    } catch (error) {
      if (error instanceof QueueStorageError && error.storageErrorName === "ConstraintError") {
        throw new DuplicateOperationError(record.localId, error);
      }
      throw error;
    }
  }

  /**
   * All operations still waiting for the server, in insertion order.
   */
  async listPending(): Promise<QueuedOperation[]> {
    return this.listByStatus("pending");
  }

  async listByStatus(status: OperationStatus): Promise<QueuedOperation[]> {
    return this.withStore("readonly", "list operations", (store, done) => {
      const request = store.index("status").getAll(status);
      request.onsuccess = () => {
        const rows: unknown[] = request.result;
        done(rows.filter(isQueuedOperation));
      };
    });
  }

  /**
   * Every stored operation regardless of status.
   */
  async list(): Promise<QueuedOperation[]> {
    return this.withStore("readonly", "list operations", (store, done) => {
      const request = store.getAll();
      request.onsuccess = () => {
        const rows: unknown[] = request.result;
        done(rows.filter(isQueuedOperation));
      };
    });
  }

  async get(id: number): Promise<QueuedOperation | undefined> {
    return this.withStore("readonly", "read operation", (store, done) => {
      const request = store.get(id);
      request.onsuccess = () => {
        const row: unknown = request.result;
        done(isQueuedOperation(row) ? row : undefined);
      };
    });
  }

  async findByLocalId(localId: string): Promise<QueuedOperation | undefined> {
    return this.withStore("readonly", "read operation", (store, done) => {
      const request = store.index("localId").get(localId);
      request.onsuccess = () => {
        const row: unknown = request.result;
        done(isQueuedOperation(row) ? row : undefined);
      };
    });
  }

  async count(status: OperationStatus): Promise<number> {
    return this.withStore("readonly", "count operations", (store, done) => {
      const request = store.index("status").count(status);
      request.onsuccess = () => {
        done(request.result);
      };
    });
  }

  /**
   * Mark a pending operation as accepted by the server.
   * Returns false when the record is unknown or already terminal.
   */
  async markSynced(id: number): Promise<boolean> {
    return this.transition(id, "synced");
  }

  /**
   * Mark a pending operation as rejected by the server.
   * Returns false when the record is unknown or already terminal.
   */
  async markFailed(id: number): Promise<boolean> {
    return this.transition(id, "failed");
  }

  private async transition(id: number, status: "synced" | "failed"): Promise<boolean> {
    return this.withStore("readwrite", `mark operation ${status}`, (store, done) => {
      const request = store.get(id);
      request.onsuccess = () => {
        const row: unknown = request.result;
        if (!isQueuedOperation(row) || row.status !== "pending") {
          done(false);
          return;
        }
        const put = store.put({ ...row, status, updatedAt: new Date().toISOString() });
        put.onsuccess = () => done(true);
      };
    });
  }

  /**
   * Move every failed operation back to pending so the next drain retries it.
   */
  async requeueFailed(): Promise<number> {
    return this.withStore("readwrite", "requeue failed operations", (store, done) => {
      const request = store.index("status").getAll("failed");
      request.onsuccess = () => {
        const rows: unknown[] = request.result;
        const failed = rows.filter(isQueuedOperation);
        const updatedAt = new Date().toISOString();
        for (const row of failed) {
          store.put({ ...row, status: "pending", updatedAt });
        }
        done(failed.length);
      };
    });
  }

  /**
   * Delete synced operations. Maintenance only; the sync flow never calls it.
   */
  async purgeSynced(): Promise<number> {
    return this.withStore("readwrite", "purge synced operations", (store, done) => {
      const request = store.index("status").getAllKeys("synced");
      request.onsuccess = () => {
        const keys = request.result;
        for (const key of keys) {
          store.delete(key);
        }
        done(keys.length);
      };
    });
  }

  /**
   * Close the database connection.
   */
  close(): void {
    if (this.db) {
      this.db.close();
    }
    this.db = null;
    this.dbPromise = null;
  }
}
