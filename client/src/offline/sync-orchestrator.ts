/**
 * Sync orchestrator replaying queued operations against the server.
 *
 * Each drain cycle reads every pending operation, submits them concurrently
 * and records the verdict per operation:
 * - 2xx, or 409 (already applied under the same localId): synced
 * - any other status: failed
 * - network error or redirect to the login page: left pending
 */

import {
  classifyFetch,
  type FetchFn,
  globalFetch,
} from "./connectivity-classifier.ts";
import type { ConnectivityManager } from "./connectivity-manager.ts";
import { describeError } from "./errors.ts";
import type { OperationQueue } from "./operation-queue.ts";
import {
  DEFAULT_AUTH_PATH_PREFIX,
  DEFAULT_ENDPOINTS,
  type EndpointMap,
  type OperationKind,
  type QueuedOperation,
} from "../types.ts";

export const SYNC_TAG = "stockline-sync";

const DEFAULT_POLL_INTERVAL_MS = 2000;
const DEFAULT_MAX_POLL_ATTEMPTS = 15;

export type SyncQueue = Pick<
  OperationQueue,
  "listPending" | "markSynced" | "markFailed" | "count" | "requeueFailed"
>;

export type SyncConnectivity = Pick<ConnectivityManager, "report" | "subscribe" | "isOnline">;

/**
 * Platform facility that retries sync in the background (service worker
 * background sync). Optional; without it the orchestrator drains directly.
 */
export interface BackgroundSyncRegistrar {
  register(tag: string): Promise<void>;
}

export interface SyncOrchestratorOptions {
  queue: SyncQueue;
  connectivity?: SyncConnectivity | null;
  endpoints?: Partial<EndpointMap>;
  /** Prefix for endpoint paths; empty for same-origin relative URLs. */
  baseUrl?: string;
  authPathPrefix?: string;
  fetch?: FetchFn;
  backgroundSync?: BackgroundSyncRegistrar | null;
  pollIntervalMs?: number;
  maxPollAttempts?: number;
}

export type SubmissionResult = "synced" | "failed" | "pending";

export interface DrainResult {
  synced: number;
  failed: number;
  pending: number;
}

export type SyncEventType = "sync:started" | "sync:completed" | "sync:error";

export interface SyncEvent {
  type: SyncEventType;
  pending?: number;
  synced?: number;
  failed?: number;
  error?: string;
}

export type SyncEventListener = (event: SyncEvent) => void;

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SyncOrchestrator {
  private queue: SyncQueue;
  private connectivity: SyncConnectivity | null;
  private endpoints: EndpointMap;
  private baseUrl: string;
  private authPathPrefix: string;
  private fetchFn: FetchFn;
  private backgroundSync: BackgroundSyncRegistrar | null;
  private pollIntervalMs: number;
  private maxPollAttempts: number;
  private listeners: Set<SyncEventListener> = new Set();
  private unsubscribeConnectivity: (() => void) | null = null;
  private activeDrain: Promise<DrainResult> | null = null;
  private rerunRequested = false;
  private destroyed = false;

  constructor(options: SyncOrchestratorOptions) {
    this.queue = options.queue;
    this.connectivity = options.connectivity ?? null;
    this.endpoints = { ...DEFAULT_ENDPOINTS, ...options.endpoints };
    this.baseUrl = (options.baseUrl ?? "").replace(/\/$/, "");
    this.authPathPrefix = options.authPathPrefix ?? DEFAULT_AUTH_PATH_PREFIX;
    this.fetchFn = options.fetch ?? globalFetch;
    this.backgroundSync = options.backgroundSync ?? null;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.maxPollAttempts = options.maxPollAttempts ?? DEFAULT_MAX_POLL_ATTEMPTS;
  }

  /**
   * Drain whenever connectivity becomes reachable, and once now if it
   * already is.
   */
  start(): void {
    if (this.unsubscribeConnectivity || !this.connectivity) return;

    this.unsubscribeConnectivity = this.connectivity.subscribe((state) => {
      if (state === "reachable") {
        void this.handleOnline();
      }
    });

    if (this.connectivity.isOnline()) {
      void this.handleOnline();
    }
  }

  /**
   * Swap the background sync facility, e.g. once the service worker is
   * registered.
   */
  setBackgroundSync(registrar: BackgroundSyncRegistrar | null): void {
    this.backgroundSync = registrar;
  }

  endpointFor(kind: OperationKind): string {
    return `${this.baseUrl}${this.endpoints[kind]}`;
  }

  /**
   * React to an online transition, through background sync when available.
   */
  async handleOnline(): Promise<void> {
    if (!this.backgroundSync) {
      await this.drain();
      return;
    }

    try {
      await this.backgroundSync.register(SYNC_TAG);
    } catch (error) {
      console.warn("[stockline] Background sync unavailable, draining directly:", error);
      await this.drain();
      return;
    }

    await this.pollBackgroundSync();
  }

  /**
   * Watch the queue while the background sync runs elsewhere; drain
   * directly if it has not emptied the queue after the last attempt.
   */
  private async pollBackgroundSync(): Promise<void> {
    try {
      const pending = await this.queue.count("pending");
      if (pending === 0) {
        return;
      }
      const syncedBefore = await this.queue.count("synced");
      const failedBefore = await this.queue.count("failed");
      this.emit({ type: "sync:started", pending });

      for (let attempt = 1; attempt <= this.maxPollAttempts; attempt++) {
        await delay(this.pollIntervalMs);
        if (this.destroyed) return;

        if ((await this.queue.count("pending")) === 0) {
          this.emit({
            type: "sync:completed",
            synced: (await this.queue.count("synced")) - syncedBefore,
            failed: (await this.queue.count("failed")) - failedBefore,
            pending: 0,
          });
          return;
        }
      }
    } catch (error) {
      this.emit({ type: "sync:error", error: describeError(error, "Sync error") });
      return;
    }

    await this.drain();
  }

  /**
   * Run a drain cycle. A call made while a cycle runs joins it and causes
   * exactly one more cycle once it finishes.
   */
  drain(): Promise<DrainResult> {
    if (this.activeDrain) {
      this.rerunRequested = true;
      return this.activeDrain;
    }

    const run = this.runDrainCycles();
    this.activeDrain = run;
    return run;
  }

  private async runDrainCycles(): Promise<DrainResult> {
    try {
      let result: DrainResult;
      do {
        this.rerunRequested = false;
        result = await this.runCycle();
      } while (this.rerunRequested && !this.destroyed);
      return result;
    } finally {
      this.activeDrain = null;
    }
  }

  private async runCycle(): Promise<DrainResult> {
    let operations: QueuedOperation[];
    try {
      operations = await this.queue.listPending();
    } catch (error) {
      this.emit({ type: "sync:error", error: describeError(error, "Failed to read queue") });
      return { synced: 0, failed: 0, pending: 0 };
    }

    if (operations.length > 0) {
      this.emit({ type: "sync:started", pending: operations.length });
    }

    const storageErrors: string[] = [];
    const outcomes = await Promise.all(
      operations.map((operation) =>
        this.submit(operation).catch((error: unknown): SubmissionResult => {
          storageErrors.push(describeError(error, "Failed to update queue"));
          return "pending";
        }),
      ),
    );

    const result: DrainResult = { synced: 0, failed: 0, pending: 0 };
    for (const outcome of outcomes) {
      result[outcome]++;
    }

    if (storageErrors.length > 0) {
      this.emit({ type: "sync:error", error: storageErrors[0] });
    }
    this.emit({ type: "sync:completed", ...result });

    return result;
  }

  /**
   * Submit one operation and record the verdict in the queue.
   */
  async submit(operation: QueuedOperation): Promise<SubmissionResult> {
    const classification = await classifyFetch(
      this.fetchFn,
      this.endpointFor(operation.kind),
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Requested-With": "XMLHttpRequest",
        },
        credentials: "same-origin",
        body: JSON.stringify({ ...operation.payload, localId: operation.localId }),
      },
      { authPathPrefix: this.authPathPrefix },
    );

    if (classification.outcome !== "reachable") {
      // Either no network or a bounce to the login page: the server has not
      // judged the operation, so it stays pending for the next cycle.
      this.connectivity?.report(classification.outcome);
      return "pending";
    }

    const { response } = classification;
    if (response.ok || response.status === 409) {
      await this.queue.markSynced(operation.id);
      return "synced";
    }

    await this.queue.markFailed(operation.id);
    return "failed";
  }

  /**
   * Put failed operations back in the queue and drain (manual retry).
   */
  async retryFailed(): Promise<DrainResult> {
    try {
      await this.queue.requeueFailed();
    } catch (error) {
      this.emit({ type: "sync:error", error: describeError(error, "Failed to requeue") });
      return { synced: 0, failed: 0, pending: 0 };
    }
    return this.drain();
  }

  private emit(event: SyncEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error("Error in sync event listener:", error);
      }
    }
  }

  /**
   * Subscribe to sync events.
   */
  subscribe(listener: SyncEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  destroy(): void {
    if (this.unsubscribeConnectivity) {
      this.unsubscribeConnectivity();
      this.unsubscribeConnectivity = null;
    }
    this.destroyed = true;
    this.listeners.clear();
  }
}
