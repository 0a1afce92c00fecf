/**
 * Page bootstrap composing the offline pieces for a server-rendered page.
 *
 * @example
 * ```ts
 * const client = new OfflineClient();
 * await client.start();
 * ```
 */

import { ConnectivityManager } from "./offline/connectivity-manager.ts";
import type { FetchFn } from "./offline/connectivity-classifier.ts";
import { describeError } from "./offline/errors.ts";
import { OperationQueue } from "./offline/operation-queue.ts";
import {
  type BackgroundSyncRegistrar,
  type DrainResult,
  type SyncEvent,
  SyncOrchestrator,
} from "./offline/sync-orchestrator.ts";
import { FormInterceptor, type FormRoute } from "./forms/form-interceptor.ts";
import { renderPendingRows } from "./ui/pending-rows.ts";
import { StatusSurface } from "./ui/status-surface.ts";
import { DEFAULT_AUTH_PATH_PREFIX, type EndpointMap } from "./types.ts";

export const DEFAULT_SERVICE_WORKER_URL = "/sw.js";

/** The part of `navigator.serviceWorker` the client uses. */
export interface WorkerContainer {
  register(scriptUrl: string, options?: RegistrationOptions): Promise<object>;
}

export interface WorkerRegistrationOptions {
  container: WorkerContainer;
  scriptUrl?: string;
  scope?: string;
}

export interface OfflineClientOptions {
  document?: Document;
  /** Path of the current page, used to pick the intercepted form. */
  pathname?: string;
  queue?: OperationQueue;
  connectivity?: ConnectivityManager;
  surface?: StatusSurface;
  fetch?: FetchFn;
  endpoints?: Partial<EndpointMap>;
  authPathPrefix?: string;
  probeUrl?: string;
  formRoutes?: readonly FormRoute[];
  /** Pass null to skip service worker registration. */
  serviceWorker?: WorkerRegistrationOptions | null;
  /**
   * Defaults to the registered service worker's Background Sync when the
   * browser has it. Pass null to always drain from the page.
   */
  backgroundSync?: BackgroundSyncRegistrar | null;
}

interface SyncCapableRegistration {
  sync: { register(tag: string): Promise<void> };
}

function hasBackgroundSync(registration: object): registration is SyncCapableRegistration {
  if (!("sync" in registration)) return false;
  const { sync } = registration;
  return (
    typeof sync === "object" &&
    sync !== null &&
    "register" in sync &&
    typeof sync.register === "function"
  );
}

/**
 * Background sync through a service worker registration, or null when the
 * browser does not support it.
 */
export function backgroundSyncFor(registration: object): BackgroundSyncRegistrar | null {
  if (!hasBackgroundSync(registration)) return null;
  const { sync } = registration;
  return { register: (tag) => sync.register(tag) };
}

function defaultServiceWorker(): WorkerRegistrationOptions | null {
  if (typeof navigator !== "undefined" && "serviceWorker" in navigator) {
    return { container: navigator.serviceWorker };
  }
  return null;
}

export class OfflineClient {
  readonly queue: OperationQueue;
  readonly connectivity: ConnectivityManager;
  readonly surface: StatusSurface;
  readonly orchestrator: SyncOrchestrator;
  readonly interceptor: FormInterceptor;

  private doc: Document;
  private pathname: string;
  private serviceWorker: WorkerRegistrationOptions | null;
  private useWorkerSync: boolean;
  private unsubscribers: (() => void)[] = [];
  private started = false;

  constructor(options: OfflineClientOptions = {}) {
    this.doc = options.document ?? document;
    this.pathname = options.pathname ?? this.doc.location?.pathname ?? "/";
    this.serviceWorker =
      options.serviceWorker !== undefined ? options.serviceWorker : defaultServiceWorker();
    this.useWorkerSync = options.backgroundSync === undefined;

    const authPathPrefix = options.authPathPrefix ?? DEFAULT_AUTH_PATH_PREFIX;

    this.queue = options.queue ?? new OperationQueue();
    this.connectivity =
      options.connectivity ??
      new ConnectivityManager({
        probeUrl: options.probeUrl,
        authPathPrefix,
        fetch: options.fetch,
      });
    this.surface = options.surface ?? new StatusSurface({ document: this.doc });
    this.orchestrator = new SyncOrchestrator({
      queue: this.queue,
      connectivity: this.connectivity,
      endpoints: options.endpoints,
      authPathPrefix,
      fetch: options.fetch,
      backgroundSync: options.backgroundSync,
    });
    this.interceptor = new FormInterceptor({
      sink: this.queue,
      connectivity: this.connectivity,
      surface: this.surface,
      document: this.doc,
      routes: options.formRoutes,
    });
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    const registration = await this.registerServiceWorker();
    if (registration && this.useWorkerSync) {
      this.orchestrator.setBackgroundSync(backgroundSyncFor(registration));
    }

    this.unsubscribers.push(
      this.orchestrator.subscribe((event) => this.handleSyncEvent(event)),
      this.connectivity.subscribe((state) => {
        void this.showQueueStatus(state === "unreachable" ? "always" : "never");
      }),
    );

    const route = this.interceptor.attachForPath(this.pathname);
    if (route) {
      await this.renderPendingRows(route.kind);
    }

    await this.showQueueStatus(this.connectivity.isOnline() ? "never" : "when-pending");

    this.orchestrator.start();
  }

  private async registerServiceWorker(): Promise<object | null> {
    if (!this.serviceWorker) return null;
    const { container, scriptUrl, scope } = this.serviceWorker;
    try {
      return await container.register(
        scriptUrl ?? DEFAULT_SERVICE_WORKER_URL,
        scope ? { scope } : undefined,
      );
    } catch (error) {
      console.warn("[stockline] Service worker registration failed:", error);
      return null;
    }
  }

  private async renderPendingRows(kind: FormRoute["kind"]): Promise<void> {
    try {
      const pending = await this.queue.listPending();
      renderPendingRows(this.doc, pending, kind);
    } catch (error) {
      console.error("[stockline] Failed to load pending operations:", error);
    }
  }

  private showSyncError(failed: number): void {
    this.surface.showSyncError(failed, () => {
      void this.retryNow();
    });
  }

  /**
   * Project the queue onto the status surface. Failed records keep the
   * error toast up until they are retried; otherwise the offline toast is
   * shown always, only when something is waiting, or never.
   */
  private async showQueueStatus(offline: "always" | "when-pending" | "never"): Promise<void> {
    try {
      const failed = await this.queue.count("failed");
      if (failed > 0) {
        this.showSyncError(failed);
        return;
      }
      if (offline === "never") return;

      const pending = await this.queue.count("pending");
      if (offline === "always" || pending > 0) {
        this.surface.showOffline(pending);
      }
    } catch (error) {
      this.surface.flash(describeError(error, "Offline storage unavailable"), "danger");
    }
  }

  private async showSyncOutcome(event: SyncEvent): Promise<void> {
    try {
      const failed = await this.queue.count("failed");
      const synced = event.synced ?? 0;
      const pending = event.pending ?? 0;
      if (failed > 0) {
        this.showSyncError(failed);
      } else if (synced > 0) {
        this.surface.showSynced(synced);
      } else if (pending > 0) {
        this.surface.showOffline(pending);
      } else {
        this.surface.hide();
      }
    } catch (error) {
      this.surface.flash(describeError(error, "Offline storage unavailable"), "danger");
    }
  }

  private handleSyncEvent(event: SyncEvent): void {
    switch (event.type) {
      case "sync:started":
        this.surface.showSyncing();
        break;
      case "sync:completed":
        void this.showSyncOutcome(event);
        break;
      case "sync:error":
        this.surface.flash(event.error ?? "Sync error", "danger");
        break;
    }
  }

  /**
   * Re-queue failed operations and drain now.
   */
  retryNow(): Promise<DrainResult> {
    return this.orchestrator.retryFailed();
  }

  destroy(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    this.interceptor.destroy();
    this.orchestrator.destroy();
    this.connectivity.destroy();
    this.surface.destroy();
    this.queue.close();
    this.started = false;
  }
}
