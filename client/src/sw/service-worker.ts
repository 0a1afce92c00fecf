/**
 * Service worker wiring: precache on install, drop stale caches on
 * activate, route fetches through the policies and drain the queue on
 * background sync.
 */

import {
  type CacheLike,
  type CacheStorageLike,
  DEFAULT_OFFLINE_URL,
  type FetchPolicyOptions,
  handleFetch,
} from "../offline/fetch-policy.ts";
import { globalFetch, type FetchFn } from "../offline/connectivity-classifier.ts";
import { OperationQueue } from "../offline/operation-queue.ts";
import { SYNC_TAG, SyncOrchestrator } from "../offline/sync-orchestrator.ts";

export const CACHE_VERSION = "stockline-v1";

export const DEFAULT_PRECACHE = [DEFAULT_OFFLINE_URL];

export interface ExtendableEventLike {
  waitUntil(promise: Promise<unknown>): void;
}

export interface FetchEventLike extends ExtendableEventLike {
  readonly request: Request;
  respondWith(response: Promise<Response>): void;
}

export interface SyncEventLike extends ExtendableEventLike {
  readonly tag: string;
}

export interface WorkerCache extends CacheLike {
  addAll(requests: string[]): Promise<void>;
}

export interface WorkerCacheStorage extends CacheStorageLike {
  open(cacheName: string): Promise<WorkerCache>;
  keys(): Promise<string[]>;
  delete(cacheName: string): Promise<boolean>;
}

/**
 * What the handlers need from the worker global scope.
 */
export interface WorkerEnvironment {
  readonly location: { readonly origin: string };
  readonly caches: WorkerCacheStorage;
  readonly clients: { claim(): Promise<void> };
  skipWaiting(): Promise<void>;
}

interface WorkerEventMap {
  install: ExtendableEventLike;
  activate: ExtendableEventLike;
  fetch: FetchEventLike;
  sync: SyncEventLike;
}

export interface WorkerScope extends WorkerEnvironment {
  addEventListener<K extends keyof WorkerEventMap>(
    type: K,
    listener: (event: WorkerEventMap[K]) => void,
  ): void;
}

export interface ServiceWorkerOptions {
  cacheName?: string;
  precache?: string[];
  offlineUrl?: string;
  authPathPrefix?: string;
  fetch?: FetchFn;
  /** Drains the queue on a background-sync event. */
  drain?: () => Promise<unknown>;
}

export interface ServiceWorkerHandlers {
  install(event: ExtendableEventLike): void;
  activate(event: ExtendableEventLike): void;
  fetch(event: FetchEventLike): void;
  sync(event: SyncEventLike): void;
}

function defaultDrain(): () => Promise<unknown> {
  return async () => {
    const queue = new OperationQueue();
    try {
      await new SyncOrchestrator({ queue }).drain();
    } finally {
      queue.close();
    }
  };
}

export function createServiceWorkerHandlers(
  env: WorkerEnvironment,
  options: ServiceWorkerOptions = {},
): ServiceWorkerHandlers {
  const cacheName = options.cacheName ?? CACHE_VERSION;
  const precache = options.precache ?? DEFAULT_PRECACHE;
  const drain = options.drain ?? defaultDrain();

  const policy: FetchPolicyOptions = {
    cacheName,
    caches: env.caches,
    fetch: options.fetch ?? globalFetch,
    origin: env.location.origin,
    offlineUrl: options.offlineUrl ?? DEFAULT_OFFLINE_URL,
    authPathPrefix: options.authPathPrefix,
  };

  return {
    install(event) {
      event.waitUntil(
        env.caches
          .open(cacheName)
          .then((cache) =>
            cache.addAll(precache).catch((error: unknown) => {
              console.warn("[stockline] Some assets failed to pre-cache:", error);
            }),
          )
          .then(() => env.skipWaiting()),
      );
    },

    activate(event) {
      event.waitUntil(
        env.caches
          .keys()
          .then((keys) =>
            Promise.all(keys.filter((key) => key !== cacheName).map((key) => env.caches.delete(key))),
          )
          .then(() => env.clients.claim()),
      );
    },

    fetch(event) {
      const response = handleFetch(event.request, policy);
      if (response) {
        event.respondWith(response);
      }
    },

    sync(event) {
      if (event.tag === SYNC_TAG) {
        event.waitUntil(
          drain().catch((error: unknown) => {
            console.error("[stockline] Background sync failed:", error);
            // Rejecting lets the browser schedule another attempt.
            throw error;
          }),
        );
      }
    },
  };
}

export function isWorkerScope(value: unknown): value is WorkerScope {
  return (
    typeof value === "object" &&
    value !== null &&
    "skipWaiting" in value &&
    "clients" in value &&
    "caches" in value &&
    "addEventListener" in value
  );
}

/**
 * Attach the handlers to the worker global scope.
 */
export function installServiceWorker(scope: WorkerScope, options: ServiceWorkerOptions = {}): void {
  const handlers = createServiceWorkerHandlers(scope, options);
  scope.addEventListener("install", handlers.install);
  scope.addEventListener("activate", handlers.activate);
  scope.addEventListener("fetch", handlers.fetch);
  scope.addEventListener("sync", handlers.sync);
}
