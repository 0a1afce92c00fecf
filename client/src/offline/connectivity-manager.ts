/**
 * Connectivity manager exposing a single three-way connectivity state.
 *
 * Combines browser online/offline events with the outcome of real requests
 * (probes, sync submissions) so callers can tell a dead network apart from
 * a server that is up but bouncing requests to the login page.
 */

import {
  classifyFetch,
  type ConnectivityOutcome,
  type FetchFn,
  globalFetch,
} from "./connectivity-classifier.ts";
import { DEFAULT_AUTH_PATH_PREFIX } from "../types.ts";

export type ConnectivityState = ConnectivityOutcome;

export type ConnectivityListener = (state: ConnectivityState) => void;

export interface ConnectivityManagerOptions {
  /** Lightweight authenticated endpoint used to verify the session. */
  probeUrl?: string;
  authPathPrefix?: string;
  fetch?: FetchFn;
  /** Source of online/offline events. Defaults to `window` when present. */
  events?: EventTarget | null;
  /** First delay before re-probing a server that is not reachable. */
  reprobeDelayMs?: number;
  /** Upper bound for the doubling re-probe delay. */
  maxReprobeDelayMs?: number;
}

export const DEFAULT_PROBE_URL = "/api/v1/sync/status";
const DEFAULT_REPROBE_DELAY_MS = 5000;
const DEFAULT_MAX_REPROBE_DELAY_MS = 60_000;

export class ConnectivityManager {
  private state: ConnectivityState;
  private listeners: Set<ConnectivityListener> = new Set();
  private browserOnline: boolean;
  private probeUrl: string;
  private authPathPrefix: string;
  private fetchFn: FetchFn;
  private events: EventTarget | null;
  private reprobeDelayMs: number;
  private maxReprobeDelayMs: number;
  private nextReprobeDelayMs: number;
  private reprobeTimer: ReturnType<typeof setTimeout> | null = null;
  private destroyed = false;

  constructor(options: ConnectivityManagerOptions = {}) {
    this.probeUrl = options.probeUrl ?? DEFAULT_PROBE_URL;
    this.authPathPrefix = options.authPathPrefix ?? DEFAULT_AUTH_PATH_PREFIX;
    this.fetchFn = options.fetch ?? globalFetch;
    this.reprobeDelayMs = options.reprobeDelayMs ?? DEFAULT_REPROBE_DELAY_MS;
    this.maxReprobeDelayMs = options.maxReprobeDelayMs ?? DEFAULT_MAX_REPROBE_DELAY_MS;
    this.nextReprobeDelayMs = this.reprobeDelayMs;
    this.events =
      options.events !== undefined
        ? options.events
        : typeof window !== "undefined"
          ? window
          : null;

    // Check navigator.onLine, defaulting to true if unavailable
    this.browserOnline =
      typeof navigator !== "undefined" && typeof navigator.onLine === "boolean"
        ? navigator.onLine
        : true;
    this.state = this.browserOnline ? "reachable" : "unreachable";

    this.events?.addEventListener("online", this.handleBrowserOnline);
    this.events?.addEventListener("offline", this.handleBrowserOffline);
  }

  private handleBrowserOnline = (): void => {
    this.browserOnline = true;
    // The browser event only says a link exists; ask the server.
    void this.probe();
  };

  private handleBrowserOffline = (): void => {
    this.browserOnline = false;
    this.setState("unreachable");
  };

  /**
   * While the browser has a link but the server is not reachable, no browser
   * event will fire again, so probe on a doubling timer until it answers.
   */
  private scheduleReprobe(): void {
    if (this.destroyed || this.state === "reachable" || !this.browserOnline) {
      this.clearReprobe();
      this.nextReprobeDelayMs = this.reprobeDelayMs;
      return;
    }
    if (this.reprobeTimer) return;

    const delay = this.nextReprobeDelayMs;
    this.nextReprobeDelayMs = Math.min(delay * 2, this.maxReprobeDelayMs);
    this.reprobeTimer = setTimeout(() => {
      this.reprobeTimer = null;
      this.probe().catch((error: unknown) => {
        console.error("Error in connectivity probe:", error);
      });
    }, delay);
  }

  private clearReprobe(): void {
    if (this.reprobeTimer) {
      clearTimeout(this.reprobeTimer);
      this.reprobeTimer = null;
    }
  }

  /**
   * Feed the outcome of a request made elsewhere into the state.
   */
  report(outcome: ConnectivityOutcome): void {
    this.setState(outcome);
  }

  /**
   * Request the probe endpoint without following redirects and update the
   * state from the result.
   */
  async probe(): Promise<ConnectivityState> {
    const result = await classifyFetch(
      this.fetchFn,
      this.probeUrl,
      {
        method: "GET",
        redirect: "manual",
        credentials: "same-origin",
        cache: "no-store",
        headers: { "X-Requested-With": "XMLHttpRequest" },
      },
      { authPathPrefix: this.authPathPrefix },
    );

    this.setState(result.outcome);
    return result.outcome;
  }

  private setState(next: ConnectivityState): void {
    if (next !== this.state) {
      this.state = next;
      this.notifyListeners();
    }
    this.scheduleReprobe();
  }

  private notifyListeners(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch (error) {
        console.error("Error in connectivity listener:", error);
      }
    }
  }

  currentState(): ConnectivityState {
    return this.state;
  }

  /**
   * Check if the server is reachable and accepting the session.
   */
  isOnline(): boolean {
    return this.state === "reachable";
  }

  /**
   * Check if browser reports being online (the server may still be down).
   */
  isBrowserOnline(): boolean {
    return this.browserOnline;
  }

  /**
   * Subscribe to connectivity state changes.
   */
  subscribe(listener: ConnectivityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async waitForOnline(): Promise<void> {
    if (this.state === "reachable") {
      return;
    }

    return new Promise((resolve) => {
      const unsubscribe = this.subscribe((state) => {
        if (state === "reachable") {
          unsubscribe();
          resolve();
        }
      });
    });
  }

  /**
   * Cleanup event listeners.
   */
  destroy(): void {
    this.destroyed = true;
    this.clearReprobe();
    this.events?.removeEventListener("online", this.handleBrowserOnline);
    this.events?.removeEventListener("offline", this.handleBrowserOffline);
    this.listeners.clear();
  }
}
