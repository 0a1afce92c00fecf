/**
 * Shared test utilities for offline components.
 */

import "fake-indexeddb/auto";
import type { FetchFn } from "../../src/offline/connectivity-classifier.ts";
import type { OperationQueue } from "../../src/offline/operation-queue.ts";
import type {
  CashOutflowPayload,
  QueuedOperation,
  SalePayload,
  StockPurchasePayload,
} from "../../src/types.ts";

/**
 * Delete a specific database by name.
 */
export function deleteDatabase(name: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const request = indexedDB.deleteDatabase(name);
    request.onsuccess = () => resolve();
    request.onerror = () => reject(request.error);
    request.onblocked = () => {
      // Open connections close themselves on versionchange
      resolve();
    };
  });
}

export function salePayload(overrides: Partial<SalePayload> = {}): SalePayload {
  return {
    clientChoice: "existing",
    existingClientId: "12",
    newClientName: null,
    displayClient: "Kasongo Shop",
    cashPaid: 500,
    items: [
      { network: "airtel", quantity: 2, unitPrice: 100 },
      { network: "orange", quantity: 3, unitPrice: 150 },
    ],
    ...overrides,
  };
}

export function stockPurchasePayload(
  overrides: Partial<StockPurchasePayload> = {},
): StockPurchasePayload {
  return {
    network: "vodacom",
    amountPurchased: 40,
    buyingPriceChoice: "standard",
    customBuyingPrice: null,
    sellingPriceChoice: "standard",
    customSellingPrice: null,
    ...overrides,
  };
}

export function cashOutflowPayload(overrides: Partial<CashOutflowPayload> = {}): CashOutflowPayload {
  return {
    amount: 25,
    category: "transport",
    description: "Taxi to supplier",
    ...overrides,
  };
}

export async function queueStatuses(queue: OperationQueue): Promise<QueuedOperation["status"][]> {
  const operations = await queue.list();
  return operations.map((operation) => operation.status);
}

/**
 * Mock fetch responses.
 */
export interface MockFetchResponse {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
  /** Simulate a followed redirect ending at this URL. */
  redirectedTo?: string;
}

export interface RecordedRequest {
  method: string;
  url: string;
  headers: Headers;
  credentials: RequestCredentials | undefined;
  redirect: RequestRedirect | undefined;
  body: unknown;
}

type MockReply =
  | MockFetchResponse
  | "network-error"
  | ((request: RecordedRequest) => MockFetchResponse | "network-error" | Promise<MockFetchResponse | "network-error">);

export type MockFetchConfig = Record<string, MockReply>;

export function redirectedResponse(finalUrl: string, init: ResponseInit = {}): Response {
  const response = new Response("<html>login</html>", {
    status: 200,
    headers: { "Content-Type": "text/html" },
    ...init,
  });
  Object.defineProperty(response, "redirected", { value: true });
  Object.defineProperty(response, "url", { value: finalUrl });
  return response;
}

function requestUrl(input: RequestInfo | URL): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

function parseBody(body: RequestInit["body"]): unknown {
  if (typeof body !== "string") return body ?? null;
  try {
    return JSON.parse(body);
  } catch {
    return body;
  }
}

/**
 * Create a mock fetch keyed by "METHOD url", url, or "*". Every call is
 * recorded in `requests`.
 */
export function createMockFetch(config: MockFetchConfig): {
  fetch: FetchFn;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const fetch: FetchFn = async (input, init) => {
    const url = requestUrl(input);
    const method = init?.method ?? (input instanceof Request ? input.method : "GET");
    const recorded: RecordedRequest = {
      method,
      url,
      headers: new Headers(init?.headers),
      credentials: init?.credentials,
      redirect: init?.redirect,
      body: parseBody(init?.body),
    };
    requests.push(recorded);

    const reply = config[`${method} ${url}`] ?? config[url] ?? config["*"];
    if (reply === undefined) {
      throw new Error(`No mock configured for: ${method} ${url}`);
    }

    const resolved = typeof reply === "function" ? await reply(recorded) : reply;
    if (resolved === "network-error") {
      throw new TypeError("Failed to fetch");
    }

    const body = resolved.body !== undefined ? JSON.stringify(resolved.body) : null;
    const responseInit: ResponseInit = {
      status: resolved.status,
      headers: { "Content-Type": "application/json", ...resolved.headers },
    };
    return resolved.redirectedTo
      ? redirectedResponse(resolved.redirectedTo, responseInit)
      : new Response(body, responseInit);
  };

  return { fetch, requests };
}

/**
 * Wait for a specified number of milliseconds.
 */
export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait for all pending promises to resolve.
 */
export async function flushPromises(): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, 0));
}
