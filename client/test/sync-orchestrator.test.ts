/**
 * Tests for SyncOrchestrator.
 */

import "fake-indexeddb/auto";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ConnectivityManager } from "../src/offline/connectivity-manager.ts";
import { QueueStorageError } from "../src/offline/errors.ts";
import { OperationQueue } from "../src/offline/operation-queue.ts";
import {
  SYNC_TAG,
  type SyncEvent,
  SyncOrchestrator,
  type SyncOrchestratorOptions,
  type SyncQueue,
} from "../src/offline/sync-orchestrator.ts";
import type { QueuedOperation } from "../src/types.ts";
import {
  cashOutflowPayload,
  createMockFetch,
  deleteDatabase,
  type MockFetchConfig,
  salePayload,
  stockPurchasePayload,
} from "./helpers/test-utils.ts";

const TEST_DB_NAME = "test-sync-orchestrator";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve: () => resolve() };
}

describe("SyncOrchestrator", () => {
  let queue: OperationQueue;
  let connectivity: ConnectivityManager;
  let orchestrator: SyncOrchestrator | null = null;
  let events: SyncEvent[];

  function createOrchestrator(
    config: MockFetchConfig,
    options: Partial<SyncOrchestratorOptions> = {},
  ) {
    const mock = createMockFetch(config);
    const instance = new SyncOrchestrator({
      queue,
      connectivity,
      fetch: mock.fetch,
      ...options,
    });
    instance.subscribe((event) => {
      events.push(event);
    });
    orchestrator = instance;
    return { orchestrator: instance, requests: mock.requests };
  }

  beforeEach(async () => {
    await deleteDatabase(TEST_DB_NAME);
    queue = new OperationQueue(TEST_DB_NAME);
    connectivity = new ConnectivityManager({
      events: new EventTarget(),
      fetch: createMockFetch({ "*": { status: 200 } }).fetch,
    });
    events = [];
  });

  afterEach(async () => {
    orchestrator?.destroy();
    orchestrator = null;
    connectivity.destroy();
    queue.close();
    await deleteDatabase(TEST_DB_NAME);
  });

  describe("drain()", () => {
    test("submits every pending operation to its endpoint", async () => {
      await queue.enqueue("sale", salePayload(), { localId: "s-1" });
      await queue.enqueue("stockPurchase", stockPurchasePayload(), { localId: "p-1" });
      await queue.enqueue("cashOutflow", cashOutflowPayload(), { localId: "c-1" });
      const { orchestrator, requests } = createOrchestrator({ "*": { status: 201 } });

      const result = await orchestrator.drain();

      expect(result).toEqual({ synced: 3, failed: 0, pending: 0 });
      expect(await queue.listPending()).toEqual([]);
      expect(requests.map((request) => `${request.method} ${request.url}`).sort()).toEqual([
        "POST /api/v1/cash-outflows",
        "POST /api/v1/sales",
        "POST /api/v1/stock-purchases",
      ]);
    });

    test("sends the payload with its localId, JSON headers and credentials", async () => {
      await queue.enqueue("cashOutflow", cashOutflowPayload(), { localId: "c-1" });
      const { orchestrator, requests } = createOrchestrator({ "*": { status: 201 } });

      await orchestrator.drain();

      const [request] = requests;
      expect(request?.body).toEqual({ ...cashOutflowPayload(), localId: "c-1" });
      expect(request?.headers.get("Content-Type")).toBe("application/json");
      expect(request?.headers.get("X-Requested-With")).toBe("XMLHttpRequest");
      expect(request?.credentials).toBe("same-origin");
    });

    test("treats 409 as already applied", async () => {
      const id = await queue.enqueue("sale", salePayload());
      const { orchestrator } = createOrchestrator({
        "*": { status: 409, body: { error: "already_applied" } },
      });

      await orchestrator.drain();

      expect((await queue.get(id))?.status).toBe("synced");
    });

    test("records each verdict independently on partial failure", async () => {
      const sale = await queue.enqueue("sale", salePayload());
      const stock = await queue.enqueue("stockPurchase", stockPurchasePayload());
      const outflow = await queue.enqueue("cashOutflow", cashOutflowPayload());
      const { orchestrator } = createOrchestrator({
        "POST /api/v1/sales": { status: 201 },
        "POST /api/v1/stock-purchases": { status: 500 },
        "POST /api/v1/cash-outflows": "network-error",
      });

      const result = await orchestrator.drain();

      expect(result).toEqual({ synced: 1, failed: 1, pending: 1 });
      expect((await queue.get(sale))?.status).toBe("synced");
      expect((await queue.get(stock))?.status).toBe("failed");
      expect((await queue.get(outflow))?.status).toBe("pending");
      expect(connectivity.currentState()).toBe("unreachable");
    });

    test("leaves operations pending when bounced to the login page", async () => {
      const id = await queue.enqueue("sale", salePayload());
      const { orchestrator } = createOrchestrator({
        "*": { status: 200, redirectedTo: "https://app.example/auth/login?next=/api/v1/sales" },
      });

      const result = await orchestrator.drain();

      expect(result).toEqual({ synced: 0, failed: 0, pending: 1 });
      expect((await queue.get(id))?.status).toBe("pending");
      expect(connectivity.currentState()).toBe("rejected");
    });

    test("emits started and completed events", async () => {
      await queue.enqueue("sale", salePayload());
      await queue.enqueue("sale", salePayload());
      const { orchestrator } = createOrchestrator({ "*": { status: 201 } });

      await orchestrator.drain();

      expect(events).toEqual([
        { type: "sync:started", pending: 2 },
        { type: "sync:completed", synced: 2, failed: 0, pending: 0 },
      ]);
    });

    test("an empty queue only reports completion", async () => {
      const { orchestrator, requests } = createOrchestrator({});

      await orchestrator.drain();

      expect(requests).toHaveLength(0);
      expect(events).toEqual([{ type: "sync:completed", synced: 0, failed: 0, pending: 0 }]);
    });

    test("uses configured endpoints and base URL", async () => {
      await queue.enqueue("sale", salePayload());
      const { orchestrator, requests } = createOrchestrator(
        { "*": { status: 201 } },
        { baseUrl: "https://app.example/", endpoints: { sale: "/v2/sales" } },
      );

      await orchestrator.drain();

      expect(requests[0]?.url).toBe("https://app.example/v2/sales");
    });

    test("coalesces drains requested while one runs into a single extra cycle", async () => {
      const gate = deferred();
      let calls = 0;
      const { orchestrator } = createOrchestrator({
        "*": async () => {
          calls++;
          if (calls === 1) await gate.promise;
          return { status: 201 };
        },
      });
      await queue.enqueue("sale", salePayload(), { localId: "first" });

      const first = orchestrator.drain();
      await vi.waitFor(() => expect(calls).toBe(1));
      await queue.enqueue("sale", salePayload(), { localId: "second" });
      const second = orchestrator.drain();
      const third = orchestrator.drain();
      gate.resolve();

      expect(second).toBe(first);
      expect(third).toBe(first);
      expect(await first).toEqual({ synced: 1, failed: 0, pending: 0 });
      expect(events.filter((event) => event.type === "sync:completed")).toHaveLength(2);
      expect(await queue.count("synced")).toBe(2);
      expect(calls).toBe(2);
    });
  });

  describe("storage errors", () => {
    function failingQueue(overrides: Partial<SyncQueue>): SyncQueue {
      const operation: QueuedOperation = {
        id: 1,
        localId: "x-1",
        kind: "sale",
        payload: salePayload(),
        status: "pending",
        queuedAt: "2026-01-01T00:00:00.000Z",
        updatedAt: "2026-01-01T00:00:00.000Z",
      };
      return {
        listPending: async () => [operation],
        markSynced: async () => true,
        markFailed: async () => true,
        count: async () => 0,
        requeueFailed: async () => 0,
        ...overrides,
      };
    }

    test("a failed queue read emits sync:error and resolves", async () => {
      const { orchestrator } = createOrchestrator(
        {},
        {
          queue: failingQueue({
            listPending: async () => {
              throw new QueueStorageError("Failed to list operations");
            },
          }),
        },
      );

      await expect(orchestrator.drain()).resolves.toEqual({ synced: 0, failed: 0, pending: 0 });
      expect(events).toEqual([{ type: "sync:error", error: "Failed to list operations" }]);
    });

    test("a failed status write keeps the operation pending and emits sync:error", async () => {
      const { orchestrator } = createOrchestrator(
        { "*": { status: 201 } },
        {
          queue: failingQueue({
            markSynced: async () => {
              throw new QueueStorageError("Quota exceeded");
            },
          }),
        },
      );

      const result = await orchestrator.drain();

      expect(result).toEqual({ synced: 0, failed: 0, pending: 1 });
      expect(events.map((event) => event.type)).toEqual([
        "sync:started",
        "sync:error",
        "sync:completed",
      ]);
      expect(events[1]?.error).toBe("Quota exceeded");
    });
  });

  describe("start()", () => {
    test("drains immediately when already online", async () => {
      const id = await queue.enqueue("sale", salePayload());
      const { orchestrator } = createOrchestrator({ "*": { status: 201 } });

      orchestrator.start();

      await vi.waitFor(async () => {
        expect((await queue.get(id))?.status).toBe("synced");
      });
    });

    test("drains when connectivity becomes reachable", async () => {
      connectivity.report("unreachable");
      const id = await queue.enqueue("sale", salePayload());
      const { orchestrator, requests } = createOrchestrator({ "*": { status: 201 } });

      orchestrator.start();
      expect(requests).toHaveLength(0);

      connectivity.report("reachable");

      await vi.waitFor(async () => {
        expect((await queue.get(id))?.status).toBe("synced");
      });
    });
  });

  describe("retryFailed()", () => {
    test("requeues failed operations and drains them", async () => {
      const id = await queue.enqueue("stockPurchase", stockPurchasePayload());
      await queue.markFailed(id);
      const { orchestrator } = createOrchestrator({ "*": { status: 201 } });

      const result = await orchestrator.retryFailed();

      expect(result).toEqual({ synced: 1, failed: 0, pending: 0 });
      expect((await queue.get(id))?.status).toBe("synced");
    });
  });

  describe("background sync", () => {
    test("polls until the worker has emptied the queue", async () => {
      const id = await queue.enqueue("sale", salePayload());
      const register = vi.fn(async (_tag: string) => {
        setTimeout(() => {
          void queue.markSynced(id);
        }, 30);
      });
      const { orchestrator, requests } = createOrchestrator(
        {},
        { backgroundSync: { register }, pollIntervalMs: 60, maxPollAttempts: 5 },
      );

      await orchestrator.handleOnline();

      expect(register).toHaveBeenCalledWith(SYNC_TAG);
      expect(requests).toHaveLength(0);
      expect(events).toEqual([
        { type: "sync:started", pending: 1 },
        { type: "sync:completed", synced: 1, failed: 0, pending: 0 },
      ]);
    });

    test("falls back to a direct drain after the last poll", async () => {
      const id = await queue.enqueue("sale", salePayload());
      const { orchestrator, requests } = createOrchestrator(
        { "*": { status: 201 } },
        { backgroundSync: { register: async () => {} }, pollIntervalMs: 5, maxPollAttempts: 3 },
      );

      await orchestrator.handleOnline();

      expect(requests).toHaveLength(1);
      expect((await queue.get(id))?.status).toBe("synced");
    });

    test("drains directly when registration fails", async () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const id = await queue.enqueue("sale", salePayload());
      const { orchestrator } = createOrchestrator(
        { "*": { status: 201 } },
        {
          backgroundSync: {
            register: async () => {
              throw new Error("SyncManager unavailable");
            },
          },
        },
      );

      await orchestrator.handleOnline();

      expect((await queue.get(id))?.status).toBe("synced");
      expect(warn).toHaveBeenCalled();
      warn.mockRestore();
    });
  });
});
