import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { FastifyInstance } from "fastify";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { createSessionToken } from "../src/auth/tokens.ts";
import { config } from "../src/config.ts";
import { createServer } from "../src/server.ts";
import {
  closeDatabase,
  createUser,
  getOperationByLocalId,
  initDatabase,
} from "../src/storage/database.ts";

const TEST_DIR = join(process.cwd(), `.test-api-operations-${Date.now()}`);
const PUBLIC_DIR = join(TEST_DIR, "public");

// Mock config
config.dataDir = TEST_DIR;
config.publicDir = PUBLIC_DIR;

let server: FastifyInstance;
let sessionCookie: string;
const userId = "test-user-ops";

const saleBody = {
  localId: "sale-0001",
  clientChoice: "existing",
  existingClientId: "12",
  newClientName: null,
  displayClient: "Kasongo Shop",
  cashPaid: 500,
  items: [
    { network: "AIRTEL", quantity: 2, unitPrice: 100 },
    { network: "ORANGE", quantity: 3, unitPrice: null },
  ],
};

beforeAll(async () => {
  mkdirSync(PUBLIC_DIR, { recursive: true });
  writeFileSync(join(PUBLIC_DIR, "sw.js"), "self.addEventListener('fetch', () => {});\n");
  writeFileSync(join(PUBLIC_DIR, "offline.html"), "<h1>Offline</h1>\n");

  await initDatabase(TEST_DIR);
  createUser({ id: userId, name: "Amani" });
  sessionCookie = `${config.session.cookieName}=${createSessionToken(userId)}`;
  server = await createServer(config, { logger: false });
});

afterAll(async () => {
  if (server) await server.close();
  closeDatabase();
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe("Operation endpoints", () => {
  test("should record a sale and answer 409 on replay", async () => {
    const first = await server.inject({
      method: "POST",
      url: "/api/v1/sales",
      headers: { cookie: sessionCookie },
      payload: saleBody,
    });
    expect(first.statusCode).toBe(201);
    const created = first.json();
    expect(created.localId).toBe("sale-0001");
    expect(created.kind).toBe("sale");
    expect(typeof created.id).toBe("number");

    const replay = await server.inject({
      method: "POST",
      url: "/api/v1/sales",
      headers: { cookie: sessionCookie },
      payload: saleBody,
    });
    expect(replay.statusCode).toBe(409);
    expect(replay.json()).toEqual({
      error: "already_applied",
      id: created.id,
      localId: "sale-0001",
    });
  });

  test("should store the payload without the localId", async () => {
    const stored = getOperationByLocalId("sale-0001");
    expect(stored?.kind).toBe("sale");
    expect(stored?.userId).toBe(userId);

    const { localId: _localId, ...payload } = saleBody;
    expect(stored?.payload).toEqual(payload);
  });

  test("should record a stock purchase", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/api/v1/stock-purchases",
      headers: { cookie: sessionCookie },
      payload: {
        localId: "stock-0001",
        network: "VODACOM",
        amountPurchased: 40,
        buyingPriceChoice: "standard",
        customBuyingPrice: null,
        sellingPriceChoice: "standard",
        customSellingPrice: null,
      },
    });
    expect(res.statusCode).toBe(201);
    expect(res.json().kind).toBe("stockPurchase");
  });

  test("should accept a Bearer token for a cash outflow", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/api/v1/cash-outflows",
      headers: { Authorization: `Bearer ${createSessionToken(userId)}` },
      payload: {
        localId: "outflow-0001",
        amount: 25,
        category: "transport",
        description: "Taxi to supplier",
      },
    });
    expect(res.statusCode).toBe(201);
    expect(res.json().kind).toBe("cashOutflow");
  });

  test("should reject a sale without items", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/api/v1/sales",
      headers: { cookie: sessionCookie },
      payload: { ...saleBody, localId: "sale-0002", items: [] },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "invalid_request",
      message: "items: Array must contain at least 1 element(s)",
    });
    expect(getOperationByLocalId("sale-0002")).toBeNull();
  });

  test("should reject a cash outflow of zero", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/api/v1/cash-outflows",
      headers: { cookie: sessionCookie },
      payload: {
        localId: "outflow-0002",
        amount: 0,
        category: "transport",
        description: "",
      },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe("amount: Number must be greater than 0");
  });

  test("should answer malformed JSON with a request error", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/api/v1/sales",
      headers: { cookie: sessionCookie, "content-type": "application/json" },
      payload: "{not json",
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe("request_error");
  });
});

describe("Session handling", () => {
  test("should redirect to the login page without a session", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/api/v1/sales",
      payload: { ...saleBody, localId: "sale-0003" },
    });
    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe("/auth/login?next=%2Fapi%2Fv1%2Fsales");
    expect(getOperationByLocalId("sale-0003")).toBeNull();
  });

  test("should redirect when the token is invalid", async () => {
    const res = await server.inject({
      method: "GET",
      url: "/api/v1/sync/status",
      headers: { cookie: `${config.session.cookieName}=garbage` },
    });
    expect(res.statusCode).toBe(302);
    expect(res.headers.location).toBe("/auth/login?next=%2Fapi%2Fv1%2Fsync%2Fstatus");
  });

  test("should redirect when the session user no longer exists", async () => {
    const res = await server.inject({
      method: "GET",
      url: "/api/v1/sync/status",
      headers: { cookie: `${config.session.cookieName}=${createSessionToken("ghost")}` },
    });
    expect(res.statusCode).toBe(302);
  });

  test("should report the session user on the status probe", async () => {
    const res = await server.inject({
      method: "GET",
      url: "/api/v1/sync/status",
      headers: { cookie: sessionCookie },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "online", user: { id: userId, name: "Amani" } });
  });

  test("should answer health checks without a session", async () => {
    const res = await server.inject({ method: "GET", url: "/api/v1/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });
  });
});

describe("Static files", () => {
  test("should serve the service worker from the root", async () => {
    const res = await server.inject({ method: "GET", url: "/sw.js" });
    expect(res.statusCode).toBe(200);
    expect(res.headers["service-worker-allowed"]).toBe("/");
    expect(res.body).toBe("self.addEventListener('fetch', () => {});\n");
  });

  test("should serve the offline page under /static/", async () => {
    const res = await server.inject({ method: "GET", url: "/static/offline.html" });
    expect(res.statusCode).toBe(200);
    expect(res.body).toBe("<h1>Offline</h1>\n");
  });
});
