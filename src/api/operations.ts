/**
 * Receiving endpoints for operations replayed by the offline client.
 *
 * Each operation carries the client's localId; a localId that was already
 * received answers 409 so the client can treat the replay as applied.
 */

import type { FastifyInstance } from "fastify";
import type { z } from "zod";
import { requireSession, sessionAuth } from "../auth/middleware.ts";
import type { OperationKind } from "../lib/types.ts";
import { recordOperation } from "../storage/database.ts";
import { cashOutflowSchema, saleSchema, stockPurchaseSchema } from "./schemas.ts";

type OperationSchema = typeof saleSchema | typeof stockPurchaseSchema | typeof cashOutflowSchema;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join("; ");
}

function registerOperationRoute(
  fastify: FastifyInstance,
  path: string,
  kind: OperationKind,
  schema: OperationSchema,
): void {
  fastify.post(path, { preHandler: requireSession }, async (request, reply) => {
    const { userId } = sessionAuth(request);

    const result = schema.safeParse(request.body);
    if (!result.success) {
      reply.code(400).send({
        error: "invalid_request",
        message: formatIssues(result.error),
      });
      return;
    }

    const { localId, ...payload } = result.data;
    const recorded = recordOperation({ localId, kind, userId, payload });

    if (recorded.status === "duplicate") {
      request.log.info({ localId, kind }, "Operation already applied");
      reply.code(409).send({
        error: "already_applied",
        id: recorded.operation.id,
        localId,
      });
      return;
    }

    request.log.info({ localId, kind, id: recorded.operation.id }, "Operation recorded");
    reply.code(201).send({ id: recorded.operation.id, localId, kind });
  });
}

export async function operationRoutes(fastify: FastifyInstance): Promise<void> {
  // Public liveness check
  fastify.get("/health", async () => {
    return { status: "ok" };
  });

  // Connectivity probe: answers only when the session resolves
  fastify.get("/sync/status", { preHandler: requireSession }, async (request) => {
    const { user } = sessionAuth(request);
    return { status: "online", user: { id: user.id, name: user.name } };
  });

  registerOperationRoute(fastify, "/sales", "sale", saleSchema);
  registerOperationRoute(fastify, "/stock-purchases", "stockPurchase", stockPurchaseSchema);
  registerOperationRoute(fastify, "/cash-outflows", "cashOutflow", cashOutflowSchema);
}
