import { resolve } from "node:path";
import cookie from "@fastify/cookie";
import fastifyStatic from "@fastify/static";
import Fastify from "fastify";
import { authRoutes } from "./api/auth.ts";
import { operationRoutes } from "./api/operations.ts";
import type { Config } from "./config.ts";

export interface ServerOptions {
  logger?: boolean;
}

export async function createServer(config: Config, options: ServerOptions = {}) {
  const server = Fastify({
    logger: options.logger ?? true,
  });

  server.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "Unhandled error");
    const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    reply.code(statusCode).send({
      error: statusCode === 500 ? "internal_error" : "request_error",
      message: statusCode === 500 ? "Internal server error" : error.message,
    });
  });

  // Register plugins
  await server.register(cookie);

  // Offline fallback page and other assets
  await server.register(fastifyStatic, {
    root: resolve(config.publicDir),
    prefix: "/static/",
  });

  // The service worker must be served from the root to control every page
  server.get("/sw.js", async (_request, reply) => {
    return reply
      .header("Service-Worker-Allowed", "/")
      .header("Cache-Control", "no-cache")
      .sendFile("sw.js");
  });

  // Register routes
  await server.register(authRoutes, { prefix: "/auth" });
  await server.register(operationRoutes, { prefix: "/api/v1" });

  return server;
}
