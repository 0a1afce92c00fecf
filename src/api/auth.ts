import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "../config.ts";

const loginQuerySchema = z.object({
  next: z.string().optional(),
});

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

// Only same-site paths are kept as the post-login destination
export function safeNextPath(next: string | undefined): string {
  if (!next || !next.startsWith("/") || next.startsWith("//")) {
    return "/";
  }
  return next;
}

export async function authRoutes(fastify: FastifyInstance): Promise<void> {
  // Sign-in placeholder. Sessions are issued out of band (see the CLI).
  fastify.get("/login", async (request, reply) => {
    const query = loginQuerySchema.safeParse(request.query);
    const next = safeNextPath(query.success ? query.data.next : undefined);

    return reply.type("text/html; charset=utf-8").send(`<!doctype html>
<html lang="en">
<head><meta charset="utf-8"><title>Sign in</title></head>
<body>
  <h1>Sign in</h1>
  <p>Your session has expired. Sign in again to continue.</p>
  <p data-next="${escapeHtml(next)}">After signing in you will return to ${escapeHtml(next)}.</p>
</body>
</html>
`);
  });

  fastify.post("/logout", async (_request, reply) => {
    reply.clearCookie(config.session.cookieName, { path: "/" });
    return reply.redirect(config.authLoginPath);
  });
}
