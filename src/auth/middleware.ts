import type { FastifyReply, FastifyRequest } from "fastify";
import { config } from "../config.ts";
import type { AuthContext, User } from "../lib/types.ts";
import { getUser } from "../storage/database.ts";
import { verifySessionToken } from "./tokens.ts";

declare module "fastify" {
  interface FastifyRequest {
    auth?: AuthContext;
  }
}

/**
 * Extract the session token from the cookie, or from a Bearer header for
 * scripted clients.
 */
export function extractSessionToken(request: FastifyRequest): string | null {
  const cookie = request.cookies[config.session.cookieName];
  if (cookie) {
    return cookie;
  }

  const authHeader = request.headers.authorization;
  if (authHeader?.startsWith("Bearer ")) {
    return authHeader.slice(7);
  }

  return null;
}

export function loginRedirectUrl(nextPath: string): string {
  return `${config.authLoginPath}?next=${encodeURIComponent(nextPath)}`;
}

/**
 * Middleware that requires a session. Like a server-rendered app, anything
 * that cannot resolve the session answers with a redirect to the login page,
 * including a failed user lookup.
 */
export async function requireSession(
  request: FastifyRequest,
  reply: FastifyReply,
): Promise<FastifyReply | undefined> {
  const token = extractSessionToken(request);
  const payload = token ? verifySessionToken(token) : null;

  if (!payload) {
    return reply.redirect(loginRedirectUrl(request.url));
  }

  let user: User | null;
  try {
    user = getUser(payload.sub);
  } catch (error) {
    request.log.error({ err: error, userId: payload.sub }, "Failed to load session user");
    return reply.redirect(loginRedirectUrl(request.url));
  }

  if (!user) {
    return reply.redirect(loginRedirectUrl(request.url));
  }

  request.auth = { userId: user.id, user };
  return undefined;
}

/**
 * Auth context set by requireSession.
 */
export function sessionAuth(request: FastifyRequest): AuthContext {
  if (!request.auth) {
    throw new Error("Route is missing the requireSession pre-handler");
  }
  return request.auth;
}
