import { createHmac, randomBytes, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import { config } from "../config.ts";

const fallbackSecret = randomBytes(32).toString("hex");

const tokenPayloadSchema = z.object({
  sub: z.string().min(1),
  exp: z.number(),
  iat: z.number(),
  type: z.literal("session"),
});

export type TokenPayload = z.infer<typeof tokenPayloadSchema>;

function sessionSecret(): string {
  return config.session.secret ?? fallbackSecret;
}

function sign(data: string): string {
  return createHmac("sha256", sessionSecret()).update(data).digest("base64url");
}

/**
 * Create a signed session token (JWT-like, but simpler).
 */
export function createSessionToken(
  userId: string,
  expiresInSeconds = config.session.ttlSeconds,
): string {
  const now = Math.floor(Date.now() / 1000);
  const payload: TokenPayload = {
    sub: userId,
    exp: now + expiresInSeconds,
    iat: now,
    type: "session",
  };

  const data = Buffer.from(JSON.stringify(payload)).toString("base64url");
  return `${data}.${sign(data)}`;
}

/**
 * Verify and decode a session token.
 */
export function verifySessionToken(token: string): TokenPayload | null {
  const parts = token.split(".");
  if (parts.length !== 2) {
    return null;
  }

  const [data, signature] = parts;
  if (!data || !signature) {
    return null;
  }

  const expected = Buffer.from(sign(data));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    return null;
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(data, "base64url").toString());
  } catch {
    return null;
  }

  const result = tokenPayloadSchema.safeParse(decoded);
  if (!result.success || result.data.exp < Date.now() / 1000) {
    return null;
  }

  return result.data;
}
