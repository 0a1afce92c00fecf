import { z } from "zod";

const configSchema = z.object({
  port: z.coerce.number().default(4151),
  host: z.string().default("0.0.0.0"),
  dataDir: z.string().default("./data"),
  publicDir: z.string().default("./public"),

  // Sessions
  session: z.object({
    // Without a secret, sessions only live as long as the process.
    secret: z.string().min(16).optional(),
    ttlSeconds: z.coerce.number().int().positive().default(12 * 60 * 60),
    cookieName: z.string().default("stockline_session"),
  }),

  // Where unauthenticated requests are sent
  authLoginPath: z.string().startsWith("/").default("/auth/login"),
});

export type Config = z.infer<typeof configSchema>;

function loadConfig(): Config {
  const env = process.env;

  return configSchema.parse({
    port: env.PORT,
    host: env.HOST,
    dataDir: env.DATA_DIR,
    publicDir: env.PUBLIC_DIR,

    session: {
      secret: env.SESSION_SECRET || undefined,
      ttlSeconds: env.SESSION_TTL_SECONDS,
      cookieName: env.SESSION_COOKIE_NAME,
    },

    authLoginPath: env.AUTH_LOGIN_PATH,
  });
}

export const config = loadConfig();
