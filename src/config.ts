import { z } from "zod";

const csv = z
  .string()
  .default("")
  .transform((s) =>
    s
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0),
  );

const EnvSchema = z.object({
  GROQ_API_KEY: z.string().default(""),
  GROQ_MODEL: z.string().default(""),
  GROQ_BASE_URL: z.string().url().optional(),
  JWT_SECRET: z.string().default(""),
  TRUSTED_PROXIES: csv,
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(3500),
});

export interface AppConfig {
  apiKey: string;
  model: string;
  baseURL: string | undefined;
  jwtSecret: string;
  trustedProxies: string[];
  port: number;
  logLevel: string;
  checkTimeoutMs: number;
}

/** Read and validate process configuration. Throws on malformed values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`invalid configuration: ${fields}`);
  }

  const e = parsed.data;
  return {
    apiKey: e.GROQ_API_KEY,
    model: e.GROQ_MODEL,
    baseURL: e.GROQ_BASE_URL,
    jwtSecret: e.JWT_SECRET,
    trustedProxies: e.TRUSTED_PROXIES,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    checkTimeoutMs: e.CHECK_TIMEOUT_MS,
  };
}
