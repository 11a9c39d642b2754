import { z } from "zod";

// Local dev origins; add deployed domains through ALLOWED_ORIGINS
const DEFAULT_ORIGINS = ["http://localhost:5173", "http://127.0.0.1:5173"];

const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  DATABASE_URL: z
    .string({ required_error: "DATABASE_URL is not set. Point it at a Postgres database." })
    .trim()
    .min(1, "DATABASE_URL is not set. Point it at a Postgres database."),
  PGSSLMODE: z.preprocess(blankToUndefined, z.string().trim().optional()),
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  OPENAI_MODEL: z.preprocess(blankToUndefined, z.string().trim().default("gpt-4.1-mini")),
  ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  ALLOWED_ORIGINS: z.preprocess(blankToUndefined, z.string().optional()),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(300),
  LOG_FORMAT: z.preprocess(blankToUndefined, z.string().default("dev")),
});

export type AppConfig = {
  port: number;
  databaseUrl: string;
  databaseSsl: boolean;
  /** null = offline heuristic only */
  openaiApiKey: string | null;
  openaiModel: string;
  actionTimeoutMs: number;
  allowedOrigins: string[];
  rateLimitMax: number;
  /** morgan format; "off" disables request logs */
  logFormat: string | null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;

  // ssl on if PGSSLMODE=require or the URL asks for it; off works locally
  const databaseSsl =
    (e.PGSSLMODE ?? "").toLowerCase() === "require" || e.DATABASE_URL.toLowerCase().includes("sslmode=require");

  const allowedOrigins = e.ALLOWED_ORIGINS
    ? e.ALLOWED_ORIGINS.split(",")
        .map((s) => s.trim())
        .filter(Boolean)
    : DEFAULT_ORIGINS;

  return {
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    databaseSsl,
    openaiApiKey: e.OPENAI_API_KEY ?? null,
    openaiModel: e.OPENAI_MODEL,
    actionTimeoutMs: e.ACTION_TIMEOUT_MS,
    allowedOrigins,
    rateLimitMax: e.RATE_LIMIT_MAX,
    logFormat: e.LOG_FORMAT === "off" ? null : e.LOG_FORMAT,
  };
}
