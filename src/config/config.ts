// =============================================================================
// Service configuration — environment variables validated with zod
// =============================================================================

import { z } from "zod";
import { ConfigError } from "../errors.js";
import { TOKENIZER_ENCODINGS } from "../adapters/token-counter/tiktoken.adapter.js";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

const intFrom = (fallback: number) => z.coerce.number().int().default(fallback);

const EnvSchema = z.object({
  MODEL_NAME: z.string().min(1),
  OLLAMA_URL: z.string().url().default("http://localhost:11434/v1"),
  TOKENIZER_ENCODING: z.enum(TOKENIZER_ENCODINGS).default("cl100k_base"),
  MAX_TOKENS_PER_ENTRY: intFrom(4096).pipe(z.number().positive()),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.25),
  COMPLETION_TIMEOUT_MS: intFrom(120_000).pipe(z.number().positive()),
  STORE: z.enum(["postgres", "memory"]).default("postgres"),
  DATABASE_URL: z.string().min(1).default("postgresql://localhost:5432/pagebrief"),
  DATABASE_POOL_SIZE: intFrom(10).pipe(z.number().positive()),
  RETENTION_MINUTES: intFrom(60).pipe(z.number().positive()),
  SWEEP_INTERVAL_MINUTES: intFrom(10).pipe(z.number().positive()),
  PORT: intFrom(8000).pipe(z.number().min(0).max(65_535)),
  CORS_ORIGIN: z.string().default("*"),
  MAX_BODY_BYTES: intFrom(1_048_576).pipe(z.number().positive()),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_FILE: z.string().min(1).optional(),
});

export type Env = z.infer<typeof EnvSchema>;

export interface AppConfig {
  model: {
    name: string;
    baseURL: string;
    temperature: number;
    timeoutMs: number;
  };
  budget: {
    encoding: Env["TOKENIZER_ENCODING"];
    maxTokens: number;
  };
  store:
    | { kind: "memory" }
    | { kind: "postgres"; connectionString: string; poolSize: number };
  expiry: {
    retentionMs: number;
    intervalMs: number;
  };
  server: {
    port: number;
    corsOrigin: string;
    maxBodyBytes: number;
  };
  logging: {
    level: Env["LOG_LEVEL"];
    file?: string;
  };
}

const MINUTE_MS = 60_000;

/**
 * Reads configuration from an environment map.
 * Blank variables count as unset so `FOO=` in a shell falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value.trim();
  }
  // CORS_ORIGIN="" is meaningful: it disables CORS.
  if (env.CORS_ORIGIN !== undefined) present.CORS_ORIGIN = env.CORS_ORIGIN.trim();

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    model: {
      name: e.MODEL_NAME,
      baseURL: e.OLLAMA_URL,
      temperature: e.TEMPERATURE,
      timeoutMs: e.COMPLETION_TIMEOUT_MS,
    },
    budget: {
      encoding: e.TOKENIZER_ENCODING,
      maxTokens: e.MAX_TOKENS_PER_ENTRY,
    },
    store: e.STORE === "memory"
      ? { kind: "memory" }
      : { kind: "postgres", connectionString: e.DATABASE_URL, poolSize: e.DATABASE_POOL_SIZE },
    expiry: {
      retentionMs: e.RETENTION_MINUTES * MINUTE_MS,
      intervalMs: e.SWEEP_INTERVAL_MINUTES * MINUTE_MS,
    },
    server: {
      port: e.PORT,
      corsOrigin: e.CORS_ORIGIN,
      maxBodyBytes: e.MAX_BODY_BYTES,
    },
    logging: {
      level: e.LOG_LEVEL,
      file: e.LOG_FILE,
    },
  };
}
