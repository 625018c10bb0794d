import { config as loadEnv } from "dotenv";
import { z } from "zod";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

const DEV_CREDENTIAL_SECRET = "dev-only-credential-secret";

const flag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ["1", "true", "yes", "on"].includes(value.toLowerCase()));

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    PORT: int(3333, 1),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z.string().optional(),
    PINO_PRETTY: flag,
    CREDENTIAL_SECRET: z.string().min(1).optional(),

    MAX_RETRIES: int(3),
    MAX_CLARIFICATION_ROUNDS: int(3, 1),
    COMPLETENESS_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
    COLLABORATOR_TIMEOUT_MS: int(30_000, 1),
    RETRY_BASE_DELAY_MS: int(500),
    RETRY_MAX_DELAY_MS: int(8_000),

    HEARTBEAT_INTERVAL_MS: int(30_000, 1),
    HEARTBEAT_TIMEOUT_MS: int(10_000, 1),
    SESSION_IDLE_TTL_MS: int(60 * 60 * 1000, 1),
    SESSION_SWEEP_INTERVAL_MS: int(5 * 60 * 1000, 1),
    MAX_INPUT_CHARS: int(5_000, 1),
    MAX_QUEUE_DEPTH: int(32, 1),
    RATE_LIMIT_PER_MINUTE: int(120, 1),

    COLLABORATOR_MODE: z.enum(["mock", "http"]).default("mock"),
    COLLABORATOR_BASE_URL: z.string().url().optional(),
    COLLABORATOR_API_KEY: z.string().min(1).optional(),
    SESSION_STORE: z.enum(["memory", "sqlite"]).default("memory"),
    SESSION_DB_PATH: z.string().min(1).default("./data/sessions.db"),
  })
  .superRefine((env, ctx) => {
    if (env.COLLABORATOR_MODE === "http" && !env.COLLABORATOR_BASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["COLLABORATOR_BASE_URL"],
        message: "required when COLLABORATOR_MODE=http",
      });
    }
    if (env.NODE_ENV === "production" && !env.CREDENTIAL_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CREDENTIAL_SECRET"],
        message: "must be set in production",
      });
    }
  });

export type AppConfig = {
  isDev: boolean;
  port: number;
  host: string;
  logLevel?: string;
  prettyLogs: boolean;
  credentialSecret: string;
  workflow: {
    maxRetries: number;
    maxClarificationRounds: number;
    completenessThreshold: number;
    collaboratorTimeoutMs: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
  };
  connections: {
    heartbeatIntervalMs: number;
    heartbeatTimeoutMs: number;
    framesPerMinute: number;
  };
  sessions: {
    idleTtlMs: number;
    sweepIntervalMs: number;
    maxInputChars: number;
    maxQueueDepth: number;
    store: "memory" | "sqlite";
    dbPath: string;
  };
  collaborator: { mode: "mock"; baseUrl?: undefined } | { mode: "http"; baseUrl: string; apiKey?: string };
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;

  return {
    isDev: e.NODE_ENV !== "production",
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    prettyLogs: e.PINO_PRETTY,
    credentialSecret: e.CREDENTIAL_SECRET ?? DEV_CREDENTIAL_SECRET,
    workflow: {
      maxRetries: e.MAX_RETRIES,
      maxClarificationRounds: e.MAX_CLARIFICATION_ROUNDS,
      completenessThreshold: e.COMPLETENESS_THRESHOLD,
      collaboratorTimeoutMs: e.COLLABORATOR_TIMEOUT_MS,
      retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
      retryMaxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    connections: {
      heartbeatIntervalMs: e.HEARTBEAT_INTERVAL_MS,
      heartbeatTimeoutMs: e.HEARTBEAT_TIMEOUT_MS,
      framesPerMinute: e.RATE_LIMIT_PER_MINUTE,
    },
    sessions: {
      idleTtlMs: e.SESSION_IDLE_TTL_MS,
      sweepIntervalMs: e.SESSION_SWEEP_INTERVAL_MS,
      maxInputChars: e.MAX_INPUT_CHARS,
      maxQueueDepth: e.MAX_QUEUE_DEPTH,
      store: e.SESSION_STORE,
      dbPath: e.SESSION_DB_PATH,
    },
    collaborator:
      e.COLLABORATOR_MODE === "http" && e.COLLABORATOR_BASE_URL
        ? {
            mode: "http",
            baseUrl: e.COLLABORATOR_BASE_URL,
            ...(e.COLLABORATOR_API_KEY ? { apiKey: e.COLLABORATOR_API_KEY } : {}),
          }
        : { mode: "mock" },
  };
}
