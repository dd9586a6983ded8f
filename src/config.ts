import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { StoreBackend } from "./store/decision-store.js";

export const STORE_BACKENDS = ["memory", "file", "sqlite"] as const satisfies readonly StoreBackend[];

const EnvSchema = z.object({
  DECISION_STORE: z.string().default("file"),
  DECISIONS_PATH: z.string().min(1).default("decisions"),
  DECISIONS_DB_PATH: z.string().min(1).default("data/decisions.db"),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface StoreConfig {
  backend: StoreBackend;
  decisionsPath: string;
  dbPath: string;
  logLevel?: LogLevel;
}

export function parseBackend(value: string): StoreBackend {
  const backend = STORE_BACKENDS.find((b) => b === value);
  if (!backend) {
    throw new ConfigError(
      `Unknown storage backend: "${value}". Expected one of: ${STORE_BACKENDS.join(", ")}.`
    );
  }
  return backend;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): StoreConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid store configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    backend: parseBackend(parsed.DECISION_STORE),
    decisionsPath: parsed.DECISIONS_PATH,
    dbPath: parsed.DECISIONS_DB_PATH,
    logLevel: parsed.LOG_LEVEL,
  };
}
