import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { DecisionStore, StoreBackend } from "../store/decision-store.js";
import { FileDecisionStore } from "../store/file-store.js";
import { MemoryDecisionStore } from "../store/memory-store.js";
import { SqliteDecisionStore } from "../store/sqlite-store.js";
import type { Decision, DecisionInput } from "../store/types.js";

export const silentLogger = pino({ level: "silent" });

export function makeInput(overrides: Partial<DecisionInput> = {}): DecisionInput {
  return {
    decision: "Use PostgreSQL for persistence",
    confidence: 0.85,
    category: "architecture",
    stakes: "high",
    context: "Evaluating database options for the backend.",
    recordedBy: "agent-alpha",
    project: "acme/api",
    tags: ["database", "persistence"],
    reasons: [{ type: "analysis", text: "ACID compliance and JSON support" }],
    createdAt: "2026-02-12T09:30:00.000Z",
    ...overrides,
  };
}

export function makeDecision(overrides: Partial<Decision> = {}): Decision {
  return {
    id: "abc12345",
    decision: "Use PostgreSQL for persistence",
    confidence: 0.85,
    category: "architecture",
    stakes: "high",
    status: "pending",
    context: "Evaluating database options for the backend.",
    recordedBy: "agent-alpha",
    project: "acme/api",
    tags: ["database", "persistence"],
    reasons: [
      { type: "analysis", text: "ACID compliance and JSON support", strength: 0.8 },
    ],
    createdAt: "2026-02-12T09:30:00.000Z",
    updatedAt: "2026-02-12T09:30:00.000Z",
    ...overrides,
  };
}

export async function makeTempDir(prefix = "decision-vault-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export interface BackendCase {
  name: StoreBackend;
  create: (dir: string) => DecisionStore;
}

export const BACKENDS: BackendCase[] = [
  { name: "memory", create: () => new MemoryDecisionStore() },
  {
    name: "file",
    create: (dir) => new FileDecisionStore(path.join(dir, "decisions"), silentLogger),
  },
  {
    name: "sqlite",
    create: (dir) => new SqliteDecisionStore(path.join(dir, "decisions.db"), silentLogger),
  },
];

/** ISO timestamp `ms` milliseconds before now. */
export function ago(ms: number): string {
  return new Date(Date.now() - ms).toISOString();
}

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;
