import type { DecisionStore } from "./decision-store.js";
import {
  applyFieldUpdates,
  applyOutcome,
  buildDecision,
  nowIso,
  pickFieldUpdates,
} from "./records.js";
import {
  matchesCountFilters,
  runListQuery,
  runStatsQuery,
} from "./query-helpers.js";
import type {
  CountFilters,
  Decision,
  DecisionFieldUpdates,
  DecisionInput,
  ListQuery,
  ListResult,
  OutcomeUpdate,
  StatsQuery,
  StatsResult,
} from "./types.js";

/**
 * Volatile store for tests and short-lived processes. It is the reference
 * for query behaviour: the other backends must return what this one returns.
 */
export class MemoryDecisionStore implements DecisionStore {
  readonly backend = "memory" as const;
  private readonly data = new Map<string, Decision>();

  async initialize(): Promise<void> {
    this.data.clear();
  }

  async close(): Promise<void> {}

  async save(id: string, input: DecisionInput): Promise<boolean> {
    const decision = buildDecision(id, input, nowIso(), this.data.get(id));
    this.data.set(id, structuredClone(decision));
    return true;
  }

  async get(id: string): Promise<Decision | null> {
    const decision = this.data.get(id);
    return decision ? structuredClone(decision) : null;
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }

  async list(query: ListQuery = {}): Promise<ListResult> {
    const result = runListQuery([...this.data.values()], query);
    return { ...result, decisions: structuredClone(result.decisions) };
  }

  async stats(query: StatsQuery = {}): Promise<StatsResult> {
    return runStatsQuery([...this.data.values()], query);
  }

  async updateOutcome(id: string, update: OutcomeUpdate): Promise<boolean> {
    const decision = this.data.get(id);
    if (!decision) return false;

    this.data.set(id, applyOutcome(decision, update, nowIso()));
    return true;
  }

  async updateFields(
    id: string,
    fields: DecisionFieldUpdates
  ): Promise<boolean> {
    const decision = this.data.get(id);
    const updates = pickFieldUpdates(fields);
    if (!decision || Object.keys(updates).length === 0) return false;

    this.data.set(
      id,
      structuredClone(applyFieldUpdates(decision, updates, nowIso()))
    );
    return true;
  }

  async count(filters: CountFilters = {}): Promise<number> {
    let total = 0;
    for (const decision of this.data.values()) {
      if (matchesCountFilters(decision, filters)) total++;
    }
    return total;
  }
}
