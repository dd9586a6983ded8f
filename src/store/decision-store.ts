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

export type StoreBackend = "memory" | "file" | "sqlite";

/**
 * Structured storage for decision records.
 *
 * Every backend answers the same query with the same result; callers never
 * need to know which one is active. Lookups that miss resolve to `null` or
 * `false` rather than rejecting, and mutations resolve to `false` when the
 * underlying medium fails.
 */
export interface DecisionStore {
  readonly backend: StoreBackend;

  /** Prepare schema or directories. Safe to call more than once. */
  initialize(): Promise<void>;

  /** Insert or overwrite the decision stored under `id`. */
  save(id: string, input: DecisionInput): Promise<boolean>;

  get(id: string): Promise<Decision | null>;

  /** Remove the decision and everything attached to it. */
  delete(id: string): Promise<boolean>;

  list(query?: ListQuery): Promise<ListResult>;

  stats(query?: StatsQuery): Promise<StatsResult>;

  /** Record a review; the decision becomes `reviewed`. */
  updateOutcome(id: string, update: OutcomeUpdate): Promise<boolean>;

  updateFields(id: string, fields: DecisionFieldUpdates): Promise<boolean>;

  count(filters?: CountFilters): Promise<number>;

  /** Release the underlying handle. Safe before or without `initialize`. */
  close(): Promise<void>;
}
