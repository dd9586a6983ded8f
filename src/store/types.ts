export const DECISION_STAKES = ["low", "medium", "high", "critical"] as const;
export const DECISION_STATUSES = ["pending", "reviewed"] as const;
export const DECISION_OUTCOMES = [
  "success",
  "partial",
  "failure",
  "abandoned",
] as const;

export type DecisionStakes = (typeof DECISION_STAKES)[number];
export type DecisionStatus = (typeof DECISION_STATUSES)[number];
export type DecisionOutcome = (typeof DECISION_OUTCOMES)[number];

export interface Reason {
  type: string;
  text: string;
  strength: number;
}

/** Structural/functional description of the pattern a decision instantiates. */
export interface BridgeDefinition {
  structure?: string;
  function?: string;
  tolerance?: string[];
  enforcement?: string[];
  prevention?: string[];
}

export interface DeliberationInput {
  id: string;
  text: string;
  source?: string;
  timestamp?: string;
}

export interface DeliberationStep {
  step: number;
  thought: string;
  inputsUsed?: string[];
  timestamp?: string;
  durationMs?: number;
  type?: string;
  conclusion?: boolean;
}

export interface Deliberation {
  inputs: DeliberationInput[];
  steps: DeliberationStep[];
  totalDurationMs?: number;
  convergencePoint?: number;
}

export interface Decision {
  id: string;
  decision: string;
  summary?: string;
  confidence: number;
  category: string;
  stakes: DecisionStakes;
  status: DecisionStatus;
  context?: string;
  recordedBy?: string;
  project?: string;
  feature?: string;
  pr?: number;
  file?: string;
  line?: number;
  commit?: string;
  pattern?: string;
  /** The decision's own date; older records carry it instead of createdAt. */
  date?: string;
  tags: string[];
  reasons: Reason[];
  bridge?: BridgeDefinition;
  deliberation?: Deliberation;
  outcome?: DecisionOutcome;
  actualResult?: string;
  lessons?: string;
  reviewNotes?: string;
  reviewedAt?: string;
  createdAt: string;
  updatedAt: string;
}

export type ReasonInput = Omit<Reason, "strength"> & { strength?: number };

/**
 * What callers hand to `save`. The store owns `id` and `updatedAt` and fills
 * in defaults for the remaining optional fields.
 */
export type DecisionInput = Omit<
  Decision,
  | "id"
  | "updatedAt"
  | "createdAt"
  | "tags"
  | "reasons"
  | "stakes"
  | "status"
> & {
  createdAt?: string;
  tags?: string[];
  reasons?: ReasonInput[];
  stakes?: DecisionStakes;
  status?: DecisionStatus;
};

export interface OutcomeUpdate {
  outcome: DecisionOutcome;
  result?: string;
  lessons?: string;
  notes?: string;
}

export const UPDATABLE_FIELDS = [
  "decision",
  "summary",
  "confidence",
  "category",
  "stakes",
  "context",
  "recordedBy",
  "project",
  "feature",
  "pr",
  "file",
  "line",
  "commit",
  "pattern",
  "actualResult",
  "lessons",
  "reviewNotes",
  "tags",
  "reasons",
  "bridge",
  "deliberation",
] as const;

export type UpdatableField = (typeof UPDATABLE_FIELDS)[number];

type ScalarUpdates = Partial<
  Pick<Decision, Exclude<UpdatableField, "reasons" | "bridge" | "deliberation">>
>;

export type DecisionFieldUpdates = ScalarUpdates & {
  reasons?: ReasonInput[];
  /** `null` removes the block. */
  bridge?: BridgeDefinition | null;
  /** `null` removes the block. */
  deliberation?: Deliberation | null;
};

export const SORT_FIELDS = [
  "id",
  "decision",
  "confidence",
  "category",
  "stakes",
  "status",
  "createdAt",
  "updatedAt",
  "recordedBy",
  "project",
] as const;

export type SortField = (typeof SORT_FIELDS)[number];
export type SortOrder = "asc" | "desc";

export interface ListQuery {
  limit?: number;
  offset?: number;
  category?: string;
  stakes?: string;
  status?: string;
  agent?: string;
  project?: string;
  feature?: string;
  /** Matches decisions carrying any of these tags. */
  tags?: string[];
  dateFrom?: string;
  /** A bare date (no `T`) includes the whole day. */
  dateTo?: string;
  search?: string;
  sort?: string;
  order?: SortOrder;
}

export interface ResolvedListQuery
  extends Omit<ListQuery, "limit" | "offset" | "sort" | "order" | "tags"> {
  limit: number;
  offset: number;
  tags: string[];
  sort: SortField;
  order: SortOrder;
}

export interface ListResult {
  decisions: Decision[];
  total: number;
  limit: number;
  offset: number;
}

export interface StatsQuery {
  dateFrom?: string;
  dateTo?: string;
  project?: string;
}

export interface DayCount {
  date: string;
  count: number;
}

export interface TagCount {
  tag: string;
  count: number;
}

export interface RecentActivity {
  last24h: number;
  last7d: number;
  last30d: number;
}

export interface StatsResult {
  total: number;
  byCategory: Record<string, number>;
  byStakes: Record<string, number>;
  byStatus: Record<string, number>;
  byAgent: Record<string, number>;
  byDay: DayCount[];
  topTags: TagCount[];
  recentActivity: RecentActivity;
}

export const COUNT_FILTER_FIELDS = [
  "category",
  "stakes",
  "status",
  "recordedBy",
  "project",
  "feature",
] as const;

export type CountFilterField = (typeof COUNT_FILTER_FIELDS)[number];

export type CountFilters = Partial<Record<CountFilterField, string>> & {
  tags?: string | string[];
};
