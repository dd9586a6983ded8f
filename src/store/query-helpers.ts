import {
  COUNT_FILTER_FIELDS,
  SORT_FIELDS,
  type CountFilters,
  type Decision,
  type ListQuery,
  type ListResult,
  type ResolvedListQuery,
  type SortField,
  type StatsQuery,
  type StatsResult,
} from "./types.js";

// Shared by the in-memory and file-tree stores, which have no query engine
// of their own. The SQLite store mirrors these rules in SQL.

export const DEFAULT_LIMIT = 20;
export const TOP_TAGS_LIMIT = 20;

const DAY_MS = 24 * 60 * 60 * 1000;

export const RECENCY_WINDOWS = {
  last24h: 1,
  last7d: 7,
  last30d: 30,
} as const;

const SEARCHABLE_FIELDS = ["decision", "summary", "context", "pattern"] as const;

export function isSortField(value: string | undefined): value is SortField {
  return SORT_FIELDS.some((f) => f === value);
}

export function resolveListQuery(query: ListQuery = {}): ResolvedListQuery {
  const { limit, offset, tags, sort, order, ...filters } = query;
  return {
    ...filters,
    limit: Math.max(0, Math.trunc(limit ?? DEFAULT_LIMIT)),
    offset: Math.max(0, Math.trunc(offset ?? 0)),
    tags: tags ?? [],
    sort: isSortField(sort) ? sort : "createdAt",
    order: order?.toLowerCase() === "asc" ? "asc" : "desc",
  };
}

export function getDateKey(d: Pick<Decision, "createdAt" | "date">): string {
  return d.createdAt || d.date || "";
}

/** A bare date as an upper bound covers the whole day. */
export function dateUpperBound(dateTo: string): string {
  return dateTo.includes("T") ? dateTo : `${dateTo}T23:59:59`;
}

function inDateRange(
  d: Decision,
  dateFrom: string | undefined,
  dateTo: string | undefined
): boolean {
  const key = getDateKey(d);
  if (dateFrom && key < dateFrom) return false;
  if (dateTo && key > dateUpperBound(dateTo)) return false;
  return true;
}

function hasAnyTag(d: Decision, tags: string[]): boolean {
  return tags.some((t) => d.tags.includes(t));
}

export function applyFilters(
  decisions: Decision[],
  query: ResolvedListQuery
): Decision[] {
  const search = query.search?.toLowerCase();

  return decisions.filter((d) => {
    if (query.category && d.category !== query.category) return false;
    if (query.stakes && d.stakes !== query.stakes) return false;
    if (query.status && d.status !== query.status) return false;
    if (query.agent && d.recordedBy !== query.agent) return false;
    if (query.project && d.project !== query.project) return false;
    if (query.feature && d.feature !== query.feature) return false;
    if (query.tags.length > 0 && !hasAnyTag(d, query.tags)) return false;
    if (!inDateRange(d, query.dateFrom, query.dateTo)) return false;

    if (search) {
      const haystack = SEARCHABLE_FIELDS.map((f) => d[f] ?? "")
        .join(" ")
        .toLowerCase();
      if (!haystack.includes(search)) return false;
    }
    return true;
  });
}

function sortValue(d: Decision, field: SortField): string | number {
  switch (field) {
    case "confidence":
      return d.confidence;
    case "createdAt":
      return getDateKey(d);
    default:
      return d[field] ?? "";
  }
}

function compareValues(a: string | number, b: string | number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orders by `field`; missing values sort as the empty string and ties fall
 * back to ascending id so every backend pages the same way.
 */
export function sortDecisions(
  decisions: Decision[],
  field: SortField,
  order: "asc" | "desc"
): Decision[] {
  const direction = order === "asc" ? 1 : -1;
  return [...decisions].sort(
    (a, b) =>
      direction * compareValues(sortValue(a, field), sortValue(b, field)) ||
      compareValues(a.id, b.id)
  );
}

export function runListQuery(
  decisions: Decision[],
  query: ListQuery = {}
): ListResult {
  const resolved = resolveListQuery(query);
  const filtered = applyFilters(decisions, resolved);
  const sorted = sortDecisions(filtered, resolved.sort, resolved.order);

  return {
    decisions: sorted.slice(resolved.offset, resolved.offset + resolved.limit),
    total: filtered.length,
    limit: resolved.limit,
    offset: resolved.offset,
  };
}

export function applyStatsFilters(
  decisions: Decision[],
  query: StatsQuery
): Decision[] {
  return decisions.filter((d) => {
    if (query.project && d.project !== query.project) return false;
    return inDateRange(d, query.dateFrom, query.dateTo);
  });
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function computeStats(
  decisions: Decision[],
  now: Date = new Date()
): StatsResult {
  const byCategory: Record<string, number> = {};
  const byStakes: Record<string, number> = {};
  const byStatus: Record<string, number> = {};
  const byAgent: Record<string, number> = {};
  const byDay: Record<string, number> = {};
  const tagCounts: Record<string, number> = {};
  const recentActivity = { last24h: 0, last7d: 0, last30d: 0 };

  for (const d of decisions) {
    increment(byCategory, d.category || "unknown");
    increment(byStakes, d.stakes || "medium");
    increment(byStatus, d.status || "pending");
    if (d.recordedBy) increment(byAgent, d.recordedBy);

    const dateKey = getDateKey(d);
    if (dateKey) {
      increment(byDay, dateKey.slice(0, 10));

      const timestamp = Date.parse(dateKey);
      // Unparsable timestamps still count per day, just not per window.
      if (!Number.isNaN(timestamp)) {
        const age = now.getTime() - timestamp;
        if (age <= RECENCY_WINDOWS.last24h * DAY_MS) recentActivity.last24h++;
        if (age <= RECENCY_WINDOWS.last7d * DAY_MS) recentActivity.last7d++;
        if (age <= RECENCY_WINDOWS.last30d * DAY_MS) recentActivity.last30d++;
      }
    }

    for (const tag of d.tags) increment(tagCounts, tag);
  }

  return {
    total: decisions.length,
    byCategory,
    byStakes,
    byStatus,
    byAgent,
    byDay: Object.entries(byDay)
      .map(([date, count]) => ({ date, count }))
      .sort((a, b) => compareValues(a.date, b.date)),
    topTags: Object.entries(tagCounts)
      .map(([tag, count]) => ({ tag, count }))
      .sort((a, b) => b.count - a.count || compareValues(a.tag, b.tag))
      .slice(0, TOP_TAGS_LIMIT),
    recentActivity,
  };
}

export function runStatsQuery(
  decisions: Decision[],
  query: StatsQuery = {},
  now: Date = new Date()
): StatsResult {
  return computeStats(applyStatsFilters(decisions, query), now);
}

/** Threshold timestamp for a recency window, as stored ISO text. */
export function recencyThreshold(days: number, now: Date = new Date()): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString();
}

export function normalizeTagFilter(tags: string | string[] | undefined): string[] {
  if (tags === undefined) return [];
  return Array.isArray(tags) ? tags : [tags];
}

export function matchesCountFilters(d: Decision, filters: CountFilters): boolean {
  for (const field of COUNT_FILTER_FIELDS) {
    const expected = filters[field];
    if (expected !== undefined && expected !== null && d[field] !== expected) {
      return false;
    }
  }
  const tags = normalizeTagFilter(filters.tags);
  return tags.length === 0 || hasAnyTag(d, tags);
}
