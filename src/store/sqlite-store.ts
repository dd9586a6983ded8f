import fs from "node:fs/promises";
import path from "node:path";
import Database from "better-sqlite3";
import { Mutex } from "async-mutex";
import type { z } from "zod";
import { StoreNotInitializedError } from "../errors.js";
import { logger, type Logger } from "../logger.js";
import type { DecisionStore } from "./decision-store.js";
import {
  buildDecision,
  hasBridgeContent,
  normalizeReasons,
  nowIso,
  pickFieldUpdates,
  uniqueTags,
} from "./records.js";
import {
  RECENCY_WINDOWS,
  TOP_TAGS_LIMIT,
  dateUpperBound,
  normalizeTagFilter,
  recencyThreshold,
  resolveListQuery,
} from "./query-helpers.js";
import {
  DeliberationInputsJson,
  DeliberationStepsJson,
  SCHEMA_SQL,
  StringListJson,
  sanitizeFtsQuery,
  type BridgeRow,
  type DecisionRow,
  type DeliberationRow,
  type ReasonRow,
  type TagRow,
} from "./sqlite-schema.js";
import {
  COUNT_FILTER_FIELDS,
  DECISION_OUTCOMES,
  DECISION_STAKES,
  DECISION_STATUSES,
  UPDATABLE_FIELDS,
  type BridgeDefinition,
  type CountFilterField,
  type CountFilters,
  type Decision,
  type DecisionFieldUpdates,
  type DecisionInput,
  type Deliberation,
  type ListQuery,
  type ListResult,
  type OutcomeUpdate,
  type Reason,
  type ResolvedListQuery,
  type SortField,
  type StatsQuery,
  type StatsResult,
  type UpdatableField,
} from "./types.js";

type SqlDatabase = Database.Database;

interface Predicate {
  conditions: string[];
  params: unknown[];
}

interface GroupRow {
  bucket: string;
  total: number;
}

const HYDRATE_BATCH_SIZE = 500;

/** Creation time with the legacy `date` as fallback, as the helpers read it. */
const DATE_KEY = "COALESCE(NULLIF(d.created_at, ''), d.decision_date, '')";

const SORT_COLUMNS: Record<SortField, string> = {
  id: "d.id",
  decision: "COALESCE(d.decision, '')",
  confidence: "d.confidence",
  category: "COALESCE(d.category, '')",
  stakes: "COALESCE(d.stakes, '')",
  status: "COALESCE(d.status, '')",
  createdAt: DATE_KEY,
  updatedAt: "COALESCE(d.updated_at, '')",
  recordedBy: "COALESCE(d.recorded_by, '')",
  project: "COALESCE(d.project, '')",
};

const COUNT_COLUMNS: Record<CountFilterField, string> = {
  category: "category",
  stakes: "stakes",
  status: "status",
  recordedBy: "recorded_by",
  project: "project",
  feature: "feature",
};

type ScalarField = Exclude<
  UpdatableField,
  "tags" | "reasons" | "bridge" | "deliberation"
>;

const SCALAR_COLUMNS: Record<ScalarField, string> = {
  decision: "decision",
  summary: "summary",
  confidence: "confidence",
  category: "category",
  stakes: "stakes",
  context: "context",
  recordedBy: "recorded_by",
  project: "project",
  feature: "feature",
  pr: "pr",
  file: "file",
  line: "line",
  commit: "commit_ref",
  pattern: "pattern",
  actualResult: "outcome_result",
  lessons: "outcome_lessons",
  reviewNotes: "outcome_notes",
};

const SCALAR_FIELDS = UPDATABLE_FIELDS.filter(
  (f): f is ScalarField => f in SCALAR_COLUMNS
);

// created_at is left out of the conflict branch: an overwrite keeps it.
const UPSERT_SQL = `
  INSERT INTO decisions (
    id, decision, summary, confidence, category, stakes, status, context,
    recorded_by, project, feature, pr, file, line, commit_ref, pattern,
    decision_date, outcome, outcome_result, outcome_lessons, outcome_notes,
    reviewed_at, created_at, updated_at
  ) VALUES (
    @id, @decision, @summary, @confidence, @category, @stakes, @status, @context,
    @recorded_by, @project, @feature, @pr, @file, @line, @commit_ref, @pattern,
    @decision_date, @outcome, @outcome_result, @outcome_lessons, @outcome_notes,
    @reviewed_at, @created_at, @updated_at
  )
  ON CONFLICT(id) DO UPDATE SET
    decision = excluded.decision,
    summary = excluded.summary,
    confidence = excluded.confidence,
    category = excluded.category,
    stakes = excluded.stakes,
    status = excluded.status,
    context = excluded.context,
    recorded_by = excluded.recorded_by,
    project = excluded.project,
    feature = excluded.feature,
    pr = excluded.pr,
    file = excluded.file,
    line = excluded.line,
    commit_ref = excluded.commit_ref,
    pattern = excluded.pattern,
    decision_date = excluded.decision_date,
    outcome = excluded.outcome,
    outcome_result = excluded.outcome_result,
    outcome_lessons = excluded.outcome_lessons,
    outcome_notes = excluded.outcome_notes,
    reviewed_at = excluded.reviewed_at,
    updated_at = excluded.updated_at
`;

function placeholders(count: number): string {
  return Array.from({ length: count }, () => "?").join(", ");
}

function whereClause(conditions: string[]): string {
  return conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
}

function opt<T>(value: T | null): T | undefined {
  return value ?? undefined;
}

function groupBy<T extends { decision_id: string }>(rows: T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const group = groups.get(row.decision_id);
    if (group) group.push(row);
    else groups.set(row.decision_id, [row]);
  }
  return groups;
}

function toCounts(rows: GroupRow[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const row of rows) counts[row.bucket] = row.total;
  return counts;
}

function toRow(d: Decision): DecisionRow {
  return {
    id: d.id,
    decision: d.decision,
    summary: d.summary ?? null,
    confidence: d.confidence,
    category: d.category,
    stakes: d.stakes,
    status: d.status,
    context: d.context ?? null,
    recorded_by: d.recordedBy ?? null,
    project: d.project ?? null,
    feature: d.feature ?? null,
    pr: d.pr ?? null,
    file: d.file ?? null,
    line: d.line ?? null,
    commit_ref: d.commit ?? null,
    pattern: d.pattern ?? null,
    decision_date: d.date ?? null,
    outcome: d.outcome ?? null,
    outcome_result: d.actualResult ?? null,
    outcome_lessons: d.lessons ?? null,
    outcome_notes: d.reviewNotes ?? null,
    reviewed_at: d.reviewedAt ?? null,
    created_at: d.createdAt,
    updated_at: d.updatedAt,
  };
}

/**
 * Decisions in one SQLite file: a row per decision, child tables for tags,
 * reasons, bridge and deliberation, and an FTS5 index kept current by
 * triggers. Writes go through a mutex and a transaction each.
 */
export class SqliteDecisionStore implements DecisionStore {
  readonly backend = "sqlite" as const;
  private db: SqlDatabase | null = null;
  private readonly writeLock = new Mutex();
  private readonly log: Logger;

  constructor(
    private readonly dbPath: string,
    log: Logger = logger
  ) {
    this.log = log.child({ component: "sqlite-store" });
  }

  async initialize(): Promise<void> {
    if (this.db) return;

    if (this.dbPath !== ":memory:") {
      await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);
    try {
      db.pragma("journal_mode = WAL");
      db.pragma("foreign_keys = ON");
      db.exec(SCHEMA_SQL);
    } catch (err) {
      db.close();
      throw err;
    }
    this.db = db;
    this.log.info({ dbPath: this.dbPath }, "SQLite decision store initialized");
  }

  async close(): Promise<void> {
    await this.writeLock.waitForUnlock();
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async save(id: string, input: DecisionInput): Promise<boolean> {
    return this.mutate(id, "Failed to save decision", (db) => {
      const existing = db
        .prepare<[string], { created_at: string }>(
          "SELECT created_at FROM decisions WHERE id = ?"
        )
        .get(id);
      const decision = buildDecision(
        id,
        input,
        nowIso(),
        existing ? { createdAt: existing.created_at } : null
      );

      db.prepare<DecisionRow>(UPSERT_SQL).run(toRow(decision));
      this.writeTags(db, id, decision.tags);
      this.writeReasons(db, id, decision.reasons);
      this.writeBridge(db, id, decision.bridge);
      this.writeDeliberation(db, id, decision.deliberation);
      return true;
    });
  }

  async get(id: string): Promise<Decision | null> {
    const db = this.connection();
    const row = db
      .prepare<[string], DecisionRow>("SELECT * FROM decisions WHERE id = ?")
      .get(id);
    if (!row) return null;
    return this.hydrate(db, [row])[0] ?? null;
  }

  async delete(id: string): Promise<boolean> {
    return this.mutate(id, "Failed to delete decision", (db) => {
      // Child rows go with it through ON DELETE CASCADE.
      const result = db.prepare("DELETE FROM decisions WHERE id = ?").run(id);
      return result.changes > 0;
    });
  }

  async list(query: ListQuery = {}): Promise<ListResult> {
    const db = this.connection();
    const resolved = resolveListQuery(query);
    const { conditions, params } = this.listPredicate(resolved);
    const where = whereClause(conditions);

    const counted = db
      .prepare<unknown[], { total: number }>(
        `SELECT COUNT(*) AS total FROM decisions d ${where}`
      )
      .get(...params);

    const direction = resolved.order === "asc" ? "ASC" : "DESC";
    const rows = db
      .prepare<unknown[], DecisionRow>(
        `SELECT d.* FROM decisions d ${where}
         ORDER BY ${SORT_COLUMNS[resolved.sort]} ${direction}, d.id ASC
         LIMIT ? OFFSET ?`
      )
      .all(...params, resolved.limit, resolved.offset);

    return {
      decisions: this.hydrate(db, rows),
      total: counted?.total ?? 0,
      limit: resolved.limit,
      offset: resolved.offset,
    };
  }

  async stats(query: StatsQuery = {}, now: Date = new Date()): Promise<StatsResult> {
    const db = this.connection();
    const { conditions, params } = this.statsPredicate(query);
    const where = whereClause(conditions);

    const grouped = (keyExpr: string, extra: string[] = []): GroupRow[] =>
      db
        .prepare<unknown[], GroupRow>(
          `SELECT ${keyExpr} AS bucket, COUNT(*) AS total FROM decisions d
           ${whereClause([...conditions, ...extra])}
           GROUP BY bucket ORDER BY bucket`
        )
        .all(...params);

    const counted = db
      .prepare<unknown[], { total: number }>(
        `SELECT COUNT(*) AS total FROM decisions d ${where}`
      )
      .get(...params);

    const topTags = db
      .prepare<unknown[], { tag: string; count: number }>(
        `SELECT t.tag AS tag, COUNT(*) AS count
         FROM decision_tags t JOIN decisions d ON d.id = t.decision_id
         ${where}
         GROUP BY t.tag ORDER BY count DESC, t.tag ASC LIMIT ?`
      )
      .all(...params, TOP_TAGS_LIMIT);

    // julianday() is NULL for text that is not a date, which keeps it out of every window.
    const recent = db
      .prepare<unknown[], { last24h: number; last7d: number; last30d: number }>(
        `SELECT
           COALESCE(SUM(CASE WHEN julianday(${DATE_KEY}) >= julianday(?) THEN 1 ELSE 0 END), 0) AS last24h,
           COALESCE(SUM(CASE WHEN julianday(${DATE_KEY}) >= julianday(?) THEN 1 ELSE 0 END), 0) AS last7d,
           COALESCE(SUM(CASE WHEN julianday(${DATE_KEY}) >= julianday(?) THEN 1 ELSE 0 END), 0) AS last30d
         FROM decisions d ${where}`
      )
      .get(
        recencyThreshold(RECENCY_WINDOWS.last24h, now),
        recencyThreshold(RECENCY_WINDOWS.last7d, now),
        recencyThreshold(RECENCY_WINDOWS.last30d, now),
        ...params
      );

    return {
      total: counted?.total ?? 0,
      byCategory: toCounts(grouped("COALESCE(NULLIF(d.category, ''), 'unknown')")),
      byStakes: toCounts(grouped("COALESCE(NULLIF(d.stakes, ''), 'medium')")),
      byStatus: toCounts(grouped("COALESCE(NULLIF(d.status, ''), 'pending')")),
      byAgent: toCounts(
        grouped("d.recorded_by", ["d.recorded_by IS NOT NULL", "d.recorded_by != ''"])
      ),
      byDay: grouped(`substr(${DATE_KEY}, 1, 10)`, [`${DATE_KEY} != ''`]).map(
        (r) => ({ date: r.bucket, count: r.total })
      ),
      topTags,
      recentActivity: {
        last24h: recent?.last24h ?? 0,
        last7d: recent?.last7d ?? 0,
        last30d: recent?.last30d ?? 0,
      },
    };
  }

  async updateOutcome(id: string, update: OutcomeUpdate): Promise<boolean> {
    return this.mutate(id, "Failed to record decision outcome", (db) => {
      const now = nowIso();
      const result = db
        .prepare(
          `UPDATE decisions SET
             status = 'reviewed',
             outcome = ?,
             outcome_result = COALESCE(?, outcome_result),
             outcome_lessons = COALESCE(?, outcome_lessons),
             outcome_notes = COALESCE(?, outcome_notes),
             reviewed_at = ?,
             updated_at = ?
           WHERE id = ?`
        )
        .run(
          update.outcome,
          update.result ?? null,
          update.lessons ?? null,
          update.notes ?? null,
          now,
          now,
          id
        );
      return result.changes > 0;
    });
  }

  async updateFields(
    id: string,
    fields: DecisionFieldUpdates
  ): Promise<boolean> {
    const updates = pickFieldUpdates(fields);
    if (Object.keys(updates).length === 0) return false;

    return this.mutate(id, "Failed to update decision fields", (db) => {
      const assignments = ["updated_at = ?"];
      const params: unknown[] = [nowIso()];
      for (const field of SCALAR_FIELDS) {
        const value = updates[field];
        if (value !== undefined) {
          assignments.push(`${SCALAR_COLUMNS[field]} = ?`);
          params.push(value);
        }
      }

      const result = db
        .prepare(`UPDATE decisions SET ${assignments.join(", ")} WHERE id = ?`)
        .run(...params, id);
      if (result.changes === 0) return false;

      if (updates.tags !== undefined) {
        this.writeTags(db, id, uniqueTags(updates.tags));
      }
      if (updates.reasons !== undefined) {
        this.writeReasons(db, id, normalizeReasons(updates.reasons));
      }
      if (updates.bridge !== undefined) {
        this.writeBridge(
          db,
          id,
          hasBridgeContent(updates.bridge) ? updates.bridge : undefined
        );
      }
      if (updates.deliberation !== undefined) {
        this.writeDeliberation(db, id, updates.deliberation ?? undefined);
      }
      return true;
    });
  }

  async count(filters: CountFilters = {}): Promise<number> {
    const db = this.connection();
    const conditions: string[] = [];
    const params: unknown[] = [];

    for (const field of COUNT_FILTER_FIELDS) {
      const expected = filters[field];
      if (expected !== undefined && expected !== null) {
        conditions.push(`d.${COUNT_COLUMNS[field]} = ?`);
        params.push(expected);
      }
    }

    const tags = normalizeTagFilter(filters.tags);
    if (tags.length > 0) {
      conditions.push(
        `d.id IN (SELECT decision_id FROM decision_tags WHERE tag IN (${placeholders(tags.length)}))`
      );
      params.push(...tags);
    }

    const row = db
      .prepare<unknown[], { total: number }>(
        `SELECT COUNT(*) AS total FROM decisions d ${whereClause(conditions)}`
      )
      .get(...params);
    return row?.total ?? 0;
  }

  /** Every table in the database file, FTS shadow tables included. */
  getTableNames(): string[] {
    return this.connection()
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name"
      )
      .all()
      .map((r) => r.name);
  }

  getJournalMode(): string {
    const mode: unknown = this.connection().pragma("journal_mode", { simple: true });
    return String(mode);
  }

  private connection(): SqlDatabase {
    if (!this.db) throw new StoreNotInitializedError(this.backend);
    return this.db;
  }

  private async mutate(
    id: string,
    failure: string,
    work: (db: SqlDatabase) => boolean
  ): Promise<boolean> {
    try {
      return await this.writeLock.runExclusive(() => {
        const db = this.connection();
        return db.transaction(() => work(db))();
      });
    } catch (err) {
      this.log.error({ err, id }, failure);
      return false;
    }
  }

  private listPredicate(q: ResolvedListQuery): Predicate {
    const predicate: Predicate = { conditions: [], params: [] };
    const equals = (column: string, value: string | undefined): void => {
      if (!value) return;
      predicate.conditions.push(`${column} = ?`);
      predicate.params.push(value);
    };

    equals("d.category", q.category);
    equals("d.stakes", q.stakes);
    equals("d.status", q.status);
    equals("d.recorded_by", q.agent);
    equals("d.project", q.project);
    equals("d.feature", q.feature);

    if (q.tags.length > 0) {
      predicate.conditions.push(
        `d.id IN (SELECT decision_id FROM decision_tags WHERE tag IN (${placeholders(q.tags.length)}))`
      );
      predicate.params.push(...q.tags);
    }

    this.addDateRange(predicate, q.dateFrom, q.dateTo);

    if (q.search) {
      const match = sanitizeFtsQuery(q.search);
      if (match) {
        predicate.conditions.push(
          "d.rowid IN (SELECT rowid FROM decisions_fts WHERE decisions_fts MATCH ?)"
        );
        predicate.params.push(match);
      } else {
        // Nothing left to search for once operators are stripped.
        predicate.conditions.push("0");
      }
    }
    return predicate;
  }

  private statsPredicate(q: StatsQuery): Predicate {
    const predicate: Predicate = { conditions: [], params: [] };
    if (q.project) {
      predicate.conditions.push("d.project = ?");
      predicate.params.push(q.project);
    }
    this.addDateRange(predicate, q.dateFrom, q.dateTo);
    return predicate;
  }

  private addDateRange(
    predicate: Predicate,
    dateFrom: string | undefined,
    dateTo: string | undefined
  ): void {
    if (dateFrom) {
      predicate.conditions.push(`${DATE_KEY} >= ?`);
      predicate.params.push(dateFrom);
    }
    if (dateTo) {
      predicate.conditions.push(`${DATE_KEY} <= ?`);
      predicate.params.push(dateUpperBound(dateTo));
    }
  }

  private writeTags(db: SqlDatabase, id: string, tags: string[]): void {
    db.prepare("DELETE FROM decision_tags WHERE decision_id = ?").run(id);
    const insert = db.prepare(
      "INSERT OR IGNORE INTO decision_tags (decision_id, tag) VALUES (?, ?)"
    );
    for (const tag of tags) insert.run(id, tag);
  }

  private writeReasons(db: SqlDatabase, id: string, reasons: Reason[]): void {
    db.prepare("DELETE FROM decision_reasons WHERE decision_id = ?").run(id);
    const insert = db.prepare(
      "INSERT INTO decision_reasons (decision_id, type, text, strength) VALUES (?, ?, ?, ?)"
    );
    for (const r of reasons) insert.run(id, r.type, r.text, r.strength);
  }

  private writeBridge(
    db: SqlDatabase,
    id: string,
    bridge: BridgeDefinition | undefined
  ): void {
    db.prepare("DELETE FROM decision_bridge WHERE decision_id = ?").run(id);
    if (!bridge) return;

    const json = (list: string[] | undefined): string | null =>
      list ? JSON.stringify(list) : null;
    db.prepare(
      `INSERT INTO decision_bridge
         (decision_id, structure, bridge_function, tolerance_json, enforcement_json, prevention_json)
       VALUES (?, ?, ?, ?, ?, ?)`
    ).run(
      id,
      bridge.structure ?? null,
      bridge.function ?? null,
      json(bridge.tolerance),
      json(bridge.enforcement),
      json(bridge.prevention)
    );
  }

  private writeDeliberation(
    db: SqlDatabase,
    id: string,
    deliberation: Deliberation | undefined
  ): void {
    db.prepare("DELETE FROM decision_deliberation WHERE decision_id = ?").run(id);
    if (!deliberation) return;

    db.prepare(
      `INSERT INTO decision_deliberation
         (decision_id, inputs_json, steps_json, total_duration_ms, convergence_point)
       VALUES (?, ?, ?, ?, ?)`
    ).run(
      id,
      JSON.stringify(deliberation.inputs),
      JSON.stringify(deliberation.steps),
      deliberation.totalDurationMs ?? null,
      deliberation.convergencePoint ?? null
    );
  }

  private readJson<S extends z.ZodTypeAny>(
    schema: S,
    text: string | null,
    id: string
  ): z.output<S> | undefined {
    if (text === null) return undefined;
    try {
      const result = schema.safeParse(JSON.parse(text));
      if (result.success) return result.data;
      this.log.warn({ id, issues: result.error.issues }, "Ignoring malformed JSON column");
    } catch (err) {
      this.log.warn({ id, err }, "Ignoring malformed JSON column");
    }
    return undefined;
  }

  /** Loads the child rows for a page of decisions, one query per table and batch. */
  private hydrate(db: SqlDatabase, rows: DecisionRow[]): Decision[] {
    const decisions: Decision[] = [];
    // Each id is a bound parameter, and SQLite caps how many one statement takes.
    for (let start = 0; start < rows.length; start += HYDRATE_BATCH_SIZE) {
      decisions.push(...this.hydrateBatch(db, rows.slice(start, start + HYDRATE_BATCH_SIZE)));
    }
    return decisions;
  }

  private hydrateBatch(db: SqlDatabase, rows: DecisionRow[]): Decision[] {
    if (rows.length === 0) return [];

    const ids = rows.map((r) => r.id);
    const marks = placeholders(ids.length);
    const select = <T>(sql: string): T[] =>
      db.prepare<unknown[], T>(sql).all(...ids);

    const tags = groupBy(
      select<TagRow>(
        `SELECT decision_id, tag FROM decision_tags WHERE decision_id IN (${marks}) ORDER BY rowid`
      )
    );
    const reasons = groupBy(
      select<ReasonRow>(
        `SELECT decision_id, type, text, strength FROM decision_reasons
         WHERE decision_id IN (${marks}) ORDER BY id`
      )
    );
    const bridges = new Map(
      select<BridgeRow>(
        `SELECT * FROM decision_bridge WHERE decision_id IN (${marks})`
      ).map((r) => [r.decision_id, r])
    );
    const deliberations = new Map(
      select<DeliberationRow>(
        `SELECT * FROM decision_deliberation WHERE decision_id IN (${marks})`
      ).map((r) => [r.decision_id, r])
    );

    return rows.map((row) =>
      this.toDecision(
        row,
        (tags.get(row.id) ?? []).map((t) => t.tag),
        (reasons.get(row.id) ?? []).map(({ type, text, strength }) => ({
          type,
          text,
          strength,
        })),
        bridges.get(row.id),
        deliberations.get(row.id)
      )
    );
  }

  private toDecision(
    row: DecisionRow,
    tags: string[],
    reasons: Reason[],
    bridge: BridgeRow | undefined,
    deliberation: DeliberationRow | undefined
  ): Decision {
    return {
      id: row.id,
      decision: row.decision,
      summary: opt(row.summary),
      confidence: row.confidence,
      category: row.category,
      stakes: DECISION_STAKES.find((s) => s === row.stakes) ?? "medium",
      status: DECISION_STATUSES.find((s) => s === row.status) ?? "pending",
      context: opt(row.context),
      recordedBy: opt(row.recorded_by),
      project: opt(row.project),
      feature: opt(row.feature),
      pr: opt(row.pr),
      file: opt(row.file),
      line: opt(row.line),
      commit: opt(row.commit_ref),
      pattern: opt(row.pattern),
      date: opt(row.decision_date),
      tags,
      reasons,
      bridge: bridge && {
        structure: opt(bridge.structure),
        function: opt(bridge.bridge_function),
        tolerance: this.readJson(StringListJson, bridge.tolerance_json, row.id),
        enforcement: this.readJson(StringListJson, bridge.enforcement_json, row.id),
        prevention: this.readJson(StringListJson, bridge.prevention_json, row.id),
      },
      deliberation: deliberation && {
        inputs:
          this.readJson(DeliberationInputsJson, deliberation.inputs_json, row.id) ?? [],
        steps:
          this.readJson(DeliberationStepsJson, deliberation.steps_json, row.id) ?? [],
        totalDurationMs: opt(deliberation.total_duration_ms),
        convergencePoint: opt(deliberation.convergence_point),
      },
      outcome: DECISION_OUTCOMES.find((o) => o === row.outcome),
      actualResult: opt(row.outcome_result),
      lessons: opt(row.outcome_lessons),
      reviewNotes: opt(row.outcome_notes),
      reviewedAt: opt(row.reviewed_at),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
