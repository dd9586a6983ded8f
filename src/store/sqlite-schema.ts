import { z } from "zod";

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS decisions (
    id TEXT PRIMARY KEY,
    decision TEXT NOT NULL,
    summary TEXT,
    confidence REAL NOT NULL DEFAULT 0,
    category TEXT NOT NULL DEFAULT '',
    stakes TEXT NOT NULL DEFAULT 'medium',
    status TEXT NOT NULL DEFAULT 'pending',
    context TEXT,
    recorded_by TEXT,
    project TEXT,
    feature TEXT,
    pr INTEGER,
    file TEXT,
    line INTEGER,
    commit_ref TEXT,
    pattern TEXT,
    decision_date TEXT,
    outcome TEXT,
    outcome_result TEXT,
    outcome_lessons TEXT,
    outcome_notes TEXT,
    reviewed_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS decision_tags (
    decision_id TEXT NOT NULL REFERENCES decisions(id) ON DELETE CASCADE,
    tag TEXT NOT NULL,
    PRIMARY KEY (decision_id, tag)
  );

  CREATE TABLE IF NOT EXISTS decision_reasons (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    decision_id TEXT NOT NULL REFERENCES decisions(id) ON DELETE CASCADE,
    type TEXT NOT NULL,
    text TEXT NOT NULL,
    strength REAL NOT NULL DEFAULT 0.8
  );

  CREATE TABLE IF NOT EXISTS decision_bridge (
    decision_id TEXT PRIMARY KEY REFERENCES decisions(id) ON DELETE CASCADE,
    structure TEXT,
    bridge_function TEXT,
    tolerance_json TEXT,
    enforcement_json TEXT,
    prevention_json TEXT
  );

  CREATE TABLE IF NOT EXISTS decision_deliberation (
    decision_id TEXT PRIMARY KEY REFERENCES decisions(id) ON DELETE CASCADE,
    inputs_json TEXT NOT NULL DEFAULT '[]',
    steps_json TEXT NOT NULL DEFAULT '[]',
    total_duration_ms INTEGER,
    convergence_point INTEGER
  );

  CREATE INDEX IF NOT EXISTS idx_decisions_created_at ON decisions(created_at);
  CREATE INDEX IF NOT EXISTS idx_decisions_category ON decisions(category);
  CREATE INDEX IF NOT EXISTS idx_decisions_status ON decisions(status);
  CREATE INDEX IF NOT EXISTS idx_decisions_stakes ON decisions(stakes);
  CREATE INDEX IF NOT EXISTS idx_decisions_recorded_by ON decisions(recorded_by);
  CREATE INDEX IF NOT EXISTS idx_decisions_project ON decisions(project);
  CREATE INDEX IF NOT EXISTS idx_decision_tags_tag ON decision_tags(tag);
  CREATE INDEX IF NOT EXISTS idx_decision_reasons_decision ON decision_reasons(decision_id);

  CREATE VIRTUAL TABLE IF NOT EXISTS decisions_fts USING fts5(
    id UNINDEXED,
    decision,
    summary,
    context,
    pattern,
    content=decisions,
    content_rowid=rowid
  );

  CREATE TRIGGER IF NOT EXISTS decisions_ai AFTER INSERT ON decisions BEGIN
    INSERT INTO decisions_fts(rowid, id, decision, summary, context, pattern)
    VALUES (new.rowid, new.id, new.decision, new.summary, new.context, new.pattern);
  END;

  CREATE TRIGGER IF NOT EXISTS decisions_ad AFTER DELETE ON decisions BEGIN
    INSERT INTO decisions_fts(decisions_fts, rowid, id, decision, summary, context, pattern)
    VALUES ('delete', old.rowid, old.id, old.decision, old.summary, old.context, old.pattern);
  END;

  CREATE TRIGGER IF NOT EXISTS decisions_au AFTER UPDATE ON decisions BEGIN
    INSERT INTO decisions_fts(decisions_fts, rowid, id, decision, summary, context, pattern)
    VALUES ('delete', old.rowid, old.id, old.decision, old.summary, old.context, old.pattern);
    INSERT INTO decisions_fts(rowid, id, decision, summary, context, pattern)
    VALUES (new.rowid, new.id, new.decision, new.summary, new.context, new.pattern);
  END;
`;

export interface DecisionRow {
  id: string;
  decision: string;
  summary: string | null;
  confidence: number;
  category: string;
  stakes: string;
  status: string;
  context: string | null;
  recorded_by: string | null;
  project: string | null;
  feature: string | null;
  pr: number | null;
  file: string | null;
  line: number | null;
  commit_ref: string | null;
  pattern: string | null;
  decision_date: string | null;
  outcome: string | null;
  outcome_result: string | null;
  outcome_lessons: string | null;
  outcome_notes: string | null;
  reviewed_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface TagRow {
  decision_id: string;
  tag: string;
}

export interface ReasonRow {
  decision_id: string;
  type: string;
  text: string;
  strength: number;
}

export interface BridgeRow {
  decision_id: string;
  structure: string | null;
  bridge_function: string | null;
  tolerance_json: string | null;
  enforcement_json: string | null;
  prevention_json: string | null;
}

export interface DeliberationRow {
  decision_id: string;
  inputs_json: string;
  steps_json: string;
  total_duration_ms: number | null;
  convergence_point: number | null;
}

// JSON columns are read back through these, so a hand-edited row cannot
// smuggle a wrong shape into a Decision.
export const StringListJson = z.array(z.string());

export const DeliberationInputsJson = z.array(
  z.object({
    id: z.string(),
    text: z.string(),
    source: z.string().optional(),
    timestamp: z.string().optional(),
  })
);

export const DeliberationStepsJson = z.array(
  z.object({
    step: z.number(),
    thought: z.string(),
    inputsUsed: z.array(z.string()).optional(),
    timestamp: z.string().optional(),
    durationMs: z.number().optional(),
    type: z.string().optional(),
    conclusion: z.boolean().optional(),
  })
);

/**
 * Turns free text into an FTS5 query: operator characters are dropped and
 * every remaining word becomes a quoted, required term.
 *
 * `cache "redis"*` -> `"cache" "redis"`
 */
export function sanitizeFtsQuery(query: string): string {
  const words = query.replace(/["*()+\-^:]/g, " ").split(/\s+/).filter(Boolean);
  return words.map((w) => `"${w}"`).join(" ");
}
