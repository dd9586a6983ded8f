import path from "node:path";
import matter from "gray-matter";
import { z } from "zod";
import { DecisionFileError } from "../errors.js";
import { DEFAULT_REASON_STRENGTH } from "./records.js";
import {
  DECISION_OUTCOMES,
  DECISION_STAKES,
  DECISION_STATUSES,
  type Decision,
} from "./types.js";

export const DECISION_FILE_EXT = ".md";
const ID_MARKER = "-decision-";
const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})/;

// Options turn off gray-matter's parse cache, which is keyed by the whole
// document and never evicted.
const MATTER_OPTIONS = {};
const LEGACY_CONTEXT = /## Context\s*\n([\s\S]*?)(?=\n## |\n*$)/;

// YAML turns empty values into null and bare timestamps into Date objects.
const text = z.preprocess(
  (v) => (v instanceof Date ? v.toISOString() : typeof v === "number" ? String(v) : v),
  z.string()
);
const optionalText = z.preprocess((v) => v ?? undefined, text.optional());
const optionalNumber = z.preprocess((v) => v ?? undefined, z.coerce.number().optional());
const optionalInt = z.preprocess((v) => v ?? undefined, z.coerce.number().int().optional());
const textList = z.preprocess((v) => v ?? [], z.array(text));

const ReasonSchema = z.object({
  type: optionalText,
  text: optionalText,
  strength: optionalNumber,
});

const BridgeSchema = z.object({
  structure: optionalText,
  function: optionalText,
  purpose: optionalText,
  tolerance: textList.optional(),
  enforcement: textList.optional(),
  prevention: textList.optional(),
});

const DeliberationSchema = z.object({
  inputs: z.preprocess(
    (v) => v ?? [],
    z.array(
      z.object({
        id: optionalText,
        text: optionalText,
        source: optionalText,
        timestamp: optionalText,
      })
    )
  ),
  steps: z.preprocess(
    (v) => v ?? [],
    z.array(
      z.object({
        step: optionalInt,
        thought: optionalText,
        inputs_used: textList.optional(),
        timestamp: optionalText,
        duration_ms: optionalInt,
        type: optionalText,
        conclusion: z.boolean().optional(),
      })
    )
  ),
  total_duration_ms: optionalInt,
  convergence_point: optionalInt,
});

const FrontmatterSchema = z.object({
  id: optionalText,
  decision: optionalText,
  summary: optionalText,
  category: optionalText,
  confidence: optionalNumber,
  stakes: z.enum(DECISION_STAKES).optional().catch(undefined),
  status: z.enum(DECISION_STATUSES).optional().catch(undefined),
  date: optionalText,
  created_at: optionalText,
  updated_at: optionalText,
  recorded_by: optionalText,
  agent_id: optionalText,
  project: optionalText,
  feature: optionalText,
  pr: optionalInt,
  file: optionalText,
  line: optionalInt,
  commit: optionalText,
  pattern: optionalText,
  context: optionalText,
  tags: textList,
  reasons: z.preprocess((v) => v ?? [], z.array(ReasonSchema)),
  bridge: z.preprocess((v) => v ?? undefined, BridgeSchema.optional()),
  deliberation: z.preprocess((v) => v ?? undefined, DeliberationSchema.optional()),
  outcome: z.enum(DECISION_OUTCOMES).optional().catch(undefined),
  actual_result: optionalText,
  outcome_result: optionalText,
  lessons: optionalText,
  outcome_lessons: optionalText,
  review_notes: optionalText,
  outcome_notes: optionalText,
  reviewed_at: optionalText,
});

type Frontmatter = z.infer<typeof FrontmatterSchema>;

/** `2026-03-05-decision-ab12cd34.md` -> `ab12cd34` */
export function decisionIdFromFilename(filename: string): string | null {
  const stem = path.basename(filename, path.extname(filename));
  const at = stem.lastIndexOf(ID_MARKER);
  if (at < 0) return null;
  const id = stem.slice(at + ID_MARKER.length);
  return id || null;
}

export function decisionFilename(id: string, day: string): string {
  return `${day}${ID_MARKER}${id}${DECISION_FILE_EXT}`;
}

export function decisionFilePattern(id = "*"): string {
  return `*${ID_MARKER}${id}${DECISION_FILE_EXT}`;
}

/**
 * Year, month and day for the file tree. A leading `YYYY-MM-DD` is taken as
 * written; otherwise the value is parsed, and unparsable dates fall back to
 * `fallback`.
 */
export function dateParts(
  value: string | undefined,
  fallback: Date = new Date()
): { year: string; month: string; day: string } {
  const prefix = value?.match(DATE_PREFIX);
  if (prefix) {
    return { year: prefix[1], month: prefix[2], day: prefix[0] };
  }
  const parsed = value ? new Date(value) : fallback;
  const date = Number.isNaN(parsed.getTime()) ? fallback : parsed;
  const iso = date.toISOString();
  return { year: iso.slice(0, 4), month: iso.slice(5, 7), day: iso.slice(0, 10) };
}

function fromFrontmatter(
  fm: Frontmatter,
  id: string,
  legacyContext: string | undefined,
  filenameDay: string | undefined
): Decision {
  const createdAt = fm.created_at ?? fm.date ?? fm.updated_at ?? filenameDay ?? "";

  return {
    id,
    decision: fm.decision ?? fm.summary ?? "",
    summary: fm.summary,
    confidence: fm.confidence ?? 0,
    category: fm.category ?? "",
    stakes: fm.stakes ?? "medium",
    status: fm.status ?? "pending",
    context: fm.context ?? legacyContext,
    recordedBy: fm.recorded_by ?? fm.agent_id,
    project: fm.project,
    feature: fm.feature,
    pr: fm.pr,
    file: fm.file,
    line: fm.line,
    commit: fm.commit,
    pattern: fm.pattern,
    date: fm.date,
    tags: [...new Set(fm.tags)],
    reasons: fm.reasons.map((r) => ({
      type: r.type || "analysis",
      text: r.text ?? "",
      strength: r.strength ?? DEFAULT_REASON_STRENGTH,
    })),
    bridge: fm.bridge && {
      structure: fm.bridge.structure,
      function: fm.bridge.function ?? fm.bridge.purpose,
      tolerance: fm.bridge.tolerance,
      enforcement: fm.bridge.enforcement,
      prevention: fm.bridge.prevention,
    },
    deliberation: fm.deliberation && {
      inputs: fm.deliberation.inputs.map((i) => ({
        id: i.id ?? "",
        text: i.text ?? "",
        source: i.source,
        timestamp: i.timestamp,
      })),
      steps: fm.deliberation.steps.map((s, index) => ({
        step: s.step ?? index + 1,
        thought: s.thought ?? "",
        inputsUsed: s.inputs_used,
        timestamp: s.timestamp,
        durationMs: s.duration_ms,
        type: s.type,
        conclusion: s.conclusion,
      })),
      totalDurationMs: fm.deliberation.total_duration_ms,
      convergencePoint: fm.deliberation.convergence_point,
    },
    outcome: fm.outcome,
    actualResult: fm.actual_result ?? fm.outcome_result,
    lessons: fm.lessons ?? fm.outcome_lessons,
    reviewNotes: fm.review_notes ?? fm.outcome_notes,
    reviewedAt: fm.reviewed_at,
    createdAt,
    updatedAt: fm.updated_at ?? createdAt,
  };
}

/**
 * Parses one decision file. Returns `null` for a file with no front matter;
 * throws `DecisionFileError` when the front matter cannot be read. The id
 * comes from the filename, falling back to the `id` key.
 */
export function parseDecision(markdown: string, filePath: string): Decision | null {
  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(markdown, MATTER_OPTIONS);
  } catch (err) {
    throw new DecisionFileError(`Invalid front matter in ${filePath}`, filePath, err);
  }

  if (Object.keys(parsed.data).length === 0) return null;

  const result = FrontmatterSchema.safeParse(parsed.data);
  if (!result.success) {
    throw new DecisionFileError(
      `Invalid decision in ${filePath}: ${result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ")}`,
      filePath,
      result.error
    );
  }

  const id = decisionIdFromFilename(filePath) ?? result.data.id;
  if (!id) {
    throw new DecisionFileError(`No decision id for ${filePath}`, filePath);
  }

  // Older files carry the context as a Markdown section instead of a key.
  const legacyContext = parsed.content.match(LEGACY_CONTEXT)?.[1].trim();
  const filenameDay = path.basename(filePath).match(DATE_PREFIX)?.[0];

  return fromFrontmatter(result.data, id, legacyContext, filenameDay);
}

function defined(entries: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function toFrontmatter(decision: Decision): Record<string, unknown> {
  const { bridge, deliberation } = decision;

  return defined({
    id: decision.id,
    decision: decision.decision,
    summary: decision.summary,
    category: decision.category,
    confidence: decision.confidence,
    stakes: decision.stakes,
    status: decision.status,
    date: decision.date,
    created_at: decision.createdAt,
    updated_at: decision.updatedAt,
    recorded_by: decision.recordedBy,
    project: decision.project,
    feature: decision.feature,
    pr: decision.pr,
    file: decision.file,
    line: decision.line,
    commit: decision.commit,
    pattern: decision.pattern,
    context: decision.context,
    tags: decision.tags,
    reasons: decision.reasons.map((r) => ({ ...r })),
    bridge: bridge && defined({ ...bridge }),
    deliberation: deliberation && defined({
      inputs: deliberation.inputs.map((i) => defined({ ...i })),
      steps: deliberation.steps.map((s) =>
        defined({
          step: s.step,
          thought: s.thought,
          inputs_used: s.inputsUsed,
          timestamp: s.timestamp,
          duration_ms: s.durationMs,
          type: s.type,
          conclusion: s.conclusion,
        })
      ),
      total_duration_ms: deliberation.totalDurationMs,
      convergence_point: deliberation.convergencePoint,
    }),
    outcome: decision.outcome,
    actual_result: decision.actualResult,
    lessons: decision.lessons,
    review_notes: decision.reviewNotes,
    reviewed_at: decision.reviewedAt,
  });
}

export function serializeDecision(decision: Decision): string {
  return matter.stringify("", toFrontmatter(decision), MATTER_OPTIONS);
}
