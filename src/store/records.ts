import {
  UPDATABLE_FIELDS,
  type BridgeDefinition,
  type Decision,
  type DecisionFieldUpdates,
  type DecisionInput,
  type OutcomeUpdate,
  type Reason,
  type ReasonInput,
} from "./types.js";

export const DEFAULT_REASON_STRENGTH = 0.8;

export function nowIso(): string {
  return new Date().toISOString();
}

export function normalizeReasons(reasons: ReasonInput[] = []): Reason[] {
  return reasons.map((r) => ({
    type: r.type,
    text: r.text,
    strength: r.strength ?? DEFAULT_REASON_STRENGTH,
  }));
}

export function hasBridgeContent(
  bridge: BridgeDefinition | undefined | null
): bridge is BridgeDefinition {
  if (!bridge) return false;
  return Object.values(bridge).some((v) => v !== undefined && v !== null);
}

/** Tags are a set: first occurrence wins, order otherwise preserved. */
export function uniqueTags(tags: string[]): string[] {
  return [...new Set(tags)];
}

/**
 * Turns caller input into a stored record. An existing record keeps its
 * creation time; a new one takes `createdAt`, then `date`, then now.
 */
export function buildDecision(
  id: string,
  input: DecisionInput,
  now: string,
  existing?: Pick<Decision, "createdAt"> | null
): Decision {
  const { createdAt, tags, reasons, stakes, status, bridge, ...rest } = input;

  return {
    ...rest,
    id,
    stakes: stakes ?? "medium",
    status: status ?? "pending",
    tags: uniqueTags(tags ?? []),
    reasons: normalizeReasons(reasons),
    bridge: hasBridgeContent(bridge) ? bridge : undefined,
    createdAt: existing?.createdAt ?? createdAt ?? input.date ?? now,
    updatedAt: now,
  };
}

export function applyOutcome(
  decision: Decision,
  update: OutcomeUpdate,
  now: string
): Decision {
  return {
    ...decision,
    status: "reviewed",
    outcome: update.outcome,
    actualResult: update.result ?? decision.actualResult,
    lessons: update.lessons ?? decision.lessons,
    reviewNotes: update.notes ?? decision.reviewNotes,
    reviewedAt: now,
    updatedAt: now,
  };
}

function copyField<K extends keyof DecisionFieldUpdates>(
  from: DecisionFieldUpdates,
  to: DecisionFieldUpdates,
  key: K
): void {
  if (from[key] !== undefined) to[key] = from[key];
}

/**
 * Keeps only allow-listed keys with a defined value. Input may arrive from
 * untyped callers, so anything outside the list is dropped here.
 */
export function pickFieldUpdates(
  fields: DecisionFieldUpdates
): DecisionFieldUpdates {
  const picked: DecisionFieldUpdates = {};
  for (const key of UPDATABLE_FIELDS) {
    copyField(fields, picked, key);
  }
  return picked;
}

export function applyFieldUpdates(
  decision: Decision,
  fields: DecisionFieldUpdates,
  now: string
): Decision {
  const { tags, reasons, bridge, deliberation, ...scalars } =
    pickFieldUpdates(fields);
  const next: Decision = { ...decision, ...scalars, updatedAt: now };

  if (tags !== undefined) next.tags = uniqueTags(tags);
  if (reasons !== undefined) next.reasons = normalizeReasons(reasons);
  if (bridge !== undefined) {
    next.bridge = hasBridgeContent(bridge) ? bridge : undefined;
  }
  if (deliberation !== undefined) {
    next.deliberation = deliberation ?? undefined;
  }
  return next;
}
