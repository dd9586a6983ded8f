import { describe, it, expect } from "vitest";
import matter from "gray-matter";
import { DecisionFileError } from "../errors.js";
import { makeDecision } from "../test-support/fixtures.js";
import {
  dateParts,
  decisionFilePattern,
  decisionFilename,
  decisionIdFromFilename,
  parseDecision,
  serializeDecision,
} from "./parser.js";

const FILE = "/tmp/decisions/2026/02/2026-02-12-decision-abc12345.md";

describe("filenames", () => {
  it("takes the id from the suffix", () => {
    expect(decisionIdFromFilename(FILE)).toBe("abc12345");
    expect(decisionIdFromFilename("2026-02-12-decision-x-decision-y.md")).toBe("y");
  });

  it("returns null for names outside the scheme", () => {
    expect(decisionIdFromFilename("notes.md")).toBeNull();
    expect(decisionIdFromFilename("2026-02-12-decision-.md")).toBeNull();
  });

  it("builds names and lookup patterns", () => {
    expect(decisionFilename("abc12345", "2026-02-12")).toBe("2026-02-12-decision-abc12345.md");
    expect(decisionFilePattern("abc12345")).toBe("*-decision-abc12345.md");
    expect(decisionFilePattern()).toBe("*-decision-*.md");
  });
});

describe("dateParts", () => {
  const fallback = new Date("2025-12-31T12:00:00.000Z");

  it("uses a leading calendar date as written", () => {
    expect(dateParts("2026-03-05T23:30:00-05:00", fallback)).toEqual({
      year: "2026",
      month: "03",
      day: "2026-03-05",
    });
  });

  it("falls back when the value is missing or unparsable", () => {
    const expected = { year: "2025", month: "12", day: "2025-12-31" };
    expect(dateParts(undefined, fallback)).toEqual(expected);
    expect(dateParts("next tuesday", fallback)).toEqual(expected);
  });
});

describe("serializeDecision / parseDecision", () => {
  it("reads back what it writes", () => {
    const decision = makeDecision({
      summary: "Postgres",
      pr: 17,
      commit: "4f2a9c1",
      date: "2026-02-12",
      bridge: { structure: "repository", function: "isolation", prevention: ["raw SQL in handlers"] },
      deliberation: {
        inputs: [{ id: "q1", text: "Earlier datastore decision" }],
        steps: [{ step: 1, thought: "Postgres is already in use", conclusion: true }],
        totalDurationMs: 800,
      },
      outcome: "success",
      actualResult: "No incidents",
      status: "reviewed",
      reviewedAt: "2026-03-01T00:00:00.000Z",
    });

    expect(parseDecision(serializeDecision(decision), FILE)).toEqual(decision);
  });

  it("writes snake_case keys in a fixed order", () => {
    const text = serializeDecision(makeDecision());

    expect(text.indexOf("id: abc12345")).toBeLessThan(text.indexOf("decision: Use PostgreSQL"));
    expect(text).toContain("created_at: '2026-02-12T09:30:00.000Z'\n");
    expect(text).toContain("context: Evaluating database options for the backend.\n");
    expect(text).not.toContain("## Context");
  });

  it("keeps headings and edge whitespace inside the context", () => {
    const decision = makeDecision({ context: "\n## Redis\nfast\n\n## Memcached\nsimple  \n" });
    expect(parseDecision(serializeDecision(decision), FILE)?.context).toBe(decision.context);
  });

  it("reads the context from a section in older files", () => {
    const got = parseDecision("---\ndecision: x\n---\n\n## Context\n\nOld layout.\n", FILE);
    expect(got?.context).toBe("Old layout.");
  });

  it("leaves nothing in gray-matter's document cache", () => {
    const text = serializeDecision(makeDecision({ decision: "Cache once" }));
    parseDecision(text, FILE);

    const cache: unknown = Reflect.get(matter, "cache");
    expect(cache).toBeTypeOf("object");
    expect(cache).not.toHaveProperty([text]);
  });

  it("returns null for a document without front matter", () => {
    expect(parseDecision("# Meeting notes\n", FILE)).toBeNull();
  });

  it("throws DecisionFileError for broken front matter", () => {
    expect(() => parseDecision("---\nreasons: {oops\n---\n", FILE)).toThrow(DecisionFileError);
  });

  it("throws DecisionFileError when a field has the wrong shape", () => {
    expect(() => parseDecision("---\nreasons: just one\n---\n", FILE)).toThrow(
      /Invalid decision in .*: reasons/
    );
  });

  it("falls back to defaults for unknown enum values", () => {
    const got = parseDecision("---\ndecision: x\nstakes: extreme\nstatus: done\n---\n", FILE);
    expect(got?.stakes).toBe("medium");
    expect(got?.status).toBe("pending");
  });

  it("accepts the older key names", () => {
    const got = parseDecision(
      [
        "---",
        "decision: Queue writes",
        "created_at: '2026-02-01T08:00:00Z'",
        "agent_id: agent-gamma",
        "outcome_result: Worked",
        "outcome_lessons: Batch sooner",
        "outcome_notes: Checked in review",
        "bridge:",
        "  structure: write-behind",
        "  purpose: smoothing",
        "---",
        "",
      ].join("\n"),
      FILE
    );

    expect(got).toMatchObject({
      recordedBy: "agent-gamma",
      actualResult: "Worked",
      lessons: "Batch sooner",
      reviewNotes: "Checked in review",
      bridge: { structure: "write-behind", function: "smoothing" },
      createdAt: "2026-02-01T08:00:00Z",
      updatedAt: "2026-02-01T08:00:00Z",
    });
  });

  it("uses the id key when the filename carries none", () => {
    const got = parseDecision("---\nid: legacy99\ndecision: x\n---\n", "/tmp/legacy.md");
    expect(got?.id).toBe("legacy99");
    expect(() => parseDecision("---\ndecision: x\n---\n", "/tmp/legacy.md")).toThrow(
      DecisionFileError
    );
  });
});
