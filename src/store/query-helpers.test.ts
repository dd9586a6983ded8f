import { describe, it, expect } from "vitest";
import { makeDecision } from "../test-support/fixtures.js";
import {
  computeStats,
  dateUpperBound,
  matchesCountFilters,
  recencyThreshold,
  resolveListQuery,
  runListQuery,
  sortDecisions,
} from "./query-helpers.js";

const NOW = new Date("2026-03-10T12:00:00.000Z");

describe("resolveListQuery", () => {
  it("applies defaults", () => {
    expect(resolveListQuery()).toEqual({
      limit: 20,
      offset: 0,
      tags: [],
      sort: "createdAt",
      order: "desc",
    });
  });

  it("rejects sort fields outside the allow-list", () => {
    expect(resolveListQuery({ sort: "rowid" }).sort).toBe("createdAt");
    expect(resolveListQuery({ sort: "confidence" }).sort).toBe("confidence");
  });

  it("clamps negative paging values", () => {
    const q = resolveListQuery({ limit: -5, offset: -1 });
    expect(q.limit).toBe(0);
    expect(q.offset).toBe(0);
  });
});

describe("dateUpperBound", () => {
  it("extends a bare date to the end of the day", () => {
    expect(dateUpperBound("2026-03-05")).toBe("2026-03-05T23:59:59");
    expect(dateUpperBound("2026-03-05T08:00:00Z")).toBe("2026-03-05T08:00:00Z");
  });
});

describe("sortDecisions", () => {
  it("sorts missing values as empty and breaks ties by id", () => {
    const decisions = [
      makeDecision({ id: "c", project: "beta" }),
      makeDecision({ id: "b", project: undefined }),
      makeDecision({ id: "a", project: "beta" }),
    ];

    expect(sortDecisions(decisions, "project", "asc").map((d) => d.id)).toEqual(["b", "a", "c"]);
    expect(sortDecisions(decisions, "project", "desc").map((d) => d.id)).toEqual(["a", "c", "b"]);
  });

  it("falls back to the legacy date when createdAt is empty", () => {
    const decisions = [
      makeDecision({ id: "new", createdAt: "2026-03-02T00:00:00.000Z" }),
      makeDecision({ id: "legacy", createdAt: "", date: "2026-03-01" }),
    ];
    expect(sortDecisions(decisions, "createdAt", "asc").map((d) => d.id)).toEqual([
      "legacy",
      "new",
    ]);
  });
});

describe("runListQuery", () => {
  const decisions = [
    makeDecision({ id: "x1", tags: ["a"], createdAt: "2026-03-01T09:00:00.000Z" }),
    makeDecision({ id: "x2", tags: ["b"], createdAt: "2026-03-02T09:00:00.000Z" }),
    makeDecision({
      id: "x3",
      tags: ["a", "b"],
      pattern: "Prefer boring technology",
      createdAt: "2026-03-03T09:00:00.000Z",
    }),
  ];

  it("counts the total before paging", () => {
    const result = runListQuery(decisions, { limit: 1, offset: 1 });
    expect(result.total).toBe(3);
    expect(result.decisions.map((d) => d.id)).toEqual(["x2"]);
  });

  it("filters by any tag", () => {
    expect(runListQuery(decisions, { tags: ["a"] }).decisions.map((d) => d.id)).toEqual([
      "x3",
      "x1",
    ]);
  });

  it("searches the pattern text case-insensitively", () => {
    expect(runListQuery(decisions, { search: "BORING" }).decisions.map((d) => d.id)).toEqual([
      "x3",
    ]);
  });
});

describe("computeStats", () => {
  it("counts recency windows relative to now", () => {
    const stats = computeStats(
      [
        makeDecision({ id: "h2", createdAt: "2026-03-10T10:00:00.000Z" }),
        makeDecision({ id: "d3", createdAt: "2026-03-07T12:00:00.000Z" }),
        makeDecision({ id: "d20", createdAt: "2026-02-18T12:00:00.000Z" }),
        makeDecision({ id: "d40", createdAt: "2026-01-29T12:00:00.000Z" }),
      ],
      NOW
    );

    expect(stats.recentActivity).toEqual({ last24h: 1, last7d: 2, last30d: 3 });
  });

  it("counts unparsable dates per day but not per window", () => {
    const stats = computeStats([makeDecision({ createdAt: "someday" })], NOW);
    expect(stats.byDay).toEqual([{ date: "someday", count: 1 }]);
    expect(stats.recentActivity).toEqual({ last24h: 0, last7d: 0, last30d: 0 });
  });

  it("ranks tags by count then name", () => {
    const stats = computeStats(
      [
        makeDecision({ id: "1", tags: ["zeta", "alpha"] }),
        makeDecision({ id: "2", tags: ["zeta", "beta"] }),
        makeDecision({ id: "3", tags: ["beta"] }),
      ],
      NOW
    );
    expect(stats.topTags).toEqual([
      { tag: "beta", count: 2 },
      { tag: "zeta", count: 2 },
      { tag: "alpha", count: 1 },
    ]);
  });
});

describe("recencyThreshold", () => {
  it("subtracts whole days", () => {
    expect(recencyThreshold(7, NOW)).toBe("2026-03-03T12:00:00.000Z");
  });
});

describe("matchesCountFilters", () => {
  it("requires every given field and any given tag", () => {
    const d = makeDecision({ tags: ["a", "b"] });
    expect(matchesCountFilters(d, { category: "architecture", tags: "b" })).toBe(true);
    expect(matchesCountFilters(d, { category: "architecture", tags: ["c"] })).toBe(false);
    expect(matchesCountFilters(d, { project: "acme/web" })).toBe(false);
  });
});
