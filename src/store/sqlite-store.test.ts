import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import Database from "better-sqlite3";
import { StoreNotInitializedError } from "../errors.js";
import { makeInput, makeTempDir, silentLogger } from "../test-support/fixtures.js";
import { sanitizeFtsQuery } from "./sqlite-schema.js";
import { SqliteDecisionStore } from "./sqlite-store.js";

let tmpDir: string;
let dbPath: string;
let store: SqliteDecisionStore;

beforeEach(async () => {
  tmpDir = await makeTempDir("decision-vault-sqlite-");
  dbPath = path.join(tmpDir, "data", "decisions.db");
  store = new SqliteDecisionStore(dbPath, silentLogger);
});

afterEach(async () => {
  await store.close();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function childRowCounts(id: string): Record<string, number> {
  const db = new Database(dbPath, { readonly: true });
  try {
    const counts: Record<string, number> = {};
    for (const table of [
      "decision_tags",
      "decision_reasons",
      "decision_bridge",
      "decision_deliberation",
    ]) {
      const row = db
        .prepare<[string], { n: number }>(
          `SELECT COUNT(*) AS n FROM ${table} WHERE decision_id = ?`
        )
        .get(id);
      counts[table] = row?.n ?? -1;
    }
    return counts;
  } finally {
    db.close();
  }
}

describe("sanitizeFtsQuery", () => {
  it("quotes each word and drops operator characters", () => {
    expect(sanitizeFtsQuery('cache "redis"*')).toBe('"cache" "redis"');
    expect(sanitizeFtsQuery("file-based (store)")).toBe('"file" "based" "store"');
    expect(sanitizeFtsQuery("decision:NEAR")).toBe('"decision" "NEAR"');
  });

  it("returns an empty string when nothing is left", () => {
    expect(sanitizeFtsQuery(" *() ")).toBe("");
  });
});

describe("SqliteDecisionStore", () => {
  describe("before initialize", () => {
    it("rejects reads", async () => {
      await expect(store.get("abc12345")).rejects.toBeInstanceOf(StoreNotInitializedError);
      await expect(store.list()).rejects.toBeInstanceOf(StoreNotInitializedError);
    });

    it("reports writes as failed", async () => {
      expect(await store.save("abc12345", makeInput())).toBe(false);
    });

    it("can be closed", async () => {
      await expect(store.close()).resolves.toBeUndefined();
    });
  });

  describe("initialize", () => {
    beforeEach(async () => {
      await store.initialize();
    });

    it("creates the schema", () => {
      const tables = store.getTableNames();
      for (const table of [
        "decisions",
        "decision_tags",
        "decision_reasons",
        "decision_bridge",
        "decision_deliberation",
        "decisions_fts",
      ]) {
        expect(tables).toContain(table);
      }
    });

    it("uses write-ahead logging", () => {
      expect(store.getJournalMode()).toBe("wal");
    });

    it("keeps data across reopen", async () => {
      await store.save("abc12345", makeInput());
      await store.close();

      store = new SqliteDecisionStore(dbPath, silentLogger);
      await store.initialize();
      expect((await store.get("abc12345"))?.tags).toEqual(["database", "persistence"]);
    });
  });

  describe("delete", () => {
    beforeEach(async () => {
      await store.initialize();
      await store.save(
        "abc12345",
        makeInput({
          bridge: { structure: "queue", enforcement: ["lint rule"] },
          deliberation: {
            inputs: [{ id: "q1", text: "Similar past decision" }],
            steps: [{ step: 1, thought: "Looks the same" }],
          },
        })
      );
    });

    it("cascades to every child table", async () => {
      expect(childRowCounts("abc12345")).toEqual({
        decision_tags: 2,
        decision_reasons: 1,
        decision_bridge: 1,
        decision_deliberation: 1,
      });

      expect(await store.delete("abc12345")).toBe(true);

      expect(await store.get("abc12345")).toBeNull();
      expect(childRowCounts("abc12345")).toEqual({
        decision_tags: 0,
        decision_reasons: 0,
        decision_bridge: 0,
        decision_deliberation: 0,
      });
    });

    it("drops the decision from search", async () => {
      await store.delete("abc12345");
      expect((await store.list({ search: "PostgreSQL" })).total).toBe(0);
    });
  });

  describe("search", () => {
    beforeEach(async () => {
      await store.initialize();
      await store.save("abc12345", makeInput());
    });

    it("ignores query syntax in the input", async () => {
      expect((await store.list({ search: "postgresql*" })).total).toBe(1);
      expect((await store.list({ search: '"backend" OR nothing' })).total).toBe(0);
      expect((await store.list({ search: "()" })).total).toBe(0);
    });

    it("requires every word", async () => {
      expect((await store.list({ search: "database backend" })).total).toBe(1);
      expect((await store.list({ search: "database frontend" })).total).toBe(0);
    });

    it("follows updates to the text", async () => {
      await store.updateFields("abc12345", { decision: "Use CockroachDB for persistence" });

      expect((await store.list({ search: "cockroachdb" })).total).toBe(1);
      expect((await store.list({ search: "postgresql" })).total).toBe(0);
    });
  });

  describe("list", () => {
    it("returns a page with more decisions than one statement takes parameters", async () => {
      await store.initialize();
      const bulk = 33_000;
      const db = new Database(dbPath);
      try {
        const insert = db.prepare(
          "INSERT INTO decisions (id, decision, created_at, updated_at) VALUES (?, ?, ?, ?)"
        );
        const tag = db.prepare("INSERT INTO decision_tags (decision_id, tag) VALUES (?, ?)");
        db.transaction(() => {
          for (let i = 0; i < bulk; i++) {
            const id = `bulk${String(i).padStart(5, "0")}`;
            insert.run(id, "Batch import", "2026-03-01T09:00:00.000Z", "2026-03-01T09:00:00.000Z");
            tag.run(id, "bulk");
          }
        })();
      } finally {
        db.close();
      }

      const result = await store.list({ limit: bulk, sort: "id", order: "asc" });

      expect(result.total).toBe(bulk);
      expect(result.decisions).toHaveLength(bulk);
      expect(result.decisions[bulk - 1]).toMatchObject({ id: "bulk32999", tags: ["bulk"] });
      expect(result.decisions.filter((d) => d.tags.length !== 1)).toEqual([]);
    }, 30_000);
  });

  describe("updateFields", () => {
    it("replaces only the child collections it is given", async () => {
      await store.initialize();
      await store.save("abc12345", makeInput());

      await store.updateFields("abc12345", { tags: ["ci"] });

      expect(childRowCounts("abc12345")).toEqual({
        decision_tags: 1,
        decision_reasons: 1,
        decision_bridge: 0,
        decision_deliberation: 0,
      });
    });
  });
});
