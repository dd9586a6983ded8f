import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs/promises";
import path from "node:path";
import type { StoreConfig } from "../config.js";
import { makeInput, makeTempDir, silentLogger } from "../test-support/fixtures.js";
import { DecisionStoreProvider, createDecisionStore } from "./factory.js";
import { FileDecisionStore } from "./file-store.js";
import { MemoryDecisionStore } from "./memory-store.js";
import { SqliteDecisionStore } from "./sqlite-store.js";

let tmpDir: string;
let config: StoreConfig;

beforeEach(async () => {
  tmpDir = await makeTempDir("decision-vault-factory-");
  config = {
    backend: "memory",
    decisionsPath: path.join(tmpDir, "decisions"),
    dbPath: path.join(tmpDir, "decisions.db"),
  };
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe("createDecisionStore", () => {
  it("builds the configured backend", () => {
    expect(createDecisionStore({ ...config, backend: "memory" })).toBeInstanceOf(MemoryDecisionStore);
    expect(createDecisionStore({ ...config, backend: "file" })).toBeInstanceOf(FileDecisionStore);
    expect(createDecisionStore({ ...config, backend: "sqlite" })).toBeInstanceOf(SqliteDecisionStore);
  });
});

describe("DecisionStoreProvider", () => {
  it("constructs one instance and reuses it", () => {
    const provider = new DecisionStoreProvider({ config, log: silentLogger });
    expect(provider.get()).toBe(provider.get());
  });

  it("warns when the store is used before initialization", () => {
    const warn = vi.spyOn(silentLogger, "warn");
    const provider = new DecisionStoreProvider({ config, log: silentLogger });

    provider.get();
    expect(warn).toHaveBeenCalledTimes(1);

    provider.markInitialized();
    provider.get();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(provider.isInitialized).toBe(true);
  });

  it("lets tests swap the instance and reset", () => {
    const provider = new DecisionStoreProvider({ config, log: silentLogger });
    const injected = new MemoryDecisionStore();

    provider.override(injected);
    expect(provider.isInitialized).toBe(true);
    expect(provider.get()).toBe(injected);

    provider.override(null);
    expect(provider.isInitialized).toBe(false);
    const rebuilt = provider.get();
    expect(rebuilt).not.toBe(injected);
    expect(rebuilt.backend).toBe("memory");
  });

  it("opens a SQLite store and imports the file tree into it", async () => {
    const files = new FileDecisionStore(config.decisionsPath, silentLogger);
    await files.initialize();
    await files.save("seed0001", makeInput());

    const provider = new DecisionStoreProvider({
      config: { ...config, backend: "sqlite" },
      log: silentLogger,
    });
    const store = await provider.open();

    try {
      expect(provider.isInitialized).toBe(true);
      expect(store.backend).toBe("sqlite");
      expect(await store.count()).toBe(1);
      expect((await store.get("seed0001"))?.decision).toBe("Use PostgreSQL for persistence");
    } finally {
      await store.close();
    }
  });
});
