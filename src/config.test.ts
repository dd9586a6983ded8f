import { describe, it, expect } from "vitest";
import { loadConfig, parseBackend } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      backend: "file",
      decisionsPath: "decisions",
      dbPath: "data/decisions.db",
      logLevel: undefined,
    });
  });

  it("reads every variable", () => {
    expect(
      loadConfig({
        DECISION_STORE: "sqlite",
        DECISIONS_PATH: "/srv/decisions",
        DECISIONS_DB_PATH: "/srv/db/decisions.db",
        LOG_LEVEL: "debug",
      })
    ).toEqual({
      backend: "sqlite",
      decisionsPath: "/srv/decisions",
      dbPath: "/srv/db/decisions.db",
      logLevel: "debug",
    });
  });

  it("rejects an unknown backend", () => {
    expect(() => loadConfig({ DECISION_STORE: "redis" })).toThrow(
      'Unknown storage backend: "redis". Expected one of: memory, file, sqlite.'
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });

  it("rejects an empty path", () => {
    expect(() => loadConfig({ DECISIONS_PATH: "" })).toThrow(ConfigError);
  });
});

describe("parseBackend", () => {
  it("accepts the three backends", () => {
    expect(parseBackend("memory")).toBe("memory");
    expect(parseBackend("file")).toBe("file");
    expect(parseBackend("sqlite")).toBe("sqlite");
  });

  it("is case-sensitive", () => {
    expect(() => parseBackend("SQLite")).toThrow(ConfigError);
  });
});
