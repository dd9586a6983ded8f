import { Command, InvalidArgumentError, Option } from "commander";
import { loadConfig, parseBackend, type StoreConfig } from "./config.js";
import { setLogLevel } from "./logger.js";
import type { DecisionStore } from "./store/decision-store.js";
import { createDecisionStore } from "./store/factory.js";
import { autoMigrateIfEmpty, migrateFilesToStore } from "./store/migrate.js";
import { SqliteDecisionStore } from "./store/sqlite-store.js";
import type { Decision, SortOrder, StatsResult } from "./store/types.js";

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  setExitCode: (code: number) => void;
  env: Record<string, string | undefined>;
}

const processIO: CliIO = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  env: process.env,
};

interface StoreOptions {
  backend?: string;
  decisionsDir?: string;
  dbPath?: string;
}

interface ListOptions extends StoreOptions {
  category?: string;
  stakes?: string;
  status?: string;
  agent?: string;
  project?: string;
  feature?: string;
  tags?: string;
  search?: string;
  from?: string;
  to?: string;
  limit?: number;
  offset?: number;
  sort?: string;
  order?: SortOrder;
  json?: boolean;
}

interface StatsOptions extends StoreOptions {
  from?: string;
  to?: string;
  project?: string;
  json?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  return items.length > 0 ? items : undefined;
}

function withStoreOptions(command: Command): Command {
  return command
    .option("--backend <type>", "Storage backend (memory, file, sqlite)")
    .option("--decisions-dir <dir>", "Root of the decision file tree")
    .option("--db-path <path>", "SQLite database file");
}

function resolveConfig(io: CliIO, opts: StoreOptions): StoreConfig {
  const config = loadConfig(io.env);
  // Before any store exists, since child loggers copy the level when created.
  if (config.logLevel) setLogLevel(config.logLevel);
  return {
    ...config,
    backend: opts.backend ? parseBackend(opts.backend) : config.backend,
    decisionsPath: opts.decisionsDir ?? config.decisionsPath,
    dbPath: opts.dbPath ?? config.dbPath,
  };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function withStore(
  io: CliIO,
  opts: StoreOptions,
  work: (store: DecisionStore) => Promise<void>
): Promise<void> {
  let store: DecisionStore;
  try {
    store = createDecisionStore(resolveConfig(io, opts));
    await store.initialize();
  } catch (err) {
    io.stderr(`Error: ${describeError(err)}`);
    io.setExitCode(1);
    return;
  }

  try {
    await work(store);
  } finally {
    await store.close();
  }
}

function formatDecision(d: Decision): string[] {
  const lines = [
    `${d.decision} (${d.id})`,
    `  Status: ${d.status}${d.outcome ? ` (${d.outcome})` : ""}`,
    `  Category: ${d.category || "unknown"}`,
    `  Stakes: ${d.stakes}`,
    `  Confidence: ${d.confidence}`,
    `  Created: ${d.createdAt}`,
  ];
  if (d.recordedBy) lines.push(`  Recorded by: ${d.recordedBy}`);
  if (d.project) lines.push(`  Project: ${d.project}`);
  if (d.tags.length > 0) lines.push(`  Tags: ${d.tags.join(", ")}`);
  for (const r of d.reasons) {
    lines.push(`  Reason [${r.type}, ${r.strength}]: ${r.text}`);
  }
  if (d.context) lines.push("", d.context);
  if (d.actualResult) lines.push("", `Result: ${d.actualResult}`);
  if (d.lessons) lines.push(`Lessons: ${d.lessons}`);
  return lines;
}

function formatCounts(label: string, counts: Record<string, number>): string[] {
  const entries = Object.entries(counts).sort(
    ([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)
  );
  if (entries.length === 0) return [];
  return [`${label}:`, ...entries.map(([key, n]) => `  ${key}: ${n}`)];
}

function formatStats(stats: StatsResult): string[] {
  const { last24h, last7d, last30d } = stats.recentActivity;
  return [
    `Total decisions: ${stats.total}`,
    `Recent: ${last24h} (24h), ${last7d} (7d), ${last30d} (30d)`,
    ...formatCounts("By category", stats.byCategory),
    ...formatCounts("By stakes", stats.byStakes),
    ...formatCounts("By status", stats.byStatus),
    ...formatCounts("By agent", stats.byAgent),
    ...(stats.topTags.length > 0
      ? ["Top tags:", ...stats.topTags.map((t) => `  ${t.tag}: ${t.count}`)]
      : []),
  ];
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name("decision-vault")
    .description("Store, query and migrate recorded decisions")
    .version("0.1.0");

  program
    .command("migrate")
    .description("Import the decision file tree into a SQLite database")
    .option("--decisions-dir <dir>", "Root of the decision file tree")
    .option("--db-path <path>", "SQLite database file")
    .option("--force", "Import even if the database already holds decisions")
    .action(async (opts: Omit<StoreOptions, "backend"> & { force?: boolean }) => {
      let config: StoreConfig;
      try {
        config = resolveConfig(io, opts);
      } catch (err) {
        io.stderr(`Error: ${describeError(err)}`);
        io.setExitCode(1);
        return;
      }

      const store = new SqliteDecisionStore(config.dbPath);
      try {
        await store.initialize();
      } catch (err) {
        io.stderr(`Error: cannot open ${config.dbPath}: ${describeError(err)}`);
        io.setExitCode(1);
        return;
      }

      try {
        const migrate = opts.force ? migrateFilesToStore : autoMigrateIfEmpty;
        const result = await migrate(store, { decisionsDir: config.decisionsPath });
        io.stdout(`Done. ${result.imported} decisions imported.`);
        if (result.errors > 0) {
          io.stdout(`${result.errors} file(s) could not be imported.`);
        }
      } finally {
        await store.close();
      }
    });

  withStoreOptions(
    program
      .command("list")
      .description("List decisions")
      .option("--category <category>", "Filter by category")
      .option("--stakes <stakes>", "Filter by stakes")
      .option("--status <status>", "Filter by status (pending, reviewed)")
      .option("--agent <agent>", "Filter by recording agent")
      .option("--project <project>", "Filter by project")
      .option("--feature <feature>", "Filter by feature")
      .option("-t, --tags <tags>", "Any of these tags (comma-separated)")
      .option("--search <text>", "Free-text search")
      .option("--from <date>", "Created on or after")
      .option("--to <date>", "Created on or before (a bare date covers the day)")
      .option("--limit <n>", "Page size", parseInteger)
      .option("--offset <n>", "Page start", parseInteger)
      .option("--sort <field>", "Sort field")
      .addOption(new Option("--order <order>", "Sort order").choices(["asc", "desc"]))
      .option("--json", "Output as JSON")
  ).action(async (opts: ListOptions) => {
    await withStore(io, opts, async (store) => {
      const result = await store.list({
        category: opts.category,
        stakes: opts.stakes,
        status: opts.status,
        agent: opts.agent,
        project: opts.project,
        feature: opts.feature,
        tags: splitList(opts.tags),
        search: opts.search,
        dateFrom: opts.from,
        dateTo: opts.to,
        limit: opts.limit,
        offset: opts.offset,
        sort: opts.sort,
        order: opts.order,
      });

      if (opts.json) {
        io.stdout(JSON.stringify(result, null, 2));
        return;
      }

      if (result.decisions.length === 0) {
        io.stdout("No decisions found.");
        return;
      }

      io.stdout(`${result.decisions.length} of ${result.total} decision(s):`);
      for (const d of result.decisions) {
        io.stdout(`  [${d.status.toUpperCase()}] ${d.decision} (${d.id})`);
        if (d.tags.length > 0) io.stdout(`    ${d.tags.join(", ")}`);
      }
    });
  });

  withStoreOptions(
    program
      .command("show <id>")
      .description("Show one decision")
      .option("--json", "Output as JSON")
  ).action(async (id: string, opts: StoreOptions & { json?: boolean }) => {
    await withStore(io, opts, async (store) => {
      const decision = await store.get(id);
      if (!decision) {
        io.stderr(`Decision ${id} not found.`);
        io.setExitCode(1);
        return;
      }

      if (opts.json) {
        io.stdout(JSON.stringify(decision, null, 2));
        return;
      }
      for (const line of formatDecision(decision)) io.stdout(line);
    });
  });

  withStoreOptions(
    program
      .command("stats")
      .description("Aggregate counts over stored decisions")
      .option("--from <date>", "Created on or after")
      .option("--to <date>", "Created on or before")
      .option("--project <project>", "Only this project")
      .option("--json", "Output as JSON")
  ).action(async (opts: StatsOptions) => {
    await withStore(io, opts, async (store) => {
      const stats = await store.stats({
        dateFrom: opts.from,
        dateTo: opts.to,
        project: opts.project,
      });

      if (opts.json) {
        io.stdout(JSON.stringify(stats, null, 2));
        return;
      }
      for (const line of formatStats(stats)) io.stdout(line);
    });
  });

  return program;
}
