import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import writeFileAtomic from "write-file-atomic";
import { logger, type Logger } from "../logger.js";
import type { DecisionStore } from "./decision-store.js";
import {
  dateParts,
  decisionFilePattern,
  decisionFilename,
  parseDecision,
  serializeDecision,
} from "./parser.js";
import {
  applyFieldUpdates,
  applyOutcome,
  buildDecision,
  nowIso,
  pickFieldUpdates,
} from "./records.js";
import {
  matchesCountFilters,
  runListQuery,
  runStatsQuery,
} from "./query-helpers.js";
import type {
  CountFilters,
  Decision,
  DecisionFieldUpdates,
  DecisionInput,
  ListQuery,
  ListResult,
  OutcomeUpdate,
  StatsQuery,
  StatsResult,
} from "./types.js";

interface StoredDecision {
  filePath: string;
  decision: Decision;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Yields every file under `dir` whose name matches `pattern`, depth first,
 * in name order. A missing directory yields nothing.
 */
export async function* walkDecisionFiles(
  dir: string,
  pattern: string = decisionFilePattern()
): AsyncGenerator<string> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissing(err)) return;
    throw err;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walkDecisionFiles(full, pattern);
    } else if (entry.isFile() && minimatch(entry.name, pattern)) {
      yield full;
    }
  }
}

/**
 * One Markdown file per decision under `<base>/<YYYY>/<MM>/`. There is no
 * index: by-id operations find the file by name, queries scan the whole tree.
 */
export class FileDecisionStore implements DecisionStore {
  readonly backend = "file" as const;
  private readonly base: string;
  private readonly log: Logger;

  constructor(basePath: string, log: Logger = logger) {
    this.base = basePath;
    this.log = log.child({ component: "file-store" });
  }

  get basePath(): string {
    return this.base;
  }

  async initialize(): Promise<void> {
    await fs.mkdir(this.base, { recursive: true });
  }

  async close(): Promise<void> {}

  /** Destination for a decision, from its own date or its creation time. */
  filePathFor(decision: Pick<Decision, "id" | "date" | "createdAt">): string {
    const { year, month, day } = dateParts(decision.date ?? decision.createdAt);
    return path.join(this.base, year, month, decisionFilename(decision.id, day));
  }

  async save(id: string, input: DecisionInput): Promise<boolean> {
    try {
      const existing = await this.findAll(id);
      const decision = buildDecision(id, input, nowIso(), existing[0]?.decision);
      const target = this.filePathFor(decision);

      await fs.mkdir(path.dirname(target), { recursive: true });
      await this.writeDecision(target, decision);

      // A changed date moves the file; drop the copies left at old paths.
      for (const stale of existing) {
        if (stale.filePath !== target) await fs.rm(stale.filePath, { force: true });
      }
      return true;
    } catch (err) {
      this.log.error({ err, id }, "Failed to write decision");
      return false;
    }
  }

  async get(id: string): Promise<Decision | null> {
    const found = await this.findAll(id);
    return found[0]?.decision ?? null;
  }

  async delete(id: string): Promise<boolean> {
    const found = await this.findAll(id);
    if (found.length === 0) return false;

    try {
      for (const { filePath } of found) await fs.rm(filePath);
      return true;
    } catch (err) {
      this.log.error({ err, id }, "Failed to delete decision");
      return false;
    }
  }

  async list(query: ListQuery = {}): Promise<ListResult> {
    return runListQuery(await this.loadAll(), query);
  }

  async stats(query: StatsQuery = {}): Promise<StatsResult> {
    return runStatsQuery(await this.loadAll(), query);
  }

  async updateOutcome(id: string, update: OutcomeUpdate): Promise<boolean> {
    const [found] = await this.findAll(id);
    if (!found) return false;

    return this.rewrite(found, applyOutcome(found.decision, update, nowIso()));
  }

  async updateFields(
    id: string,
    fields: DecisionFieldUpdates
  ): Promise<boolean> {
    const updates = pickFieldUpdates(fields);
    if (Object.keys(updates).length === 0) return false;

    const [found] = await this.findAll(id);
    if (!found) return false;

    return this.rewrite(
      found,
      applyFieldUpdates(found.decision, updates, nowIso())
    );
  }

  async count(filters: CountFilters = {}): Promise<number> {
    const decisions = await this.loadAll();
    return decisions.filter((d) => matchesCountFilters(d, filters)).length;
  }

  private async writeDecision(filePath: string, decision: Decision): Promise<void> {
    // Temp file in the same directory, fsync, rename; the temp file is
    // removed if any step fails.
    await writeFileAtomic(filePath, serializeDecision(decision), {
      encoding: "utf-8",
    });
  }

  private async rewrite(found: StoredDecision, next: Decision): Promise<boolean> {
    try {
      await this.writeDecision(found.filePath, next);
      return true;
    } catch (err) {
      this.log.error(
        { err, id: next.id, file: found.filePath },
        "Failed to update decision"
      );
      return false;
    }
  }

  private async readFile(filePath: string): Promise<Decision | null> {
    try {
      const content = await fs.readFile(filePath, "utf-8");
      return parseDecision(content, filePath);
    } catch (err) {
      this.log.warn({ err, file: filePath }, "Skipping unreadable decision file");
      return null;
    }
  }

  private async findAll(id: string): Promise<StoredDecision[]> {
    const found: StoredDecision[] = [];
    for await (const filePath of walkDecisionFiles(this.base, decisionFilePattern(id))) {
      const decision = await this.readFile(filePath);
      if (decision) found.push({ filePath, decision });
    }
    return found;
  }

  private async loadAll(): Promise<Decision[]> {
    const decisions: Decision[] = [];
    for await (const filePath of walkDecisionFiles(this.base)) {
      const decision = await this.readFile(filePath);
      if (decision) decisions.push(decision);
    }
    return decisions;
  }
}
