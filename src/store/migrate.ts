import fs from "node:fs/promises";
import { logger, type Logger } from "../logger.js";
import type { DecisionStore } from "./decision-store.js";
import { walkDecisionFiles } from "./file-store.js";
import { parseDecision } from "./parser.js";
import type { Decision } from "./types.js";

export interface MigrationOptions {
  decisionsDir: string;
  log?: Logger;
}

export interface MigrationResult {
  imported: number;
  /** Files with an empty front matter. */
  skipped: number;
  /** Unparsable files plus failed saves. */
  errors: number;
  /** Every file that matched the decision filename pattern. */
  total: number;
  /** False when nothing was attempted. */
  ran: boolean;
}

function emptyResult(ran: boolean): MigrationResult {
  return { imported: 0, skipped: 0, errors: 0, total: 0, ran };
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return false;
    }
    throw err;
  }
}

/**
 * Copies every decision file under `decisionsDir` into `store`. Saves are
 * upserts, so running it again converges on the same contents. A bad file
 * is counted and skipped; the run always finishes.
 */
export async function migrateFilesToStore(
  store: DecisionStore,
  { decisionsDir, log = logger }: MigrationOptions
): Promise<MigrationResult> {
  const migrationLog = log.child({ component: "migrate" });

  if (!(await isDirectory(decisionsDir))) {
    migrationLog.warn({ decisionsDir }, "Decisions directory not found, nothing to migrate");
    return emptyResult(false);
  }

  const result = emptyResult(true);
  for await (const filePath of walkDecisionFiles(decisionsDir)) {
    result.total++;

    let decision: Decision | null;
    try {
      decision = parseDecision(await fs.readFile(filePath, "utf-8"), filePath);
    } catch (err) {
      result.errors++;
      migrationLog.warn({ err, file: filePath }, "Skipping unparsable decision file");
      continue;
    }

    if (!decision) {
      result.skipped++;
      continue;
    }

    const { id, updatedAt: _updatedAt, ...input } = decision;
    if (await store.save(id, input)) {
      result.imported++;
    } else {
      result.errors++;
    }
  }

  migrationLog.info({ decisionsDir, ...result }, "Decision migration finished");
  return result;
}

/**
 * Runs the migration only when `store` holds no decisions yet, so it can be
 * called on every startup without overwriting later edits.
 */
export async function autoMigrateIfEmpty(
  store: DecisionStore,
  options: MigrationOptions
): Promise<MigrationResult> {
  const existing = await store.count();
  if (existing > 0) {
    (options.log ?? logger)
      .child({ component: "migrate" })
      .debug({ existing }, "Store already populated, skipping migration");
    return emptyResult(false);
  }
  return migrateFilesToStore(store, options);
}
