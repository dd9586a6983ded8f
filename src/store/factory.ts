import { loadConfig, type StoreConfig } from "../config.js";
import { ConfigError } from "../errors.js";
import { logger, setLogLevel, type Logger } from "../logger.js";
import type { DecisionStore } from "./decision-store.js";
import { FileDecisionStore } from "./file-store.js";
import { MemoryDecisionStore } from "./memory-store.js";
import { autoMigrateIfEmpty } from "./migrate.js";
import { SqliteDecisionStore } from "./sqlite-store.js";

export function createDecisionStore(
  config: StoreConfig,
  log: Logger = logger
): DecisionStore {
  switch (config.backend) {
    case "memory":
      return new MemoryDecisionStore();
    case "file":
      return new FileDecisionStore(config.decisionsPath, log);
    case "sqlite":
      return new SqliteDecisionStore(config.dbPath, log);
    default: {
      const backend: never = config.backend;
      throw new ConfigError(`Unknown storage backend: "${String(backend)}"`);
    }
  }
}

export interface ProviderOptions {
  /** Read from the environment on first use when omitted. */
  config?: StoreConfig;
  log?: Logger;
}

/**
 * Holds the one store instance of a process. Construction is lazy;
 * initialization belongs to whoever owns startup (see `open`).
 */
export class DecisionStoreProvider {
  private store: DecisionStore | null = null;
  private config: StoreConfig | undefined;
  private initialized = false;
  private readonly log: Logger;

  constructor(options: ProviderOptions = {}) {
    this.config = options.config;
    this.log = options.log ?? logger;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get(): DecisionStore {
    const store = this.instance();
    if (!this.initialized) {
      this.log.warn(
        { backend: store.backend },
        "Decision store used before initialization"
      );
    }
    return store;
  }

  markInitialized(): void {
    this.initialized = true;
  }

  /** Swaps in a store (treated as initialized); `null` resets the provider. */
  override(store: DecisionStore | null): void {
    this.store = store;
    this.initialized = store !== null;
  }

  /**
   * Startup routine: construct, initialize, import the file tree into an
   * empty SQLite store, then mark the provider initialized.
   */
  async open(): Promise<DecisionStore> {
    const { logLevel } = this.resolveConfig();
    if (logLevel) setLogLevel(logLevel);
    const store = this.instance();
    await store.initialize();

    if (store.backend === "sqlite") {
      await autoMigrateIfEmpty(store, {
        decisionsDir: this.resolveConfig().decisionsPath,
        log: this.log,
      });
    }

    this.markInitialized();
    this.log.info({ backend: store.backend }, "Decision store ready");
    return store;
  }

  private resolveConfig(): StoreConfig {
    this.config ??= loadConfig();
    return this.config;
  }

  private instance(): DecisionStore {
    this.store ??= createDecisionStore(this.resolveConfig(), this.log);
    return this.store;
  }
}

export const defaultProvider = new DecisionStoreProvider();

export function getDecisionStore(): DecisionStore {
  return defaultProvider.get();
}

export function markInitialized(): void {
  defaultProvider.markInitialized();
}

export function setDecisionStore(store: DecisionStore | null): void {
  defaultProvider.override(store);
}

export function openDecisionStore(): Promise<DecisionStore> {
  return defaultProvider.open();
}
