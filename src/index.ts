export { loadConfig, parseBackend, STORE_BACKENDS, type StoreConfig } from "./config.js";
export {
  ConfigError,
  DecisionFileError,
  DecisionStoreError,
  StoreNotInitializedError,
} from "./errors.js";
export { LOG_LEVELS, logger, setLogLevel, type Logger, type LogLevel } from "./logger.js";
export type { DecisionStore, StoreBackend } from "./store/decision-store.js";
export {
  DecisionStoreProvider,
  createDecisionStore,
  defaultProvider,
  getDecisionStore,
  markInitialized,
  openDecisionStore,
  setDecisionStore,
  type ProviderOptions,
} from "./store/factory.js";
export { FileDecisionStore } from "./store/file-store.js";
export { MemoryDecisionStore } from "./store/memory-store.js";
export {
  autoMigrateIfEmpty,
  migrateFilesToStore,
  type MigrationOptions,
  type MigrationResult,
} from "./store/migrate.js";
export { parseDecision, serializeDecision } from "./store/parser.js";
export {
  applyFilters,
  computeStats,
  resolveListQuery,
  runListQuery,
  runStatsQuery,
  sortDecisions,
} from "./store/query-helpers.js";
export { SqliteDecisionStore } from "./store/sqlite-store.js";
export { sanitizeFtsQuery } from "./store/sqlite-schema.js";
export * from "./store/types.js";
