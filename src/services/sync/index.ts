// Sync Services - Re-exports
export { AbstractIndex } from "./abstract-index.js";
export type { PersistedEntry, PersistedIndex } from "./abstract-index.js";
export { SyncEngine } from "./engine.js";
export type { SyncEngineOptions } from "./engine.js";
export { RunController, computeTotals } from "./run.js";
export type {
  AgencyOutcome,
  RunConfig,
  RunOptions,
  RunReport,
  RunTotals,
} from "./run.js";
export {
  documentFileName,
  documentKey,
  indexKey,
  sanitizeFileName,
  truncateTitle,
} from "./storage-keys.js";
