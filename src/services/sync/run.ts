/**
 * Run Controller
 *
 * One batch run: load the abstract index, sync every selected agency in
 * configured order, checkpoint the index, and work out the exit status.
 */

import { ConfigurationError, describeError } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { AbstractIndex } from "./abstract-index.js";
import { SyncEngine } from "./engine.js";
import { indexKey } from "./storage-keys.js";

import type { AppConfig, CheckpointPolicy } from "../../config.js";
import type {
  AgencySummary,
  DocumentStore,
  NoticeSource,
  SyncEventListener,
  SyncMode,
} from "../../types/sync.js";

// ============================================================================
// Types
// ============================================================================

export type RunConfig = Pick<AppConfig, "parentFolder" | "agencies"> & {
  checkpoint?: CheckpointPolicy;
};

export interface RunOptions {
  mode: SyncMode;
  /** Subset of configured agencies; defaults to all of them */
  agencies?: string[];
  onEvent?: SyncEventListener;
  onAgencyStart?: (agency: string, position: number, total: number) => void;
}

export type AgencyOutcome =
  | { agency: string; status: "completed"; summary: AgencySummary }
  | { agency: string; status: "failed"; error: string; errorCode?: string };

export interface RunTotals {
  processed: number;
  recovered: number;
  skipped: number;
  failed: number;
  failedAgencies: number;
}

export interface RunReport {
  mode: SyncMode;
  startedAt: Date;
  durationMs: number;
  agencies: AgencyOutcome[];
  totals: RunTotals;
  indexPersisted: boolean;
  /** Set when the run could not start or could not save the index */
  fatalError?: string;
  exitCode: 0 | 1;
}

// ============================================================================
// Helpers
// ============================================================================

export function computeTotals(outcomes: AgencyOutcome[]): RunTotals {
  const totals: RunTotals = {
    processed: 0,
    recovered: 0,
    skipped: 0,
    failed: 0,
    failedAgencies: 0,
  };

  for (const outcome of outcomes) {
    if (outcome.status === "failed") {
      totals.failedAgencies += 1;
      continue;
    }
    totals.processed += outcome.summary.processed;
    totals.recovered += outcome.summary.recovered;
    totals.skipped += outcome.summary.skipped;
    totals.failed += outcome.summary.failed;
  }

  return totals;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

// ============================================================================
// Run Controller
// ============================================================================

export class RunController {
  constructor(
    private readonly config: RunConfig,
    private readonly source: NoticeSource,
    private readonly store: DocumentStore
  ) {}

  async run(options: RunOptions): Promise<RunReport> {
    const startedAt = new Date();
    const startTime = performance.now();
    const checkpoint = this.config.checkpoint ?? "agency";
    const key = indexKey(this.config.parentFolder);

    const finish = (
      outcomes: AgencyOutcome[],
      indexPersisted: boolean,
      fatalError?: string
    ): RunReport => {
      const totals = computeTotals(outcomes);
      const exitCode =
        fatalError !== undefined || totals.failedAgencies > 0 ? 1 : 0;
      const report: RunReport = {
        mode: options.mode,
        startedAt,
        durationMs: Math.round(performance.now() - startTime),
        agencies: outcomes,
        totals,
        indexPersisted,
        fatalError,
        exitCode,
      };
      syncLogger.info(
        {
          mode: report.mode,
          durationMs: report.durationMs,
          ...totals,
          indexPersisted,
          exitCode,
        },
        "Sync run finished"
      );
      return report;
    };

    syncLogger.info(
      { mode: options.mode, agencies: options.agencies ?? this.config.agencies },
      "Sync run started"
    );

    let index: AbstractIndex;
    try {
      index = await AbstractIndex.load(this.store, key, this.config.agencies);
    } catch (error) {
      syncLogger.fatal(
        { key, error: describeError(error) },
        "Cannot load abstract index, aborting run"
      );
      return finish([], false, describeError(error));
    }

    const engine = new SyncEngine({
      source: this.source,
      store: this.store,
      index,
      parentFolder: this.config.parentFolder,
      agencies: this.config.agencies,
    });
    engine.setEventListener(options.onEvent);

    const selected = options.agencies ?? this.config.agencies;
    const outcomes: AgencyOutcome[] = [];

    for (const [position, agency] of selected.entries()) {
      options.onAgencyStart?.(agency, position + 1, selected.length);

      try {
        const summary = await engine.syncAgency(agency, options.mode);
        outcomes.push({ agency, status: "completed", summary });
      } catch (error) {
        const message = describeError(error);
        const level = error instanceof ConfigurationError ? "warn" : "error";
        syncLogger[level]({ agency, error: message }, "Agency sync failed");
        outcomes.push({
          agency,
          status: "failed",
          error: message,
          errorCode: errorCode(error),
        });
      }

      if (checkpoint === "agency" && index.isDirty) {
        try {
          await index.persist();
        } catch (error) {
          // The final persist below tries again
          syncLogger.error(
            { agency, error: describeError(error) },
            "Index checkpoint failed"
          );
        }
      }
    }

    if (!index.isDirty) {
      syncLogger.info({ key }, "Abstract index unchanged, nothing to persist");
      return finish(outcomes, true);
    }

    try {
      await index.persist();
    } catch (error) {
      syncLogger.fatal(
        { key, error: describeError(error) },
        "Failed to persist abstract index"
      );
      return finish(outcomes, false, describeError(error));
    }

    return finish(outcomes, true);
  }
}
