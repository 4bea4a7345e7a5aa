/**
 * Sync Engine - reconcile one agency's notice stream with the abstract index
 *
 * Pages are read newest first. Each unseen notice has its PDF written to the
 * document store and then gets an index entry; a notice never produces an
 * index entry unless its document is in the store.
 *
 * Incremental mode stops at the first notice that is already indexed: the
 * index and the remote stream are both newest first, so everything older has
 * been seen. Full mode walks the whole stream and skips indexed notices
 * without fetching them again.
 */

import { ConfigurationError, isSyncError, describeError } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { documentKey } from "./storage-keys.js";

import type { AbstractIndex } from "./abstract-index.js";
import type {
  AgencySummary,
  DocumentStore,
  Notice,
  NoticeSource,
  SyncEvent,
  SyncEventListener,
  SyncMode,
} from "../../types/sync.js";

// ============================================================================
// Types
// ============================================================================

export interface SyncEngineOptions {
  source: NoticeSource;
  store: DocumentStore;
  index: AbstractIndex;
  parentFolder: string;
  /** Agencies allowed to sync */
  agencies: readonly string[];
}

type NoticeOutcome = "stored" | "recovered" | "failed";

// ============================================================================
// Sync Engine
// ============================================================================

export class SyncEngine {
  private readonly source: NoticeSource;
  private readonly store: DocumentStore;
  private readonly index: AbstractIndex;
  private readonly parentFolder: string;
  private readonly agencies: ReadonlySet<string>;
  private onEvent?: SyncEventListener;

  constructor(options: SyncEngineOptions) {
    this.source = options.source;
    this.store = options.store;
    this.index = options.index;
    this.parentFolder = options.parentFolder;
    this.agencies = new Set(options.agencies);
  }

  setEventListener(listener: SyncEventListener | undefined): void {
    this.onEvent = listener;
  }

  private emit(event: SyncEvent): void {
    this.onEvent?.(event);
  }

  /**
   * Sync a single agency.
   *
   * Throws ConfigurationError for an agency outside the configured list, and
   * propagates listing failures. Per-notice failures are counted in the
   * summary instead.
   */
  async syncAgency(agency: string, mode: SyncMode): Promise<AgencySummary> {
    if (!this.agencies.has(agency)) {
      throw new ConfigurationError(`Agency '${agency}' is not configured`, {
        agency,
      });
    }

    const startTime = performance.now();
    const summary: AgencySummary = {
      agency,
      mode,
      processed: 0,
      recovered: 0,
      skipped: 0,
      failed: 0,
      pages: 0,
      stoppedEarly: false,
      elapsedMs: 0,
      failures: [],
    };

    // Notices indexed during this traversal. The register's pages can shift
    // while we read them, so one of these may show up again on the next page;
    // it must not be mistaken for the incremental stop marker.
    const recordedThisRun = new Set<string>();
    // Last notice of the stream that is in the index; new notices are placed
    // behind it
    let anchor: string | undefined;

    syncLogger.info(
      { agency, mode, indexed: this.index.size(agency) },
      "Starting agency sync"
    );

    let page = 1;
    let hasMore = true;

    traversal: while (hasMore) {
      const result = await this.source.listNotices(agency, page);
      summary.pages += 1;
      this.emit({ type: "page", agency, page, count: result.notices.length });

      if (result.notices.length === 0) {
        break;
      }

      for (const notice of result.notices) {
        if (this.index.contains(agency, notice.documentNumber)) {
          if (recordedThisRun.has(notice.documentNumber)) {
            anchor = notice.documentNumber;
            summary.skipped += 1;
            this.emit({
              type: "skipped",
              agency,
              documentNumber: notice.documentNumber,
            });
            continue;
          }

          if (mode === "incremental") {
            summary.stoppedEarly = true;
            syncLogger.info(
              { agency, documentNumber: notice.documentNumber, page },
              "Reached already indexed notice, stopping"
            );
            this.emit({
              type: "stopped",
              agency,
              documentNumber: notice.documentNumber,
            });
            break traversal;
          }

          anchor = notice.documentNumber;
          summary.skipped += 1;
          this.emit({
            type: "skipped",
            agency,
            documentNumber: notice.documentNumber,
          });
          continue;
        }

        const outcome = await this.archiveNotice(
          agency,
          notice,
          summary,
          anchor
        );
        if (outcome === "failed") {
          continue;
        }
        if (outcome === "stored") {
          summary.processed += 1;
        } else {
          summary.recovered += 1;
        }
        recordedThisRun.add(notice.documentNumber);
        anchor = notice.documentNumber;
      }

      hasMore = result.hasMore;
      page += 1;
    }

    summary.elapsedMs = Math.round(performance.now() - startTime);

    syncLogger.info(
      {
        agency,
        mode,
        processed: summary.processed,
        recovered: summary.recovered,
        skipped: summary.skipped,
        failed: summary.failed,
        pages: summary.pages,
        stoppedEarly: summary.stoppedEarly,
        elapsedMs: summary.elapsedMs,
      },
      "Agency sync finished"
    );

    return summary;
  }

  /**
   * Store one unseen notice and index it behind `after`.
   *
   * An object already at the notice's key means an earlier run wrote the
   * document but stopped before persisting the index; it is indexed as is.
   */
  private async archiveNotice(
    agency: string,
    notice: Notice,
    summary: AgencySummary,
    after: string | undefined
  ): Promise<NoticeOutcome> {
    const { documentNumber } = notice;
    const key = documentKey(
      this.parentFolder,
      notice.folder,
      documentNumber,
      notice.title
    );

    try {
      if (await this.store.exists(key)) {
        this.recordNotice(agency, notice, key, after);
        syncLogger.info(
          { agency, documentNumber, key },
          "Document already in store, indexed without download"
        );
        this.emit({ type: "recovered", agency, documentNumber, key });
        return "recovered";
      }

      if (notice.documentUrl === null) {
        this.fail(summary, agency, notice, "Notice has no document URL");
        return "failed";
      }

      const bytes = await this.source.fetchDocument(notice.documentUrl);
      await this.store.put(key, bytes, "application/pdf");
    } catch (error) {
      if (!isSyncError(error)) {
        throw error;
      }
      this.fail(summary, agency, notice, describeError(error));
      return "failed";
    }

    this.recordNotice(agency, notice, key, after);
    syncLogger.debug({ agency, documentNumber, key }, "Document archived");
    this.emit({ type: "stored", agency, documentNumber, key });
    return "stored";
  }

  private recordNotice(
    agency: string,
    notice: Notice,
    storageKey: string,
    after: string | undefined
  ): void {
    this.index.record(
      agency,
      {
        documentNumber: notice.documentNumber,
        title: notice.title,
        publicationDate: notice.publicationDate,
        abstract: notice.abstract,
        storageKey,
      },
      after
    );
  }

  private fail(
    summary: AgencySummary,
    agency: string,
    notice: Notice,
    reason: string
  ): void {
    summary.failed += 1;
    summary.failures.push({ documentNumber: notice.documentNumber, reason });
    syncLogger.warn(
      { agency, documentNumber: notice.documentNumber, reason },
      "Failed to archive notice"
    );
    this.emit({
      type: "failed",
      agency,
      documentNumber: notice.documentNumber,
      reason,
    });
  }
}
