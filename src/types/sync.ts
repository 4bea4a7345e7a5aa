/**
 * Sync Domain Types
 *
 * Notices as the engine sees them, abstract index entries, and the two ports
 * (notice source, document store) the engine is written against.
 */

// ============================================================================
// Notices
// ============================================================================

export interface Notice {
  /** Agency identifier as written in configuration */
  agency: string;
  /** Storage folder: the register's short name for the agency, else its name */
  folder: string;
  documentNumber: string;
  title: string;
  /** ISO date (YYYY-MM-DD) */
  publicationDate: string;
  /** PDF locator; null when the register publishes no PDF */
  documentUrl: string | null;
  abstract: string | null;
}

export interface NoticePage {
  notices: Notice[];
  hasMore: boolean;
}

// ============================================================================
// Abstract Index
// ============================================================================

export interface AbstractIndexEntry {
  documentNumber: string;
  title: string;
  publicationDate: string;
  abstract: string | null;
  storageKey: string;
}

// ============================================================================
// Ports
// ============================================================================

/**
 * Register listing, newest-first within and across pages. Pages are 1-based.
 */
export interface NoticeSource {
  listNotices(agency: string, page: number): Promise<NoticePage>;
  /** Fails with NotFoundError or TransportError */
  fetchDocument(documentUrl: string): Promise<Uint8Array>;
}

/**
 * Binary blobs keyed by path.
 */
export interface DocumentStore {
  put(key: string, bytes: Uint8Array, contentType?: string): Promise<void>;
  /** Fails with NotFoundError when the key is absent */
  get(key: string): Promise<Uint8Array>;
  exists(key: string): Promise<boolean>;
  copy(sourceKey: string, targetKey: string): Promise<void>;
  delete(key: string): Promise<void>;
}

// ============================================================================
// Sync Results
// ============================================================================

export type SyncMode = "incremental" | "full";

export interface NoticeFailure {
  documentNumber: string;
  reason: string;
}

export interface AgencySummary {
  agency: string;
  mode: SyncMode;
  /** Documents fetched and written during this run */
  processed: number;
  /** Documents found already in the store and indexed without re-fetching */
  recovered: number;
  /** Known notices passed over (full mode, or repeated across pages) */
  skipped: number;
  failed: number;
  pages: number;
  stoppedEarly: boolean;
  elapsedMs: number;
  failures: NoticeFailure[];
}

export type SyncEvent =
  | { type: "page"; agency: string; page: number; count: number }
  | { type: "stored"; agency: string; documentNumber: string; key: string }
  | { type: "recovered"; agency: string; documentNumber: string; key: string }
  | { type: "skipped"; agency: string; documentNumber: string }
  | {
      type: "failed";
      agency: string;
      documentNumber: string;
      reason: string;
    }
  | { type: "stopped"; agency: string; documentNumber: string };

export type SyncEventListener = (event: SyncEvent) => void;
