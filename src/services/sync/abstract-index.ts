/**
 * Abstract Index - durable record of archived notices per agency
 *
 * The index is a single JSON document in the object store mapping each agency
 * to its entries, newest first. It is loaded once per run, mutated in memory
 * and persisted at checkpoints. The newest entry of an agency doubles as its
 * watermark for incremental runs.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { CorruptIndexError, NotFoundError, describeError } from "../../errors.js";
import { syncLogger } from "../../logger.js";

import type { AbstractIndexEntry, DocumentStore } from "../../types/sync.js";

// ============================================================================
// Persisted Format
// ============================================================================

export const PersistedEntrySchema = Type.Object({
  document_number: Type.String({ minLength: 1 }),
  title: Type.String(),
  publication_date: Type.String(),
  abstract: Type.Union([Type.String(), Type.Null()]),
  storage_key: Type.String({ minLength: 1 }),
});

export const PersistedIndexSchema = Type.Record(
  Type.String(),
  Type.Array(PersistedEntrySchema)
);

export type PersistedEntry = Static<typeof PersistedEntrySchema>;
export type PersistedIndex = Static<typeof PersistedIndexSchema>;

const TEMP_SUFFIX = ".tmp";

function toPersisted(entry: AbstractIndexEntry): PersistedEntry {
  return {
    document_number: entry.documentNumber,
    title: entry.title,
    publication_date: entry.publicationDate,
    abstract: entry.abstract,
    storage_key: entry.storageKey,
  };
}

function fromPersisted(entry: PersistedEntry): AbstractIndexEntry {
  return {
    documentNumber: entry.document_number,
    title: entry.title,
    publicationDate: entry.publication_date,
    abstract: entry.abstract,
    storageKey: entry.storage_key,
  };
}

// ============================================================================
// Abstract Index
// ============================================================================

interface AgencyEntries {
  entries: AbstractIndexEntry[];
  documentNumbers: Set<string>;
  /** Recorded since this index was loaded */
  recorded: Set<string>;
}

function emptyEntries(): AgencyEntries {
  return { entries: [], documentNumbers: new Set(), recorded: new Set() };
}

function insertPosition(
  bucket: AgencyEntries,
  entry: AbstractIndexEntry,
  after: string | undefined
): number {
  if (after !== undefined) {
    const anchor = bucket.entries.findIndex((e) => e.documentNumber === after);
    const anchorEntry = bucket.entries[anchor];
    const next = bucket.entries[anchor + 1];
    if (
      anchorEntry !== undefined &&
      anchorEntry.publicationDate >= entry.publicationDate &&
      (next === undefined || next.publicationDate <= entry.publicationDate)
    ) {
      return anchor + 1;
    }
  }

  const position = bucket.entries.findIndex(
    (existing) =>
      existing.publicationDate < entry.publicationDate ||
      (existing.publicationDate === entry.publicationDate &&
        !bucket.recorded.has(existing.documentNumber))
  );
  return position === -1 ? bucket.entries.length : position;
}

export class AbstractIndex {
  private readonly byAgency = new Map<string, AgencyEntries>();
  private dirty = false;

  constructor(
    private readonly store: DocumentStore,
    readonly key: string
  ) {}

  /**
   * Load the index from the store.
   *
   * A missing blob yields an empty index for every configured agency. A blob
   * that cannot be parsed raises CorruptIndexError: starting from an empty
   * index would re-download every agency's history.
   */
  static async load(
    store: DocumentStore,
    key: string,
    agencies: readonly string[]
  ): Promise<AbstractIndex> {
    const index = new AbstractIndex(store, key);

    let bytes: Uint8Array | undefined;
    try {
      bytes = await store.get(key);
    } catch (error) {
      if (!(error instanceof NotFoundError)) {
        throw error;
      }
      syncLogger.info({ key }, "No abstract index found, starting empty");
    }

    if (bytes !== undefined) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(Buffer.from(bytes).toString("utf8"));
      } catch (error) {
        throw new CorruptIndexError(
          `Abstract index at ${key} is not valid JSON: ${describeError(error)}`,
          { key }
        );
      }
      index.restore(parsed);
    }

    for (const agency of agencies) {
      if (!index.byAgency.has(agency)) {
        index.byAgency.set(agency, emptyEntries());
        index.dirty = true;
      }
    }

    syncLogger.info(
      {
        key,
        agencies: index.byAgency.size,
        entries: index.totalSize(),
      },
      "Abstract index loaded"
    );

    return index;
  }

  /**
   * Build an in-memory index from the persisted format (no store reads).
   */
  static fromJSON(
    store: DocumentStore,
    key: string,
    data: unknown
  ): AbstractIndex {
    const index = new AbstractIndex(store, key);
    index.restore(data);
    return index;
  }

  private restore(data: unknown): void {
    if (Array.isArray(data)) {
      throw new CorruptIndexError(
        `Abstract index at ${this.key} is an array, expected an object keyed by agency`,
        { key: this.key }
      );
    }
    if (!Value.Check(PersistedIndexSchema, data)) {
      const first = Value.Errors(PersistedIndexSchema, data).First();
      throw new CorruptIndexError(
        `Abstract index at ${this.key} does not match the expected format${first !== undefined ? ` (${first.path}: ${first.message})` : ""}`,
        { key: this.key, path: first?.path }
      );
    }

    for (const [agency, persisted] of Object.entries(data)) {
      const documentNumbers = new Set<string>();
      for (const entry of persisted) {
        if (documentNumbers.has(entry.document_number)) {
          throw new CorruptIndexError(
            `Abstract index at ${this.key} lists ${entry.document_number} twice for ${agency}`,
            { key: this.key, agency, documentNumber: entry.document_number }
          );
        }
        documentNumbers.add(entry.document_number);
      }
      this.byAgency.set(agency, {
        entries: persisted.map(fromPersisted),
        documentNumbers,
        recorded: new Set(),
      });
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  contains(agency: string, documentNumber: string): boolean {
    return this.byAgency.get(agency)?.documentNumbers.has(documentNumber) ?? false;
  }

  entries(agency: string): readonly AbstractIndexEntry[] {
    return this.byAgency.get(agency)?.entries ?? [];
  }

  /**
   * Newest archived notice of an agency, if any
   */
  watermark(agency: string): AbstractIndexEntry | undefined {
    return this.byAgency.get(agency)?.entries[0];
  }

  agencies(): string[] {
    return [...this.byAgency.keys()];
  }

  size(agency: string): number {
    return this.byAgency.get(agency)?.entries.length ?? 0;
  }

  totalSize(): number {
    let total = 0;
    for (const { entries } of this.byAgency.values()) {
      total += entries.length;
    }
    return total;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * Add an entry, keeping the agency's list newest first.
   *
   * With `after`, the entry goes directly behind that indexed notice, which
   * keeps the register's own order for notices sharing a date. The anchor is
   * ignored when it is unknown or when placing the entry there would break
   * date order.
   *
   * Otherwise the entry goes in front of the first entry that is older, or
   * that has the same date and was loaded rather than recorded since: a
   * notice discovered now is newer than what earlier runs archived. Same-day
   * entries recorded since loading keep their recording order.
   *
   * Returns false (and changes nothing) when the document number is already
   * indexed.
   */
  record(agency: string, entry: AbstractIndexEntry, after?: string): boolean {
    let bucket = this.byAgency.get(agency);
    if (bucket === undefined) {
      bucket = emptyEntries();
      this.byAgency.set(agency, bucket);
    }

    if (bucket.documentNumbers.has(entry.documentNumber)) {
      return false;
    }

    bucket.entries.splice(insertPosition(bucket, entry, after), 0, { ...entry });
    bucket.documentNumbers.add(entry.documentNumber);
    bucket.recorded.add(entry.documentNumber);
    this.dirty = true;
    return true;
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  toJSON(): PersistedIndex {
    const data: PersistedIndex = {};
    for (const [agency, { entries }] of this.byAgency) {
      data[agency] = entries.map(toPersisted);
    }
    return data;
  }

  serialize(): Uint8Array {
    return Buffer.from(JSON.stringify(this.toJSON(), null, 2), "utf8");
  }

  /**
   * Write the index to the store.
   *
   * The blob is written to a temporary sibling key first and then copied over
   * the live key, so a reader sees either the previous or the new index.
   */
  async persist(): Promise<void> {
    const tempKey = `${this.key}${TEMP_SUFFIX}`;
    const bytes = this.serialize();

    await this.store.put(tempKey, bytes, "application/json");
    await this.store.copy(tempKey, this.key);

    try {
      await this.store.delete(tempKey);
    } catch (error) {
      syncLogger.warn(
        { key: tempKey, error: describeError(error) },
        "Could not remove temporary index object"
      );
    }

    this.dirty = false;
    syncLogger.info(
      { key: this.key, bytes: bytes.length, entries: this.totalSize() },
      "Abstract index persisted"
    );
  }
}
