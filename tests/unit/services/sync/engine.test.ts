import { describe, it, expect, beforeEach } from "vitest";

import { ConfigurationError, TransportError } from "../../../../src/errors.js";
import { AbstractIndex } from "../../../../src/services/sync/abstract-index.js";
import { SyncEngine } from "../../../../src/services/sync/engine.js";
import { documentKey } from "../../../../src/services/sync/storage-keys.js";
import {
  PARENT_FOLDER,
  entryFor,
  epaStream,
  makeNotice,
  sameDayStream,
} from "../../../fixtures/notices.js";
import { FakeNoticeSource } from "../../../mocks/register.js";
import { InMemoryDocumentStore } from "../../../mocks/store.js";

import type { Notice, SyncEvent } from "../../../../src/types/sync.js";

const INDEX_KEY = `${PARENT_FOLDER}/abstracts.json`;

function keyOf(notice: Notice): string {
  return documentKey(
    PARENT_FOLDER,
    notice.folder,
    notice.documentNumber,
    notice.title
  );
}

describe("services/sync/engine", () => {
  let stream: Notice[];
  let source: FakeNoticeSource;
  let store: InMemoryDocumentStore;
  let index: AbstractIndex;

  function createEngine(): SyncEngine {
    return new SyncEngine({
      source,
      store,
      index,
      parentFolder: PARENT_FOLDER,
      agencies: ["EPA", "FDA"],
    });
  }

  /** Index N3, N2, N1 as if an earlier run had archived them */
  function seedOlderNotices(): void {
    for (const notice of stream.slice(2)) {
      index.record("EPA", entryFor(notice, keyOf(notice)));
    }
  }

  beforeEach(async () => {
    stream = epaStream();
    source = new FakeNoticeSource({ EPA: stream }, 2);
    store = new InMemoryDocumentStore();
    index = await AbstractIndex.load(store, INDEX_KEY, ["EPA", "FDA"]);
  });

  // ============================================================================
  // Fresh agency
  // ============================================================================

  describe("first sync of an agency", () => {
    it("should archive every notice across all pages", async () => {
      const summary = await createEngine().syncAgency("EPA", "incremental");

      expect(summary.processed).toBe(5);
      expect(summary.failed).toBe(0);
      expect(summary.pages).toBe(3);
      expect(summary.stoppedEarly).toBe(false);
      expect(source.listedPages("EPA")).toEqual([1, 2, 3]);
      expect(store.documentPuts()).toHaveLength(5);
    });

    it("should keep index entries newest first", async () => {
      await createEngine().syncAgency("EPA", "incremental");

      expect(index.entries("EPA").map((e) => e.documentNumber)).toEqual([
        "2024-00005",
        "2024-00004",
        "2024-00003",
        "2024-00002",
        "2024-00001",
      ]);
    });

    it("should write documents under the agency folder as PDFs", async () => {
      await createEngine().syncAgency("EPA", "incremental");

      const key = "federal-register/EPA/2024-00005 - Notice 2024-00005.pdf";
      expect(store.objects.has(key)).toBe(true);
      expect(store.contentTypes.get(key)).toBe("application/pdf");
      expect(index.watermark("EPA")).toEqual({
        documentNumber: "2024-00005",
        title: "Notice 2024-00005",
        publicationDate: "2024-05-05",
        abstract: "Summary of 2024-00005",
        storageKey: key,
      });
    });

    it("should stop when the source returns an empty page", async () => {
      source = new FakeNoticeSource({ EPA: [] }, 2);

      const summary = await createEngine().syncAgency("EPA", "full");

      expect(summary.pages).toBe(1);
      expect(summary.processed).toBe(0);
      expect(index.size("EPA")).toBe(0);
    });
  });

  // ============================================================================
  // Incremental mode
  // ============================================================================

  describe("incremental mode", () => {
    it("should fetch exactly the notices newer than the watermark", async () => {
      seedOlderNotices();

      const summary = await createEngine().syncAgency("EPA", "incremental");

      expect(summary.processed).toBe(2);
      expect(summary.skipped).toBe(0);
      expect(summary.stoppedEarly).toBe(true);
      expect(source.fetchCalls).toEqual([
        "https://register.test/pdf/2024-00005.pdf",
        "https://register.test/pdf/2024-00004.pdf",
      ]);
    });

    it("should not request pages after the one holding the first known notice", async () => {
      seedOlderNotices();

      await createEngine().syncAgency("EPA", "incremental");

      expect(source.listedPages("EPA")).toEqual([1, 2]);
    });

    it("should record new notices ahead of the existing ones", async () => {
      seedOlderNotices();

      await createEngine().syncAgency("EPA", "incremental");

      expect(index.entries("EPA").map((e) => e.documentNumber)).toEqual([
        "2024-00005",
        "2024-00004",
        "2024-00003",
        "2024-00002",
        "2024-00001",
      ]);
    });

    it("should write nothing on a second run without new notices", async () => {
      const engine = createEngine();
      await engine.syncAgency("EPA", "incremental");
      await index.persist();
      const putsAfterFirstRun = store.puts.length;
      const snapshot = JSON.stringify(index.toJSON());

      const summary = await engine.syncAgency("EPA", "incremental");

      expect(summary.processed).toBe(0);
      expect(summary.stoppedEarly).toBe(true);
      expect(summary.pages).toBe(1);
      expect(store.puts).toHaveLength(putsAfterFirstRun);
      expect(JSON.stringify(index.toJSON())).toBe(snapshot);
      expect(index.isDirty).toBe(false);
    });

    it("should emit a stopped event naming the first known notice", async () => {
      seedOlderNotices();
      const events: SyncEvent[] = [];
      const engine = createEngine();
      engine.setEventListener((event) => events.push(event));

      await engine.syncAgency("EPA", "incremental");

      expect(events.at(-1)).toEqual({
        type: "stopped",
        agency: "EPA",
        documentNumber: "2024-00003",
      });
    });

    it("should not stop on a notice repeated by a shifted page", async () => {
      // A new notice was published between page 1 and page 2, pushing N4
      // onto page 2 as well
      const [n5, n4, n3, n2] = stream;
      if (!n5 || !n4 || !n3 || !n2) throw new Error("fixture");
      source.pageOverrides.set("EPA#2", [n4, n3]);
      source.pageOverrides.set("EPA#3", [n2]);

      const summary = await createEngine().syncAgency("EPA", "incremental");

      expect(summary.processed).toBe(4);
      expect(summary.skipped).toBe(1);
      expect(summary.stoppedEarly).toBe(false);
      expect(store.documentPuts()).toHaveLength(4);
    });
  });

  // ============================================================================
  // Notices sharing a publication date
  // ============================================================================

  describe("notices sharing a publication date", () => {
    /** Archive the given notices in an earlier run and reload the index */
    async function archivedEarlier(notices: Notice[]): Promise<void> {
      const earlier = await AbstractIndex.load(store, INDEX_KEY, ["EPA", "FDA"]);
      for (const notice of notices) {
        earlier.record("EPA", entryFor(notice, keyOf(notice)));
      }
      await earlier.persist();
      index = await AbstractIndex.load(store, INDEX_KEY, ["EPA", "FDA"]);
    }

    it("should put a new same-day notice ahead of earlier runs' entries", async () => {
      const [n4, n3, n2] = sameDayStream();
      if (!n4 || !n3 || !n2) throw new Error("fixture");
      await archivedEarlier([n3, n2]);
      source = new FakeNoticeSource({ EPA: [n4, n3, n2] }, 2);

      const summary = await createEngine().syncAgency("EPA", "incremental");

      expect(summary.processed).toBe(1);
      expect(summary.stoppedEarly).toBe(true);
      expect(index.entries("EPA").map((e) => e.documentNumber)).toEqual([
        "2024-00004",
        "2024-00003",
        "2024-00002",
      ]);
      expect(index.watermark("EPA")?.documentNumber).toBe("2024-00004");
    });

    it("should fill a same-day gap in register order", async () => {
      const [n4, n3, n2] = sameDayStream();
      if (!n4 || !n3 || !n2) throw new Error("fixture");
      await archivedEarlier([n4, n2]);
      source = new FakeNoticeSource({ EPA: [n4, n3, n2] }, 2);

      await createEngine().syncAgency("EPA", "full");

      expect(index.entries("EPA").map((e) => e.documentNumber)).toEqual([
        "2024-00004",
        "2024-00003",
        "2024-00002",
      ]);
    });
  });

  // ============================================================================
  // Storage folder
  // ============================================================================

  describe("storage folder", () => {
    it("should store under the notice folder and index under the configured identifier", async () => {
      const agency = "Food and Drug Administration";
      const notice = makeNotice(
        agency,
        "2024-10001",
        "2024-04-18",
        "Medical Devices",
        "FDA"
      );
      source = new FakeNoticeSource({ [agency]: [notice] }, 2);
      const engine = new SyncEngine({
        source,
        store,
        index,
        parentFolder: PARENT_FOLDER,
        agencies: [agency],
      });

      await engine.syncAgency(agency, "incremental");

      const key = "federal-register/FDA/2024-10001 - Medical Devices.pdf";
      expect(store.documentPuts()).toEqual([key]);
      expect(index.watermark(agency)?.storageKey).toBe(key);
      expect(index.contains("FDA", "2024-10001")).toBe(false);
    });
  });

  // ============================================================================
  // Full mode
  // ============================================================================

  describe("full mode", () => {
    it("should visit every notice but only download unseen ones", async () => {
      seedOlderNotices();

      const summary = await createEngine().syncAgency("EPA", "full");

      expect(source.listedPages("EPA")).toEqual([1, 2, 3]);
      expect(summary.processed).toBe(2);
      expect(summary.skipped).toBe(3);
      expect(summary.stoppedEarly).toBe(false);
      expect(source.fetchCalls).toHaveLength(2);
      expect(store.documentPuts()).toEqual([
        "federal-register/EPA/2024-00005 - Notice 2024-00005.pdf",
        "federal-register/EPA/2024-00004 - Notice 2024-00004.pdf",
      ]);
    });

    it("should leave pre-existing entries unchanged", async () => {
      seedOlderNotices();
      const before = JSON.stringify(index.toJSON().EPA);

      await createEngine().syncAgency("EPA", "full");

      const after = index.toJSON().EPA ?? [];
      expect(after).toHaveLength(5);
      expect(JSON.stringify(after.slice(2))).toBe(before);
    });

    it("should fill a gap older than the watermark in date order", async () => {
      // Only N5 and N1 are indexed; N4..N2 were never archived
      const [n5, , , , n1] = stream;
      if (!n5 || !n1) throw new Error("fixture");
      index.record("EPA", entryFor(n5, keyOf(n5)));
      index.record("EPA", entryFor(n1, keyOf(n1)));

      const summary = await createEngine().syncAgency("EPA", "full");

      expect(summary.processed).toBe(3);
      expect(index.entries("EPA").map((e) => e.publicationDate)).toEqual([
        "2024-05-05",
        "2024-05-04",
        "2024-05-03",
        "2024-05-02",
        "2024-05-01",
      ]);
    });
  });

  // ============================================================================
  // Failures
  // ============================================================================

  describe("per-notice failures", () => {
    it("should skip a notice whose document is missing and continue", async () => {
      source.missingDocuments.add("https://register.test/pdf/2024-00004.pdf");

      const summary = await createEngine().syncAgency("EPA", "incremental");

      expect(summary.processed).toBe(4);
      expect(summary.failed).toBe(1);
      expect(summary.failures).toEqual([
        {
          documentNumber: "2024-00004",
          reason:
            "NOT_FOUND: document not found: https://register.test/pdf/2024-00004.pdf",
        },
      ]);
      expect(index.contains("EPA", "2024-00004")).toBe(false);
      expect(index.contains("EPA", "2024-00003")).toBe(true);
    });

    it("should skip a notice whose download fails in transport", async () => {
      source.brokenDocuments.add("https://register.test/pdf/2024-00002.pdf");

      const summary = await createEngine().syncAgency("EPA", "full");

      expect(summary.failed).toBe(1);
      expect(summary.processed).toBe(4);
      expect(index.contains("EPA", "2024-00002")).toBe(false);
    });

    it("should not index a notice whose document write failed", async () => {
      const [n5] = stream;
      if (!n5) throw new Error("fixture");
      store.failPut.add(keyOf(n5));

      const summary = await createEngine().syncAgency("EPA", "incremental");

      expect(summary.failed).toBe(1);
      expect(summary.failures[0]?.reason).toMatch(/^STORE_WRITE_ERROR: /);
      expect(index.contains("EPA", n5.documentNumber)).toBe(false);
      expect(index.size("EPA")).toBe(4);
    });

    it("should fail a notice without a document URL without fetching", async () => {
      const notice = { ...makeNotice("EPA", "2024-09999", "2024-06-01"), documentUrl: null };
      source = new FakeNoticeSource({ EPA: [notice] }, 2);

      const summary = await createEngine().syncAgency("EPA", "incremental");

      expect(summary.failures).toEqual([
        { documentNumber: "2024-09999", reason: "Notice has no document URL" },
      ]);
      expect(source.fetchCalls).toEqual([]);
    });
  });

  describe("agency-level failures", () => {
    it("should reject an agency that is not configured", async () => {
      await expect(
        createEngine().syncAgency("NOAA", "incremental")
      ).rejects.toBeInstanceOf(ConfigurationError);
      expect(source.listCalls).toEqual([]);
    });

    it("should propagate a listing failure", async () => {
      source.failListing.add("EPA");

      await expect(
        createEngine().syncAgency("EPA", "incremental")
      ).rejects.toBeInstanceOf(TransportError);
    });

    it("should keep entries recorded before a later page failed", async () => {
      source.failListingFromPage.set("EPA", 2);

      await expect(
        createEngine().syncAgency("EPA", "incremental")
      ).rejects.toBeInstanceOf(TransportError);
      expect(index.entries("EPA").map((e) => e.documentNumber)).toEqual([
        "2024-00005",
        "2024-00004",
      ]);
    });
  });

  // ============================================================================
  // Crash recovery
  // ============================================================================

  describe("crash between document write and index persist", () => {
    it("should index a document already in the store without fetching it", async () => {
      // A previous run wrote N5 and crashed before persisting the index
      const [n5] = stream;
      if (!n5) throw new Error("fixture");
      store.objects.set(keyOf(n5), Buffer.from("%PDF-1.7 earlier run"));
      seedOlderNotices();

      const summary = await createEngine().syncAgency("EPA", "incremental");

      expect(summary.recovered).toBe(1);
      expect(summary.processed).toBe(1);
      expect(source.fetchCalls).toEqual([
        "https://register.test/pdf/2024-00004.pdf",
      ]);
      expect(store.documentPuts()).toEqual([
        "federal-register/EPA/2024-00004 - Notice 2024-00004.pdf",
      ]);
      expect(index.watermark("EPA")?.documentNumber).toBe("2024-00005");
    });
  });
});
