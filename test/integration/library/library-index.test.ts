import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { Effect, Layer } from "effect";
import { mkdir, rm, symlink } from "node:fs/promises";
import { join } from "node:path";
import { FileSystemService, LiveFileSystemService } from "../../../src/effect/services.ts";
import type { LibraryIndex } from "../../../src/library/library-index.ts";
import type { BookEntry, FolderItem } from "../../../src/types.ts";
import { AccessDeniedError, NotFoundError } from "../../../src/utils/errors.ts";
import { paginationLinks } from "../../../src/utils/pagination.ts";
import { writeEpub } from "../../helpers/epub.ts";
import { cleanupTempDir, createTempDir } from "../../helpers/fs-helpers.ts";
import { createTestIndex, makeMetadataSpy, makeTestLogger, testConfig } from "../../helpers/layers.ts";

const run = <A, E>(effect: Effect.Effect<A, E>) => Effect.runPromise(effect);
const titles = (books: readonly BookEntry[]) => books.map((book) => book.title);
const rels = (page: number, size: number, total: number) =>
  paginationLinks("/opds/books", page, size, total).map((link) => link.rel);

function itemLabel(item: FolderItem): string {
  return item.kind === "folder" ? `folder:${item.name}` : `book:${item.book.title}`;
}

describe("LibraryIndex", () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir("library");
  });

  afterEach(async () => {
    await cleanupTempDir(root);
  });

  describe("two-book library", () => {
    let index: LibraryIndex;
    let logger: ReturnType<typeof makeTestLogger>;

    beforeEach(async () => {
      await writeEpub(join(root, "alpha.epub"), { title: "Alpha Title", author: "Ann Author" }, 200);
      await writeEpub(join(root, "Subfolder", "beta.epub"), { title: "Beta Title", author: "Ben Writer" }, 50);
      logger = makeTestLogger();
      index = await createTestIndex(testConfig(root), { logger: logger.layer });
    });

    test("pages through all books in filename order", async () => {
      const first = await run(index.getAllBooksPaginated(1, 1));
      expect(titles(first.items)).toEqual(["Alpha Title"]);
      expect(first.total).toBe(2);
      expect(rels(1, 1, first.total)).toContain("next");

      const second = await run(index.getAllBooksPaginated(2, 1));
      expect(titles(second.items)).toEqual(["Beta Title"]);
      expect(rels(2, 1, second.total)).not.toContain("next");
      expect(rels(2, 1, second.total)).toContain("previous");
    });

    test("hydrates identity and metadata", async () => {
      const { items } = await run(index.getAllBooksPaginated(2, 1));
      const [beta] = items;
      expect(beta?.relativePath).toBe("Subfolder/beta.epub");
      expect(beta?.absolutePath).toBe(join(root, "Subfolder", "beta.epub"));
      expect(beta?.author).toBe("Ben Writer");
      expect(beta?.year).toBe("Unknown");
    });

    test("out-of-range pages are empty but keep the total", async () => {
      expect(await run(index.getAllBooksPaginated(5, 1))).toEqual({ items: [], total: 2 });
    });

    test("lists the most recently modified books first", async () => {
      expect(titles(await run(index.scanRecent(10)))).toEqual(["Beta Title", "Alpha Title"]);
      expect(titles(await run(index.scanRecent(1)))).toEqual(["Beta Title"]);
    });

    test("drops every cache when a cached book has been deleted", async () => {
      await run(index.getAllBooksPaginated(1, 10));
      await run(index.scanRecent(10));
      await run(index.getYearsWithCounts());

      await rm(join(root, "alpha.epub"));

      const page = await run(index.getAllBooksPaginated(1, 1));
      expect(titles(page.items)).toEqual(["Beta Title"]);
      expect(page.total).toBe(1);
      expect(logger.calls.some((call) => call.msg === "Cached book disappeared, rebuilding")).toBe(true);

      expect(titles(await run(index.scanRecent(10)))).toEqual(["Beta Title"]);
      expect(await run(index.getYearsWithCounts())).toEqual([{ year: "Unknown", count: 1 }]);
      expect(titles((await run(index.getAllBooksPaginated(1, 10))).items)).toEqual(["Beta Title"]);
    });

    test("deletion found through an index query also rebuilds", async () => {
      await run(index.getBooksForAuthor("Ann Author", 1, 10));
      await rm(join(root, "alpha.epub"));

      expect(await run(index.getBooksForAuthor("Ann Author", 1, 10))).toEqual({ items: [], total: 0 });
      expect(await run(index.getAuthorsWithCounts())).toEqual([{ author: "Ben Writer", count: 1 }]);
    });

    test("a book deleted before the indexes are built leaves no trace in them", async () => {
      await run(index.getAllBooksPaginated(1, 10));
      await rm(join(root, "alpha.epub"));

      expect(await run(index.getAuthorsWithCounts())).toEqual([{ author: "Ben Writer", count: 1 }]);
      expect(await run(index.getAuthorLetters())).toEqual([{ letter: "B", count: 1 }]);
      expect(await run(index.getYearsWithCounts())).toEqual([{ year: "Unknown", count: 1 }]);
      expect(await run(index.cacheStatus())).toEqual({ paths: 1, indexes: true, recent: false });
      expect(logger.calls.filter((call) => call.msg === "Cached book disappeared, rebuilding")).toHaveLength(1);
    });

    test("search totals leave out books deleted since enumeration", async () => {
      await run(index.enumerate());
      await rm(join(root, "alpha.epub"));

      expect(await run(index.searchBooks("e", 2, 1))).toEqual({ items: [], total: 1 });
      expect(titles((await run(index.searchBooks("e", 1, 1))).items)).toEqual(["Beta Title"]);
    });

    test("invalidate empties every cache", async () => {
      expect(await run(index.cacheStatus())).toEqual({ paths: null, indexes: false, recent: false });

      await run(index.getAllBooksPaginated(1, 1));
      await run(index.buildYearAuthorIndexes());
      await run(index.scanRecent(5));
      expect(await run(index.cacheStatus())).toEqual({ paths: 2, indexes: true, recent: true });

      await run(index.invalidate());
      expect(await run(index.cacheStatus())).toEqual({ paths: null, indexes: false, recent: false });
    });

    test("picks up new books only after invalidation", async () => {
      expect(await run(index.enumerate())).toHaveLength(2);
      await writeEpub(join(root, "gamma.epub"), { title: "Gamma Title" });
      expect(await run(index.enumerate())).toHaveLength(2);

      await run(index.invalidate());
      expect(await run(index.enumerate())).toHaveLength(3);
    });

    test("concurrent cold queries share one enumeration and one index build", async () => {
      await Promise.all([
        run(index.getAllBooksPaginated(1, 1)),
        run(index.getAllBooksPaginated(2, 1)),
        run(index.getYearsWithCounts()),
        run(index.getAuthorsWithCounts()),
        run(index.searchBooks("title", 1, 5)),
      ]);

      expect(logger.calls.filter((call) => call.msg === "Library enumerated")).toHaveLength(1);
      expect(logger.calls.filter((call) => call.msg === "Year and author indexes built")).toHaveLength(1);
    });
  });

  describe("recency cache", () => {
    let clock: number;
    let index: LibraryIndex;

    beforeEach(async () => {
      clock = Date.now();
      await writeEpub(join(root, "old.epub"), { title: "Old" }, 300);
      await writeEpub(join(root, "new.epub"), { title: "New" }, 100);
      index = await createTestIndex(testConfig(root, { recentTtlSeconds: 60 }), {}, { now: () => clock });
    });

    test("serves the cached list until the TTL lapses", async () => {
      expect(titles(await run(index.scanRecent(10)))).toEqual(["New", "Old"]);

      await writeEpub(join(root, "newest.epub"), { title: "Newest" }, 10);
      clock += 59_000;
      expect(titles(await run(index.scanRecent(10)))).toEqual(["New", "Old"]);

      clock += 2_000;
      expect(titles(await run(index.scanRecent(10)))).toEqual(["Newest", "New", "Old"]);
    });

    test("rebuilds when a larger limit is asked for", async () => {
      expect(titles(await run(index.scanRecent(1)))).toEqual(["New"]);
      expect(titles(await run(index.scanRecent(2)))).toEqual(["New", "Old"]);
    });

    test("returns every book when the limit exceeds the library", async () => {
      expect(await run(index.scanRecent(50))).toHaveLength(2);
    });
  });

  describe("enumeration", () => {
    test("collects EPUB files recursively, skipping hidden entries and other files", async () => {
      await writeEpub(join(root, "Zebra.epub"));
      await writeEpub(join(root, "apple.EPUB"));
      await writeEpub(join(root, "Nested", "Deeper", "mango.epub"));
      await writeEpub(join(root, ".hidden.epub"));
      await writeEpub(join(root, ".secret", "inside.epub"));
      await writeEpub(join(root, "notes.txt"));

      const index = await createTestIndex(testConfig(root));
      expect(await run(index.enumerate())).toEqual([
        join(root, "apple.EPUB"),
        join(root, "Nested", "Deeper", "mango.epub"),
        join(root, "Zebra.epub"),
      ]);
    });

    test("skips directories that cannot be read", async () => {
      await writeEpub(join(root, "kept.epub"));
      await writeEpub(join(root, "Broken", "lost.epub"));

      const fileSystem = Layer.effect(
        FileSystemService,
        Effect.map(FileSystemService, (live) => ({
          ...live,
          readdir: (path: string) =>
            path.endsWith("Broken") ? Effect.fail(new Error("EACCES: permission denied")) : live.readdir(path),
        })),
      ).pipe(Layer.provide(LiveFileSystemService));
      const logger = makeTestLogger();

      const index = await createTestIndex(testConfig(root), { fileSystem, logger: logger.layer });
      expect(await run(index.enumerate())).toEqual([join(root, "kept.epub")]);
      expect(logger.calls).toContainEqual({ level: "warn", tag: "LibraryIndex", msg: "Skipping unreadable directory" });
    });

    test("recency does not depend on directory listing order", async () => {
      await writeEpub(join(root, "a.epub"), { title: "A" }, 300);
      await writeEpub(join(root, "b.epub"), { title: "B" }, 100);
      await writeEpub(join(root, "c.epub"), { title: "C" }, 200);

      const reversed = Layer.effect(
        FileSystemService,
        Effect.map(FileSystemService, (live) => ({
          ...live,
          readdir: (path: string) => Effect.map(live.readdir(path), (entries) => [...entries].reverse()),
        })),
      ).pipe(Layer.provide(LiveFileSystemService));

      const full = await createTestIndex(testConfig(root), { fileSystem: reversed });
      expect(titles(await run(full.scanRecent(10)))).toEqual(["B", "C", "A"]);
      const trimmed = await createTestIndex(testConfig(root), { fileSystem: reversed });
      expect(titles(await run(trimmed.scanRecent(2)))).toEqual(["B", "C"]);
    });

    test("a missing root is an empty library", async () => {
      const index = await createTestIndex(testConfig(join(root, "nowhere")));
      expect(await run(index.getAllBooksPaginated(1, 10))).toEqual({ items: [], total: 0 });
    });

    test("falls back to the file name and Unknown author", async () => {
      await writeEpub(join(root, "no-metadata.epub"));
      const index = await createTestIndex(testConfig(root));
      const [book] = (await run(index.getAllBooksPaginated(1, 1))).items;
      expect(book?.title).toBe("no-metadata.epub");
      expect(book?.author).toBe("Unknown");
      expect(book?.year).toBe("Unknown");
    });
  });

  describe("year and author indexes", () => {
    let index: LibraryIndex;
    let metadata: ReturnType<typeof makeMetadataSpy>;

    beforeEach(async () => {
      await writeEpub(join(root, "a.epub"), { title: "A", author: "Zed", date: "2001" });
      await writeEpub(join(root, "b.epub"), { title: "B", author: "alice", date: "1999-02-03" });
      await writeEpub(join(root, "c.epub"), { title: "C" });
      await writeEpub(join(root, "d.epub"), { title: "D", author: "42 Collective", date: "2001-07" });
      metadata = makeMetadataSpy();
      index = await createTestIndex(testConfig(root), { metadata: metadata.layer });
    });

    test("counts books per year, newest first and Unknown last", async () => {
      expect(await run(index.getYearsWithCounts())).toEqual([
        { year: "2001", count: 2 },
        { year: "1999", count: 1 },
        { year: "Unknown", count: 1 },
      ]);
    });

    test("counts books per author, Unknown last", async () => {
      expect(await run(index.getAuthorsWithCounts())).toEqual([
        { author: "42 Collective", count: 1 },
        { author: "alice", count: 1 },
        { author: "Zed", count: 1 },
        { author: "Unknown", count: 1 },
      ]);
    });

    test("builds the indexes without reading titles", async () => {
      await run(index.buildYearAuthorIndexes());
      expect(metadata.calls).toHaveLength(4);
      expect(metadata.calls.every((call) => call.fields.join() === "author,date")).toBe(true);

      await run(index.buildYearAuthorIndexes());
      expect(metadata.calls).toHaveLength(4);
    });

    test("hydrates only the requested page", async () => {
      await run(index.buildYearAuthorIndexes());
      metadata.calls.length = 0;

      const page = await run(index.getBooksForYear("2001", 2, 1));
      expect(titles(page.items)).toEqual(["D"]);
      expect(page.total).toBe(2);
      expect(metadata.calls).toEqual([{ path: join(root, "d.epub"), fields: ["title", "author", "date"] }]);
    });

    test("lists books of a year and of an author in filename order", async () => {
      expect(titles((await run(index.getBooksForYear("2001", 1, 10))).items)).toEqual(["A", "D"]);
      expect(titles((await run(index.getBooksForAuthor("Unknown", 1, 10))).items)).toEqual(["C"]);
    });

    test("unknown keys give an empty page", async () => {
      expect(await run(index.getBooksForYear("1850", 1, 10))).toEqual({ items: [], total: 0 });
      expect(await run(index.getBooksForAuthor("Nobody", 1, 10))).toEqual({ items: [], total: 0 });
    });

    test("groups authors by initial with # last", async () => {
      expect(await run(index.getAuthorLetters())).toEqual([
        { letter: "A", count: 1 },
        { letter: "Z", count: 1 },
        { letter: "#", count: 2 },
      ]);
    });

    test("# covers Unknown and non-letter names only", async () => {
      const page = await run(index.getAuthorsByLetter("#", 1, 10));
      expect(page.items.map((entry) => entry.author)).toEqual(["42 Collective", "Unknown"]);
      expect(page.total).toBe(2);
    });

    test("letters match case-insensitively and paginate", async () => {
      expect(await run(index.getAuthorsByLetter("a", 1, 10))).toEqual({
        items: [{ author: "alice", count: 1 }],
        total: 1,
      });
      expect(await run(index.getAuthorsByLetter("#", 2, 1))).toEqual({
        items: [{ author: "Unknown", count: 1 }],
        total: 2,
      });
    });

    test("search matches titles and authors case-insensitively in filename order", async () => {
      expect(titles((await run(index.searchBooks("ALICE", 1, 10))).items)).toEqual(["B"]);
      const byD = await run(index.searchBooks("d", 1, 10));
      expect(titles(byD.items)).toEqual(["A", "D"]);
      expect(byD.total).toBe(2);
      expect(await run(index.searchBooks("no such book", 1, 10))).toEqual({ items: [], total: 0 });
    });

    test("search paginates the match list", async () => {
      const page = await run(index.searchBooks("d", 2, 1));
      expect(titles(page.items)).toEqual(["D"]);
      expect(page.total).toBe(2);
    });

    test("a blank search is the full listing", async () => {
      for (const [page, size] of [
        [1, 1],
        [2, 3],
        [1, 10],
        [9, 2],
      ] as const) {
        expect(await run(index.searchBooks("   ", page, size))).toEqual(
          await run(index.getAllBooksPaginated(page, size)),
        );
        expect(await run(index.searchBooks("", page, size))).toEqual(await run(index.getAllBooksPaginated(page, size)));
      }
    });
  });

  describe("search fallbacks", () => {
    test("matches the file name when a book has no title", async () => {
      await writeEpub(join(root, "mystery-novel.epub"), { author: "Someone" });
      await writeEpub(join(root, "other.epub"), { title: "Other" });
      const index = await createTestIndex(testConfig(root));

      const result = await run(index.searchBooks("MYSTERY", 1, 10));
      expect(titles(result.items)).toEqual(["mystery-novel.epub"]);
    });

    test("matches Unknown for books without an author", async () => {
      await writeEpub(join(root, "anon.epub"), { title: "Anonymous Work" });
      await writeEpub(join(root, "known.epub"), { title: "Known", author: "Kim" });
      const index = await createTestIndex(testConfig(root));

      expect(titles((await run(index.searchBooks("unknown", 1, 10))).items)).toEqual(["Anonymous Work"]);
    });
  });

  describe("folder listing", () => {
    let index: LibraryIndex;
    let outside: string;

    beforeEach(async () => {
      outside = await createTempDir("library-outside");
      await mkdir(join(root, "Sci Fi"));
      await mkdir(join(root, "Fantasy"));
      await mkdir(join(root, ".hidden"));
      await writeEpub(join(root, "zeta.epub"), { title: "Zeta" });
      await writeEpub(join(root, "alpha.epub"), { title: "apple" });
      await writeEpub(join(root, "Sci Fi", "dune.epub"), { title: "Dune" });
      await symlink(outside, join(root, "Escape"));
      index = await createTestIndex(testConfig(root));
    });

    afterEach(async () => {
      await cleanupTempDir(outside);
    });

    test("lists subfolders before books, books by title", async () => {
      const page = await run(index.getFolderContentPaginated("", 1, 10));
      expect(page.items.map(itemLabel)).toEqual(["folder:Fantasy", "folder:Sci Fi", "book:apple", "book:Zeta"]);
      expect(page.total).toBe(4);
    });

    test("paginates folders and books with one cursor", async () => {
      const page = await run(index.getFolderContentPaginated("", 2, 3));
      expect(page.items.map(itemLabel)).toEqual(["book:Zeta"]);
      expect(page.total).toBe(4);
    });

    test("lists a nested folder without recursing", async () => {
      const page = await run(index.getFolderContentPaginated("Sci Fi", 1, 10));
      expect(page.items.map(itemLabel)).toEqual(["book:Dune"]);
      const [dune] = page.items;
      expect(dune?.kind === "book" ? dune.book.relativePath : undefined).toBe("Sci Fi/dune.epub");
    });

    test("gives folder entries root-relative paths", async () => {
      const [fantasy] = (await run(index.getFolderContentPaginated("/", 1, 1))).items;
      expect(fantasy).toEqual({ kind: "folder", name: "Fantasy", relativePath: "Fantasy" });
    });

    test("denies traversal", async () => {
      const error = await run(Effect.flip(index.getFolderContentPaginated("../", 1, 10)));
      expect(error).toBeInstanceOf(AccessDeniedError);
      expect(error.status).toBe(403);
    });

    test("denies hidden folders", async () => {
      const error = await run(Effect.flip(index.getFolderContentPaginated(".hidden", 1, 10)));
      expect(error).toBeInstanceOf(AccessDeniedError);
    });

    test("denies symlinks leading out of the library", async () => {
      const error = await run(Effect.flip(index.getFolderContentPaginated("Escape", 1, 10)));
      expect(error).toBeInstanceOf(AccessDeniedError);
    });

    test("reports missing folders and files as not found", async () => {
      const missing = await run(Effect.flip(index.getFolderContentPaginated("Horror", 1, 10)));
      expect(missing).toBeInstanceOf(NotFoundError);
      expect(missing.status).toBe(404);

      const file = await run(Effect.flip(index.getFolderContentPaginated("zeta.epub", 1, 10)));
      expect(file).toBeInstanceOf(NotFoundError);
    });
  });
});
