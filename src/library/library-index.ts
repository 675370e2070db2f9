import { Context, Effect, Either, Layer, Option, SynchronizedRef } from "effect";
import { basename, join } from "node:path";
import { UNKNOWN } from "../constants.ts";
import { ConfigService, FileSystemService, LoggerService, MetadataService } from "../effect/services.ts";
import type { BookMetadata, MetadataField } from "../formats/index.ts";
import { parseYear } from "../formats/utils.ts";
import type { AuthorCount, BookEntry, CacheStatus, FolderItem, LetterCount, Page, YearCount } from "../types.ts";
import { isBookFile } from "../types.ts";
import { AccessDeniedError, NotFoundError, isMissingFileError } from "../utils/errors.ts";
import { naturalSort } from "../utils/opds.ts";
import { pageSlice } from "../utils/pagination.ts";
import { hasTraversal, isContained, resolveSafePath, toRelativePath } from "../utils/path.ts";
import { BoundedMinHeap } from "./bounded-heap.ts";
import {
  authorLetter,
  compareAuthors,
  compareByFilename,
  compareIgnoreCase,
  compareLetters,
  compareYears,
  matchesLetter,
} from "./sorting.ts";

export interface LibraryIndex {
  /** Every book path under the root, filename order, cached */
  readonly enumerate: () => Effect.Effect<readonly string[]>;
  readonly getAllBooksPaginated: (page: number, size: number) => Effect.Effect<Page<BookEntry>>;
  readonly getFolderContentPaginated: (
    folder: string,
    page: number,
    size: number,
  ) => Effect.Effect<Page<FolderItem>, AccessDeniedError | NotFoundError>;
  readonly scanRecent: (limit: number) => Effect.Effect<readonly BookEntry[]>;
  readonly buildYearAuthorIndexes: () => Effect.Effect<void>;
  readonly getYearsWithCounts: () => Effect.Effect<readonly YearCount[]>;
  readonly getAuthorsWithCounts: () => Effect.Effect<readonly AuthorCount[]>;
  readonly getAuthorLetters: () => Effect.Effect<readonly LetterCount[]>;
  readonly getAuthorsByLetter: (letter: string, page: number, size: number) => Effect.Effect<Page<AuthorCount>>;
  readonly getBooksForYear: (year: string, page: number, size: number) => Effect.Effect<Page<BookEntry>>;
  readonly getBooksForAuthor: (author: string, page: number, size: number) => Effect.Effect<Page<BookEntry>>;
  readonly searchBooks: (query: string, page: number, size: number) => Effect.Effect<Page<BookEntry>>;
  readonly invalidate: () => Effect.Effect<void>;
  readonly cacheStatus: () => Effect.Effect<CacheStatus>;
}

export interface LibraryIndexOptions {
  /** Wall clock used for the recency cache expiry */
  now?: () => number;
}

interface YearAuthorIndexes {
  years: ReadonlyMap<string, readonly string[]>;
  authors: ReadonlyMap<string, readonly string[]>;
}

interface RecentCache {
  limit: number;
  entries: readonly BookEntry[];
  expiresAt: number;
}

type MetadataLookup = { _tag: "Present"; meta: BookMetadata } | { _tag: "Missing" };

type Hydration =
  | { _tag: "Found"; book: BookEntry }
  | { _tag: "Missing"; path: string }
  | { _tag: "Rejected"; path: string };

/** A result plus whether some cached path turned out to be gone while computing it */
interface Checked<A> {
  value: A;
  stale: boolean;
}

type CacheRef<A> = SynchronizedRef.SynchronizedRef<Option.Option<A>>;

const TAG = "LibraryIndex";

// Index build never asks for titles
const INDEX_FIELDS: readonly MetadataField[] = ["author", "date"];
const SEARCH_FIELDS: readonly MetadataField[] = ["title", "author"];

/** Read-check-build under the ref's lock: concurrent callers on a cold cache share one build */
const getOrBuild = <A, E>(ref: CacheRef<A>, build: Effect.Effect<A, E>): Effect.Effect<A, E> =>
  SynchronizedRef.modifyEffect(
    ref,
    (current): Effect.Effect<readonly [A, Option.Option<A>], E> =>
      Option.isSome(current)
        ? Effect.succeed([current.value, current] as const)
        : Effect.map(build, (value) => [value, Option.some(value)] as const),
  );

/** Like `getOrBuild`, but a build that met a missing path is handed back without being cached */
const getOrBuildChecked = <A>(ref: CacheRef<A>, build: Effect.Effect<Checked<A>>): Effect.Effect<Checked<A>> =>
  SynchronizedRef.modifyEffect(
    ref,
    (current): Effect.Effect<readonly [Checked<A>, Option.Option<A>]> =>
      Option.isSome(current)
        ? Effect.succeed([{ value: current.value, stale: false }, current] as const)
        : Effect.map(build, (checked) => [checked, checked.stale ? Option.none() : Option.some(checked.value)] as const),
  );

const appendTo = (map: Map<string, string[]>, key: string, path: string) => {
  const paths = map.get(key);
  if (paths) paths.push(path);
  else map.set(key, [path]);
};

const countEntries = (map: ReadonlyMap<string, readonly string[]>) =>
  [...map].map(([key, paths]) => ({ key, count: paths.length }));

export const makeLibraryIndex = (options: LibraryIndexOptions = {}) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const logger = yield* LoggerService;
    const fs = yield* FileSystemService;
    const metadata = yield* MetadataService;

    const root = config.filesPath;
    const now = options.now ?? Date.now;
    const recentTtlMs = config.recentTtlSeconds * 1000;

    const pathsRef: CacheRef<readonly string[]> = yield* SynchronizedRef.make(Option.none<readonly string[]>());
    const indexesRef: CacheRef<YearAuthorIndexes> = yield* SynchronizedRef.make(Option.none<YearAuthorIndexes>());
    const recentRef: CacheRef<RecentCache> = yield* SynchronizedRef.make(Option.none<RecentCache>());

    // Enumeration

    const walk = (dir: string): Effect.Effect<string[]> =>
      fs.readdir(dir).pipe(
        Effect.flatMap((entries) =>
          Effect.forEach(entries, (entry): Effect.Effect<string[]> => {
            if (entry.name.startsWith(".")) return Effect.succeed([]);
            const fullPath = join(dir, entry.name);
            if (entry.isDirectory()) return walk(fullPath);
            if (entry.isFile() && isBookFile(entry.name)) return Effect.succeed([fullPath]);
            return Effect.succeed([]);
          }),
        ),
        Effect.map((nested) => nested.flat()),
        Effect.catchAll((error) =>
          logger
            .warn(TAG, "Skipping unreadable directory", { path: dir, error: error.message })
            .pipe(Effect.map((): string[] => [])),
        ),
      );

    const buildPaths = Effect.gen(function* () {
      const startTime = now();
      const paths = yield* walk(root);
      paths.sort(compareByFilename);
      yield* logger.info(TAG, "Library enumerated", {
        root,
        books_found: paths.length,
        duration_ms: now() - startTime,
      });
      return paths;
    });

    const allPaths = getOrBuild(pathsRef, buildPaths);

    // Hydration

    const hydrate = (absolutePath: string): Effect.Effect<Hydration> =>
      Effect.gen(function* () {
        const relativePath = toRelativePath(root, absolutePath);
        if (hasTraversal(relativePath) || !isContained(root, absolutePath)) {
          const fileStat = yield* Effect.either(fs.stat(absolutePath));
          if (Either.isLeft(fileStat) && isMissingFileError(fileStat.left)) {
            return { _tag: "Missing", path: absolutePath } as const;
          }
          yield* logger.warn(TAG, "Rejected path outside the library", { path: relativePath });
          return { _tag: "Rejected", path: absolutePath } as const;
        }

        const fileStat = yield* Effect.either(fs.stat(absolutePath));
        if (Either.isLeft(fileStat)) {
          if (isMissingFileError(fileStat.left)) return { _tag: "Missing", path: absolutePath } as const;
          yield* logger.warn(TAG, "Cannot stat book", { path: relativePath, error: fileStat.left.message });
          return { _tag: "Rejected", path: absolutePath } as const;
        }

        const meta = yield* metadata.extract(absolutePath);
        const book: BookEntry = {
          absolutePath,
          relativePath,
          title: meta.title ?? basename(absolutePath),
          author: meta.author ?? UNKNOWN,
          year: parseYear(meta.date),
          mtime: fileStat.right.mtimeMs,
        };
        return { _tag: "Found", book } as const;
      });

    const hydrateAll = (paths: readonly string[]): Effect.Effect<Checked<BookEntry[]>> =>
      Effect.map(Effect.forEach(paths, hydrate), (results) => {
        const books: BookEntry[] = [];
        let stale = false;
        for (const result of results) {
          if (result._tag === "Found") books.push(result.book);
          else if (result._tag === "Missing") stale = true;
        }
        return { value: books, stale };
      });

    const hydratePage = (paths: readonly string[], page: number, size: number): Effect.Effect<Checked<Page<BookEntry>>> =>
      Effect.map(hydrateAll(pageSlice(paths, page, size)), (hydrated) => ({
        value: { items: hydrated.value, total: paths.length },
        stale: hydrated.stale,
      }));

    // Metadata of a cached path, or Missing when the file has gone since enumeration
    const lookupMetadata = (path: string, fields: readonly MetadataField[]): Effect.Effect<MetadataLookup> =>
      Effect.gen(function* () {
        const fileStat = yield* Effect.either(fs.stat(path));
        if (Either.isLeft(fileStat) && isMissingFileError(fileStat.left)) return { _tag: "Missing" } as const;
        const meta = yield* metadata.extract(path, fields);
        return { _tag: "Present", meta } as const;
      });

    // Invalidation

    const invalidate = () =>
      Effect.gen(function* () {
        yield* SynchronizedRef.set(pathsRef, Option.none());
        yield* SynchronizedRef.set(indexesRef, Option.none());
        yield* SynchronizedRef.set(recentRef, Option.none());
        yield* logger.info(TAG, "Caches invalidated");
      });

    /**
     * Runs a query; when it met a cached path that no longer exists, drops every
     * cache and runs it once more against a fresh enumeration.
     */
    const withFreshSnapshot = <A>(query: Effect.Effect<Checked<A>>): Effect.Effect<A> =>
      Effect.gen(function* () {
        const first = yield* query;
        if (!first.stale) return first.value;

        yield* logger.info(TAG, "Cached book disappeared, rebuilding");
        yield* invalidate();
        const second = yield* query;
        if (second.stale) yield* invalidate();
        return second.value;
      });

    // Year and author indexes

    const buildIndexes: Effect.Effect<Checked<YearAuthorIndexes>> = Effect.gen(function* () {
      const paths = yield* allPaths;
      const years = new Map<string, string[]>();
      const authors = new Map<string, string[]>();
      let stale = false;

      for (const path of paths) {
        const lookup = yield* lookupMetadata(path, INDEX_FIELDS);
        if (lookup._tag === "Missing") {
          stale = true;
          continue;
        }
        appendTo(years, parseYear(lookup.meta.date), path);
        appendTo(authors, lookup.meta.author ?? UNKNOWN, path);
      }

      if (!stale) {
        yield* logger.info(TAG, "Year and author indexes built", { years: years.size, authors: authors.size });
      }
      return { value: { years, authors }, stale };
    });

    const indexes = getOrBuildChecked(indexesRef, buildIndexes);

    /** Answers a query from the indexes, rebuilding them when they turn out to list a deleted book */
    const fromIndexes = <A>(query: (built: YearAuthorIndexes) => A): Effect.Effect<A> =>
      withFreshSnapshot(Effect.map(indexes, (checked) => ({ value: query(checked.value), stale: checked.stale })));

    const indexedPage = (select: (built: YearAuthorIndexes) => readonly string[] | undefined, page: number, size: number) =>
      withFreshSnapshot(
        Effect.flatMap(indexes, (checked) =>
          Effect.map(hydratePage(select(checked.value) ?? [], page, size), (hydrated) => ({
            value: hydrated.value,
            stale: checked.stale || hydrated.stale,
          })),
        ),
      );

    const authorCounts = ({ authors }: YearAuthorIndexes) =>
      countEntries(authors)
        .map(({ key, count }): AuthorCount => ({ author: key, count }))
        .sort((a, b) => compareAuthors(a.author, b.author));

    // Recency

    // Walks the root afresh so books added since the enumeration show up once the TTL lapses
    const buildRecent = (limit: number): Effect.Effect<Checked<BookEntry[]>> =>
      Effect.gen(function* () {
        // Unsorted walk: the heap ranks by mtime, then by filename among equal mtimes
        const paths = yield* walk(root);
        const heap = new BoundedMinHeap<{ path: string; mtime: number }>(
          limit,
          (a, b) => a.mtime - b.mtime || compareByFilename(b.path, a.path),
        );
        let stale = false;

        for (const path of paths) {
          const fileStat = yield* Effect.either(fs.stat(path));
          if (Either.isLeft(fileStat)) {
            if (isMissingFileError(fileStat.left)) stale = true;
            continue;
          }
          heap.offer({ path, mtime: fileStat.right.mtimeMs });
        }

        const hydrated = yield* hydrateAll(heap.toSortedDescending().map((candidate) => candidate.path));
        return { value: hydrated.value, stale: stale || hydrated.stale };
      });

    const recentLookup = (limit: number): Effect.Effect<Checked<readonly BookEntry[]>> =>
      SynchronizedRef.modifyEffect(
        recentRef,
        (current): Effect.Effect<readonly [Checked<readonly BookEntry[]>, Option.Option<RecentCache>]> => {
          const cachedAt = now();
          if (Option.isSome(current) && current.value.expiresAt > cachedAt && current.value.limit >= limit) {
            return Effect.succeed([{ value: current.value.entries.slice(0, limit), stale: false }, current] as const);
          }
          return Effect.map(buildRecent(limit), (checked) => {
            // A stale result is returned once but never cached
            const next: Option.Option<RecentCache> = checked.stale
              ? Option.none()
              : Option.some({ limit, entries: checked.value, expiresAt: cachedAt + recentTtlMs });
            return [checked, next] as const;
          });
        },
      );

    const index: LibraryIndex = {
      enumerate: () => allPaths,

      getAllBooksPaginated: (page, size) =>
        withFreshSnapshot(Effect.flatMap(allPaths, (paths) => hydratePage(paths, page, size))),

      getFolderContentPaginated: (folder, page, size) =>
        Effect.gen(function* () {
          const relativeFolder = folder.replace(/^\/+|\/+$/g, "");
          if (relativeFolder !== "" && hasTraversal(relativeFolder)) {
            return yield* Effect.fail(new AccessDeniedError(relativeFolder, "Invalid path"));
          }
          const folderPath = resolveSafePath(root, relativeFolder);
          if (!folderPath) {
            return yield* Effect.fail(new AccessDeniedError(relativeFolder));
          }

          const folderStat = yield* Effect.either(fs.stat(folderPath));
          if (Either.isLeft(folderStat) || !folderStat.right.isDirectory()) {
            return yield* Effect.fail(new NotFoundError(relativeFolder, "Folder not found"));
          }
          if (!isContained(root, folderPath)) {
            return yield* Effect.fail(new AccessDeniedError(relativeFolder));
          }

          const entries = yield* fs
            .readdir(folderPath)
            .pipe(Effect.mapError(() => new NotFoundError(relativeFolder, "Folder not readable")));

          const folders = entries
            .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
            .map((entry) => entry.name)
            .sort(naturalSort)
            .map(
              (name): FolderItem => ({
                kind: "folder",
                name,
                relativePath: relativeFolder ? `${relativeFolder}/${name}` : name,
              }),
            );

          const bookPaths = entries
            .filter((entry) => entry.isFile() && !entry.name.startsWith(".") && isBookFile(entry.name))
            .map((entry) => join(folderPath, entry.name));
          const hydrated = yield* hydrateAll(bookPaths);
          const books = hydrated.value
            .sort((a, b) => compareIgnoreCase(a.title, b.title) || compareByFilename(a.absolutePath, b.absolutePath))
            .map((book): FolderItem => ({ kind: "book", book }));

          const combined = [...folders, ...books];
          const result: Page<FolderItem> = { items: pageSlice(combined, page, size), total: combined.length };
          return result;
        }),

      scanRecent: (limit) => withFreshSnapshot(recentLookup(limit)),

      buildYearAuthorIndexes: () => fromIndexes(() => undefined),

      getYearsWithCounts: () =>
        fromIndexes(({ years }) =>
          countEntries(years)
            .map(({ key, count }): YearCount => ({ year: key, count }))
            .sort((a, b) => compareYears(a.year, b.year)),
        ),

      getAuthorsWithCounts: () => fromIndexes(authorCounts),

      getAuthorLetters: () =>
        fromIndexes((built) => {
          const letters = new Map<string, number>();
          for (const { author } of authorCounts(built)) {
            const letter = authorLetter(author);
            letters.set(letter, (letters.get(letter) ?? 0) + 1);
          }
          return [...letters]
            .map(([letter, count]): LetterCount => ({ letter, count }))
            .sort((a, b) => compareLetters(a.letter, b.letter));
        }),

      getAuthorsByLetter: (letter, page, size) =>
        fromIndexes((built) => {
          const matching = authorCounts(built).filter(({ author }) => matchesLetter(author, letter));
          const result: Page<AuthorCount> = { items: pageSlice(matching, page, size), total: matching.length };
          return result;
        }),

      getBooksForYear: (year, page, size) => indexedPage(({ years }) => years.get(year), page, size),

      getBooksForAuthor: (author, page, size) => indexedPage(({ authors }) => authors.get(author), page, size),

      searchBooks: (query, page, size) => {
        const needle = query.trim().toLowerCase();
        if (needle === "") return index.getAllBooksPaginated(page, size);

        return withFreshSnapshot(
          Effect.gen(function* () {
            const paths = yield* allPaths;
            const matches: string[] = [];
            let stale = false;
            for (const path of paths) {
              const lookup = yield* lookupMetadata(path, SEARCH_FIELDS);
              if (lookup._tag === "Missing") {
                stale = true;
                continue;
              }
              const title = (lookup.meta.title ?? basename(path)).toLowerCase();
              const author = (lookup.meta.author ?? UNKNOWN).toLowerCase();
              if (title.includes(needle) || author.includes(needle)) matches.push(path);
            }
            yield* logger.debug(TAG, "Search matched", { query: needle, entries_count: matches.length });
            const hydrated = yield* hydratePage(matches, page, size);
            return { value: hydrated.value, stale: stale || hydrated.stale };
          }),
        );
      },

      invalidate,

      cacheStatus: () =>
        Effect.gen(function* () {
          const paths = yield* SynchronizedRef.get(pathsRef);
          const built = yield* SynchronizedRef.get(indexesRef);
          const recent = yield* SynchronizedRef.get(recentRef);
          const status: CacheStatus = {
            paths: Option.match(paths, { onNone: () => null, onSome: (value) => value.length }),
            indexes: Option.isSome(built),
            recent: Option.isSome(recent) && recent.value.expiresAt > now(),
          };
          return status;
        }),
    };

    return index;
  });

export class LibraryIndexService extends Context.Tag("LibraryIndexService")<LibraryIndexService, LibraryIndex>() {}

export const makeLibraryIndexLayer = (options: LibraryIndexOptions = {}) =>
  Layer.effect(LibraryIndexService, makeLibraryIndex(options));
