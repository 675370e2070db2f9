import { Effect } from "effect";
import { posix } from "node:path";
import { ConfigService } from "../effect/services.ts";
import { LibraryIndexService } from "../library/library-index.ts";
import { bookEntry, navigationEntry, renderFeed } from "../opds.ts";
import type { FeedDocument, FeedEntry, FeedLink } from "../opds.ts";
import type { FolderItem } from "../types.ts";
import { countLabel, feedContentType, pageTitle } from "../utils/opds.ts";
import type { FeedKind } from "../utils/opds.ts";
import { paginationLinks, totalPages } from "../utils/pagination.ts";
import { encodeUrlPath } from "../utils/path.ts";

const ROOT_HREF = "/opds";
const SEARCH_HREF = "/opds/search?q={searchTerms}";

const commonLinks: FeedLink[] = [
  { rel: "start", href: ROOT_HREF, type: feedContentType("navigation") },
  { rel: "search", href: SEARCH_HREF, type: "application/atom+xml", title: "Search" },
];

const feedResponse = (feed: FeedDocument) =>
  Effect.map(
    ConfigService,
    (config) =>
      new Response(renderFeed(feed), {
        headers: {
          "Content-Type": feedContentType(feed.kind),
          "Cache-Control": config.devMode ? "no-store" : "no-cache",
        },
      }),
  );

interface PagedFeed {
  id: string;
  title: string;
  kind: FeedKind;
  /** Unpaginated feed URL, already encoded */
  path: string;
  page: number;
  size: number;
  total: number;
  entries: readonly FeedEntry[];
  params?: Record<string, string>;
}

const pagedFeedResponse = (feed: PagedFeed) => {
  const links: FeedLink[] = paginationLinks(feed.path, feed.page, feed.size, feed.total, feed.params).map((link) => ({
    rel: link.rel,
    href: link.href,
    type: feedContentType(feed.kind),
  }));

  return feedResponse({
    id: feed.id,
    title: pageTitle(feed.title, feed.page, totalPages(feed.total, feed.size)),
    kind: feed.kind,
    links: [...links, ...commonLinks],
    entries: feed.entries,
  });
};

function folderEntry(item: FolderItem): FeedEntry {
  if (item.kind === "book") return bookEntry(item.book);
  return navigationEntry(
    `urn:opds:folder:${item.relativePath}`,
    item.name,
    `/opds/folder/${encodeUrlPath(item.relativePath)}`,
    "acquisition",
  );
}

export const rootFeed = () =>
  feedResponse({
    id: "urn:opds:catalog:root",
    title: "My Library",
    kind: "navigation",
    links: [{ rel: "self", href: ROOT_HREF, type: feedContentType("navigation") }, ...commonLinks],
    entries: [
      navigationEntry("urn:opds:catalog:books", "All Books", "/opds/books", "acquisition"),
      navigationEntry("urn:opds:catalog:recent", "Recent Books", "/opds/recent", "acquisition"),
      navigationEntry("urn:opds:catalog:years", "By Year", "/opds/years", "navigation"),
      navigationEntry("urn:opds:catalog:authors", "By Author", "/opds/authors", "navigation"),
      navigationEntry("urn:opds:catalog:folders", "Folders", "/opds/folder/", "acquisition"),
    ],
  });

export const allBooksFeed = (page: number) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const index = yield* LibraryIndexService;
    const result = yield* index.getAllBooksPaginated(page, config.pageSize);
    return yield* pagedFeedResponse({
      id: "urn:opds:catalog:books",
      title: "All Books",
      kind: "acquisition",
      path: "/opds/books",
      page,
      size: config.pageSize,
      total: result.total,
      entries: result.items.map(bookEntry),
    });
  });

export const recentFeed = () =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const index = yield* LibraryIndexService;
    const books = yield* index.scanRecent(config.recentLimit);
    return yield* feedResponse({
      id: "urn:opds:catalog:recent",
      title: "Recent Books",
      kind: "acquisition",
      links: [{ rel: "self", href: "/opds/recent", type: feedContentType("acquisition") }, ...commonLinks],
      entries: books.map(bookEntry),
    });
  });

export const folderFeed = (folder: string, page: number) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const index = yield* LibraryIndexService;
    const result = yield* index.getFolderContentPaginated(folder, page, config.pageSize);
    const relativeFolder = folder.replace(/^\/+|\/+$/g, "");
    return yield* pagedFeedResponse({
      id: `urn:opds:folder:${relativeFolder}`,
      title: posix.basename(relativeFolder) || "Library",
      kind: "acquisition",
      path: `/opds/folder/${encodeUrlPath(relativeFolder)}`,
      page,
      size: config.pageSize,
      total: result.total,
      entries: result.items.map(folderEntry),
    });
  });

export const yearsFeed = () =>
  Effect.gen(function* () {
    const index = yield* LibraryIndexService;
    const years = yield* index.getYearsWithCounts();
    return yield* feedResponse({
      id: "urn:opds:catalog:years",
      title: "By Year",
      kind: "navigation",
      links: [{ rel: "self", href: "/opds/years", type: feedContentType("navigation") }, ...commonLinks],
      entries: years.map(({ year, count }) =>
        navigationEntry(
          `urn:opds:year:${year}`,
          year,
          `/opds/years/${encodeURIComponent(year)}`,
          "acquisition",
          countLabel(count, "book"),
        ),
      ),
    });
  });

export const yearBooksFeed = (year: string, page: number) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const index = yield* LibraryIndexService;
    const result = yield* index.getBooksForYear(year, page, config.pageSize);
    return yield* pagedFeedResponse({
      id: `urn:opds:year:${year}`,
      title: year,
      kind: "acquisition",
      path: `/opds/years/${encodeURIComponent(year)}`,
      page,
      size: config.pageSize,
      total: result.total,
      entries: result.items.map(bookEntry),
    });
  });

export const authorLettersFeed = () =>
  Effect.gen(function* () {
    const index = yield* LibraryIndexService;
    const letters = yield* index.getAuthorLetters();
    return yield* feedResponse({
      id: "urn:opds:catalog:authors",
      title: "By Author",
      kind: "navigation",
      links: [{ rel: "self", href: "/opds/authors", type: feedContentType("navigation") }, ...commonLinks],
      entries: letters.map(({ letter, count }) =>
        navigationEntry(
          `urn:opds:authors:letter:${letter}`,
          letter,
          `/opds/authors/letter/${encodeURIComponent(letter)}`,
          "navigation",
          countLabel(count, "author"),
        ),
      ),
    });
  });

export const authorsByLetterFeed = (letter: string, page: number) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const index = yield* LibraryIndexService;
    const result = yield* index.getAuthorsByLetter(letter, page, config.pageSize);
    return yield* pagedFeedResponse({
      id: `urn:opds:authors:letter:${letter}`,
      title: `Authors: ${letter}`,
      kind: "navigation",
      path: `/opds/authors/letter/${encodeURIComponent(letter)}`,
      page,
      size: config.pageSize,
      total: result.total,
      entries: result.items.map(({ author, count }) =>
        navigationEntry(
          `urn:opds:author:${author}`,
          author,
          `/opds/authors/name/${encodeURIComponent(author)}`,
          "acquisition",
          countLabel(count, "book"),
        ),
      ),
    });
  });

export const authorBooksFeed = (author: string, page: number) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const index = yield* LibraryIndexService;
    const result = yield* index.getBooksForAuthor(author, page, config.pageSize);
    return yield* pagedFeedResponse({
      id: `urn:opds:author:${author}`,
      title: author,
      kind: "acquisition",
      path: `/opds/authors/name/${encodeURIComponent(author)}`,
      page,
      size: config.pageSize,
      total: result.total,
      entries: result.items.map(bookEntry),
    });
  });

export const searchFeed = (query: string, page: number) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const index = yield* LibraryIndexService;
    const trimmed = query.trim();
    const result = yield* index.searchBooks(trimmed, page, config.pageSize);
    return yield* pagedFeedResponse({
      id: `urn:opds:search:${trimmed}`,
      title: trimmed ? `Search: ${trimmed}` : "All Books",
      kind: "acquisition",
      path: "/opds/search",
      page,
      size: config.pageSize,
      total: result.total,
      entries: result.items.map(bookEntry),
      params: { q: trimmed },
    });
  });
