import { Schema } from "@effect/schema";
import { Effect, ManagedRuntime, Option } from "effect";
import type { ConfigService, FileSystemService, LoggerService, MetadataService } from "../effect/services.ts";
import { LibraryIndexService } from "../library/library-index.ts";
import { log } from "../logging/index.ts";
import { CatalogError, InvalidRequestError } from "../utils/errors.ts";
import { clampPage } from "../utils/pagination.ts";
import { handleCover, handleDownload, handleStylesheet } from "./assets.ts";
import {
  allBooksFeed,
  authorBooksFeed,
  authorLettersFeed,
  authorsByLetterFeed,
  folderFeed,
  recentFeed,
  rootFeed,
  searchFeed,
  yearBooksFeed,
  yearsFeed,
} from "./opds.ts";

export type AppServices = ConfigService | LoggerService | FileSystemService | MetadataService | LibraryIndexService;

export type AppRuntime = ManagedRuntime.ManagedRuntime<AppServices, never>;

type Method = "GET" | "POST";

type Handler = (match: RegExpExecArray, url: URL) => Effect.Effect<Response, CatalogError, AppServices>;

interface Route {
  method: Method;
  pattern: RegExp;
  handler: Handler;
}

const PageParam = Schema.NumberFromString.pipe(Schema.int());
const decodePage = Schema.decodeUnknownOption(PageParam);

/** `?page=` as a clamped page number; anything unparsable is page 1 */
export function pageParam(url: URL): number {
  return clampPage(Option.getOrUndefined(decodePage(url.searchParams.get("page"))));
}

const pathParam = (raw: string | undefined) =>
  Effect.try({
    try: () => decodeURIComponent(raw ?? ""),
    catch: () => new InvalidRequestError("Malformed path", raw),
  });

const redirect = (location: string) => new Response(null, { status: 302, headers: { Location: location } });

const routes: Route[] = [
  { method: "GET", pattern: /^\/$/, handler: () => Effect.succeed(redirect("/opds")) },

  {
    method: "GET",
    pattern: /^\/health$/,
    handler: () =>
      Effect.gen(function* () {
        const index = yield* LibraryIndexService;
        const cache = yield* index.cacheStatus();
        return Response.json({ status: "ok", cache });
      }),
  },

  {
    method: "POST",
    pattern: /^\/refresh$/,
    handler: () =>
      Effect.gen(function* () {
        const index = yield* LibraryIndexService;
        yield* index.invalidate();
        return Response.json({ status: "invalidated" }, { status: 202 });
      }),
  },

  { method: "GET", pattern: /^\/opds_to_html\.xslt$/, handler: () => handleStylesheet() },

  { method: "GET", pattern: /^\/opds\/?$/, handler: () => rootFeed() },
  { method: "GET", pattern: /^\/opds\/books$/, handler: (_, url) => allBooksFeed(pageParam(url)) },
  { method: "GET", pattern: /^\/opds\/recent$/, handler: () => recentFeed() },

  {
    method: "GET",
    pattern: /^\/opds\/folder(?:\/(.*))?$/,
    handler: (match, url) => Effect.flatMap(pathParam(match[1]), (folder) => folderFeed(folder, pageParam(url))),
  },

  { method: "GET", pattern: /^\/opds\/years$/, handler: () => yearsFeed() },
  {
    method: "GET",
    pattern: /^\/opds\/years\/([^/]+)$/,
    handler: (match, url) => Effect.flatMap(pathParam(match[1]), (year) => yearBooksFeed(year, pageParam(url))),
  },

  { method: "GET", pattern: /^\/opds\/authors$/, handler: () => authorLettersFeed() },
  {
    method: "GET",
    pattern: /^\/opds\/authors\/letter\/([^/]+)$/,
    handler: (match, url) =>
      Effect.flatMap(pathParam(match[1]), (letter) => authorsByLetterFeed(letter, pageParam(url))),
  },
  {
    method: "GET",
    pattern: /^\/opds\/authors\/name\/([^/]+)$/,
    handler: (match, url) => Effect.flatMap(pathParam(match[1]), (author) => authorBooksFeed(author, pageParam(url))),
  },

  {
    method: "GET",
    pattern: /^\/opds\/search$/,
    handler: (_, url) => searchFeed(url.searchParams.get("q") ?? "", pageParam(url)),
  },

  {
    method: "GET",
    pattern: /^\/download\/(.+)$/,
    handler: (match) => Effect.flatMap(pathParam(match[1]), handleDownload),
  },
  {
    method: "GET",
    pattern: /^\/cover\/(.+)$/,
    handler: (match) => Effect.flatMap(pathParam(match[1]), handleCover),
  },
];

function errorResponse(error: CatalogError): Response {
  if (error.status === 403) {
    log.warn("Router", error.message, { path: error.path, status: error.status });
  }
  return new Response(error.message, { status: error.status });
}

export function createRouter(runtime: AppRuntime) {
  return async function router(req: Request): Promise<Response> {
    const startTime = Date.now();
    const url = new URL(req.url);
    const path = url.pathname;
    const method = req.method === "HEAD" ? "GET" : req.method;

    const allowed: Method[] = [];
    for (const route of routes) {
      const match = route.pattern.exec(path);
      if (!match) continue;
      if (route.method !== method) {
        allowed.push(route.method);
        continue;
      }

      const program = route.handler(match, url).pipe(Effect.catchAll((error) => Effect.succeed(errorResponse(error))));
      try {
        const response = await runtime.runPromise(program);
        log.debug("Router", "Request handled", {
          method: req.method,
          path,
          status: response.status,
          duration_ms: Date.now() - startTime,
        });
        return response;
      } catch (error) {
        log.error("Router", "Request failed", error, { method: req.method, path });
        return new Response("Internal server error", { status: 500 });
      }
    }

    if (allowed.length > 0) {
      return new Response("Method not allowed", { status: 405, headers: { Allow: allowed.join(", ") } });
    }
    return new Response("Not found", { status: 404 });
  };
}
