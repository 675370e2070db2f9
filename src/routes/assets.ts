import { Effect, Either } from "effect";
import { basename } from "node:path";
import { COVER_CACHE_MAX_AGE, PLACEHOLDER_CACHE_MAX_AGE } from "../constants.ts";
import { ConfigService, FileSystemService, MetadataService } from "../effect/services.ts";
import { STYLESHEET_HREF } from "../opds.ts";
import { MIME_TYPES, isBookFile } from "../types.ts";
import { AccessDeniedError, NotFoundError } from "../utils/errors.ts";
import { hasTraversal, isContained, resolveSafePath } from "../utils/path.ts";

const PLACEHOLDER_PNG = new Uint8Array([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d, 0x49, 0x48, 0x44, 0x52, 0x00, 0x00, 0x00,
  0x01, 0x00, 0x00, 0x00, 0x01, 0x08, 0x02, 0x00, 0x00, 0x00, 0x90, 0x77, 0x53, 0xde, 0x00, 0x00, 0x00, 0x0c, 0x49,
  0x44, 0x41, 0x54, 0x08, 0xd7, 0x63, 0x78, 0x78, 0x78, 0x00, 0x00, 0x02, 0x3d, 0x01, 0x26, 0xf8, 0x7e, 0xb1, 0xa8,
  0x00, 0x00, 0x00, 0x00, 0x49, 0x45, 0x4e, 0x44, 0xae, 0x42, 0x60, 0x82,
]);

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

function encodeRfc5987(value: string): string {
  return encodeURIComponent(value).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Attachment header for a download. Non-ASCII names get an ASCII fallback
 * plus the UTF-8 `filename*` form of RFC 5987.
 */
export function contentDisposition(fileName: string): string {
  const quoted = fileName.replace(/["\\]/g, "_");
  if (PRINTABLE_ASCII.test(fileName)) {
    return `attachment; filename="${quoted}"`;
  }
  const fallback = quoted.replace(/[^\x20-\x7e]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeRfc5987(fileName)}`;
}

/** Resolves a requested book path to a file inside the content root */
const resolveBookFile = (relativePath: string) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const fs = yield* FileSystemService;

    if (hasTraversal(relativePath)) {
      return yield* Effect.fail(new AccessDeniedError(relativePath, "Access denied: Invalid path"));
    }
    const fullPath = resolveSafePath(config.filesPath, relativePath);
    if (!fullPath) {
      return yield* Effect.fail(new AccessDeniedError(relativePath, "Access denied: Invalid path"));
    }
    if (!isBookFile(basename(fullPath))) {
      return yield* Effect.fail(new NotFoundError(relativePath, "File not found"));
    }

    const fileStat = yield* Effect.either(fs.stat(fullPath));
    if (Either.isLeft(fileStat) || !fileStat.right.isFile()) {
      return yield* Effect.fail(new NotFoundError(relativePath, "File not found"));
    }
    if (!isContained(config.filesPath, fullPath)) {
      return yield* Effect.fail(new AccessDeniedError(relativePath, "Access denied: Path traversal detected"));
    }
    return fullPath;
  });

export const handleDownload = (relativePath: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystemService;
    const fullPath = yield* resolveBookFile(relativePath);
    const file = yield* fs
      .openRead(fullPath)
      .pipe(Effect.mapError(() => new NotFoundError(relativePath, "File not found")));

    return new Response(file.stream, {
      headers: {
        "Content-Type": MIME_TYPES.epub,
        "Content-Length": String(file.size),
        "Content-Disposition": contentDisposition(basename(fullPath)),
      },
    });
  });

/** XSLT that browsers apply to the feeds through their `xml-stylesheet` instruction */
export const handleStylesheet = () =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const fs = yield* FileSystemService;
    const data = yield* fs
      .readFile(config.stylesheetPath)
      .pipe(Effect.mapError(() => new NotFoundError(STYLESHEET_HREF, "XSLT file not found")));

    return new Response(data, {
      headers: {
        "Content-Type": "application/xml",
        "Cache-Control": config.devMode ? "no-store" : "no-cache",
      },
    });
  });

export const handleCover = (relativePath: string) =>
  Effect.gen(function* () {
    const config = yield* ConfigService;
    const metadata = yield* MetadataService;
    const fullPath = yield* resolveBookFile(relativePath);
    const cover = yield* metadata.cover(fullPath);

    if (cover) {
      return new Response(cover.data, {
        headers: {
          "Content-Type": cover.mimeType,
          "Cache-Control": config.devMode ? "no-store" : `public, max-age=${COVER_CACHE_MAX_AGE}`,
        },
      });
    }

    return new Response(PLACEHOLDER_PNG, {
      headers: {
        "Content-Type": "image/png",
        "Cache-Control": config.devMode ? "no-store" : `public, max-age=${PLACEHOLDER_CACHE_MAX_AGE}`,
      },
    });
  });
