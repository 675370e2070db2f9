import { Context, Effect, Layer } from "effect";
import { open, readdir, readFile, stat } from "node:fs/promises";
import { Readable } from "node:stream";
import type { Config } from "../config.ts";
import { extractCover, extractMetadata } from "../formats/index.ts";
import type { BookMetadata, CoverImage, MetadataField } from "../formats/index.ts";
import { log } from "../logging/index.ts";
import type { LogContext } from "../logging/index.ts";
import { toError } from "../utils/errors.ts";

export interface DirEntry {
  name: string;
  isDirectory(): boolean;
  isFile(): boolean;
}

export interface FileStat {
  isDirectory(): boolean;
  isFile(): boolean;
  size: number;
  mtimeMs: number;
}

/** A file opened for streaming; the descriptor closes when the stream ends or is cancelled */
export interface FileStream {
  stream: ReadableStream<Uint8Array>;
  size: number;
}

// Config Service
export class ConfigService extends Context.Tag("ConfigService")<ConfigService, Config>() {}

// Logger Service
export class LoggerService extends Context.Tag("LoggerService")<
  LoggerService,
  {
    readonly info: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly warn: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
    readonly error: (tag: string, msg: string, err?: unknown, ctx?: LogContext) => Effect.Effect<void>;
    readonly debug: (tag: string, msg: string, ctx?: LogContext) => Effect.Effect<void>;
  }
>() {}

// FileSystem Service
export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    readonly readdir: (path: string) => Effect.Effect<readonly DirEntry[], Error>;
    readonly stat: (path: string) => Effect.Effect<FileStat, Error>;
    readonly readFile: (path: string) => Effect.Effect<Buffer, Error>;
    readonly openRead: (path: string) => Effect.Effect<FileStream, Error>;
  }
>() {}

// Metadata Service: never fails, absent fields mean unknown
export class MetadataService extends Context.Tag("MetadataService")<
  MetadataService,
  {
    readonly extract: (path: string, fields?: readonly MetadataField[]) => Effect.Effect<BookMetadata>;
    readonly cover: (path: string) => Effect.Effect<CoverImage | null>;
  }
>() {}

// Live implementations

export const makeConfigLayer = (config: Config) => Layer.succeed(ConfigService, config);

export const LiveLoggerService = Layer.succeed(LoggerService, {
  info: (tag, msg, ctx) => Effect.sync(() => log.info(tag, msg, ctx)),
  warn: (tag, msg, ctx) => Effect.sync(() => log.warn(tag, msg, ctx)),
  error: (tag, msg, err, ctx) => Effect.sync(() => log.error(tag, msg, err, ctx)),
  debug: (tag, msg, ctx) => Effect.sync(() => log.debug(tag, msg, ctx)),
});

export const LiveFileSystemService = Layer.succeed(FileSystemService, {
  readdir: (path) =>
    Effect.tryPromise({
      try: () => readdir(path, { withFileTypes: true }),
      catch: toError,
    }),

  stat: (path) =>
    Effect.tryPromise({
      try: () => stat(path),
      catch: toError,
    }),

  readFile: (path) =>
    Effect.tryPromise({
      try: () => readFile(path),
      catch: toError,
    }),

  openRead: (path) =>
    Effect.tryPromise({
      try: async () => {
        const handle = await open(path, "r");
        try {
          const { size } = await handle.stat();
          return { stream: Readable.toWeb(handle.createReadStream()), size };
        } catch (error) {
          await handle.close();
          throw error;
        }
      },
      catch: toError,
    }),
});

export const LiveMetadataService = Layer.succeed(MetadataService, {
  extract: (path, fields) => Effect.promise(() => extractMetadata(path, fields)),
  cover: (path) => Effect.promise(() => extractCover(path)),
});

export const makeBaseLayer = (config: Config) =>
  Layer.mergeAll(makeConfigLayer(config), LiveLoggerService, LiveFileSystemService, LiveMetadataService);
