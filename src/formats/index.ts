import { extname } from "node:path";
import type { BookMetadata, CoverImage, FormatHandlerFactory, FormatHandlerRegistration, MetadataField } from "./types.ts";
import { ALL_FIELDS } from "./types.ts";
import { epubHandlerRegistration } from "./epub.ts";

const registrations: FormatHandlerRegistration[] = [epubHandlerRegistration];

const factoryMap = new Map<string, FormatHandlerFactory>();

for (const reg of registrations) {
  for (const ext of reg.extensions) {
    factoryMap.set(ext.toLowerCase(), reg.create);
  }
}

export function getHandlerFactory(extension: string): FormatHandlerFactory | null {
  return factoryMap.get(extension.toLowerCase()) ?? null;
}

function factoryFor(filePath: string): FormatHandlerFactory | null {
  return getHandlerFactory(extname(filePath).slice(1));
}

/**
 * Reads the requested bibliographic fields from a book file.
 * Never rejects: unreadable or malformed books give an empty result.
 */
export async function extractMetadata(
  filePath: string,
  fields: readonly MetadataField[] = ALL_FIELDS,
): Promise<BookMetadata> {
  const create = factoryFor(filePath);
  if (!create) return {};
  try {
    const handler = await create(filePath);
    if (!handler) return {};
    try {
      return handler.getMetadata(fields);
    } finally {
      handler.close();
    }
  } catch {
    return {};
  }
}

/** Cover image embedded in the book, null when there is none or the book is unreadable */
export async function extractCover(filePath: string): Promise<CoverImage | null> {
  const create = factoryFor(filePath);
  if (!create) return null;
  try {
    const handler = await create(filePath);
    if (!handler) return null;
    try {
      return await handler.getCover();
    } finally {
      handler.close();
    }
  } catch {
    return null;
  }
}

export type { BookMetadata, CoverImage, MetadataField } from "./types.ts";
export { ALL_FIELDS } from "./types.ts";
