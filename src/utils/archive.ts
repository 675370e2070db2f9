import { open } from "node:fs/promises";
import { buffer } from "node:stream/consumers";
import yauzl from "yauzl";
import type { Entry, ZipFile } from "yauzl";

const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04];

export function isZip(data: Uint8Array): boolean {
  return ZIP_MAGIC.every((byte, i) => data[i] === byte);
}

/**
 * Zip archive opened from its central directory. Entry data is read on demand,
 * so only the entries asked for are ever pulled off disk. Holds a file
 * descriptor until closed.
 */
export interface Archive {
  readonly entries: ReadonlyMap<string, Entry>;
  readonly zipfile: ZipFile;
}

async function readHeader(filePath: string): Promise<Uint8Array> {
  const handle = await open(filePath, "r");
  try {
    const { buffer: header, bytesRead } = await handle.read(new Uint8Array(ZIP_MAGIC.length), 0, ZIP_MAGIC.length, 0);
    return header.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function openZip(filePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(filePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) reject(err ?? new Error(`Cannot open ${filePath}`));
      else resolve(zipfile);
    });
  });
}

function listEntries(zipfile: ZipFile): Promise<Map<string, Entry>> {
  return new Promise((resolve, reject) => {
    const entries = new Map<string, Entry>();
    zipfile.on("entry", (entry: Entry) => {
      entries.set(entry.fileName, entry);
      zipfile.readEntry();
    });
    zipfile.once("end", () => resolve(entries));
    zipfile.once("error", reject);
    zipfile.readEntry();
  });
}

/** Opens a zip archive; null when the file is unreadable or not a zip */
export async function openArchive(filePath: string): Promise<Archive | null> {
  try {
    if (!isZip(await readHeader(filePath))) return null;
    const zipfile = await openZip(filePath);
    try {
      return { entries: await listEntries(zipfile), zipfile };
    } catch {
      zipfile.close();
      return null;
    }
  } catch {
    return null;
  }
}

export function closeArchive(archive: Archive): void {
  archive.zipfile.close();
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<NodeJS.ReadableStream> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) reject(err ?? new Error(`Cannot read ${entry.fileName}`));
      else resolve(stream);
    });
  });
}

export async function readEntry(archive: Archive, entryPath: string): Promise<Buffer | null> {
  const entry = archive.entries.get(entryPath);
  if (!entry || entry.uncompressedSize === 0) return null;
  try {
    const data = await buffer(await openEntryStream(archive.zipfile, entry));
    return data.byteLength > 0 ? data : null;
  } catch {
    return null;
  }
}

export async function readEntryText(archive: Archive, entryPath: string): Promise<string | null> {
  const data = await readEntry(archive, entryPath);
  return data ? data.toString("utf-8") : null;
}
