/** A book file as the catalog sees it after hydration */
export interface BookEntry {
  /** Absolute path on disk */
  absolutePath: string;
  /** Path relative to the content root, always `/`-separated. Identity key. */
  relativePath: string;
  title: string;
  author: string;
  /** Four-digit year or "Unknown" */
  year: string;
  /** Last modification time (ms timestamp) */
  mtime: number;
}

/** One row of a folder listing: subfolders first, then books */
export type FolderItem =
  | { kind: "folder"; name: string; relativePath: string }
  | { kind: "book"; book: BookEntry };

export interface Page<T> {
  items: readonly T[];
  total: number;
}

export interface YearCount {
  year: string;
  count: number;
}

export interface AuthorCount {
  author: string;
  count: number;
}

export interface LetterCount {
  letter: string;
  count: number;
}

export interface CacheStatus {
  /** Number of enumerated paths, null while the enumeration is cold */
  paths: number | null;
  indexes: boolean;
  recent: boolean;
}

export const MIME_TYPES = {
  epub: "application/epub+zip",
} as const;

/** File extensions that count as books */
export const BOOK_EXTENSIONS = Object.keys(MIME_TYPES);

export function isBookFile(filename: string): boolean {
  const dot = filename.lastIndexOf(".");
  if (dot <= 0) return false;
  return BOOK_EXTENSIONS.includes(filename.slice(dot + 1).toLowerCase());
}
