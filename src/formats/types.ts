/** Bibliographic fields a format handler can report. Absent means unknown. */
export interface BookMetadata {
  title?: string;
  author?: string;
  /** Raw publication date as written in the book, e.g. "2001-05-12" */
  date?: string;
}

export type MetadataField = keyof BookMetadata;

export const ALL_FIELDS: readonly MetadataField[] = ["title", "author", "date"];

export interface CoverImage {
  data: Buffer;
  mimeType: string;
}

export interface FormatHandler {
  getMetadata(fields: readonly MetadataField[]): BookMetadata;
  getCover(): Promise<CoverImage | null>;
  /** Releases the open book file */
  close(): void;
}

export type FormatHandlerFactory = (filePath: string) => Promise<FormatHandler | null>;

export interface FormatHandlerRegistration {
  extensions: string[];
  create: FormatHandlerFactory;
}
