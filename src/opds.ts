import { XMLBuilder } from "fast-xml-parser";
import type { XmlBuilderOptions } from "fast-xml-parser";
import { UNKNOWN } from "./constants.ts";
import type { BookEntry } from "./types.ts";
import { MIME_TYPES } from "./types.ts";
import type { FeedKind } from "./utils/opds.ts";
import { feedContentType } from "./utils/opds.ts";
import { encodeUrlPath } from "./utils/path.ts";

const ATOM_NS = "http://www.w3.org/2005/Atom";
const DC_NS = "http://purl.org/dc/terms/";
const OPDS_NS = "http://opds-spec.org/2010/catalog";

export const STYLESHEET_HREF = "/opds_to_html.xslt";

export const REL = {
  acquisition: "http://opds-spec.org/acquisition/open-access",
  image: "http://opds-spec.org/image",
  thumbnail: "http://opds-spec.org/image/thumbnail",
  subsection: "subsection",
} as const;

const BUILDER_OPTIONS: Partial<XmlBuilderOptions> = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
};

const builder = new XMLBuilder(BUILDER_OPTIONS);

export interface FeedLink {
  rel: string;
  href: string;
  type: string;
  title?: string;
}

export interface NavigationEntry {
  kind: "navigation";
  id: string;
  title: string;
  href: string;
  /** Kind of the feed the entry leads to */
  target: FeedKind;
  content?: string;
}

export interface BookFeedEntry {
  kind: "book";
  book: BookEntry;
}

export type FeedEntry = NavigationEntry | BookFeedEntry;

export interface FeedDocument {
  id: string;
  title: string;
  kind: FeedKind;
  links: readonly FeedLink[];
  entries: readonly FeedEntry[];
  updated?: Date;
}

export function navigationEntry(
  id: string,
  title: string,
  href: string,
  target: FeedKind,
  content?: string,
): NavigationEntry {
  return { kind: "navigation", id, title, href, target, content };
}

export function bookEntry(book: BookEntry): BookFeedEntry {
  return { kind: "book", book };
}

function linkNode(link: FeedLink) {
  return {
    "@_rel": link.rel,
    "@_href": link.href,
    "@_type": link.type,
    ...(link.title ? { "@_title": link.title } : {}),
  };
}

/** Acquisition, cover and thumbnail links of a book */
export function bookLinks(book: BookEntry): FeedLink[] {
  const encoded = encodeUrlPath(book.relativePath);
  return [
    { rel: REL.acquisition, href: `/download/${encoded}`, type: MIME_TYPES.epub },
    { rel: REL.image, href: `/cover/${encoded}`, type: "image/jpeg" },
    { rel: REL.thumbnail, href: `/cover/${encoded}`, type: "image/jpeg" },
  ];
}

function entryNode(entry: FeedEntry, updated: string) {
  if (entry.kind === "navigation") {
    return {
      id: entry.id,
      title: entry.title,
      updated,
      ...(entry.content ? { content: { "@_type": "text", "#text": entry.content } } : {}),
      link: [linkNode({ rel: REL.subsection, href: entry.href, type: feedContentType(entry.target) })],
    };
  }

  const { book } = entry;
  return {
    id: `urn:opds:book:${book.relativePath}`,
    title: book.title,
    author: { name: book.author },
    updated: new Date(book.mtime).toISOString(),
    ...(book.year !== UNKNOWN ? { "dc:issued": book.year } : {}),
    link: bookLinks(book).map(linkNode),
  };
}

/** Serializes an OPDS 1.2 catalog feed to Atom XML */
export function renderFeed(feed: FeedDocument): string {
  const updated = (feed.updated ?? new Date()).toISOString();
  const xml: string = builder.build({
    "?xml": { "@_version": "1.0", "@_encoding": "utf-8" },
    "?xml-stylesheet": { "@_type": "text/xsl", "@_href": STYLESHEET_HREF },
    feed: {
      "@_xmlns": ATOM_NS,
      "@_xmlns:dc": DC_NS,
      "@_xmlns:opds": OPDS_NS,
      id: feed.id,
      title: feed.title,
      updated,
      link: feed.links.map(linkNode),
      entry: feed.entries.map((entry) => entryNode(entry, updated)),
    },
  });
  return xml;
}
