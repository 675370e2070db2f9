const collator = new Intl.Collator(undefined, { numeric: true, sensitivity: "base" });

export function naturalSort(a: string, b: string): number {
  return collator.compare(a, b);
}

export type FeedKind = "navigation" | "acquisition";

export function feedContentType(kind: FeedKind): string {
  return `application/atom+xml;profile=opds-catalog;kind=${kind}`;
}

/** "All Books (Page 2 of 3)"; the bare title when everything fits on one page */
export function pageTitle(title: string, page: number, pages: number): string {
  return pages > 1 ? `${title} (Page ${page} of ${pages})` : title;
}

export function countLabel(count: number, noun: string): string {
  return count === 1 ? `1 ${noun}` : `${count} ${noun}s`;
}
