import { MAX_PAGE } from "../constants.ts";

export type PageRel = "self" | "first" | "next" | "previous" | "last";

export interface PageLink {
  rel: PageRel;
  href: string;
  page: number;
}

export function totalPages(count: number, size: number): number {
  return Math.max(1, Math.ceil(count / size));
}

/** Clamps a requested page into [1, cap]; anything non-finite becomes page 1 */
export function clampPage(page: number | undefined, cap = MAX_PAGE): number {
  if (page === undefined || !Number.isFinite(page)) return 1;
  return Math.min(Math.max(1, Math.trunc(page)), cap);
}

export function pageSlice<T>(items: readonly T[], page: number, size: number): T[] {
  const start = (page - 1) * size;
  return items.slice(start, start + size);
}

function pageHref(path: string, page: number, params: Record<string, string>): string {
  const query = new URLSearchParams(params);
  query.set("page", String(page));
  return `${path}?${query.toString()}`;
}

/**
 * Link relations for one page of a listing.
 *
 * @example
 * paginationLinks("/opds/books", 2, 1, 2)
 * // => self (page 2), first (1), previous (1), last (2)
 */
export function paginationLinks(
  path: string,
  page: number,
  size: number,
  count: number,
  params: Record<string, string> = {},
): PageLink[] {
  const pages = totalPages(count, size);
  const link = (rel: PageRel, target: number): PageLink => ({ rel, page: target, href: pageHref(path, target, params) });

  const links: PageLink[] = [link("self", page)];
  if (pages > 1) links.push(link("first", 1));
  if (page < pages) links.push(link("next", page + 1));
  if (page > 1) links.push(link("previous", page - 1));
  if (pages > 1) links.push(link("last", pages));
  return links;
}
