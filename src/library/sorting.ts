import { basename } from "node:path";
import { NON_LETTER, UNKNOWN } from "../constants.ts";

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareIgnoreCase(a: string, b: string): number {
  return compareStrings(a.toLowerCase(), b.toLowerCase()) || compareStrings(a, b);
}

/** Filename order, case-insensitive; the full path breaks ties so the order is total */
export function compareByFilename(a: string, b: string): number {
  return compareIgnoreCase(basename(a), basename(b)) || compareStrings(a, b);
}

/** Newest years first, "Unknown" last */
export function compareYears(a: string, b: string): number {
  if (a === b) return 0;
  if (a === UNKNOWN) return 1;
  if (b === UNKNOWN) return -1;
  return Number(b) - Number(a) || compareStrings(a, b);
}

/** Alphabetical, case-insensitive, "Unknown" last */
export function compareAuthors(a: string, b: string): number {
  if (a === b) return 0;
  if (a === UNKNOWN) return 1;
  if (b === UNKNOWN) return -1;
  return compareIgnoreCase(a, b);
}

const LETTER = /^\p{L}$/u;

/**
 * Navigation letter of an author: the upper-cased first character, or "#"
 * for "Unknown" and names that do not start with a letter.
 */
export function authorLetter(author: string): string {
  if (author === UNKNOWN) return NON_LETTER;
  const first = Array.from(author.trim())[0];
  if (first === undefined || !LETTER.test(first)) return NON_LETTER;
  return first.toUpperCase();
}

export function matchesLetter(author: string, letter: string): boolean {
  if (letter === NON_LETTER) return authorLetter(author) === NON_LETTER;
  return authorLetter(author) === letter.toUpperCase();
}

export function compareLetters(a: string, b: string): number {
  if (a === b) return 0;
  if (a === NON_LETTER) return 1;
  if (b === NON_LETTER) return -1;
  return compareStrings(a, b);
}
