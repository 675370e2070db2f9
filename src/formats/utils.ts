import { XMLParser } from "fast-xml-parser";
import { UNKNOWN } from "../constants.ts";

export function createXmlParser(arrayTags: string[] = []): XMLParser {
  return new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    removeNSPrefix: true,
    parseTagValue: false,
    htmlEntities: true,
    isArray: (name) => arrayTags.includes(name),
  });
}

/**
 * Text of an element, whether the parser gave a string, a number or a node with attributes. Blank is absent.
 * Entities are already decoded by the parser; the text is taken as is.
 */
export function getString(val: unknown): string | undefined {
  let text: string | undefined;
  if (typeof val === "string") text = val;
  else if (typeof val === "number") text = String(val);
  else if (typeof val === "object" && val !== null && "#text" in val) text = String(val["#text"]);
  if (text === undefined) return undefined;
  return text.trim() || undefined;
}

export function getFirstString(val: unknown): string | undefined {
  if (Array.isArray(val)) return getString(val[0]);
  return getString(val);
}

/**
 * Year part of a publication date, "Unknown" when there is none.
 *
 * @example
 * parseYear("2001-05-12") => "2001"
 * parseYear("circa 1900") => "Unknown"
 */
export function parseYear(date: string | undefined): string {
  if (!date) return UNKNOWN;
  const match = date.trim().match(/^(\d{4})/);
  return match?.[1] ?? UNKNOWN;
}
