import { realpathSync } from "node:fs";
import { isAbsolute, join, normalize, relative, sep } from "node:path";

const DANGEROUS_PATTERNS = ["..", "~"];

/**
 * True when `relativePath` carries a traversal sequence: `..`, `~`,
 * a NUL byte, or any segment starting with a dot (hidden files included).
 *
 * @example
 * hasTraversal("Fiction/book.epub") => false
 * hasTraversal("../etc/passwd") => true
 * hasTraversal("Fiction/.cache/book.epub") => true
 */
export function hasTraversal(relativePath: string): boolean {
  if (relativePath.includes("\0")) return true;
  if (DANGEROUS_PATTERNS.some((pattern) => relativePath.includes(pattern))) return true;

  const segments = relativePath.replace(/\\/g, "/").split("/");
  return segments.some((segment) => segment.startsWith("."));
}

/**
 * Canonical containment check. Both paths go through realpath, so symlinks
 * pointing outside the root are caught. Anything that cannot be resolved is
 * reported as not contained.
 */
export function isContained(root: string, candidate: string): boolean {
  try {
    const realRoot = realpathSync(root);
    const realCandidate = realpathSync(candidate);
    return realCandidate === realRoot || realCandidate.startsWith(realRoot + sep);
  } catch {
    return false;
  }
}

/**
 * Lexical join of a user-supplied path onto `basePath`.
 * Returns null for absolute paths, NUL bytes and anything that escapes the base.
 */
export function resolveSafePath(basePath: string, userPath: string): string | null {
  if (userPath.includes("\0")) return null;
  if (isAbsolute(userPath)) return null;
  const fullPath = normalize(join(basePath, userPath));
  const normalizedBase = normalize(basePath);
  if (!fullPath.startsWith(normalizedBase + sep) && fullPath !== normalizedBase) {
    return null;
  }
  return fullPath;
}

/** Root-relative identity key, always `/`-separated */
export function toRelativePath(root: string, absolutePath: string): string {
  return relative(root, absolutePath).split(sep).join("/");
}

export function encodeUrlPath(path: string): string {
  return path.split("/").map(encodeURIComponent).join("/");
}
