export const UNKNOWN = "Unknown";

/** Sentinel letter for authors that do not start with a letter */
export const NON_LETTER = "#";

export const MAX_PAGE = 10000;
export const DEFAULT_PAGE_SIZE = 25;
export const DEFAULT_RECENT_LIMIT = 25;
export const DEFAULT_RECENT_TTL_SECONDS = 300;

export const WATCH_DEBOUNCE_MS = 500;
export const WATCH_MAX_WAIT_MS = 5000;

export const COVER_CACHE_MAX_AGE = 86400; // 1 day
export const PLACEHOLDER_CACHE_MAX_AGE = 3600; // 1 hour
