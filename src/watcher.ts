import chokidar from "chokidar";
import { basename } from "node:path";
import { WATCH_DEBOUNCE_MS, WATCH_MAX_WAIT_MS } from "./constants.ts";
import { createDebouncer } from "./event/debouncer.ts";
import { log } from "./logging/index.ts";
import { isBookFile } from "./types.ts";

export type WatchEventName = "add" | "change" | "unlink" | "addDir" | "unlinkDir";

export interface WatchEvent {
  event: WatchEventName;
  path: string;
}

export interface WatcherOptions {
  root: string;
  usePolling: boolean;
  /** Called once per debounced burst of relevant changes */
  onInvalidate: (batch: WatchEvent[]) => void;
}

/** Directory events always matter; file events only for book files */
export function isRelevantChange(event: WatchEventName, path: string): boolean {
  if (basename(path).startsWith(".")) return false;
  if (event === "addDir" || event === "unlinkDir") return true;
  return isBookFile(basename(path));
}

export interface LibraryWatcher {
  close(): Promise<void>;
}

/**
 * Watches the content root and reports changes that make the cached
 * enumeration out of date. Nothing is rebuilt here.
 */
export function startWatcher(options: WatcherOptions): LibraryWatcher {
  const debouncer = createDebouncer<WatchEvent>(
    (batch) => {
      log.info("Watch", "Library changed", { pending: batch.length });
      options.onInvalidate(batch);
    },
    { debounceMs: WATCH_DEBOUNCE_MS, maxWaitMs: WATCH_MAX_WAIT_MS },
  );

  const watcher = chokidar.watch(options.root, {
    ignored: (path, stats) =>
      path !== options.root &&
      (basename(path).startsWith(".") || (stats?.isFile() === true && !isBookFile(basename(path)))),
    persistent: true,
    ignoreInitial: true,
    usePolling: options.usePolling,
    interval: 1000,
  });

  const handle = (event: WatchEventName) => (path: string) => {
    if (!isRelevantChange(event, path)) return;
    log.debug("Watch", `${event}: ${path}`, { event, path });
    debouncer.push(`${event}:${path}`, { event, path });
  };

  watcher
    .on("add", handle("add"))
    .on("change", handle("change"))
    .on("unlink", handle("unlink"))
    .on("addDir", handle("addDir"))
    .on("unlinkDir", handle("unlinkDir"))
    .on("error", (error) => log.error("Watch", "Watcher error", error));

  log.info("Watch", `Watching ${options.root}`, { root: options.root });

  return {
    async close() {
      debouncer.cancel();
      await watcher.close();
    },
  };
}
