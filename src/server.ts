import { Effect } from "effect";
import { createServer } from "node:http";
import { loadConfig } from "./config.ts";
import { makeRuntime } from "./effect/runtime.ts";
import { LibraryIndexService } from "./library/library-index.ts";
import { log } from "./logging/index.ts";
import { toRequest, writeResponse } from "./http.ts";
import { createRouter } from "./routes/index.ts";
import { startWatcher } from "./watcher.ts";
import type { LibraryWatcher } from "./watcher.ts";

async function main(): Promise<void> {
  const config = loadConfig();
  const runtime = makeRuntime(config);
  const router = createRouter(runtime);

  let watcher: LibraryWatcher | null = null;
  if (config.watch) {
    watcher = startWatcher({
      root: config.filesPath,
      usePolling: config.devMode,
      onInvalidate: () => {
        void runtime
          .runPromise(Effect.flatMap(LibraryIndexService, (index) => index.invalidate()))
          .catch((error: unknown) => log.error("Watch", "Invalidation failed", error));
      },
    });
  }

  const server = createServer((req, res) => {
    void router(toRequest(req))
      .then((response) => writeResponse(res, response, req.method))
      .catch((error: unknown) => {
        log.error("Server", "Failed to write response", error, { method: req.method, path: req.url });
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
  });

  server.listen(config.port, () => {
    log.info("Server", `Listening on http://localhost:${config.port}`, {
      root: config.filesPath,
      port: config.port,
      page_size: config.pageSize,
      ttl_seconds: config.recentTtlSeconds,
      watch: config.watch,
      devMode: config.devMode,
    });
  });

  const shutdown = async () => {
    log.info("Server", "Shutting down");
    server.close();
    if (watcher) await watcher.close();
    await runtime.dispose();
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((error: unknown) => {
  log.error("Server", "Startup failed", error);
  process.exit(1);
});
