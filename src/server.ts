/**
 * HTTP entry point: `tsx src/server.ts`.
 *
 * Config is read once from the environment; SIGINT/SIGTERM stop accepting
 * requests, then close the browser and OCR workers.
 */

import { loadScraperConfig } from "./config.js";
import { createScrapeApp } from "./http/app.js";
import { createScraperRuntime } from "./runtime.js";

async function main(): Promise<void> {
  const config = loadScraperConfig();
  const runtime = createScraperRuntime(config);
  const app = createScrapeApp(runtime.pipeline, { requestDeadlineMs: config.http.requestDeadlineMs });

  const server = app.listen(config.http.port, config.http.host, () => {
    console.info(`[server] listening on http://${config.http.host}:${config.http.port}`);
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.info(`[server] ${signal} received, shutting down`);
    server.close((err) => {
      if (err) console.warn("[server] close error:", err);
    });
    runtime
      .close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error("[server] shutdown failed:", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`server failed to start: ${message}`);
  process.exit(1);
});
