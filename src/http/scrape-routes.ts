/**
 * Express route handlers for the scraper API.
 *
 * Routes:
 *   POST /scrape   { advertiser_name, include_videos? }
 *                    → { advertiser_id, tags, image_text, has_videos?, video_count? }
 *   GET  /ping                          → liveness
 *
 * A run is aborted when the client disconnects or the request deadline passes.
 */

import type { Request, Response, Router } from "express";
import { ScrapeError, errorMessage, type ScrapeFailureKind } from "../errors.js";
import type { ScrapePipeline } from "../pipeline/ScrapePipeline.js";

export const SERVICE_VERSION = "1.0.0";

export type ScrapeRunner = Pick<ScrapePipeline, "run">;

export type ScrapeRouteOptions = {
  requestDeadlineMs: number;
};

const STATUS_BY_KIND: Record<ScrapeFailureKind, number> = {
  InvalidQuery: 400,
  NoSearchResults: 404,
  AdvertiserIdMissing: 502,
  NavigationError: 502,
  EmptyDocument: 502,
  NavigationTimeout: 504,
  ContentTimeout: 504,
  EngineUnavailable: 503,
  // nginx's "client closed request"
  Cancelled: 499,
};

export function httpStatusForFailure(err: unknown): number {
  return err instanceof ScrapeError ? STATUS_BY_KIND[err.kind] : 500;
}

function readAdvertiserName(body: unknown): string | undefined {
  if (typeof body !== "object" || body === null || !("advertiser_name" in body)) return undefined;
  const name = body.advertiser_name;
  return typeof name === "string" && name.trim() ? name : undefined;
}

/** undefined leaves the server default in place */
function readIncludeVideos(body: unknown): boolean | undefined {
  if (typeof body !== "object" || body === null || !("include_videos" in body)) return undefined;
  return typeof body.include_videos === "boolean" ? body.include_videos : undefined;
}

export function registerScrapeRoutes(router: Router, pipeline: ScrapeRunner, options: ScrapeRouteOptions): void {
  router.get("/ping", (_req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString(), version: SERVICE_VERSION });
  });

  // POST /scrape  { "advertiser_name": "nike" }
  router.post("/scrape", async (req: Request, res: Response) => {
    const name = readAdvertiserName(req.body);
    if (!name) {
      res.status(400).json({ error: "InvalidQuery", detail: "advertiser_name must be a non-empty string" });
      return;
    }

    const controller = new AbortController();
    const deadline = setTimeout(() => {
      controller.abort(new Error(`request deadline of ${options.requestDeadlineMs}ms exceeded`));
    }, options.requestDeadlineMs);
    res.on("close", () => {
      if (!res.writableEnded) controller.abort(new Error("client disconnected"));
    });

    try {
      const result = await pipeline.run(
        { name },
        { signal: controller.signal, detectVideos: readIncludeVideos(req.body) },
      );
      res.json(result);
    } catch (err) {
      const status = httpStatusForFailure(err);
      if (status === 500) console.error(`[scrape-routes] unexpected failure for "${name}":`, err);
      if (res.writableEnded || res.destroyed) return;
      res.status(status).json(
        err instanceof ScrapeError
          ? { error: err.kind, detail: err.detail }
          : { error: "InternalError", detail: errorMessage(err) },
      );
    } finally {
      clearTimeout(deadline);
    }
  });
}
