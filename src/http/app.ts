import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { registerScrapeRoutes, type ScrapeRouteOptions, type ScrapeRunner } from "./scrape-routes.js";

/** Body parser failures (malformed JSON, oversized body) answer in the API's error shape */
function jsonErrorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  const status =
    typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;
  const detail = status === 400 ? "request body is not valid JSON" : err instanceof Error ? err.message : String(err);
  res.status(status).json({ error: status < 500 ? "InvalidQuery" : "InternalError", detail });
}

export function createScrapeApp(pipeline: ScrapeRunner, options: ScrapeRouteOptions): Express {
  const app = express();
  app.use(express.json({ limit: "16kb" }));
  const router = express.Router();
  registerScrapeRoutes(router, pipeline, options);
  app.use(router);
  app.use(jsonErrorHandler);
  return app;
}
