import { ScrapeError, errorMessage } from "../errors.js";

const NETWORK_ERROR_MARKERS = ["net::ERR_", "NS_ERROR_", "ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN"];

export function normalizeTimeoutMs(timeoutMs: number | undefined, fallback: number): number {
  return Math.max(500, Math.min(300_000, timeoutMs ?? fallback));
}

/** Playwright throws errors.TimeoutError, which keeps the name "TimeoutError" */
export function isPlaywrightTimeout(err: unknown): boolean {
  return err instanceof Error && err.name === "TimeoutError";
}

export function isBrowserClosedError(err: unknown): boolean {
  const message = errorMessage(err);
  return (
    message.includes("Target page, context or browser has been closed") ||
    message.includes("Target closed") ||
    message.includes("Browser has been closed")
  );
}

/** Map a page.goto failure onto the navigation taxonomy */
export function toNavigationError(err: unknown, url: string): ScrapeError {
  if (err instanceof ScrapeError) return err;
  if (isPlaywrightTimeout(err)) {
    return new ScrapeError("NavigationTimeout", `page did not load within the timeout: ${url}`, { cause: err });
  }
  if (isBrowserClosedError(err)) {
    return new ScrapeError("EngineUnavailable", `browser went away while loading ${url}`, { cause: err });
  }
  const message = errorMessage(err);
  const marker = NETWORK_ERROR_MARKERS.find((m) => message.includes(m));
  const reason = marker ? message.slice(message.indexOf(marker)).split(/\s/)[0] : message;
  return new ScrapeError("NavigationError", `failed to load ${url}: ${reason}`, { cause: err });
}

/** Map a waitForSelector / waitForURL failure; non-timeouts are navigation failures */
export function toContentWaitError(err: unknown, what: string): ScrapeError {
  if (err instanceof ScrapeError) return err;
  if (isPlaywrightTimeout(err)) {
    return new ScrapeError("ContentTimeout", `timed out waiting for ${what}`, { cause: err });
  }
  if (isBrowserClosedError(err)) {
    return new ScrapeError("EngineUnavailable", `browser went away while waiting for ${what}`, { cause: err });
  }
  return new ScrapeError("NavigationError", `error while waiting for ${what}: ${errorMessage(err)}`, { cause: err });
}
