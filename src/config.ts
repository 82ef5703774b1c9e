/**
 * Process-wide configuration, read once from the environment at startup.
 * Nothing in the pipeline re-reads process.env after this.
 */

export type ScraperConfig = {
  portalUrl: string;
  region: string;
  navigationTimeoutMs: number;
  contentTimeoutMs: number;
  headless: boolean;
  maxBrowserSessions: number;
  /** Also count video creatives on every run unless the request says otherwise */
  detectVideos: boolean;
  /** Lowercased advertiser name → advertiser id */
  advertiserIdOverrides: Map<string, string>;
  ocr: {
    language: string;
    /** Where tesseract.js loads traineddata from; unset uses its default CDN */
    langPath?: string;
    cachePath?: string;
    timeoutMs: number;
    concurrency: number;
    /** Upper bound on live tesseract workers across all runs */
    maxWorkers: number;
  };
  imageFetch: {
    timeoutMs: number;
    maxBytes: number;
    userAgent: string;
  };
  http: {
    host: string;
    port: number;
    requestDeadlineMs: number;
  };
};

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

type Env = Record<string, string | undefined>;

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw.trim(), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseBool(raw: string | undefined, fallback: boolean): boolean {
  const value = raw?.trim().toLowerCase();
  if (!value) return fallback;
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  return fallback;
}

function optionalString(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}

/** Parse "adidas=AR123,nike = AR456" into a lowercase-keyed map */
export function parseOverrides(raw: string | undefined): Map<string, string> {
  const out = new Map<string, string>();
  if (!raw) return out;
  for (const pair of raw.split(",")) {
    const eq = pair.indexOf("=");
    if (eq <= 0) continue;
    const name = pair.slice(0, eq).trim().toLowerCase();
    const id = pair.slice(eq + 1).trim();
    if (name && id) out.set(name, id);
  }
  return out;
}

export function loadScraperConfig(env: Env = process.env): ScraperConfig {
  return {
    portalUrl: optionalString(env.PORTAL_URL) ?? "https://adstransparency.google.com/",
    region: optionalString(env.PORTAL_REGION) ?? "US",
    navigationTimeoutMs: parsePositiveInt(env.NAVIGATION_TIMEOUT, 60_000),
    contentTimeoutMs: parsePositiveInt(env.WAIT_TIMEOUT, 30_000),
    headless: parseBool(env.BROWSER_HEADLESS, true),
    maxBrowserSessions: parsePositiveInt(env.MAX_BROWSER_SESSIONS, 2),
    detectVideos: parseBool(env.DETECT_VIDEOS, false),
    advertiserIdOverrides: parseOverrides(env.ADVERTISER_ID_OVERRIDES),
    ocr: {
      language: optionalString(env.OCR_LANGUAGE) ?? "eng",
      langPath: optionalString(env.OCR_LANG_PATH),
      cachePath: optionalString(env.OCR_CACHE_PATH),
      timeoutMs: parsePositiveInt(env.OCR_TIMEOUT_MS, 30_000),
      concurrency: parsePositiveInt(env.OCR_CONCURRENCY, 2),
      maxWorkers: parsePositiveInt(env.OCR_MAX_WORKERS, 4),
    },
    imageFetch: {
      timeoutMs: parsePositiveInt(env.IMAGE_FETCH_TIMEOUT_MS, 10_000),
      maxBytes: parsePositiveInt(env.IMAGE_MAX_BYTES, 10 * 1024 * 1024),
      userAgent: DEFAULT_USER_AGENT,
    },
    http: {
      host: optionalString(env.HOST) ?? "0.0.0.0",
      port: parsePositiveInt(env.PORT, 9001),
      requestDeadlineMs: parsePositiveInt(env.REQUEST_DEADLINE_MS, 180_000),
    },
  };
}
