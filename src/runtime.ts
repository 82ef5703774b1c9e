/**
 * Wires the production engines (chromium via playwright-core, tesseract.js,
 * undici) into a ScrapePipeline. Shared by the HTTP server and the CLI.
 */

import { AdvertiserResolver } from "./advertiser/AdvertiserResolver.js";
import { BrowserManager } from "./browser/BrowserManager.js";
import { SessionPool } from "./browser/SessionPool.js";
import type { ScraperConfig } from "./config.js";
import { ImageTextExtractor } from "./ocr/ImageTextExtractor.js";
import { TesseractOcrEngine } from "./ocr/TesseractOcrEngine.js";
import { createHttpImageFetcher } from "./ocr/imageFetcher.js";
import { ScrapePipeline } from "./pipeline/ScrapePipeline.js";

export type ScraperRuntime = {
  pipeline: ScrapePipeline;
  pool: SessionPool;
  /** Reject queued runs, then shut down the browser and OCR workers */
  close(): Promise<void>;
};

export function createScraperRuntime(config: ScraperConfig): ScraperRuntime {
  const browser = new BrowserManager({ headless: config.headless, userAgent: config.imageFetch.userAgent });
  const pool = new SessionPool(browser, config.maxBrowserSessions);
  const engine = new TesseractOcrEngine({
    language: config.ocr.language,
    langPath: config.ocr.langPath,
    cachePath: config.ocr.cachePath,
    maxWorkers: config.ocr.maxWorkers,
  });

  const pipeline = new ScrapePipeline({
    pool,
    resolver: new AdvertiserResolver({ portalUrl: config.portalUrl, overrides: config.advertiserIdOverrides }),
    extractor: new ImageTextExtractor({
      fetchImage: createHttpImageFetcher(config.imageFetch),
      engine,
      ocrTimeoutMs: config.ocr.timeoutMs,
      concurrency: config.ocr.concurrency,
    }),
    portalUrl: config.portalUrl,
    region: config.region,
    navigationTimeoutMs: config.navigationTimeoutMs,
    contentTimeoutMs: config.contentTimeoutMs,
    detectVideos: config.detectVideos,
  });

  return {
    pipeline,
    pool,
    async close() {
      pool.drain();
      await Promise.allSettled([browser.close(), engine.close()]);
    },
  };
}
