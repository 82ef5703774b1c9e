export { AdvertiserResolver } from "./advertiser/AdvertiserResolver.js";
export { advertiserPageUrl, extractAdvertiserIdFromUrl } from "./advertiser/advertiserId.js";
export { parseSearchCandidates } from "./advertiser/searchResults.js";
export type { AdvertiserQuery, ResolvedAdvertiser, SearchCandidate } from "./advertiser/types.js";
export * from "./browser/index.js";
export { loadScraperConfig, type ScraperConfig } from "./config.js";
export { ScrapeError, isScrapeError, type ScrapeFailureKind } from "./errors.js";
export { createScrapeApp } from "./http/app.js";
export { httpStatusForFailure, registerScrapeRoutes } from "./http/scrape-routes.js";
export * from "./ocr/index.js";
export { DomInventory } from "./page/DomInventory.js";
export type { ImageRef, PageInventory } from "./page/types.js";
export * from "./pipeline/index.js";
export { createScraperRuntime, type ScraperRuntime } from "./runtime.js";
