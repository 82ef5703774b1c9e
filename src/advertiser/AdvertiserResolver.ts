/**
 * AdvertiserResolver: name → advertiser id through the portal's search box.
 *
 * Flow:
 *   1. Configured override for the name? Done, no browser needed.
 *   2. Open the portal home, type the name into the search input and submit it
 *   3. Wait for results; none → the portal may have routed straight to the
 *      advertiser page, or the id may be on the page itself; otherwise
 *      NoSearchResults
 *   4. Trust the portal's ranking: take the first result
 *   5. Result without an id → click it and read the id from the URL
 */

import type { BrowserSession } from "../browser/types.js";
import { ScrapeError, isScrapeError } from "../errors.js";
import { ADVERTISER_URL_RE, extractAdvertiserIdFromUrl } from "./advertiserId.js";
import {
  SEARCH_INPUT_SELECTOR,
  SEARCH_RESULT_SELECTOR,
  findAdvertiserIdInPage,
  parseSearchCandidates,
} from "./searchResults.js";
import type { ResolveTimeouts, ResolvedAdvertiser } from "./types.js";

export type AdvertiserResolverOptions = {
  portalUrl: string;
  /** Lowercased name → id shortcuts */
  overrides?: ReadonlyMap<string, string>;
};

export class AdvertiserResolver {
  private readonly portalUrl: string;
  private readonly overrides: ReadonlyMap<string, string>;

  constructor(options: AdvertiserResolverOptions) {
    this.portalUrl = options.portalUrl;
    this.overrides = options.overrides ?? new Map<string, string>();
  }

  /** Override lookup only; an overridden name never goes through the portal search */
  lookupOverride(name: string): ResolvedAdvertiser | undefined {
    const id = this.overrides.get(name.trim().toLowerCase());
    return id ? { advertiserId: id, source: "override" } : undefined;
  }

  async resolve(session: BrowserSession, name: string, timeouts: ResolveTimeouts): Promise<ResolvedAdvertiser> {
    const query = name.trim();
    if (!query) throw new ScrapeError("InvalidQuery", "advertiser name cannot be empty");

    const override = this.lookupOverride(query);
    if (override) return override;

    await session.navigate(this.portalUrl, timeouts.navigationTimeoutMs);
    await session.waitForContent(SEARCH_INPUT_SELECTOR, timeouts.contentTimeoutMs);
    await session.type(SEARCH_INPUT_SELECTOR, query, { submit: true });

    try {
      await session.waitForContent(SEARCH_RESULT_SELECTOR, timeouts.contentTimeoutMs);
    } catch (err) {
      if (!isScrapeError(err, "ContentTimeout")) throw err;
      const routed = extractAdvertiserIdFromUrl(await session.currentUrl());
      if (routed) return { advertiserId: routed, source: "url" };
      return this.fromPageContent(session, query, err);
    }

    const candidates = parseSearchCandidates(await session.snapshot());
    const first = candidates[0];
    if (!first) return this.fromPageContent(session, query);
    if (first.advertiserId) {
      return { advertiserId: first.advertiserId, source: "search" };
    }

    // Suggestions often carry no id in markup; selecting one routes to /advertiser/<id>
    try {
      await session.clickFirst(SEARCH_RESULT_SELECTOR, timeouts.contentTimeoutMs);
      await session.waitForUrl(ADVERTISER_URL_RE, timeouts.contentTimeoutMs);
    } catch (err) {
      if (!isScrapeError(err, "ContentTimeout")) throw err;
      throw new ScrapeError(
        "AdvertiserIdMissing",
        `search result "${first.displayName}" did not lead to an advertiser page`,
        { cause: err },
      );
    }

    const fromUrl = extractAdvertiserIdFromUrl(await session.currentUrl());
    if (!fromUrl) {
      throw new ScrapeError("AdvertiserIdMissing", `no advertiser id in search result "${first.displayName}"`);
    }
    return { advertiserId: fromUrl, source: "url" };
  }

  private async fromPageContent(session: BrowserSession, query: string, cause?: unknown): Promise<ResolvedAdvertiser> {
    const id = findAdvertiserIdInPage(await session.snapshot());
    if (id) {
      console.info(`[AdvertiserResolver] no result items for "${query}", using ${id} found on the page`);
      return { advertiserId: id, source: "content" };
    }
    throw new ScrapeError("NoSearchResults", `no advertiser found for "${query}"`, { cause });
  }
}
