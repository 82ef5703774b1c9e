/** Advertiser ids on the portal look like AR followed by a long run of digits */
const AR_ID_RE = /\bAR\d{8,}\b/;
const ADVERTISER_PATH_RE = /advertiser\/([A-Z0-9]+)/;
const ID_PARAM_RE = /[?&]id=([A-Z0-9]+)/;

/** Matches an advertiser page URL; used to wait for navigation after a click */
export const ADVERTISER_URL_RE = /\/advertiser\/AR\d+/;

export function findAdvertiserId(text: string | undefined): string | undefined {
  if (!text) return undefined;
  return AR_ID_RE.exec(text)?.[0];
}

/**
 * Pull an advertiser id out of a portal URL:
 *   /advertiser/<ID>, then a bare AR id anywhere, then ?id=<ID>
 */
export function extractAdvertiserIdFromUrl(url: string): string | undefined {
  const fromPath = ADVERTISER_PATH_RE.exec(url)?.[1];
  if (fromPath) return fromPath;
  return findAdvertiserId(url) ?? ID_PARAM_RE.exec(url)?.[1];
}

export function advertiserPageUrl(portalUrl: string, advertiserId: string, region: string): string {
  const url = new URL(`advertiser/${encodeURIComponent(advertiserId)}`, portalUrl);
  if (region) url.searchParams.set("region", region);
  return url.href;
}

/** Same page filtered to video creatives */
export function advertiserVideoPageUrl(portalUrl: string, advertiserId: string, region: string): string {
  const url = new URL(advertiserPageUrl(portalUrl, advertiserId, region));
  url.searchParams.set("format", "VIDEO");
  return url.href;
}
