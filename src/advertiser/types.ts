export type AdvertiserQuery = {
  name: string;
};

export type SearchCandidate = {
  /** Absent when the rendered result carries no parseable id */
  advertiserId?: string;
  displayName: string;
};

/** "content": id found on the page itself when no result items rendered */
export type ResolutionSource = "override" | "search" | "url" | "content";

export type ResolvedAdvertiser = {
  readonly advertiserId: string;
  readonly source: ResolutionSource;
};

export type ResolveTimeouts = {
  navigationTimeoutMs: number;
  contentTimeoutMs: number;
};
