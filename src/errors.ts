/**
 * Failure taxonomy for a scrape run.
 *
 * Every fatal failure surfaces as a ScrapeError carrying one of these kinds.
 * Per-image failures never become ScrapeErrors; they are absorbed into
 * OcrOutcome by the ImageTextExtractor.
 */

export type ScrapeFailureKind =
  | "InvalidQuery"
  | "EngineUnavailable"
  | "NoSearchResults"
  | "AdvertiserIdMissing"
  | "NavigationTimeout"
  | "NavigationError"
  | "ContentTimeout"
  | "EmptyDocument"
  | "Cancelled";

export class ScrapeError extends Error {
  readonly kind: ScrapeFailureKind;
  readonly detail: string;

  constructor(kind: ScrapeFailureKind, detail: string, options?: { cause?: unknown }) {
    super(`${kind}: ${detail}`, options);
    this.name = "ScrapeError";
    this.kind = kind;
    this.detail = detail;
  }
}

export function isScrapeError(err: unknown, kind?: ScrapeFailureKind): err is ScrapeError {
  return err instanceof ScrapeError && (kind === undefined || err.kind === kind);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Throws Cancelled if the signal has fired */
export function throwIfCancelled(signal: AbortSignal | undefined, what = "run"): void {
  if (signal?.aborted) {
    throw new ScrapeError("Cancelled", `${what} cancelled: ${describeAbortReason(signal.reason)}`);
  }
}

export function describeAbortReason(reason: unknown): string {
  if (reason instanceof Error) return reason.message;
  if (typeof reason === "string" && reason) return reason;
  return "aborted";
}
