/**
 * ImageTextExtractor: download + OCR every image of a page, best effort.
 *
 * Each image is an isolated task with its own timeout; a failed task yields an
 * outcome without text and the batch carries on. Up to `concurrency` tasks run
 * at once and outcomes come back in input order.
 *
 * Two things do stop the batch: the run being cancelled (Cancelled) and an OCR
 * engine that cannot start at all (EngineUnavailable).
 */

import { ScrapeError, errorMessage, isScrapeError, throwIfCancelled } from "../errors.js";
import type { ImageRef } from "../page/types.js";
import { ImageTextError, type ImageFetcher, type OcrEngine, type OcrOutcome } from "./types.js";

export type ImageTextExtractorOptions = {
  fetchImage: ImageFetcher;
  engine: OcrEngine;
  ocrTimeoutMs: number;
  concurrency: number;
};

/** Collapse whitespace runs; whitespace-only text counts as no text */
export function cleanOcrText(raw: string | undefined): string | undefined {
  const cleaned = (raw ?? "").replace(/\s+/g, " ").trim();
  return cleaned ? cleaned : undefined;
}

/** Run `worker` over `items` with at most `limit` in flight; results keep input order */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const lanes = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      results[index] = await worker(items[index], index);
    }
  });
  await Promise.all(lanes);
  return results;
}

export class ImageTextExtractor {
  private readonly options: ImageTextExtractorOptions;

  constructor(options: ImageTextExtractorOptions) {
    this.options = options;
  }

  async extractAll(images: readonly ImageRef[], signal?: AbortSignal): Promise<OcrOutcome[]> {
    throwIfCancelled(signal, "image extraction");
    // First fatal error stops lanes from picking up new images
    const batch = new AbortController();
    let fatal: unknown;
    const onRunAbort = () => batch.abort(signal?.reason);
    signal?.addEventListener("abort", onRunAbort, { once: true });

    try {
      const outcomes = await mapWithConcurrency(images, this.options.concurrency, async (image) => {
        if (batch.signal.aborted) return { sourceLocator: image.sourceLocator };
        try {
          return await this.extractOne(image, batch.signal);
        } catch (err) {
          if (!batch.signal.aborted) {
            fatal = err;
            batch.abort(err);
          }
          throw err;
        }
      });
      throwIfCancelled(signal, "image extraction");
      return outcomes;
    } catch (err) {
      throwIfCancelled(signal, "image extraction");
      throw fatal ?? err;
    } finally {
      signal?.removeEventListener("abort", onRunAbort);
    }
  }

  /** Never throws for per-image problems; rethrows only fatal engine or cancellation errors */
  private async extractOne(image: ImageRef, batchSignal: AbortSignal): Promise<OcrOutcome> {
    const { sourceLocator } = image;
    try {
      const bytes = await this.options.fetchImage(sourceLocator, batchSignal).catch((err: unknown) => {
        throw err instanceof ImageTextError
          ? err
          : new ImageTextError("ImageFetchFailed", `download failed for ${sourceLocator}: ${errorMessage(err)}`, {
              cause: err,
            });
      });
      const raw = await this.recognizeWithTimeout(bytes, batchSignal);
      const text = cleanOcrText(raw);
      return text ? { sourceLocator, text } : { sourceLocator };
    } catch (err) {
      if (isScrapeError(err, "EngineUnavailable")) throw err;
      if (batchSignal.aborted) {
        throw new ScrapeError("Cancelled", `image extraction cancelled at ${sourceLocator}`, { cause: err });
      }
      const failure =
        err instanceof ImageTextError
          ? { kind: err.kind, message: err.message }
          : { kind: "OcrEngineError" as const, message: errorMessage(err) };
      console.warn(`[ImageTextExtractor] ${failure.kind} for ${sourceLocator}: ${failure.message}`);
      return { sourceLocator, failure };
    }
  }

  private async recognizeWithTimeout(bytes: Buffer, batchSignal: AbortSignal): Promise<string> {
    const task = new AbortController();
    const onBatchAbort = () => task.abort(batchSignal.reason);
    batchSignal.addEventListener("abort", onBatchAbort, { once: true });
    const timer = setTimeout(() => {
      task.abort(new ImageTextError("OcrTimeout", `OCR exceeded ${this.options.ocrTimeoutMs}ms`));
    }, this.options.ocrTimeoutMs);

    // Engines are asked to honour the signal; the race enforces the bound regardless
    const aborted = new Promise<never>((_, reject) => {
      task.signal.addEventListener("abort", () => reject(task.signal.reason), { once: true });
    });

    try {
      return await Promise.race([this.options.engine.recognize(bytes, task.signal), aborted]);
    } catch (err) {
      const reason: unknown = task.signal.reason;
      if (task.signal.aborted && reason instanceof ImageTextError && !batchSignal.aborted) throw reason;
      throw err;
    } finally {
      clearTimeout(timer);
      batchSignal.removeEventListener("abort", onBatchAbort);
    }
  }
}
