/**
 * Image OCR types. Per-image failures stay inside OcrOutcome and never fail a run.
 */

export type ImageFailureKind = "ImageFetchFailed" | "OcrTimeout" | "OcrEngineError";

export type OcrOutcome = {
  sourceLocator: string;
  /** Cleaned text; absent when the image failed or held no readable text */
  text?: string;
  failure?: { kind: ImageFailureKind; message: string };
};

export class ImageTextError extends Error {
  readonly kind: ImageFailureKind;

  constructor(kind: ImageFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ImageTextError";
    this.kind = kind;
  }
}

/** Download image bytes; throws ImageTextError("ImageFetchFailed") */
export type ImageFetcher = (sourceLocator: string, signal: AbortSignal) => Promise<Buffer>;

export interface OcrEngine {
  /**
   * Recognize text in an image. Must stop work and reject when the signal aborts.
   * Throws ScrapeError("EngineUnavailable") when the engine cannot start at all.
   */
  recognize(image: Buffer, signal: AbortSignal): Promise<string>;
  close(): Promise<void>;
}
