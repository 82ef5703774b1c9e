import type { ImageFetcher, OcrEngine } from "./types.js";
import { ImageTextError } from "./types.js";

/** What the fake engine does for an image: text, delayed text, an error, or never finish */
export type ScriptedOcr = string | { delayMs: number; text: string } | Error | "hang";

/** Fetcher that hands back the locator itself as the "image bytes" */
export function echoFetcher(failures: Record<string, Error> = {}): ImageFetcher {
  return async (sourceLocator) => {
    const failure = failures[sourceLocator];
    if (failure) throw failure;
    return Buffer.from(sourceLocator);
  };
}

export function fetchFailed(locator: string): ImageTextError {
  return new ImageTextError("ImageFetchFailed", `HTTP 404 for ${locator}`);
}

export class FakeOcrEngine implements OcrEngine {
  calls = 0;
  inFlight = 0;
  maxInFlight = 0;
  closed = false;

  constructor(private readonly script: Record<string, ScriptedOcr>) {}

  async recognize(image: Buffer, signal: AbortSignal): Promise<string> {
    this.calls += 1;
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await new Promise<string>((resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("fake OCR aborted")), { once: true });
        const step = this.script[image.toString()] ?? "";
        if (step === "hang") return;
        if (step instanceof Error) {
          reject(step);
          return;
        }
        if (typeof step === "string") {
          resolve(step);
          return;
        }
        setTimeout(() => resolve(step.text), step.delayMs);
      });
    } finally {
      this.inFlight -= 1;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
