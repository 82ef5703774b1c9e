/**
 * TesseractOcrEngine: OcrEngine backed by tesseract.js workers.
 *
 * Workers are created lazily, reused across images and capped at maxWorkers;
 * jobs beyond the cap wait in arrival order. A worker whose job is aborted
 * (timeout or cancellation) is terminated rather than returned, since
 * tesseract.js cannot interrupt a recognize() call in place.
 */

import Tesseract from "tesseract.js";
import type { Worker } from "tesseract.js";
import { ScrapeError, errorMessage } from "../errors.js";
import { ImageTextError, type OcrEngine } from "./types.js";

export type TesseractOcrEngineOptions = {
  language: string;
  /** traineddata location (directory or URL) */
  langPath?: string;
  cachePath?: string;
  /** Upper bound on live workers, busy or idle; extra jobs queue FIFO */
  maxWorkers?: number;
};

type WorkerWaiter = {
  /** undefined: a slot was reserved and the waiter starts its own worker */
  grant: (worker: Worker | undefined) => void;
  reject: (err: Error) => void;
};

export class TesseractOcrEngine implements OcrEngine {
  private readonly options: TesseractOcrEngineOptions;
  private readonly maxWorkers: number;
  private readonly idle: Worker[] = [];
  private readonly busy = new Set<Worker>();
  private readonly waiters: WorkerWaiter[] = [];
  private live = 0;
  private closed = false;

  constructor(options: TesseractOcrEngineOptions) {
    this.options = options;
    this.maxWorkers = Math.max(1, options.maxWorkers ?? 4);
  }

  private async acquire(signal: AbortSignal): Promise<Worker> {
    if (this.closed) throw new ScrapeError("EngineUnavailable", "OCR engine is closed");
    const reused = this.idle.pop();
    if (reused) return reused;
    if (this.live < this.maxWorkers) {
      this.live += 1;
      return this.create();
    }
    const handed = await this.waitForWorker(signal);
    return handed ?? this.create();
  }

  /** Caller has already counted the worker in `live` */
  private async create(): Promise<Worker> {
    try {
      return await Tesseract.createWorker(this.options.language, undefined, {
        langPath: this.options.langPath,
        cachePath: this.options.cachePath,
      });
    } catch (err) {
      this.live -= 1;
      this.handOff(undefined);
      throw new ScrapeError("EngineUnavailable", `could not start tesseract (${this.options.language}): ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  private waitForWorker(signal: AbortSignal): Promise<Worker | undefined> {
    return new Promise<Worker | undefined>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(new ImageTextError("OcrEngineError", "OCR aborted while waiting for a worker"));
      };
      const detach = () => signal.removeEventListener("abort", onAbort);
      const waiter: WorkerWaiter = {
        grant: (worker) => {
          detach();
          resolve(worker);
        },
        reject: (err) => {
          detach();
          reject(err);
        },
      };
      signal.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Give a worker, or a freed slot, to the oldest waiter; false when nobody waits */
  private handOff(worker: Worker | undefined): boolean {
    if (this.closed) return false;
    const next = this.waiters.shift();
    if (!next) return false;
    if (!worker) this.live += 1;
    next.grant(worker);
    return true;
  }

  private async release(worker: Worker): Promise<void> {
    this.busy.delete(worker);
    if (this.closed) {
      await this.terminate(worker);
      return;
    }
    if (!this.handOff(worker)) this.idle.push(worker);
  }

  private async terminate(worker: Worker): Promise<void> {
    this.busy.delete(worker);
    this.live -= 1;
    this.handOff(undefined);
    try {
      await worker.terminate();
    } catch (err) {
      console.warn("[TesseractOcrEngine] worker terminate failed:", err);
    }
  }

  async recognize(image: Buffer, signal: AbortSignal): Promise<string> {
    if (signal.aborted) throw new ImageTextError("OcrEngineError", "OCR aborted before start");
    const worker = await this.acquire(signal);
    this.busy.add(worker);

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(new ImageTextError("OcrEngineError", "OCR aborted"));
      signal.addEventListener("abort", onAbort, { once: true });
    });

    try {
      const result = await Promise.race([worker.recognize(image), aborted]);
      await this.release(worker);
      return result.data.text;
    } catch (err) {
      // The worker may still be mid-job; never hand it out again
      await this.terminate(worker);
      if (err instanceof ImageTextError) throw err;
      throw new ImageTextError("OcrEngineError", `tesseract failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      if (onAbort) signal.removeEventListener("abort", onAbort);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter.reject(new ScrapeError("EngineUnavailable", "OCR engine is closed"));
    }
    const workers = [...this.idle.splice(0, this.idle.length), ...this.busy];
    this.busy.clear();
    await Promise.allSettled(workers.map((w) => this.terminate(w)));
  }
}
