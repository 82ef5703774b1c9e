/**
 * HTTP image downloader backed by undici.
 *
 * The body is read chunk by chunk and abandoned as soon as it passes maxBytes,
 * so a missing or lying content-length cannot make us buffer a huge download.
 */

import { fetch, type Dispatcher, type Response } from "undici";
import { errorMessage } from "../errors.js";
import { ImageTextError, type ImageFetcher } from "./types.js";

export type HttpImageFetcherOptions = {
  timeoutMs: number;
  maxBytes: number;
  userAgent: string;
  /** Custom undici dispatcher (proxy agent, MockAgent in tests) */
  dispatcher?: Dispatcher;
};

function acceptableContentType(contentType: string | null): boolean {
  if (!contentType) return true;
  const type = contentType.split(";")[0].trim().toLowerCase();
  return type.startsWith("image/") || type === "application/octet-stream" || type === "binary/octet-stream";
}

async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (err) {
    console.warn("[imageFetcher] could not cancel response body:", err);
  }
}

async function readCapped(response: Response, maxBytes: number, sourceLocator: string): Promise<Buffer> {
  if (!response.body) return Buffer.alloc(0);
  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel().catch((err: unknown) => console.warn("[imageFetcher] could not cancel response body:", err));
      throw new ImageTextError("ImageFetchFailed", `image too large (over ${maxBytes} bytes): ${sourceLocator}`);
    }
    chunks.push(value);
  }
  return Buffer.concat(chunks, total);
}

export function createHttpImageFetcher(options: HttpImageFetcherOptions): ImageFetcher {
  return async (sourceLocator, signal) => {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const controller = new AbortController();
    const abort = () => controller.abort();
    signal.addEventListener("abort", abort, { once: true });
    timeout.addEventListener("abort", abort, { once: true });

    try {
      const response = await fetch(sourceLocator, {
        signal: controller.signal,
        dispatcher: options.dispatcher,
        headers: { "User-Agent": options.userAgent },
      });

      if (!response.ok) {
        await discardBody(response);
        throw new ImageTextError("ImageFetchFailed", `HTTP ${response.status} for ${sourceLocator}`);
      }

      const contentType = response.headers.get("content-type");
      if (!acceptableContentType(contentType)) {
        await discardBody(response);
        throw new ImageTextError("ImageFetchFailed", `not an image (${contentType ?? "unknown"}): ${sourceLocator}`);
      }

      const contentLength = Number.parseInt(response.headers.get("content-length") ?? "", 10);
      if (Number.isFinite(contentLength) && contentLength > options.maxBytes) {
        await discardBody(response);
        throw new ImageTextError("ImageFetchFailed", `image too large (${contentLength} bytes): ${sourceLocator}`);
      }

      const bytes = await readCapped(response, options.maxBytes, sourceLocator);
      if (bytes.length === 0) {
        throw new ImageTextError("ImageFetchFailed", `empty response body: ${sourceLocator}`);
      }
      return bytes;
    } catch (err) {
      if (err instanceof ImageTextError) throw err;
      const reason = timeout.aborted && !signal.aborted ? `timed out after ${options.timeoutMs}ms` : errorMessage(err);
      throw new ImageTextError("ImageFetchFailed", `download failed for ${sourceLocator}: ${reason}`, { cause: err });
    } finally {
      signal.removeEventListener("abort", abort);
      timeout.removeEventListener("abort", abort);
    }
  };
}
