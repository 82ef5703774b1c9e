export { ImageTextExtractor, cleanOcrText, mapWithConcurrency } from "./ImageTextExtractor.js";
export { TesseractOcrEngine } from "./TesseractOcrEngine.js";
export { createHttpImageFetcher } from "./imageFetcher.js";
export { ImageTextError } from "./types.js";
export type { ImageFailureKind, ImageFetcher, OcrEngine, OcrOutcome } from "./types.js";
