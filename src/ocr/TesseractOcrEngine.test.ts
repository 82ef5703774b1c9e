import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TesseractOcrEngine } from "./TesseractOcrEngine.js";

const createWorker = vi.hoisted(() => vi.fn());

vi.mock("tesseract.js", () => ({ default: { createWorker } }));

function fakeWorker(recognize: () => Promise<{ data: { text: string } }>) {
  return { recognize: vi.fn(recognize), terminate: vi.fn(async () => undefined) };
}

describe("TesseractOcrEngine", () => {
  beforeEach(() => {
    createWorker.mockReset();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("creates a worker lazily and reuses it across images", async () => {
    const worker = fakeWorker(async () => ({ data: { text: "SALE 50%\n" } }));
    createWorker.mockResolvedValue(worker);
    const engine = new TesseractOcrEngine({ language: "eng", langPath: "/models" });

    expect(createWorker).not.toHaveBeenCalled();
    await expect(engine.recognize(Buffer.from("a"), new AbortController().signal)).resolves.toBe("SALE 50%\n");
    await expect(engine.recognize(Buffer.from("b"), new AbortController().signal)).resolves.toBe("SALE 50%\n");

    expect(createWorker).toHaveBeenCalledTimes(1);
    expect(createWorker).toHaveBeenCalledWith("eng", undefined, { langPath: "/models", cachePath: undefined });
    expect(worker.recognize).toHaveBeenCalledTimes(2);
  });

  it("reports EngineUnavailable when a worker cannot start", async () => {
    createWorker.mockRejectedValue(new Error("eng.traineddata not found"));
    const engine = new TesseractOcrEngine({ language: "eng" });

    await expect(engine.recognize(Buffer.from("a"), new AbortController().signal)).rejects.toMatchObject({
      kind: "EngineUnavailable",
      detail: "could not start tesseract (eng): eng.traineddata not found",
    });
  });

  it("terminates a worker whose job was aborted", async () => {
    const worker = fakeWorker(() => new Promise<{ data: { text: string } }>(() => undefined));
    createWorker.mockResolvedValue(worker);
    const engine = new TesseractOcrEngine({ language: "eng" });
    const controller = new AbortController();

    const pending = engine.recognize(Buffer.from("a"), controller.signal);
    await vi.waitFor(() => expect(worker.recognize).toHaveBeenCalled());
    controller.abort();

    await expect(pending).rejects.toMatchObject({ kind: "OcrEngineError", message: "OCR aborted" });
    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });

  it("wraps recognition errors as OcrEngineError", async () => {
    const worker = fakeWorker(async () => {
      throw new Error("Error attempting to read image.");
    });
    createWorker.mockResolvedValue(worker);
    const engine = new TesseractOcrEngine({ language: "eng" });

    await expect(engine.recognize(Buffer.from("a"), new AbortController().signal)).rejects.toMatchObject({
      kind: "OcrEngineError",
      message: "tesseract failed: Error attempting to read image.",
    });
  });

  it("terminates idle workers on close and refuses new work", async () => {
    const worker = fakeWorker(async () => ({ data: { text: "x" } }));
    createWorker.mockResolvedValue(worker);
    const engine = new TesseractOcrEngine({ language: "eng" });
    await engine.recognize(Buffer.from("a"), new AbortController().signal);

    await engine.close();

    expect(worker.terminate).toHaveBeenCalledTimes(1);
    await expect(engine.recognize(Buffer.from("b"), new AbortController().signal)).rejects.toMatchObject({
      kind: "EngineUnavailable",
    });
  });

  it("never runs more than maxWorkers workers and queues the rest", async () => {
    createWorker.mockImplementation(async () => fakeWorker(async () => ({ data: { text: "x" } })));
    const engine = new TesseractOcrEngine({ language: "eng", maxWorkers: 4 });

    const texts = await Promise.all(
      Array.from({ length: 12 }, (_, i) => engine.recognize(Buffer.from(String(i)), new AbortController().signal)),
    );

    expect(texts).toEqual(Array.from({ length: 12 }, () => "x"));
    expect(createWorker).toHaveBeenCalledTimes(4);
  });

  it("gives up on a queued job when its signal aborts", async () => {
    const worker = fakeWorker(() => new Promise<{ data: { text: string } }>(() => undefined));
    createWorker.mockResolvedValue(worker);
    const engine = new TesseractOcrEngine({ language: "eng", maxWorkers: 1 });
    const first = new AbortController();
    const second = new AbortController();

    const running = engine.recognize(Buffer.from("a"), first.signal);
    await vi.waitFor(() => expect(worker.recognize).toHaveBeenCalled());
    const queued = engine.recognize(Buffer.from("b"), second.signal);
    second.abort();

    await expect(queued).rejects.toMatchObject({
      kind: "OcrEngineError",
      message: "OCR aborted while waiting for a worker",
    });
    expect(createWorker).toHaveBeenCalledTimes(1);
    first.abort();
    await expect(running).rejects.toMatchObject({ message: "OCR aborted" });
  });

  it("starts a fresh worker for the next queued job once a stuck one is terminated", async () => {
    const stuck = fakeWorker(() => new Promise<{ data: { text: string } }>(() => undefined));
    const fresh = fakeWorker(async () => ({ data: { text: "NEW ARRIVALS" } }));
    createWorker.mockResolvedValueOnce(stuck).mockResolvedValueOnce(fresh);
    const engine = new TesseractOcrEngine({ language: "eng", maxWorkers: 1 });
    const first = new AbortController();

    const running = engine.recognize(Buffer.from("a"), first.signal);
    await vi.waitFor(() => expect(stuck.recognize).toHaveBeenCalled());
    const queued = engine.recognize(Buffer.from("b"), new AbortController().signal);
    first.abort();

    await expect(running).rejects.toMatchObject({ message: "OCR aborted" });
    await expect(queued).resolves.toBe("NEW ARRIVALS");
    expect(stuck.terminate).toHaveBeenCalledTimes(1);
    expect(createWorker).toHaveBeenCalledTimes(2);
  });

  it("rejects queued jobs when the engine closes", async () => {
    const worker = fakeWorker(() => new Promise<{ data: { text: string } }>(() => undefined));
    createWorker.mockResolvedValue(worker);
    const engine = new TesseractOcrEngine({ language: "eng", maxWorkers: 1 });

    const running = engine.recognize(Buffer.from("a"), new AbortController().signal);
    await vi.waitFor(() => expect(worker.recognize).toHaveBeenCalled());
    const queued = engine.recognize(Buffer.from("b"), new AbortController().signal);
    await engine.close();

    await expect(queued).rejects.toMatchObject({ kind: "EngineUnavailable", detail: "OCR engine is closed" });
    expect(worker.terminate).toHaveBeenCalledTimes(1);
    running.catch(() => undefined);
  });
});
