import type { Server } from "node:http";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { fetch } from "undici";
import { ScrapeError } from "../src/errors.js";
import { createScrapeApp } from "../src/http/app.js";
import { httpStatusForFailure, type ScrapeRunner } from "../src/http/scrape-routes.js";
import type { ScrapeResult, ScrapeRunOptions } from "../src/pipeline/types.js";

const NIKE: ScrapeResult = {
  advertiser_id: "AR14017378248766259201",
  tags: ["html", "head", "body", "div", "img"],
  image_text: ["Just Do It"],
};

/** Stand-in pipeline scripted by advertiser name */
const fakePipeline: ScrapeRunner = {
  async run(query, options: ScrapeRunOptions = {}) {
    if (query.name === "nike") {
      return options.detectVideos === undefined ? NIKE : { ...NIKE, has_videos: options.detectVideos, video_count: 0 };
    }
    if (query.name === "boom") throw new Error("boom");
    if (query.name === "slow") {
      return new Promise<ScrapeResult>((_, reject) => {
        options.signal?.addEventListener("abort", () => reject(new ScrapeError("Cancelled", "run cancelled: deadline")), {
          once: true,
        });
      });
    }
    throw new ScrapeError("NoSearchResults", `no advertiser found for "${query.name}"`);
  },
};

describe("scrape routes (e2e)", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = createScrapeApp(fakePipeline, { requestDeadlineMs: 50 });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no TCP address");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  async function scrape(body: string) {
    const res = await fetch(`${baseUrl}/scrape`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body,
    });
    return { status: res.status, json: await res.json() };
  }

  it("returns the scrape result", async () => {
    await expect(scrape(JSON.stringify({ advertiser_name: "nike" }))).resolves.toEqual({ status: 200, json: NIKE });
  });

  it("passes include_videos through and ignores non-boolean values", async () => {
    await expect(scrape(JSON.stringify({ advertiser_name: "nike", include_videos: true }))).resolves.toEqual({
      status: 200,
      json: { ...NIKE, has_videos: true, video_count: 0 },
    });
    await expect(scrape(JSON.stringify({ advertiser_name: "nike", include_videos: "yes" }))).resolves.toEqual({
      status: 200,
      json: NIKE,
    });
  });

  it("rejects a missing or blank advertiser_name with 400", async () => {
    const expected = {
      status: 400,
      json: { error: "InvalidQuery", detail: "advertiser_name must be a non-empty string" },
    };
    await expect(scrape(JSON.stringify({}))).resolves.toEqual(expected);
    await expect(scrape(JSON.stringify({ advertiser_name: "  " }))).resolves.toEqual(expected);
    await expect(scrape(JSON.stringify({ advertiser_name: 42 }))).resolves.toEqual(expected);
  });

  it("answers malformed JSON in the API error shape", async () => {
    await expect(scrape("{not json")).resolves.toEqual({
      status: 400,
      json: { error: "InvalidQuery", detail: "request body is not valid JSON" },
    });
  });

  it("maps failure kinds to status codes", async () => {
    await expect(scrape(JSON.stringify({ advertiser_name: "zzz-nonexistent-brand-x" }))).resolves.toEqual({
      status: 404,
      json: { error: "NoSearchResults", detail: 'no advertiser found for "zzz-nonexistent-brand-x"' },
    });
    await expect(scrape(JSON.stringify({ advertiser_name: "boom" }))).resolves.toEqual({
      status: 500,
      json: { error: "InternalError", detail: "boom" },
    });
  });

  it("aborts the run when the request deadline passes", async () => {
    await expect(scrape(JSON.stringify({ advertiser_name: "slow" }))).resolves.toEqual({
      status: 499,
      json: { error: "Cancelled", detail: "run cancelled: deadline" },
    });
  });

  it("answers /ping", async () => {
    const res = await fetch(`${baseUrl}/ping`);
    const body = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: "ok", version: "1.0.0" });
  });
});

describe("httpStatusForFailure", () => {
  it("maps each failure kind", () => {
    expect(httpStatusForFailure(new ScrapeError("InvalidQuery", "x"))).toBe(400);
    expect(httpStatusForFailure(new ScrapeError("AdvertiserIdMissing", "x"))).toBe(502);
    expect(httpStatusForFailure(new ScrapeError("NavigationTimeout", "x"))).toBe(504);
    expect(httpStatusForFailure(new ScrapeError("ContentTimeout", "x"))).toBe(504);
    expect(httpStatusForFailure(new ScrapeError("EngineUnavailable", "x"))).toBe(503);
    expect(httpStatusForFailure(new ScrapeError("Cancelled", "x"))).toBe(499);
    expect(httpStatusForFailure(new Error("x"))).toBe(500);
  });
});
