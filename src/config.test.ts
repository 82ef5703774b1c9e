import { describe, expect, it } from "vitest";
import { loadScraperConfig, parseOverrides } from "./config.js";

describe("loadScraperConfig", () => {
  it("uses documented defaults for an empty environment", () => {
    const config = loadScraperConfig({});

    expect(config.navigationTimeoutMs).toBe(60_000);
    expect(config.contentTimeoutMs).toBe(30_000);
    expect(config.maxBrowserSessions).toBe(2);
    expect(config.region).toBe("US");
    expect(config.portalUrl).toBe("https://adstransparency.google.com/");
    expect(config.headless).toBe(true);
    expect(config.ocr.language).toBe("eng");
    expect(config.ocr.langPath).toBeUndefined();
    expect(config.ocr.concurrency).toBe(2);
    expect(config.ocr.maxWorkers).toBe(4);
    expect(config.detectVideos).toBe(false);
    expect(config.http.port).toBe(9001);
  });

  it("reads timeouts and engine location from env vars", () => {
    const config = loadScraperConfig({
      NAVIGATION_TIMEOUT: "15000",
      WAIT_TIMEOUT: " 5000 ",
      OCR_LANG_PATH: "/opt/tessdata",
      OCR_CONCURRENCY: "4",
      OCR_MAX_WORKERS: "6",
      DETECT_VIDEOS: "yes",
      BROWSER_HEADLESS: "false",
      PORT: "8080",
    });

    expect(config.navigationTimeoutMs).toBe(15_000);
    expect(config.contentTimeoutMs).toBe(5_000);
    expect(config.ocr.langPath).toBe("/opt/tessdata");
    expect(config.ocr.concurrency).toBe(4);
    expect(config.ocr.maxWorkers).toBe(6);
    expect(config.detectVideos).toBe(true);
    expect(config.headless).toBe(false);
    expect(config.http.port).toBe(8080);
  });

  it("falls back to defaults for unparseable or non-positive numbers", () => {
    const config = loadScraperConfig({ NAVIGATION_TIMEOUT: "soon", WAIT_TIMEOUT: "-1", OCR_TIMEOUT_MS: "0" });

    expect(config.navigationTimeoutMs).toBe(60_000);
    expect(config.contentTimeoutMs).toBe(30_000);
    expect(config.ocr.timeoutMs).toBe(30_000);
  });
});

describe("parseOverrides", () => {
  it("lowercases names and skips malformed pairs", () => {
    const overrides = parseOverrides("Adidas=AR14017378248766259201, broken ,=AR1,nike = AR00000000000000000001");

    expect(Array.from(overrides.entries())).toEqual([
      ["adidas", "AR14017378248766259201"],
      ["nike", "AR00000000000000000001"],
    ]);
  });
});
