/**
 * BrowserManager: owns the single headless Chromium process shared by all runs.
 *
 * Each run gets its own BrowserContext (cookies, storage and navigation state
 * are isolated per context), so runs never share browser state while the costly
 * engine process is launched once. Attach-on-demand: the browser is launched the
 * first time a session opens and relaunched if it disconnects.
 */

import type { Browser, BrowserContext } from "playwright-core";
import { chromium } from "playwright-core";
import { ScrapeError, errorMessage } from "../errors.js";
import { PlaywrightSession, type ContextProvider, type SessionContextOptions } from "./PlaywrightSession.js";
import type { BrowserSession, SessionFactory } from "./types.js";

export type BrowserManagerOptions = {
  headless?: boolean;
  userAgent: string;
  viewport?: { width: number; height: number };
  locale?: string;
  /** Path to a Chromium binary; defaults to the one playwright-core resolves */
  executablePath?: string;
};

const DEFAULT_VIEWPORT = { width: 1280, height: 720 } as const;

export class BrowserManager implements ContextProvider, SessionFactory {
  private browser?: Browser;
  private launching?: Promise<Browser>;
  private readonly options: BrowserManagerOptions;

  constructor(options: BrowserManagerOptions) {
    this.options = options;
  }

  /** Return (launching if needed) the shared browser */
  private async getBrowser(): Promise<Browser> {
    if (this.browser?.isConnected()) return this.browser;
    if (!this.launching) {
      this.launching = this.launch().finally(() => {
        this.launching = undefined;
      });
    }
    return this.launching;
  }

  private async launch(): Promise<Browser> {
    try {
      const browser = await chromium.launch({
        headless: this.options.headless !== false,
        executablePath: this.options.executablePath,
        args: [
          "--no-sandbox",
          "--disable-setuid-sandbox",
          "--disable-dev-shm-usage",
          "--disable-blink-features=AutomationControlled",
        ],
      });
      browser.on("disconnected", () => {
        if (this.browser === browser) this.browser = undefined;
      });
      this.browser = browser;
      console.info("[BrowserManager] chromium launched");
      return browser;
    } catch (err) {
      throw new ScrapeError("EngineUnavailable", `could not launch chromium: ${errorMessage(err)}`, { cause: err });
    }
  }

  async newContext(options: SessionContextOptions): Promise<BrowserContext> {
    const browser = await this.getBrowser();
    try {
      return await browser.newContext({
        viewport: options.viewport,
        userAgent: options.userAgent,
        locale: options.locale,
      });
    } catch (err) {
      throw new ScrapeError("EngineUnavailable", `could not create a browser context: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  createSession(): BrowserSession {
    return new PlaywrightSession(this, {
      userAgent: this.options.userAgent,
      viewport: this.options.viewport ?? DEFAULT_VIEWPORT,
      locale: this.options.locale ?? "en-US",
    });
  }

  /** Close the shared browser; sessions still open are torn down with it */
  async close(): Promise<void> {
    // A launch that fails here was already reported to the session that started it
    const browser = this.browser ?? (await this.launching?.catch(() => undefined));
    this.browser = undefined;
    if (!browser) return;
    try {
      await browser.close();
    } catch (err) {
      console.warn("[BrowserManager] browser close failed:", err);
    }
  }
}
