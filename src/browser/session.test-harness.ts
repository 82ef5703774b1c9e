/**
 * In-process stand-in for the browser + portal, used by resolver and pipeline tests.
 *
 * FakePortal is a SessionFactory; every session it creates simulates the portal
 * home page (search box + suggestions) and advertiser pages from plain data.
 */

import { advertiserPageUrl } from "../advertiser/advertiserId.js";
import { SEARCH_INPUT_SELECTOR, SEARCH_RESULT_SELECTOR } from "../advertiser/searchResults.js";
import { ScrapeError } from "../errors.js";
import { ADVERTISER_CONTENT_SELECTOR } from "../pipeline/ScrapePipeline.js";
import { doc, el, page } from "./dom.test-harness.js";
import type { BrowserSession, DomNode, DomSnapshot, SessionFactory } from "./types.js";

export const FAKE_PORTAL_URL = "https://portal.test/";

export type FakeSuggestion = {
  name: string;
  /** Rendered as data-advertiser-id when set */
  id?: string;
  /** Advertiser id the suggestion navigates to when clicked */
  routesTo?: string;
};

export type FakePortalOptions = {
  /** Lowercased query → suggestions in presentation order */
  search?: Record<string, FakeSuggestion[]>;
  /** Lowercased query → advertiser id the portal routes to directly after typing */
  directRoutes?: Record<string, string>;
  /** Lowercased query → extra markup rendered on the portal home after typing it */
  pageHints?: Record<string, DomNode[]>;
  /** Advertiser id → documentElement of its page (null renders nothing) */
  pages?: Record<string, DomNode | null>;
  /** Advertiser id → documentElement of its video-format page */
  videoPages?: Record<string, DomNode | null>;
  navigationDelayMs?: (url: string) => number;
  navigationError?: (url: string) => ScrapeError | undefined;
  engineDown?: boolean;
};

const ADVERTISER_PATH_RE = /\/advertiser\/([^/?#]+)/;

export class FakeBrowserSession implements BrowserSession {
  readonly navigations: string[] = [];
  /** Queries submitted with Enter, lowercased */
  readonly submitted: string[] = [];
  openCalls = 0;
  closeCalls = 0;
  private opened = false;
  private closed = false;
  private url = "about:blank";
  private typed?: string;
  private readonly pending = new Set<(err: Error) => void>();

  constructor(private readonly options: FakePortalOptions) {}

  get isOpen(): boolean {
    return this.opened && !this.closed;
  }

  async open(): Promise<void> {
    this.openCalls += 1;
    if (this.options.engineDown) {
      throw new ScrapeError("EngineUnavailable", "could not launch chromium: fake engine down");
    }
    this.opened = true;
  }

  private assertUsable(): void {
    if (!this.isOpen) throw new Error("Target page, context or browser has been closed");
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(onClose);
        resolve();
      }, ms);
      const onClose = (err: Error) => {
        clearTimeout(timer);
        reject(err);
      };
      this.pending.add(onClose);
    });
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    this.assertUsable();
    this.navigations.push(url);
    const delay = this.options.navigationDelayMs?.(url) ?? 0;
    if (delay > timeoutMs) {
      await this.sleep(timeoutMs);
      throw new ScrapeError("NavigationTimeout", `page did not load within the timeout: ${url}`);
    }
    if (delay > 0) await this.sleep(delay);
    const err = this.options.navigationError?.(url);
    if (err) throw err;
    this.url = url;
    this.typed = undefined;
  }

  private advertiserId(): string | undefined {
    return ADVERTISER_PATH_RE.exec(this.url)?.[1];
  }

  private advertiserPage(): DomNode | null {
    const id = this.advertiserId();
    if (!id) return null;
    const pages = this.url.includes("format=VIDEO") ? this.options.videoPages : this.options.pages;
    return pages?.[id] ?? null;
  }

  private suggestions(): FakeSuggestion[] {
    if (this.url !== FAKE_PORTAL_URL || this.typed === undefined) return [];
    return this.options.search?.[this.typed] ?? [];
  }

  private presentSelectors(): string[] {
    if (this.url === FAKE_PORTAL_URL) {
      return this.suggestions().length > 0 ? [SEARCH_INPUT_SELECTOR, SEARCH_RESULT_SELECTOR] : [SEARCH_INPUT_SELECTOR];
    }
    return this.advertiserPage() ? [ADVERTISER_CONTENT_SELECTOR] : [];
  }

  async waitForContent(selector: string, _timeoutMs: number): Promise<void> {
    this.assertUsable();
    if (!this.presentSelectors().includes(selector)) {
      throw new ScrapeError("ContentTimeout", `timed out waiting for selector "${selector}"`);
    }
  }

  async type(_selector: string, text: string, options?: { submit?: boolean }): Promise<void> {
    this.assertUsable();
    this.typed = text.toLowerCase();
    if (options?.submit) this.submitted.push(this.typed);
    const routed = this.options.directRoutes?.[this.typed];
    if (routed) this.url = advertiserPageUrl(FAKE_PORTAL_URL, routed, "US");
  }

  async clickFirst(selector: string, _timeoutMs: number): Promise<void> {
    this.assertUsable();
    const first = this.suggestions()[0];
    if (!first) throw new ScrapeError("ContentTimeout", `timed out waiting for clickable "${selector}"`);
    if (first.routesTo) this.url = advertiserPageUrl(FAKE_PORTAL_URL, first.routesTo, "US");
  }

  async waitForUrl(pattern: RegExp, _timeoutMs: number): Promise<void> {
    this.assertUsable();
    if (!pattern.test(this.url)) {
      throw new ScrapeError("ContentTimeout", `timed out waiting for URL matching ${pattern.source}`);
    }
  }

  async currentUrl(): Promise<string> {
    this.assertUsable();
    return this.url;
  }

  async snapshot(): Promise<DomSnapshot> {
    this.assertUsable();
    if (this.url === FAKE_PORTAL_URL) {
      const items = this.suggestions().map((s) =>
        el("material-list-item", s.id ? { "data-advertiser-id": s.id } : {}, [el("div", {}, [], s.name)]),
      );
      const hints = this.typed === undefined ? [] : (this.options.pageHints?.[this.typed] ?? []);
      return page(this.url, [el("input", { class: "input input-area" }), el("material-list", {}, items), ...hints]);
    }
    return doc(this.url, this.advertiserPage());
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
    this.closed = true;
    const err = new Error("Target page, context or browser has been closed");
    for (const reject of this.pending) reject(err);
    this.pending.clear();
  }
}

export class FakePortal implements SessionFactory {
  readonly sessions: FakeBrowserSession[] = [];

  constructor(readonly options: FakePortalOptions = {}) {}

  createSession(): FakeBrowserSession {
    const session = new FakeBrowserSession(this.options);
    this.sessions.push(session);
    return session;
  }

  openSessionCount(): number {
    return this.sessions.filter((s) => s.isOpen).length;
  }
}
