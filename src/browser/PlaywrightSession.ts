/**
 * PlaywrightSession: one isolated BrowserContext + page for a single scrape run.
 *
 * Wraps playwright-core with the handful of actions the pipeline needs:
 *   navigate, waitForContent, type, clickFirst, waitForUrl, snapshot
 */

import { ScrapeError } from "../errors.js";
import { normalizeTimeoutMs, toContentWaitError, toNavigationError } from "./pw-errors.js";
import type { BrowserSession, DomNode, DomSnapshot } from "./types.js";

export type SessionContextOptions = {
  userAgent: string;
  viewport: { width: number; height: number };
  locale: string;
};

/** The part of playwright-core's Page a session drives */
export interface SessionPage {
  goto(url: string, options: { waitUntil: "domcontentloaded"; timeout: number }): Promise<{ status(): number } | null>;
  waitForSelector(selector: string, options: { state: "attached"; timeout: number }): Promise<unknown>;
  click(selector: string): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  keyboard: { press(key: string): Promise<void> };
  locator(selector: string): { first(): { click(options: { timeout: number }): Promise<void> } };
  waitForURL(url: RegExp, options: { waitUntil: "commit"; timeout: number }): Promise<void>;
  url(): string;
  evaluate<R>(pageFunction: () => R): Promise<R>;
  isClosed(): boolean;
}

/** The part of playwright-core's BrowserContext a session drives */
export interface SessionContext {
  newPage(): Promise<SessionPage>;
  close(): Promise<void>;
}

/** Anything that can hand out a fresh isolated context; BrowserManager in production */
export interface ContextProvider {
  newContext(options: SessionContextOptions): Promise<SessionContext>;
}

export class PlaywrightSession implements BrowserSession {
  private readonly provider: ContextProvider;
  private readonly options: SessionContextOptions;
  private context?: SessionContext;
  private _page?: SessionPage;
  private closed = false;

  constructor(provider: ContextProvider, options: SessionContextOptions) {
    this.provider = provider;
    this.options = options;
  }

  async open(): Promise<void> {
    if (this.closed) throw new ScrapeError("EngineUnavailable", "session already closed");
    if (this.context) return;
    // Provider errors are already classified as EngineUnavailable
    const context = await this.provider.newContext(this.options);
    if (this.closed) {
      // close() ran while the context was being created
      await context.close().catch((err: unknown) => console.warn("[PlaywrightSession] context close failed:", err));
      throw new ScrapeError("Cancelled", "session closed while opening");
    }
    this.context = context;
    try {
      this._page = await this.context.newPage();
    } catch (err) {
      throw new ScrapeError("EngineUnavailable", `could not open a page: ${String(err)}`, { cause: err });
    }
  }

  private page(): SessionPage {
    if (!this._page || this._page.isClosed()) {
      throw new ScrapeError("NavigationError", "browser session is not open");
    }
    return this._page;
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    const pg = this.page();
    let status: number | undefined;
    try {
      const response = await pg.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: normalizeTimeoutMs(timeoutMs, 60_000),
      });
      status = response?.status();
    } catch (err) {
      throw toNavigationError(err, url);
    }
    if (status !== undefined && status >= 400) {
      throw new ScrapeError("NavigationError", `failed to load ${url}: HTTP ${status}`);
    }
  }

  async waitForContent(selector: string, timeoutMs: number): Promise<void> {
    const pg = this.page();
    try {
      await pg.waitForSelector(selector, {
        state: "attached",
        timeout: normalizeTimeoutMs(timeoutMs, 30_000),
      });
    } catch (err) {
      throw toContentWaitError(err, `selector "${selector}"`);
    }
  }

  async type(selector: string, text: string, options?: { submit?: boolean }): Promise<void> {
    const pg = this.page();
    try {
      await pg.click(selector);
      await pg.fill(selector, "");
      await pg.fill(selector, text);
      if (options?.submit) {
        await pg.keyboard.press("Enter");
      }
    } catch (err) {
      throw toContentWaitError(err, `input "${selector}"`);
    }
  }

  async clickFirst(selector: string, timeoutMs: number): Promise<void> {
    const pg = this.page();
    try {
      await pg.locator(selector).first().click({ timeout: normalizeTimeoutMs(timeoutMs, 10_000) });
    } catch (err) {
      throw toContentWaitError(err, `clickable "${selector}"`);
    }
  }

  async waitForUrl(pattern: RegExp, timeoutMs: number): Promise<void> {
    const pg = this.page();
    try {
      await pg.waitForURL(pattern, { waitUntil: "commit", timeout: normalizeTimeoutMs(timeoutMs, 30_000) });
    } catch (err) {
      throw toContentWaitError(err, `URL matching ${pattern.source}`);
    }
  }

  async currentUrl(): Promise<string> {
    return this.page().url();
  }

  /**
   * Serialize the rendered element tree. Runs read-only in the page; the walk
   * is iterative so deeply nested documents cannot overflow the stack.
   */
  async snapshot(): Promise<DomSnapshot> {
    const pg = this.page();
    try {
      return await pg.evaluate((): { url: string; root: DomNode | null } => {
        const rootEl = document.documentElement;
        if (!rootEl) return { url: document.baseURI, root: null };

        const top: DomNode[] = [];
        const stack: Array<[Element, DomNode[]]> = [[rootEl, top]];
        while (stack.length > 0) {
          const entry = stack.pop();
          if (!entry) break;
          const [el, siblings] = entry;
          let text = "";
          for (const child of Array.from(el.childNodes)) {
            if (child.nodeType === 3) text += child.textContent ?? "";
          }
          const node: DomNode = {
            tag: el.tagName,
            attributes: Object.fromEntries(Array.from(el.attributes, (a): [string, string] => [a.name, a.value])),
            text: text.replace(/\s+/g, " ").trim(),
            children: [],
          };
          siblings.push(node);
          // Reverse push keeps children in document order when popped
          const kids = Array.from(el.children);
          for (let i = kids.length - 1; i >= 0; i -= 1) {
            stack.push([kids[i], node.children]);
          }
        }
        const root = top[0] ?? null;
        return { url: document.baseURI, root };
      });
    } catch (err) {
      throw new ScrapeError("NavigationError", `could not capture the document: ${String(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const context = this.context;
    this.context = undefined;
    this._page = undefined;
    if (!context) return;
    try {
      await context.close();
    } catch (err) {
      console.warn("[PlaywrightSession] context close failed:", err);
    }
  }
}
