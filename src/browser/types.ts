/**
 * Browser session contract shared by the Playwright implementation and test fakes.
 */

/** Serializable element captured from the rendered page */
export type DomNode = {
  /** Tag name as reported by the engine (not normalized) */
  tag: string;
  attributes: Record<string, string>;
  /** Concatenated direct text-node children, whitespace-collapsed */
  text: string;
  children: DomNode[];
};

export type DomSnapshot = {
  /** Document base URL, used to resolve relative sources */
  url: string;
  /** documentElement, or null when the document has no elements */
  root: DomNode | null;
};

export interface BrowserSession {
  /** Acquire an isolated execution context. Throws EngineUnavailable. */
  open(): Promise<void>;
  /** Throws NavigationTimeout or NavigationError */
  navigate(url: string, timeoutMs: number): Promise<void>;
  /** Wait until a selector is attached. Throws ContentTimeout. */
  waitForContent(selector: string, timeoutMs: number): Promise<void>;
  /** Fill an input and optionally submit with Enter */
  type(selector: string, text: string, options?: { submit?: boolean }): Promise<void>;
  clickFirst(selector: string, timeoutMs: number): Promise<void>;
  /** Wait for the page URL to match. Throws ContentTimeout. */
  waitForUrl(pattern: RegExp, timeoutMs: number): Promise<void>;
  currentUrl(): Promise<string>;
  snapshot(): Promise<DomSnapshot>;
  /** Idempotent; never throws */
  close(): Promise<void>;
}

export interface SessionFactory {
  createSession(): BrowserSession;
}
