export { BrowserManager } from "./BrowserManager.js";
export type { BrowserManagerOptions } from "./BrowserManager.js";
export { PlaywrightSession } from "./PlaywrightSession.js";
export type { ContextProvider, SessionContextOptions } from "./PlaywrightSession.js";
export { SessionPool } from "./SessionPool.js";
export type { SessionPoolStats } from "./SessionPool.js";
export type { BrowserSession, DomNode, DomSnapshot, SessionFactory } from "./types.js";
