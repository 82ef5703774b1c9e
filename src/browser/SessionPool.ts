/**
 * SessionPool: caps how many BrowserSessions are open at once and scopes each
 * session to exactly one callback.
 *
 * withSession() opens a fresh session, hands it to the callback and closes it
 * exactly once on every exit path: success, failure, or cancellation. When the
 * caller's signal aborts, the session is closed immediately so in-flight
 * navigation fails fast, and the run rejects with Cancelled.
 */

import { ScrapeError, describeAbortReason, throwIfCancelled } from "../errors.js";
import type { BrowserSession, SessionFactory } from "./types.js";

type Waiter = {
  grant: () => void;
  reject: (err: unknown) => void;
};

export type SessionPoolStats = {
  /** Slots currently checked out (opening, open or closing) */
  active: number;
  waiting: number;
  created: number;
  closed: number;
};

export class SessionPool {
  private readonly factory: SessionFactory;
  private readonly maxSessions: number;
  private readonly waiters: Waiter[] = [];
  private active = 0;
  private created = 0;
  private closed = 0;

  constructor(factory: SessionFactory, maxSessions: number) {
    this.factory = factory;
    this.maxSessions = Math.max(1, Math.trunc(maxSessions));
  }

  stats(): SessionPoolStats {
    return { active: this.active, waiting: this.waiters.length, created: this.created, closed: this.closed };
  }

  async withSession<T>(fn: (session: BrowserSession) => Promise<T>, signal?: AbortSignal): Promise<T> {
    throwIfCancelled(signal, "session request");
    await this.acquireSlot(signal);

    let session: BrowserSession;
    try {
      session = this.factory.createSession();
    } catch (err) {
      this.releaseSlot();
      throw err;
    }
    this.created += 1;
    let closing: Promise<void> | undefined;
    const closeOnce = (): Promise<void> => {
      closing ??= session.close().finally(() => {
        this.closed += 1;
      });
      return closing;
    };

    let cancel: ((err: ScrapeError) => void) | undefined;
    const cancelled = new Promise<never>((_, reject) => {
      cancel = reject;
    });
    const onAbort = () => {
      void closeOnce();
      cancel?.(new ScrapeError("Cancelled", `run cancelled: ${describeAbortReason(signal?.reason)}`));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      await Promise.race([session.open(), cancelled]);
      const work = fn(session);
      work.catch((err: unknown) => {
        if (signal?.aborted) {
          console.warn("[SessionPool] work settled after cancellation:", err);
        }
      });
      return await Promise.race([work, cancelled]);
    } catch (err) {
      if (signal?.aborted && !(err instanceof ScrapeError && err.kind === "Cancelled")) {
        throw new ScrapeError("Cancelled", `run cancelled: ${describeAbortReason(signal.reason)}`, { cause: err });
      }
      throw err;
    } finally {
      signal?.removeEventListener("abort", onAbort);
      await closeOnce();
      this.releaseSlot();
    }
  }

  private acquireSlot(signal?: AbortSignal): Promise<void> {
    if (this.active < this.maxSessions) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const idx = this.waiters.indexOf(waiter);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new ScrapeError("Cancelled", `cancelled while waiting for a browser session: ${describeAbortReason(signal?.reason)}`));
      };
      const detach = () => signal?.removeEventListener("abort", onAbort);
      const waiter: Waiter = {
        grant: () => {
          detach();
          resolve();
        },
        reject: (err) => {
          detach();
          reject(err);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private releaseSlot(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes straight to the next waiter; active count is unchanged
      next.grant();
      return;
    }
    this.active -= 1;
  }

  /** Reject every queued request; used on shutdown */
  drain(reason = "session pool shutting down"): void {
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.reject(new ScrapeError("EngineUnavailable", reason));
    }
  }
}
