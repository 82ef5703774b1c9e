import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ScrapeError } from "../errors.js";
import { FakePortal } from "./session.test-harness.js";
import { SessionPool } from "./SessionPool.js";
import type { SessionFactory } from "./types.js";

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

async function kindOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ScrapeError) return err.kind;
    throw err;
  }
  return "ok";
}

describe("SessionPool", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("caps open sessions and serves waiters first-come first-served", async () => {
    const portal = new FakePortal();
    const pool = new SessionPool(portal, 2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];
    let maxOpen = 0;

    const runs = gates.map((gate, i) =>
      pool.withSession(async () => {
        started.push(i);
        maxOpen = Math.max(maxOpen, portal.openSessionCount());
        await gate.promise;
        return i;
      }),
    );

    await vi.waitFor(() => expect(started).toEqual([0, 1]));
    expect(pool.stats()).toMatchObject({ active: 2, waiting: 2 });

    gates[1].resolve();
    await vi.waitFor(() => expect(started).toEqual([0, 1, 2]));
    gates[0].resolve();
    gates[2].resolve();
    gates[3].resolve();

    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2, 3]);
    expect(started).toEqual([0, 1, 2, 3]);
    expect(maxOpen).toBe(2);
    expect(pool.stats()).toEqual({ active: 0, waiting: 0, created: 4, closed: 4 });
  });

  it("closes the session exactly once whether the callback succeeds or throws", async () => {
    const portal = new FakePortal();
    const pool = new SessionPool(portal, 3);

    const outcomes = await Promise.allSettled(
      Array.from({ length: 30 }, (_, i) =>
        pool.withSession(async (session) => {
          await session.close();
          if (i % 2 === 0) throw new ScrapeError("NoSearchResults", "nothing");
          return i;
        }),
      ),
    );

    expect(outcomes.filter((o) => o.status === "rejected")).toHaveLength(15);
    // The callback's own close plus the pool's
    expect(portal.sessions.every((s) => s.closeCalls === 2)).toBe(true);
    expect(pool.stats()).toEqual({ active: 0, waiting: 0, created: 30, closed: 30 });
  });

  it("releases the slot when the session cannot be opened", async () => {
    const portal = new FakePortal({ engineDown: true });
    const pool = new SessionPool(portal, 1);

    await expect(kindOf(pool.withSession(async () => "never"))).resolves.toBe("EngineUnavailable");
    await expect(kindOf(pool.withSession(async () => "never"))).resolves.toBe("EngineUnavailable");

    expect(portal.sessions.map((s) => s.closeCalls)).toEqual([1, 1]);
    expect(pool.stats()).toEqual({ active: 0, waiting: 0, created: 2, closed: 2 });
  });

  it("removes a cancelled waiter from the queue without creating a session", async () => {
    const portal = new FakePortal();
    const pool = new SessionPool(portal, 1);
    const gate = deferred();
    const holder = pool.withSession(() => gate.promise);
    const controller = new AbortController();

    const waiting = pool.withSession(async () => "late", controller.signal);
    await vi.waitFor(() => expect(pool.stats().waiting).toBe(1));
    controller.abort();

    await expect(kindOf(waiting)).resolves.toBe("Cancelled");
    expect(pool.stats().waiting).toBe(0);
    gate.resolve();
    await holder;
    expect(portal.sessions).toHaveLength(1);
    expect(pool.stats()).toEqual({ active: 0, waiting: 0, created: 1, closed: 1 });
  });

  it("closes the session immediately when the run is cancelled mid-work", async () => {
    const portal = new FakePortal({ navigationDelayMs: () => 5_000 });
    const pool = new SessionPool(portal, 1);
    const controller = new AbortController();

    const run = pool.withSession((session) => session.navigate("https://portal.test/slow", 10_000), controller.signal);
    await vi.waitFor(() => expect(portal.sessions[0]?.navigations).toHaveLength(1));
    controller.abort("client went away");

    await expect(run).rejects.toMatchObject({ kind: "Cancelled", detail: "run cancelled: client went away" });
    expect(portal.sessions[0].closeCalls).toBe(1);
    expect(pool.stats().active).toBe(0);
  });

  it("rejects queued requests on drain", async () => {
    const portal = new FakePortal();
    const pool = new SessionPool(portal, 1);
    const gate = deferred();
    const holder = pool.withSession(() => gate.promise);
    const queued = pool.withSession(async () => "queued");
    await vi.waitFor(() => expect(pool.stats().waiting).toBe(1));

    pool.drain();

    await expect(kindOf(queued)).resolves.toBe("EngineUnavailable");
    gate.resolve();
    await holder;
  });

  it("frees the slot when the factory throws before a session exists", async () => {
    const portal = new FakePortal();
    let calls = 0;
    const factory: SessionFactory = {
      createSession: () => {
        calls += 1;
        if (calls === 1) throw new Error("browser binary missing");
        return portal.createSession();
      },
    };
    const pool = new SessionPool(factory, 1);

    await expect(pool.withSession(async () => "never")).rejects.toThrow("browser binary missing");
    expect(pool.stats()).toEqual({ active: 0, waiting: 0, created: 0, closed: 0 });
    await expect(pool.withSession(async () => "ok")).resolves.toBe("ok");
    expect(pool.stats()).toEqual({ active: 0, waiting: 0, created: 1, closed: 1 });
  });

  it("detaches a drained waiter's abort listener", async () => {
    const portal = new FakePortal();
    const pool = new SessionPool(portal, 1);
    const gate = deferred();
    const holder = pool.withSession(() => gate.promise);
    const controller = new AbortController();
    const queued = pool.withSession(async () => "queued", controller.signal);
    await vi.waitFor(() => expect(pool.stats().waiting).toBe(1));
    const removeListener = vi.spyOn(controller.signal, "removeEventListener");

    pool.drain();

    await expect(kindOf(queued)).resolves.toBe("EngineUnavailable");
    expect(removeListener).toHaveBeenCalledWith("abort", expect.any(Function));
    gate.resolve();
    await holder;
  });
});
