import { describe, test, expect } from "vitest";
import { SessionStore, emptyMetrics } from "../src/session-store.ts";
import { InvalidArgumentError, SessionNotFoundError } from "../src/errors.ts";

// ── Creation & lookup ─────────────────────────────────────────────

describe("SessionStore", () => {
  test("creates active sessions with fresh ids", () => {
    const store = new SessionStore();
    const ids = new Set<string>();
    for (let i = 0; i < 50; i++) {
      ids.add(store.create("u1", "m1").id);
    }
    expect(ids.size).toBe(50);

    const session = store.create("u2", "m2");
    expect(session.userId).toBe("u2");
    expect(session.model).toBe("m2");
    expect(session.active).toBe(true);
    expect(session.messages).toEqual([]);
    expect(session.metrics).toBeUndefined();
  });

  test("get throws SessionNotFoundError for unknown ids", () => {
    const store = new SessionStore();
    expect(() => store.get("missing")).toThrow(SessionNotFoundError);
    expect(() => store.get("missing")).toThrow("Session missing does not exist");
  });

  test("getActive rejects ended sessions", () => {
    const store = new SessionStore();
    const session = store.create("u1", "m1");
    expect(store.end(session.id)).toBe(true);
    expect(() => store.getActive(session.id)).toThrow(InvalidArgumentError);
    expect(() => store.getActive(session.id)).toThrow(`Session ${session.id} is not active`);
  });

  test("end returns false for unknown sessions", () => {
    expect(new SessionStore().end("nope")).toBe(false);
  });

  // ── History ─────────────────────────────────────────────────────

  test("history keeps insertion order and honours limit", () => {
    const store = new SessionStore();
    const session = store.create("u1", "m1");
    store.append(session, "user", "one");
    store.append(session, "assistant", "two");
    store.append(session, "user", "three");

    expect(store.history(session).map((m) => m.content)).toEqual(["one", "two", "three"]);
    expect(store.history(session, 2).map((m) => m.content)).toEqual(["two", "three"]);
    expect(store.history(session, 10)).toHaveLength(3);
    expect(store.history(session, 0)).toEqual([]);
    expect(() => store.history(session, -1)).toThrow(InvalidArgumentError);
  });

  test("history returns a copy", () => {
    const store = new SessionStore();
    const session = store.create("u1", "m1");
    store.append(session, "user", "hello");
    store.history(session).pop();
    expect(session.messages).toHaveLength(1);
  });

  // ── Usage ───────────────────────────────────────────────────────

  test("metrics default to zero and accumulate per call", () => {
    const store = new SessionStore();
    const session = store.create("u1", "m1");
    expect(store.metrics(session)).toEqual(emptyMetrics());

    store.recordUsage(session, 100, 0.01);
    store.recordUsage(session, 50, 0.01);
    const metrics = store.metrics(session);
    expect(metrics.tokenCount).toBe(150);
    expect(metrics.apiCalls).toBe(2);
    expect(metrics.costEstimate).toBeCloseTo(0.0015, 10);

    metrics.tokenCount = 0;
    expect(store.metrics(session).tokenCount).toBe(150);
  });

  // ── Locking ─────────────────────────────────────────────────────

  test("withLock serializes tasks on the same session", async () => {
    const store = new SessionStore();
    const order: string[] = [];
    let releaseFirst: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = store.withLock("s1", async () => {
      order.push("first:start");
      await gate;
      order.push("first:end");
    });
    const second = store.withLock("s1", async () => {
      order.push("second");
    });

    await Promise.resolve();
    releaseFirst();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  test("withLock does not block other sessions", async () => {
    const store = new SessionStore();
    let releaseA: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      releaseA = resolve;
    });

    const a = store.withLock("a", async () => {
      await gate;
      return "a";
    });
    const b = await store.withLock("b", async () => "b");

    expect(b).toBe("b");
    releaseA();
    expect(await a).toBe("a");
  });

  test("a failing task does not block the next one", async () => {
    const store = new SessionStore();
    await expect(
      store.withLock("s1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await store.withLock("s1", async () => 42)).toBe(42);
  });
});
