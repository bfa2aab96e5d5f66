import { describe, it, expect } from "vitest";
import { MemSessionStore } from "../session/store";
import { TurnSerializer } from "../session/turnSerializer";

describe("MemSessionStore", () => {
  it("returns undefined for an unknown user", async () => {
    const store = new MemSessionStore();
    expect(await store.get("U1")).toBeUndefined();
  });

  it("keeps the last conversation written for a user", async () => {
    const store = new MemSessionStore();
    await store.put("U1", "c1");
    await store.put("U1", "c2");
    await store.put("U2", "c3");

    expect(await store.get("U1")).toBe("c2");
    expect(await store.get("U2")).toBe("c3");
    expect(store.size).toBe(2);
  });

  it("evicts the least recently written session beyond the limit", async () => {
    const store = new MemSessionStore({ maxSessions: 2 });
    await store.put("U1", "c1");
    await store.put("U2", "c2");
    await store.put("U1", "c1b");
    await store.put("U3", "c3");

    expect(store.size).toBe(2);
    expect(await store.get("U2")).toBeUndefined();
    expect(await store.get("U1")).toBe("c1b");
    expect(await store.get("U3")).toBe("c3");
  });

  it("forgets sessions older than the ttl", async () => {
    let clock = 0;
    const store = new MemSessionStore({ ttlMs: 1000, now: () => clock });
    await store.put("U1", "c1");

    clock = 1000;
    expect(await store.get("U1")).toBe("c1");

    clock = 1001;
    expect(await store.get("U1")).toBeUndefined();
    expect(store.size).toBe(0);
  });
  it("drops expired sessions on the next write", async () => {
    let clock = 0;
    const store = new MemSessionStore({ ttlMs: 1000, now: () => clock });
    for (let i = 0; i < 1000; i++) {
      await store.put(`U${i}`, `c${i}`);
    }

    clock = 10_000_000;
    await store.put("new", "c-new");

    expect(store.size).toBe(1);
    expect(await store.get("new")).toBe("c-new");
  });

  it("keeps sessions written within the ttl", async () => {
    let clock = 0;
    const store = new MemSessionStore({ ttlMs: 1000, now: () => clock });
    await store.put("U1", "c1");
    clock = 600;
    await store.put("U2", "c2");

    clock = 1200;
    await store.put("U3", "c3");

    expect(store.size).toBe(2);
    expect(await store.get("U1")).toBeUndefined();
    expect(await store.get("U2")).toBe("c2");
  });
});

describe("TurnSerializer", () => {
  function deferred() {
    let resolve: () => void = () => {};
    const promise = new Promise<void>(r => {
      resolve = r;
    });
    return { promise, resolve };
  }

  it("runs tasks for the same key in order", async () => {
    const serializer = new TurnSerializer();
    const gate = deferred();
    const events: string[] = [];

    const first = serializer.run("U1", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = serializer.run("U1", async () => {
      events.push("second");
    });

    await Promise.resolve();
    expect(events).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not hold up other keys", async () => {
    const serializer = new TurnSerializer();
    const gate = deferred();
    const events: string[] = [];

    const blocked = serializer.run("U1", async () => {
      await gate.promise;
      events.push("U1");
    });
    await serializer.run("U2", async () => {
      events.push("U2");
    });

    expect(events).toEqual(["U2"]);
    gate.resolve();
    await blocked;
    expect(events).toEqual(["U2", "U1"]);
  });

  it("keeps going after a task rejects", async () => {
    const serializer = new TurnSerializer();

    const failed = serializer.run("U1", async () => {
      throw new Error("boom");
    });
    const next = serializer.run("U1", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("drops a key once its queue drains", async () => {
    const serializer = new TurnSerializer();
    await serializer.run("U1", async () => undefined);
    await new Promise(resolve => setTimeout(resolve, 0));

    expect(serializer.pendingKeys).toBe(0);
  });
});
