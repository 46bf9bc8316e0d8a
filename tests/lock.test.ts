import { describe, expect, it } from "vitest";
import { RwLock } from "../src/lock";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("RwLock", () => {
  it("lets readers overlap", async () => {
    const lock = new RwLock();
    const gate = deferred();
    let active = 0;
    let peak = 0;
    const reader = () =>
      lock.read(async () => {
        active++;
        peak = Math.max(peak, active);
        await gate.promise;
        active--;
      });
    const all = Promise.all([reader(), reader(), reader()]);
    await Promise.resolve();
    gate.resolve();
    await all;
    expect(peak).toBe(3);
  });

  it("keeps readers out while a writer holds the lock", async () => {
    const lock = new RwLock();
    const gate = deferred();
    const events: string[] = [];

    const writer = lock.write(async () => {
      events.push("write:start");
      await gate.promise;
      events.push("write:end");
    });
    const reader = lock.read(async () => {
      events.push("read");
    });
    await Promise.resolve();
    expect(events).toEqual(["write:start"]);
    gate.resolve();
    await Promise.all([writer, reader]);
    expect(events).toEqual(["write:start", "write:end", "read"]);
  });

  it("serves a queued writer before readers that arrived after it", async () => {
    const lock = new RwLock();
    const gate = deferred();
    const events: string[] = [];

    const firstRead = lock.read(async () => {
      await gate.promise;
      events.push("read1");
    });
    const write = lock.write(async () => {
      events.push("write");
    });
    const secondRead = lock.read(async () => {
      events.push("read2");
    });
    gate.resolve();
    await Promise.all([firstRead, write, secondRead]);
    expect(events).toEqual(["read1", "write", "read2"]);
  });

  it("releases the lock when the critical section throws", async () => {
    const lock = new RwLock();
    await expect(
      lock.write(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(lock.read(async () => "ok")).resolves.toBe("ok");
  });
});
