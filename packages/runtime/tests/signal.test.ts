import { describe, expect, it } from "vitest";
import { flushMicrotasks } from "@rendezvous/testing";
import { Signal } from "../src/events/signal";

describe("Signal", () => {
  it("suspends waiters until raised", async () => {
    const signal = new Signal();
    let woke = false;
    void signal.wait().then(() => { woke = true; });

    await flushMicrotasks();
    expect(woke).toBe(false);

    signal.raise();
    await flushMicrotasks();
    expect(woke).toBe(true);
  });

  it("resolves immediately while raised and raising twice is a no-op", async () => {
    const signal = new Signal();
    signal.raise();
    signal.raise();

    expect(signal.isRaised).toBe(true);
    await expect(signal.wait()).resolves.toBeUndefined();
  });

  it("suspends again after clear", async () => {
    const signal = new Signal();
    signal.raise();
    signal.clear();

    let woke = false;
    void signal.wait().then(() => { woke = true; });
    await flushMicrotasks();

    expect(signal.isRaised).toBe(false);
    expect(woke).toBe(false);
  });
});
