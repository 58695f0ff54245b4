import { describe, expect, it, vi } from "vitest";
import { FakeEventSource, TEST_EVENT, TEST_PAYLOAD, createTestEventManager } from "@rendezvous/testing";
import { bindEventSource } from "../src/inbound/eventSourceBridge";

describe("bindEventSource", () => {
  it("forwards notifications into the manager", async () => {
    const source = new FakeEventSource();
    const { manager } = createTestEventManager();
    const binding = bindEventSource({ source, manager });

    const pending = manager.waitFor(TEST_EVENT);
    source.emit(TEST_EVENT, TEST_PAYLOAD);

    await expect(pending).resolves.toEqual([TEST_PAYLOAD]);
    expect(binding.dispatchedCount).toBe(1);

    binding.stop();
  });

  it("stops forwarding after stop()", () => {
    const source = new FakeEventSource();
    const { manager } = createTestEventManager();
    const dispatch = vi.spyOn(manager, "dispatch");

    const binding = bindEventSource({ source, manager });
    source.emit("on_ready");
    binding.stop();
    binding.stop();
    source.emit("on_ready");

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(source.unsubscriptions).toBe(1);
    expect(binding.dispatchedCount).toBe(1);
  });

  it("reports dispatch failures without throwing into the source", () => {
    const source = new FakeEventSource();
    const { manager } = createTestEventManager();
    const failure = new Error("dispatch exploded");
    vi.spyOn(manager, "dispatch").mockImplementation(() => {
      throw failure;
    });
    const onError = vi.fn();

    const binding = bindEventSource({ source, manager, onError });

    expect(() => source.emit("on_ready", 1)).not.toThrow();
    expect(onError).toHaveBeenCalledWith(failure, "on_ready");
    expect(binding.dispatchedCount).toBe(0);
  });
});
