import { describe, expect, it } from "vitest";
import { z } from "zod";
import {
  InvalidWaitOptionsError,
  LoopTimeoutError,
  PredicateError,
  TimeoutError,
  WaitAbortedError,
  WaitTimeoutError,
} from "../src";

describe("error taxonomy", () => {
  it("WaitTimeoutError carries the event name and bound", () => {
    const error = new WaitTimeoutError("on_ready", 250);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.name).toBe("WaitTimeoutError");
    expect(error.message).toBe('waitFor("on_ready") timed out after 250ms');
    expect(error.eventName).toBe("on_ready");
    expect(error.timeoutMs).toBe(250);
  });

  it("LoopTimeoutError is a TimeoutError too", () => {
    const error = new LoopTimeoutError("on_message", 30);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error.message).toBe('loopFor("on_message") timed out after 30ms');
  });

  it("WaitAbortedError describes its reason", () => {
    expect(new WaitAbortedError("on_ready").message).toBe('wait for "on_ready" aborted: aborted');
    expect(new WaitAbortedError("on_ready", "event manager closed").message)
      .toBe('wait for "on_ready" aborted: event manager closed');
    expect(new WaitAbortedError("on_ready", new Error("socket lost")).reason).toBeInstanceOf(Error);
  });

  it("PredicateError keeps the thrown value as its cause", () => {
    const cause = new TypeError("bad payload");
    const error = new PredicateError("on_ready", cause);

    expect(error.message).toBe('predicate for "on_ready" threw: bad payload');
    expect(error.cause).toBe(cause);
  });

  it("InvalidWaitOptionsError lists each issue with its path", () => {
    const parsed = z.object({ timeoutMs: z.number() }).strict().safeParse({ timeoutMs: "soon" });
    if (parsed.success) {
      throw new Error("expected the parse to fail");
    }

    const error = new InvalidWaitOptionsError(parsed.error.issues);
    expect(error.message).toBe("Invalid wait options: timeoutMs: Expected number, received string");
    expect(error.issues).toHaveLength(1);
  });
});
