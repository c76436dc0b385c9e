import { describe, it, expect, afterEach, vi } from "vitest";

import { withTimeout } from "../src/lib/timeout.js";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the promise when it settles first", async () => {
    await expect(withTimeout(Promise.resolve(7), 100, () => new Error("late"))).resolves.toBe(7);
  });

  it("rejects with the timeout error when the timer fires first", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), 100, () => new Error("late"));
    const assertion = expect(pending).rejects.toThrow("late");
    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it("clears its timer once the promise settles", async () => {
    vi.useFakeTimers();
    await withTimeout(Promise.resolve("done"), 100, () => new Error("late"));
    expect(vi.getTimerCount()).toBe(0);
  });
});
