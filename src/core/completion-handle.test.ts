import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TimeoutError } from "../errors.js";
import { CompletionHandle } from "./completion-handle.js";

describe("CompletionHandle", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves a pending waiter when settled", async () => {
    const handle = new CompletionHandle<string>();
    const pending = handle.wait(1000);

    expect(handle.settle("done")).toBe(true);

    await expect(pending).resolves.toBe("done");
  });

  it("resolves immediately when settled before wait", async () => {
    const handle = new CompletionHandle<number>();
    handle.settle(7);

    await expect(handle.wait(1000)).resolves.toBe(7);
  });

  it("accepts only the first write", async () => {
    const handle = new CompletionHandle<string>();
    expect(handle.settle("first")).toBe(true);
    expect(handle.settle("second")).toBe(false);

    await expect(handle.wait(10)).resolves.toBe("first");
    expect(handle.isSettled).toBe(true);
  });

  it("rejects with TimeoutError after the bound", async () => {
    const handle = new CompletionHandle<string>();
    const pending = handle.wait(500);
    const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(500);

    await assertion;
  });

  it("tolerates a write after the waiter timed out", async () => {
    const handle = new CompletionHandle<string>();
    const pending = handle.wait(100);
    const assertion = expect(pending).rejects.toThrow("Timeout waiting for operation to complete");
    await vi.advanceTimersByTimeAsync(100);
    await assertion;

    expect(handle.settle("late")).toBe(true);
    expect(handle.isSettled).toBe(true);
  });

  it("does not time out once settled", async () => {
    const handle = new CompletionHandle<string>();
    const pending = handle.wait(100);
    handle.settle("fast");

    await vi.advanceTimersByTimeAsync(200);

    await expect(pending).resolves.toBe("fast");
  });

  it("refuses a second concurrent waiter", async () => {
    const handle = new CompletionHandle<string>();
    const first = handle.wait(100);

    await expect(handle.wait(100)).rejects.toThrow("already has a waiter");

    handle.settle("ok");
    await expect(first).resolves.toBe("ok");
  });
});
