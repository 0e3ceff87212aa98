import { TimeoutError } from "../errors.js";

/**
 * One-shot, single-writer/single-reader result slot linking a TCP request to
 * its outcome. The serializer writes exactly once; the connection handler
 * waits with a bound. Not reusable.
 */
export class CompletionHandle<T> {
  private value: { outcome: T } | null = null;
  private waiter: ((outcome: T) => void) | null = null;

  /** Write the outcome. Returns false if the handle was already settled. */
  settle(outcome: T): boolean {
    if (this.value) return false;
    this.value = { outcome };

    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w(outcome);
    }
    return true;
  }

  get isSettled(): boolean {
    return this.value !== null;
  }

  /**
   * Wait for the outcome. Rejects with TimeoutError after `timeoutMs`; the
   * writer is unaffected and may still settle later, unobserved.
   */
  wait(timeoutMs: number): Promise<T> {
    if (this.value) return Promise.resolve(this.value.outcome);
    if (this.waiter) {
      return Promise.reject(new Error("CompletionHandle already has a waiter"));
    }

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new TimeoutError());
      }, timeoutMs);

      this.waiter = (outcome) => {
        clearTimeout(timer);
        resolve(outcome);
      };
    });
  }
}
