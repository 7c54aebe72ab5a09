import { describe, it, expect, vi, afterEach } from "vitest";
import { WakeSignal, settleWithin } from "../wake-signal.js";

describe("WakeSignal", () => {
  it("wakes a waiter early on notify", async () => {
    const signal = new WakeSignal();
    const started = Date.now();
    const waiting = signal.wait(5_000);
    signal.notify();
    await waiting;
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("latches a notify that arrives with no waiter", async () => {
    const signal = new WakeSignal();
    signal.notify();
    const started = Date.now();
    await signal.wait(5_000);
    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it("resolves on timeout without a notify", async () => {
    const signal = new WakeSignal();
    await expect(signal.wait(10)).resolves.toBeUndefined();
  });

  it("wakes every waiter once and leaves none behind", async () => {
    const signal = new WakeSignal();
    const first = signal.wait(5_000);
    const second = signal.wait(5_000);
    expect(signal.waiting()).toBe(2);

    signal.notify();
    await Promise.all([first, second]);
    expect(signal.waiting()).toBe(0);
  });

  describe("timer references", () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    function lastTimerHasRef(spy: { mock: { results: Array<{ type: string; value: unknown }> } }): boolean {
      const last = spy.mock.results.at(-1);
      const timer = last?.value;
      return typeof timer === "object" && timer !== null && "hasRef" in timer && typeof timer.hasRef === "function"
        ? Boolean(timer.hasRef())
        : false;
    }

    it("does not hold the process open by default", async () => {
      const spy = vi.spyOn(globalThis, "setTimeout");
      const signal = new WakeSignal();
      const waiting = signal.wait(5_000);

      expect(lastTimerHasRef(spy)).toBe(false);
      signal.notify();
      await waiting;
    });

    it("holds the process open while a keep-alive wait is pending", async () => {
      const spy = vi.spyOn(globalThis, "setTimeout");
      const signal = new WakeSignal();
      const waiting = signal.wait(5_000, true);

      expect(lastTimerHasRef(spy)).toBe(true);
      signal.notify();
      await waiting;
    });
  });
});

describe("settleWithin", () => {
  it("reports whether the promise settled in time", async () => {
    expect(await settleWithin(Promise.resolve("done"), 50)).toBe(true);
    expect(await settleWithin(new Promise(() => {}), 10)).toBe(false);
  });
});
