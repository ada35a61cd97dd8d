import { describe, expect, it } from "vitest";
import { InflightTracker } from "../inflight.js";

describe("InflightTracker", () => {
  it("drains immediately when nothing is running", async () => {
    expect(await new InflightTracker().drain(10)).toEqual({ drained: true, abandoned: 0 });
  });

  it("waits for tracked handlers to settle", async () => {
    const tracker = new InflightTracker();
    let release = (): void => {};
    const task = new Promise<void>(resolve => { release = resolve; });
    tracker.track(task).catch(() => undefined);
    expect(tracker.size).toBe(1);

    const drain = tracker.drain(1_000);
    release();
    expect(await drain).toEqual({ drained: true, abandoned: 0 });
    expect(tracker.size).toBe(0);
  });

  it("hands rejections back to the caller and still forgets the task", async () => {
    const tracker = new InflightTracker();
    await expect(tracker.track(Promise.reject(new Error("nope")))).rejects.toThrow("nope");
    expect(await tracker.drain(1_000)).toEqual({ drained: true, abandoned: 0 });
  });

  it("abandons handlers that outlive the timeout", async () => {
    const tracker = new InflightTracker();
    void tracker.track(new Promise<void>(() => {}));
    expect(await tracker.drain(20)).toEqual({ drained: false, abandoned: 1 });
  });
});
