import { afterEach, describe, expect, it, vi } from "vitest";

import { ManualFrameScheduler, createTimerFrameScheduler } from "../frameScheduler.js";

describe("ManualFrameScheduler", () => {
  it("should run requested callbacks with the advanced time", () => {
    const scheduler = new ManualFrameScheduler();
    const callback = vi.fn();

    scheduler.requestFrame(callback);
    scheduler.pump(16);

    expect(callback).toHaveBeenCalledWith(16);
    expect(scheduler.frameCount).toBe(1);
    expect(scheduler.now).toBe(16);
  });

  it("should skip cancelled callbacks", () => {
    const scheduler = new ManualFrameScheduler();
    const callback = vi.fn();

    const id = scheduler.requestFrame(callback);
    scheduler.cancelFrame(id);
    scheduler.pump();

    expect(callback).not.toHaveBeenCalled();
    expect(scheduler.hasPendingFrames).toBe(false);
  });

  it("should defer callbacks requested during a frame to the next pump", () => {
    const scheduler = new ManualFrameScheduler();
    const inner = vi.fn();
    scheduler.requestFrame(() => {
      scheduler.requestFrame(inner);
    });

    scheduler.pump();
    expect(inner).not.toHaveBeenCalled();

    scheduler.pump();
    expect(inner).toHaveBeenCalledWith(32);
  });

  it("should pump until idle and report the frame count", () => {
    const scheduler = new ManualFrameScheduler();
    let remaining = 3;
    const step = () => {
      remaining--;
      if (remaining > 0) {
        scheduler.requestFrame(step);
      }
    };
    scheduler.requestFrame(step);

    expect(scheduler.pumpUntilIdle()).toBe(3);
  });

  it("should throw when frames never stop", () => {
    const scheduler = new ManualFrameScheduler();
    const loop = () => {
      scheduler.requestFrame(loop);
    };
    scheduler.requestFrame(loop);

    expect(() => scheduler.pumpUntilIdle(16, 5)).toThrow("Frames still pending after 5 pumps");
  });
});

describe("createTimerFrameScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should fire callbacks after the frame interval", () => {
    vi.useFakeTimers();
    const scheduler = createTimerFrameScheduler(16);
    const callback = vi.fn();

    scheduler.requestFrame(callback);
    vi.advanceTimersByTime(15);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledWith(expect.any(Number));
  });

  it("should not fire cancelled callbacks", () => {
    vi.useFakeTimers();
    const scheduler = createTimerFrameScheduler();
    const callback = vi.fn();

    scheduler.cancelFrame(scheduler.requestFrame(callback));
    vi.advanceTimersByTime(100);

    expect(callback).not.toHaveBeenCalled();
  });
});
