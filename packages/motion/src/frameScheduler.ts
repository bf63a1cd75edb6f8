/**
 * Frame Scheduling
 *
 * The single suspension point of the sheet runtime: "run this on the next
 * frame". Hosts supply the real frame source; `ManualFrameScheduler` lets a
 * caller (a test, a game loop) pump frames itself.
 */

/** Invoked with a monotonic frame timestamp in milliseconds */
export type FrameCallback = (timestampMs: number) => void;

export interface FrameScheduler {
  /** Schedule `callback` for the next frame; returns a cancellation id */
  requestFrame(callback: FrameCallback): number;
  cancelFrame(id: number): void;
}

/**
 * Frame scheduler backed by timers, for hosts without a display-synced loop.
 */
export function createTimerFrameScheduler(frameIntervalMs = 16): FrameScheduler {
  const timers = new Map<number, ReturnType<typeof setTimeout>>();
  let nextId = 1;

  return {
    requestFrame(callback) {
      const id = nextId++;
      const timer = setTimeout(() => {
        timers.delete(id);
        callback(performance.now());
      }, frameIntervalMs);
      timers.set(id, timer);
      return id;
    },
    cancelFrame(id) {
      const timer = timers.get(id);
      if (timer !== undefined) {
        clearTimeout(timer);
        timers.delete(id);
      }
    },
  };
}

/**
 * Frame scheduler advanced explicitly with `pump`.
 *
 * Callbacks requested while a frame runs are deferred to the following pump.
 */
export class ManualFrameScheduler implements FrameScheduler {
  private pending = new Map<number, FrameCallback>();
  private nextId = 1;
  private currentTime: number;
  private frames = 0;

  constructor(startTimeMs = 0) {
    this.currentTime = startTimeMs;
  }

  /** Current frame time in milliseconds */
  get now(): number {
    return this.currentTime;
  }

  /** Number of frames pumped so far */
  get frameCount(): number {
    return this.frames;
  }

  get hasPendingFrames(): boolean {
    return this.pending.size > 0;
  }

  requestFrame(callback: FrameCallback): number {
    const id = this.nextId++;
    this.pending.set(id, callback);
    return id;
  }

  cancelFrame(id: number): void {
    this.pending.delete(id);
  }

  /** Advance time by `elapsedMs` and run every callback due this frame */
  pump(elapsedMs = 16): void {
    this.currentTime += elapsedMs;
    this.frames++;
    const due = this.pending;
    this.pending = new Map();
    for (const callback of due.values()) {
      callback(this.currentTime);
    }
  }

  /**
   * Pump until no frame is pending; returns the number of frames pumped.
   * Throws when `maxFrames` is exceeded, which means something never settles.
   */
  pumpUntilIdle(elapsedMs = 16, maxFrames = 1000): number {
    let pumped = 0;
    while (this.hasPendingFrames) {
      if (pumped >= maxFrames) {
        throw new Error(`Frames still pending after ${maxFrames} pumps`);
      }
      this.pump(elapsedMs);
      pumped++;
    }
    return pumped;
  }
}
