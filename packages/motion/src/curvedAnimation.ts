import { Curves, type Curve } from "./curves";
import type {
  Animation,
  AnimationListener,
  AnimationStatus,
  AnimationStatusListener,
} from "./types";

/**
 * Read-only view of a parent animation with a curve applied to its value.
 *
 * The curve can be swapped at any time; value listeners are notified only
 * when the swap changes the current output. Status passes straight through.
 */
export class CurvedAnimation implements Animation {
  private currentCurve: Curve;
  private readonly listeners = new Set<AnimationListener>();
  private readonly statusListeners = new Set<AnimationStatusListener>();
  private disposed = false;

  constructor(
    readonly parent: Animation,
    curve: Curve = Curves.linear
  ) {
    this.currentCurve = curve;
    parent.addListener(this.handleParentValue);
    parent.addStatusListener(this.handleParentStatus);
  }

  get curve(): Curve {
    return this.currentCurve;
  }

  set curve(next: Curve) {
    if (next === this.currentCurve) {
      return;
    }
    const previous = this.value;
    this.currentCurve = next;
    if (this.value !== previous) {
      this.notifyListeners();
    }
  }

  get value(): number {
    const t = this.parent.value;
    if (t <= 0 || t >= 1) {
      return t;
    }
    return this.currentCurve.transform(t);
  }

  get status(): AnimationStatus {
    return this.parent.status;
  }

  addListener(listener: AnimationListener): void {
    this.listeners.add(listener);
  }

  removeListener(listener: AnimationListener): void {
    this.listeners.delete(listener);
  }

  addStatusListener(listener: AnimationStatusListener): void {
    this.statusListeners.add(listener);
  }

  removeStatusListener(listener: AnimationStatusListener): void {
    this.statusListeners.delete(listener);
  }

  /** Detach from the parent; the parent itself is left running */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.parent.removeListener(this.handleParentValue);
    this.parent.removeStatusListener(this.handleParentStatus);
    this.listeners.clear();
    this.statusListeners.clear();
  }

  private readonly handleParentValue = (): void => {
    this.notifyListeners();
  };

  private readonly handleParentStatus = (status: AnimationStatus): void => {
    for (const listener of [...this.statusListeners]) {
      listener(status);
    }
  };

  private notifyListeners(): void {
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}
