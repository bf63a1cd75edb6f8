/**
 * Reference Cells
 *
 * Mutable single-slot boxes for handing a value from one layout participant to
 * another within the same pass. A cell has exactly one producer. Consumers read
 * it after the producer has been measured; reading earlier yields the previous
 * pass's value (or the initial one), which is a caller ordering bug.
 */

/** Called after a cell's value changed */
export type ReferenceListener<T> = (value: T, previous: T) => void;

/** Read-only view of a reference cell */
export interface ReadOnlyReference<T> {
  readonly value: T;
}

/**
 * Reference to a mutable value of type `T`.
 *
 * Writing a value equal (`Object.is`) to the current one is a no-op and does
 * not invoke the change listener.
 */
export class Reference<T> implements ReadOnlyReference<T> {
  private current: T;
  private listener: ReferenceListener<T> | null;

  constructor(initial: T, onChange?: ReferenceListener<T>) {
    this.current = initial;
    this.listener = onChange ?? null;
  }

  get value(): T {
    return this.current;
  }

  set value(next: T) {
    if (Object.is(this.current, next)) {
      return;
    }
    const previous = this.current;
    this.current = next;
    this.listener?.(next, previous);
  }

  /** Replace the change listener (null detaches it) */
  setListener(listener: ReferenceListener<T> | null): void {
    this.listener = listener;
  }

  /** Read-only view sharing this cell's storage */
  asReadOnly(): ReadOnlyReference<T> {
    return this;
  }
}

/** Create a nullable reference, unset until its producer first writes it */
export function createReference<T>(onChange?: ReferenceListener<T | null>): Reference<T | null> {
  return new Reference<T | null>(null, onChange);
}
