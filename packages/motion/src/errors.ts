export type AnimationDriverErrorCode = "NO_DURATION" | "DISPOSED";

/**
 * Misuse of an animation driver: a command that needs a default duration on a
 * driver without one, or any access after `dispose()`.
 */
export class AnimationDriverError extends Error {
  constructor(
    readonly code: AnimationDriverErrorCode,
    message: string,
    readonly debugLabel?: string
  ) {
    super(message);
    this.name = "AnimationDriverError";
  }
}
