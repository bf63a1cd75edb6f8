export type SheetConfigurationErrorCode = "MISSING_ANIMATION_DRIVER" | "INVALID_OPTIONS";

/**
 * A sheet was set up in a way that cannot work. Raised at construction,
 * never while a gesture or frame is being handled.
 */
export class SheetConfigurationError extends Error {
  constructor(
    readonly code: SheetConfigurationErrorCode,
    message: string,
    readonly issues: string[] = []
  ) {
    super(message);
    this.name = "SheetConfigurationError";
  }
}
