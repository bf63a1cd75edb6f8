import { describe, expect, it } from "vitest";

import { SHEET_DEFAULTS, parseSheetConfig } from "../config.js";
import { SheetConfigurationError } from "../errors.js";

function captureError(fn: () => void): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("parseSheetConfig", () => {
  it("should fill in the defaults", () => {
    expect(parseSheetConfig()).toEqual({
      flingVelocityThreshold: 700,
      closeProgressThreshold: 0.5,
      scrimDominatesFraction: 0.7,
      scrimMaxOpacity: 0.32,
      enterDurationMs: 400,
      exitDurationMs: 350,
      minContentHeight: 0,
      enableDrag: true,
      maxWidth: 640,
    });
    expect(SHEET_DEFAULTS.enterDurationMs).toBe(400);
  });

  it("should keep provided values", () => {
    const config = parseSheetConfig({ showDragHandle: true, minContentHeight: 120 });
    expect(config.showDragHandle).toBe(true);
    expect(config.minContentHeight).toBe(120);
  });

  it("should reject out-of-range values with every issue listed", () => {
    const error = captureError(() =>
      parseSheetConfig({ closeProgressThreshold: 2, scrimDominatesFraction: 1 })
    );

    expect(error).toBeInstanceOf(SheetConfigurationError);
    if (!(error instanceof SheetConfigurationError)) {
      return;
    }
    expect(error.code).toBe("INVALID_OPTIONS");
    expect(error.issues).toHaveLength(2);
    expect(error.issues[0]).toMatch(/^closeProgressThreshold: /);
    expect(error.issues[1]).toMatch(/^scrimDominatesFraction: /);
    expect(error.message).toMatch(/^Invalid sheet configuration: closeProgressThreshold: /);
  });

  it("should reject a non-object input at the root", () => {
    const error = captureError(() => parseSheetConfig(42));

    expect(error).toBeInstanceOf(SheetConfigurationError);
    if (error instanceof SheetConfigurationError) {
      expect(error.issues[0]).toMatch(/^\(root\): /);
    }
  });
});
