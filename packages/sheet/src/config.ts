/**
 * Sheet Configuration
 *
 * Tunables with their Material 3 defaults, validated with zod.
 */

import { DURATIONS } from "@docksheet/motion";
import type { RuntimeLogger } from "@docksheet/shared";
import { z } from "zod";

import { SheetConfigurationError } from "./errors";

export const SHEET_DEFAULTS = {
  /** Release speed (px/s, downwards) above which a drag-end flings */
  flingVelocityThreshold: 700,
  /** Below this progress a slow release closes the sheet */
  closeProgressThreshold: 0.5,
  /** Progress after which the scrim starts fading in */
  scrimDominatesFraction: 0.7,
  scrimMaxOpacity: 0.32,
  enterDurationMs: DURATIONS.sheetEnter,
  exitDurationMs: DURATIONS.sheetExit,
  minContentHeight: 0,
  enableDrag: true,
  maxWidth: 640,
} as const;

const unitInterval = z.number().min(0).max(1);

export const SheetConfigSchema = z.object({
  flingVelocityThreshold: z
    .number()
    .nonnegative()
    .default(SHEET_DEFAULTS.flingVelocityThreshold),
  closeProgressThreshold: unitInterval.default(SHEET_DEFAULTS.closeProgressThreshold),
  scrimDominatesFraction: z
    .number()
    .min(0)
    .lt(1)
    .default(SHEET_DEFAULTS.scrimDominatesFraction),
  scrimMaxOpacity: unitInterval.default(SHEET_DEFAULTS.scrimMaxOpacity),
  enterDurationMs: z.number().nonnegative().default(SHEET_DEFAULTS.enterDurationMs),
  exitDurationMs: z.number().nonnegative().default(SHEET_DEFAULTS.exitDurationMs),
  minContentHeight: z.number().nonnegative().default(SHEET_DEFAULTS.minContentHeight),
  enableDrag: z.boolean().default(SHEET_DEFAULTS.enableDrag),
  /** Unset means "shown when drag is enabled and the theme asks for it" */
  showDragHandle: z.boolean().optional(),
  maxWidth: z.number().positive().default(SHEET_DEFAULTS.maxWidth),
});

export type SheetConfig = z.infer<typeof SheetConfigSchema>;
export type SheetConfigInput = z.input<typeof SheetConfigSchema>;

/**
 * Validate and fill in defaults.
 * Throws `SheetConfigurationError` (`INVALID_OPTIONS`) listing every issue.
 */
export function parseSheetConfig(input: unknown = {}, logger?: RuntimeLogger): SheetConfig {
  const result = SheetConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    const error = new SheetConfigurationError(
      "INVALID_OPTIONS",
      `Invalid sheet configuration: ${issues.join("; ")}`,
      issues
    );
    logger?.error("invalid sheet configuration", { issues });
    throw error;
  }
  return result.data;
}
