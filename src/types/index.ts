/**
 * Shared types for the recolor engine and the CLI around it
 */

import type { PlaceholderSlot } from './names.js';

export {
  ALIGNMENT_MODES,
  type AlignmentMode,
  ANSI_MODES,
  type AnsiMode,
  BACKEND_NAMES,
  type BackendName,
  type ColorRole,
  isPlaceholderSlot,
  PLACEHOLDER_SLOTS,
  type PlaceholderSlot,
  TERMINAL_THEMES,
  type TerminalTheme,
} from './names.js';

/**
 * Slots singled out for special treatment: `fore` stays the theme-neutral
 * color (outline), `back` receives the gradient (fill).
 */
export type ForeBackPair = readonly [fore: PlaceholderSlot, back: PlaceholderSlot];

/** Slot → palette index (0-based) into the deduplicated profile */
export type CustomColorMap = Partial<Record<PlaceholderSlot, number>>;

/** Gradient alignment — discriminated union on `mode` */
export type ColorAlignment =
  | { mode: 'horizontal'; foreBack?: ForeBackPair }
  | { mode: 'vertical'; foreBack?: ForeBackPair }
  | { mode: 'custom'; customColors: CustomColorMap };

/** Measured bounding box of ascii art in display columns and lines */
export interface AsciiSize {
  width: number;
  height: number;
}

/** One `${cN}` occurrence inside a line (UTF-16 offsets, end exclusive) */
export interface PlaceholderMatch {
  slot: PlaceholderSlot;
  start: number;
  end: number;
}
