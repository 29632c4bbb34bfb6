/**
 * Canonical names and the union types derived from them.
 * Adding a member here makes the compiler surface every switch that needs updating.
 */

/** The six color slots ascii art authors reference as `${c1}` … `${c6}` */
export const PLACEHOLDER_SLOTS = Object.freeze([1, 2, 3, 4, 5, 6] as const);

/** Placeholder slot — 1-indexed, derived from PLACEHOLDER_SLOTS */
export type PlaceholderSlot = (typeof PLACEHOLDER_SLOTS)[number];

export function isPlaceholderSlot(value: number): value is PlaceholderSlot {
  return Number.isInteger(value) && value >= 1 && value <= PLACEHOLDER_SLOTS.length;
}

/** Escape flavours a color can be rendered in */
export const ANSI_MODES = Object.freeze(['ansi', '8bit', 'rgb'] as const);
export type AnsiMode = (typeof ANSI_MODES)[number];

export const TERMINAL_THEMES = Object.freeze(['light', 'dark'] as const);
export type TerminalTheme = (typeof TERMINAL_THEMES)[number];

export const ALIGNMENT_MODES = Object.freeze(['horizontal', 'vertical', 'custom'] as const);
export type AlignmentMode = (typeof ALIGNMENT_MODES)[number];

/** Fetch tools that can print recolored ascii art */
export const BACKEND_NAMES = Object.freeze(['neofetch', 'fastfetch', 'fastfetch-old'] as const);
export type BackendName = (typeof BACKEND_NAMES)[number];

/** Whether an escape targets the glyph color or the cell background */
export type ColorRole = 'foreground' | 'background';
