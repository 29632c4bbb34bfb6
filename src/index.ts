/**
 * gradfetch — Public API
 *
 * Recolor neofetch/fastfetch ascii art with gradient color profiles.
 *
 * @example
 * ```ts
 * import { getPreset, recolorAscii } from 'gradfetch';
 *
 * const art = '${c1}  /\\\n${c2} /  \\';
 * console.log(recolorAscii(art, { mode: 'horizontal' }, getPreset('rainbow'), 'rgb', 'dark'));
 * ```
 */

// ── Errors ───────────────────────────────────────────────────────────
export {
  BackendExitError,
  BackendNotFoundError,
  ColorParseError,
  ConfigError,
  DimensionOverflowError,
  GradfetchError,
  InvalidColorIndexError,
  InvalidOptionError,
  InvalidPlaceholderError,
  MissingColorStateError,
  ProfileSpreadError,
  UnknownPresetError,
} from './errors.js';
// ── Logger ───────────────────────────────────────────────────────────
export type { Logger, LogLevel } from './logger.js';
export { createLogger, getLogLevel, setLogLevel } from './logger.js';

// ── Types ────────────────────────────────────────────────────────────
export type {
  AlignmentMode,
  AnsiMode,
  AsciiSize,
  BackendName,
  ColorAlignment,
  ColorRole,
  CustomColorMap,
  ForeBackPair,
  PlaceholderMatch,
  PlaceholderSlot,
  TerminalTheme,
} from './types/index.js';
export { ALIGNMENT_MODES, ANSI_MODES, BACKEND_NAMES, PLACEHOLDER_SLOTS, TERMINAL_THEMES } from './types/index.js';
export type { GradfetchConfig } from './types/schemas.js';
export { AlignmentSchema, ConfigSchema, CustomColorsSchema, ForeBackSchema } from './types/schemas.js';

// ── Colors ───────────────────────────────────────────────────────────
export { ANSI_RESET, ansi256ToAnsi16, RgbColor, rgbToAnsi256 } from './color/color.js';
export type { PresetName } from './color/presets.js';
export { getPreset, PRESET_NAMES, parseColorList } from './color/presets.js';
export { ColorProfile } from './color/profile.js';

// ── Recolor ──────────────────────────────────────────────────────────
export { neutralColor, recolorAscii } from './recolor/alignment.js';
export { fillStarting } from './recolor/fill-starting.js';
export type { ForeBackRecommendation } from './recolor/fore-back.js';
export { listForeBackRecommendations, recommendForeBack } from './recolor/fore-back.js';
export { asciiSize, MAX_DIMENSION, normalizeAscii } from './recolor/metrics.js';
export { PlaceholderScanner, placeholderScanner } from './recolor/placeholders.js';

// ── Backends ─────────────────────────────────────────────────────────
export type { BackendAdapter, BackendInvocation } from './backends/registry.js';
export { ALL_BACKENDS, backends } from './backends/registry.js';
export { detectDistroName, getAvailableBackends, runBackend } from './backends/run.js';

// ── Config ───────────────────────────────────────────────────────────
export { configPath, loadConfig, saveConfig } from './utils/config.js';
export type { AlignmentChoice } from './utils/options.js';
export { resolveAlignment } from './utils/options.js';
