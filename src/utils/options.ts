import { InvalidOptionError } from '../errors.js';
import {
  ALIGNMENT_MODES,
  type AlignmentMode,
  ANSI_MODES,
  type AnsiMode,
  BACKEND_NAMES,
  type BackendName,
  type ColorAlignment,
  type CustomColorMap,
  type ForeBackPair,
  TERMINAL_THEMES,
  type TerminalTheme,
} from '../types/index.js';
import { CustomColorsSchema, ForeBackSchema } from '../types/schemas.js';

function firstIssue(error: { issues: { message: string }[] }): string {
  return error.issues[0]?.message ?? 'invalid value';
}

function parseChoice<T extends string>(option: string, value: string, choices: readonly T[]): T {
  const found = choices.find((choice) => choice === value.trim().toLowerCase());
  if (!found) throw new InvalidOptionError(option, value, `expected one of ${choices.join(', ')}`);
  return found;
}

export function parseAnsiMode(value: string): AnsiMode {
  return parseChoice('--mode', value, ANSI_MODES);
}

export function parseTheme(value: string): TerminalTheme {
  return parseChoice('--theme', value, TERMINAL_THEMES);
}

export function parseAlignmentMode(value: string): AlignmentMode {
  return parseChoice('--align', value, ALIGNMENT_MODES);
}

export function parseBackend(value: string): BackendName {
  return parseChoice('--backend', value, BACKEND_NAMES);
}

/** `"2,1"` → `[2, 1]` */
export function parseForeBack(value: string): ForeBackPair {
  const parts = value.split(',').map((part) => Number(part.trim()));
  const result = ForeBackSchema.safeParse(parts);
  if (!result.success) throw new InvalidOptionError('--fore-back', value, firstIssue(result.error));
  return result.data;
}

/** `"1=0,3=2"` → `{ 1: 0, 3: 2 }` (slot → 0-based palette index) */
export function parseCustomColors(value: string): CustomColorMap {
  const record: Record<string, number> = {};

  for (const entry of value.split(',').filter((e) => e.trim())) {
    const [slot, index, ...rest] = entry.split('=').map((part) => part.trim());
    if (index === undefined || rest.length > 0 || !/^\d+$/.test(index)) {
      throw new InvalidOptionError('--custom', value, `expected slot=index pairs, got "${entry.trim()}"`);
    }
    if (Object.hasOwn(record, slot)) {
      throw new InvalidOptionError('--custom', value, `slot ${slot} is mapped twice`);
    }
    record[slot] = Number(index);
  }

  const result = CustomColorsSchema.safeParse(record);
  if (!result.success) throw new InvalidOptionError('--custom', value, firstIssue(result.error));
  return result.data;
}

export interface AlignmentChoice {
  /** Requested mode; falls back to the configured alignment, then horizontal */
  mode?: AlignmentMode;
  foreBack?: ForeBackPair;
  customColors?: CustomColorMap;
  /** Pair recommended for the detected or named distro */
  recommended?: ForeBackPair;
}

/**
 * Combine CLI choices, the configured alignment and the distro recommendation.
 * Explicit flags win over config; config wins over the recommendation.
 */
export function resolveAlignment(choice: AlignmentChoice, configured?: ColorAlignment): ColorAlignment {
  const mode = choice.mode ?? (choice.customColors ? 'custom' : configured?.mode) ?? 'horizontal';

  if (mode === 'custom') {
    const customColors =
      choice.customColors ?? (configured?.mode === 'custom' ? configured.customColors : undefined);
    if (!customColors) {
      throw new InvalidOptionError('--align', 'custom', 'custom alignment needs a --custom slot=index mapping');
    }
    return { mode, customColors };
  }

  const configuredForeBack = configured && configured.mode !== 'custom' ? configured.foreBack : undefined;
  const foreBack = choice.foreBack ?? configuredForeBack ?? choice.recommended;
  return foreBack ? { mode, foreBack } : { mode };
}
