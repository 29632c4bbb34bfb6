import { ANSI_RESET, RgbColor } from '../color/color.js';
import type { ColorProfile } from '../color/profile.js';
import { InvalidColorIndexError, ProfileSpreadError } from '../errors.js';
import { createLogger } from '../logger.js';
import {
  type AnsiMode,
  type ColorAlignment,
  type CustomColorMap,
  type ForeBackPair,
  PLACEHOLDER_SLOTS,
  type PlaceholderSlot,
  type TerminalTheme,
} from '../types/index.js';
import { splitGraphemes } from '../utils/graphemes.js';
import { fillStarting } from './fill-starting.js';
import { asciiSize } from './metrics.js';
import { placeholderFor, placeholderScanner } from './placeholders.js';

const log = createLogger('recolor');

const NEUTRAL_COLORS: Record<TerminalTheme, RgbColor> = {
  light: new RgbColor(0, 0, 0),
  dark: new RgbColor(255, 255, 255),
};

/** The readable fixed color used for `fore` slots on the given terminal theme. */
export function neutralColor(theme: TerminalTheme): RgbColor {
  return NEUTRAL_COLORS[theme];
}

/**
 * Recolor ascii art containing `${c1}` … `${c6}` placeholders.
 *
 * Returns the finished string, ready to print or hand to a fetch backend.
 * Nothing partial is returned: every failure throws.
 */
export function recolorAscii(
  asc: string,
  alignment: ColorAlignment,
  profile: ColorProfile,
  mode: AnsiMode,
  theme: TerminalTheme,
): string {
  log.debug('recolor ascii', { alignment, colors: profile.length, mode, theme });

  if (profile.length === 0) throw new ProfileSpreadError(0, 0);

  switch (alignment.mode) {
    case 'horizontal':
      return alignment.foreBack
        ? horizontalForeBack(asc, alignment.foreBack, profile, mode, theme)
        : horizontalGradient(asc, profile, mode);
    case 'vertical':
      return alignment.foreBack
        ? verticalForeBack(asc, alignment.foreBack, profile, mode, theme)
        : verticalGradient(asc, profile, mode);
    case 'custom':
      return customColors(asc, alignment.customColors, profile, mode);
  }
}

/** One gradient color per row for `back`, the neutral color for `fore`. */
function horizontalForeBack(
  asc: string,
  [fore, back]: ForeBackPair,
  profile: ColorProfile,
  mode: AnsiMode,
  theme: TerminalTheme,
): string {
  const filled = fillStarting(asc);
  const { height } = asciiSize(filled);
  const rows = profile.spreadTo(height).colors;

  // `fore` is replaced as a literal token before any row color is inserted
  const withFore = filled.replaceAll(placeholderFor(fore), neutralColor(theme).render(mode, 'foreground'));
  const backToken = placeholderFor(back);

  const recolored = withFore
    .split('\n')
    .map((line, i) => {
      // "background" in the art, but still drawn as foreground text in the terminal
      const rowColor = rows[i].render(mode, 'foreground');
      return `${line.replaceAll(backToken, rowColor)}${ANSI_RESET}`;
    })
    .join('\n');

  // Slots other than fore/back vanish instead of leaking as literal text
  return placeholderScanner().strip(recolored);
}

/** One gradient color per row, placeholders ignored. */
function horizontalGradient(asc: string, profile: ColorProfile, mode: AnsiMode): string {
  const stripped = placeholderScanner().strip(asc);
  const { height } = asciiSize(stripped);
  const rows = profile.spreadTo(height).colors;

  return stripped
    .split('\n')
    .map((line, i) => `${rows[i].render(mode, 'foreground')}${line}${ANSI_RESET}`)
    .join('\n');
}

/** One gradient color per column, shared by every row, placeholders ignored. */
function verticalGradient(asc: string, profile: ColorProfile, mode: AnsiMode): string {
  const stripped = placeholderScanner().strip(asc);
  const { width } = asciiSize(stripped);
  const columns = profile.spreadTo(width);

  return stripped
    .split('\n')
    .map((line) => columns.slice(0, splitGraphemes(line).length).colorText(line, mode, 'foreground'))
    .join('\n');
}

/**
 * Column gradient for `back` spans, neutral color for `fore` spans, other
 * slots left plain. Placeholders take no columns, so a span's gradient
 * indices are its grapheme offsets within the stripped line.
 */
function verticalForeBack(
  asc: string,
  [fore, back]: ForeBackPair,
  profile: ColorProfile,
  mode: AnsiMode,
  theme: TerminalTheme,
): string {
  const scanner = placeholderScanner();
  const filled = fillStarting(asc);
  const { width } = asciiSize(filled);
  const columns = profile.spreadTo(width);
  const neutral = neutralColor(theme).render(mode, 'foreground');

  return filled
    .split('\n')
    .map((line, lineIndex) => {
      const matches = scanner.findAll(line);
      if (matches.length === 0) {
        throw new Error(`Line ${lineIndex + 1} has no color placeholder after filling starting colors`);
      }

      // Leading spaces before the first token stay plain but still take columns
      let out = line.slice(0, matches[0].start);
      let column = splitGraphemes(out).length;

      matches.forEach((match, i) => {
        const end = i + 1 < matches.length ? matches[i + 1].start : line.length;
        const text = line.slice(match.end, end);
        const span = splitGraphemes(text).length;

        if (match.slot === fore) {
          out += `${neutral}${text}${ANSI_RESET}`;
        } else if (match.slot === back) {
          out += columns.slice(column, column + span).colorText(text, mode, 'foreground');
        } else {
          out += text;
        }

        column += span;
      });

      return out;
    })
    .join('\n');
}

/** Fixed slot → palette substitution from the deduplicated profile. */
function customColors(asc: string, mapping: CustomColorMap, profile: ColorProfile, mode: AnsiMode): string {
  const filled = fillStarting(asc);
  const palette = profile.unique();
  const replacements = new Map<PlaceholderSlot, string>();

  for (const slot of PLACEHOLDER_SLOTS) {
    const index = mapping[slot];
    if (index === undefined) continue;

    const color = palette.colorAt(index);
    if (!color) throw new InvalidColorIndexError(slot, index, palette.length);
    replacements.set(slot, color.render(mode, 'foreground'));
  }

  // Unmapped slots are removed
  const recolored = placeholderScanner().replaceAll(filled, (slot) => replacements.get(slot) ?? '');

  // Reset at every line end so the last color does not bleed into later output
  return recolored
    .split('\n')
    .map((line) => `${line}${ANSI_RESET}`)
    .join('\n');
}
