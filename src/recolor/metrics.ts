import { DimensionOverflowError } from '../errors.js';
import type { AsciiSize } from '../types/index.js';
import { splitGraphemes } from '../utils/graphemes.js';
import { placeholderScanner } from './placeholders.js';

/** Largest width or height the renderer accepts */
export const MAX_DIMENSION = 255;

/** Display columns of one line, placeholders excluded. */
export function displayWidth(line: string): number {
  return splitGraphemes(placeholderScanner().strip(line)).length;
}

/**
 * Width (widest line, in graphemes) and height (line count) of ascii art,
 * ignoring color placeholders.
 */
export function asciiSize(asc: string): AsciiSize {
  const lines = placeholderScanner().strip(asc).split('\n');
  const width = lines.reduce((widest, line) => Math.max(widest, splitGraphemes(line).length), 0);
  const height = lines.length;

  if (width > MAX_DIMENSION) throw new DimensionOverflowError('width', width, MAX_DIMENSION);
  if (height > MAX_DIMENSION) throw new DimensionOverflowError('height', height, MAX_DIMENSION);

  return { width, height };
}

/** Pad every line with trailing spaces so all lines share the widest line's width. */
export function normalizeAscii(asc: string): string {
  const lines = asc.split('\n');
  const widths = lines.map(displayWidth);
  const width = widths.reduce((widest, w) => Math.max(widest, w), 0);
  return lines.map((line, i) => line + ' '.repeat(width - widths[i])).join('\n');
}
