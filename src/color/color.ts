import { ColorParseError } from '../errors.js';
import type { AnsiMode, ColorRole } from '../types/index.js';

/** ANSI escape sequence prefix */
const ESC = '\x1b[';

/** Resets foreground and background, leaving other attributes alone */
export const ANSI_RESET = `${ESC}39m${ESC}49m`;

const HEX_PATTERN = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i;

/**
 * Find the closest xterm 256-color index.
 * - 16-231: 6x6x6 color cube
 * - 232-255: grayscale ramp, used when all channels are equal
 */
export function rgbToAnsi256(r: number, g: number, b: number): number {
  if (r === g && g === b) {
    if (r < 8) return 16;
    if (r > 248) return 231;
    return Math.round(((r - 8) / 247) * 24) + 232;
  }

  return 16 + 36 * Math.round((r / 255) * 5) + 6 * Math.round((g / 255) * 5) + Math.round((b / 255) * 5);
}

/**
 * Map a 256-color index to the closest 16-color foreground code
 * (30-37 normal, 90-97 bright).
 */
export function ansi256ToAnsi16(code: number): number {
  if (code < 8) return 30 + code;
  if (code < 16) return 90 + (code - 8);

  let red: number;
  let green: number;
  let blue: number;

  if (code >= 232) {
    red = ((code - 232) * 10 + 8) / 255;
    green = red;
    blue = red;
  } else {
    const cube = code - 16;
    const remainder = cube % 36;
    red = Math.floor(cube / 36) / 5;
    green = Math.floor(remainder / 6) / 5;
    blue = (remainder % 6) / 5;
  }

  const value = Math.max(red, green, blue) * 2;
  if (value === 0) return 30;

  const result = 30 + ((Math.round(blue) << 2) | (Math.round(green) << 1) | Math.round(red));
  return value === 2 ? result + 60 : result;
}

/** An sRGB color with 8-bit channels */
export class RgbColor {
  constructor(
    readonly r: number,
    readonly g: number,
    readonly b: number,
  ) {}

  /** Parse `#rgb` or `#rrggbb` (the `#` is optional). */
  static fromHex(hex: string): RgbColor {
    const match = HEX_PATTERN.exec(hex.trim());
    if (!match) throw new ColorParseError(hex);

    const digits = match[1].length === 3 ? [...match[1]].map((d) => d + d).join('') : match[1];
    return new RgbColor(
      parseInt(digits.slice(0, 2), 16),
      parseInt(digits.slice(2, 4), 16),
      parseInt(digits.slice(4, 6), 16),
    );
  }

  toHex(): string {
    return `#${[this.r, this.g, this.b].map((c) => c.toString(16).padStart(2, '0')).join('')}`;
  }

  equals(other: RgbColor): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b;
  }

  /** Escape prefix that switches the terminal to this color. No reset is appended. */
  render(mode: AnsiMode, role: ColorRole = 'foreground'): string {
    switch (mode) {
      case 'rgb':
        return `${ESC}${role === 'foreground' ? 38 : 48};2;${this.r};${this.g};${this.b}m`;
      case '8bit':
        return `${ESC}${role === 'foreground' ? 38 : 48};5;${rgbToAnsi256(this.r, this.g, this.b)}m`;
      case 'ansi': {
        const code = ansi256ToAnsi16(rgbToAnsi256(this.r, this.g, this.b));
        return `${ESC}${role === 'foreground' ? code : code + 10}m`;
      }
    }
  }
}
