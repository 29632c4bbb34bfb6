import { ProfileSpreadError } from '../errors.js';
import type { AnsiMode, ColorRole } from '../types/index.js';
import { splitGraphemes } from '../utils/graphemes.js';
import { ANSI_RESET, RgbColor } from './color.js';

/**
 * Ordered palette used to color ascii art. Immutable: every transform
 * returns a new profile.
 */
export class ColorProfile {
  readonly colors: readonly RgbColor[];

  constructor(colors: readonly RgbColor[]) {
    this.colors = Object.freeze([...colors]);
  }

  static fromHex(hexColors: readonly string[]): ColorProfile {
    return new ColorProfile(hexColors.map((hex) => RgbColor.fromHex(hex)));
  }

  get length(): number {
    return this.colors.length;
  }

  /** Color at `index`, or undefined when the index is outside the palette. */
  colorAt(index: number): RgbColor | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.colors.length) return undefined;
    return this.colors[index];
  }

  /** Repeat color `i` `weights[i]` times. */
  withWeights(weights: readonly number[]): ColorProfile {
    if (weights.length !== this.colors.length) {
      throw new RangeError(`Expected ${this.colors.length} weights, got ${weights.length}`);
    }
    return new ColorProfile(this.colors.flatMap((color, i) => new Array<RgbColor>(weights[i]).fill(color)));
  }

  /**
   * Resize the profile to exactly `length` colors.
   *
   * Each color gets `floor(length / n)` copies; an odd remainder widens the
   * center color, the rest widens the borders pairwise from the outside in.
   */
  spreadTo(length: number): ColorProfile {
    const presetLength = this.colors.length;
    if (presetLength === 0 || !Number.isInteger(length) || length < 1) {
      throw new ProfileSpreadError(length, presetLength);
    }

    const centerIndex = Math.floor(presetLength / 2);
    const weights = new Array<number>(presetLength).fill(Math.floor(length / presetLength));
    let extras = length % presetLength;

    if (extras % 2 === 1) {
      extras -= 1;
      weights[centerIndex] += 1;
    }

    for (let border = 0; extras > 0; border++) {
      extras -= 2;
      weights[border] += 1;
      weights[presetLength - border - 1] += 1;
    }

    return this.withWeights(weights);
  }

  /** Drop repeated colors, keeping the first occurrence of each. */
  unique(): ColorProfile {
    const seen = new Set<string>();
    return new ColorProfile(
      this.colors.filter((color) => {
        const hex = color.toHex();
        if (seen.has(hex)) return false;
        seen.add(hex);
        return true;
      }),
    );
  }

  slice(start?: number, end?: number): ColorProfile {
    return new ColorProfile(this.colors.slice(start, end));
  }

  /**
   * Color `text` as a left-to-right gradient, one profile color per grapheme.
   * An escape is emitted only where the color changes; one reset closes the run.
   */
  colorText(text: string, mode: AnsiMode, role: ColorRole = 'foreground'): string {
    const graphemes = splitGraphemes(text);
    if (graphemes.length === 0) return '';

    const { colors } = this.spreadTo(graphemes.length);
    let out = '';
    let active: RgbColor | undefined;

    graphemes.forEach((grapheme, i) => {
      const color = colors[i];
      if (!active || !active.equals(color)) out += color.render(mode, role);
      out += grapheme;
      active = color;
    });

    return out + ANSI_RESET;
  }
}
