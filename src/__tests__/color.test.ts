/**
 * Tests for src/color/: RgbColor, ANSI conversion, ColorProfile and presets.
 */
import { describe, expect, it } from 'vitest';
import { ANSI_RESET, ansi256ToAnsi16, RgbColor, rgbToAnsi256 } from '../color/color.js';
import { getPreset, PRESET_NAMES, PRESETS, parseColorList } from '../color/presets.js';
import { ColorProfile } from '../color/profile.js';
import { ColorParseError, InvalidOptionError, ProfileSpreadError, UnknownPresetError } from '../errors.js';

const RED = new RgbColor(255, 0, 0);
const GREEN = new RgbColor(0, 255, 0);
const BLUE = new RgbColor(0, 0, 255);

const hexes = (profile: ColorProfile): string[] => profile.colors.map((c) => c.toHex());

// ── color.ts ─────────────────────────────────────────────────────────────────

describe('RgbColor', () => {
  it('parses short and long hex with or without #', () => {
    expect(RgbColor.fromHex('#f00')).toEqual(RED);
    expect(RgbColor.fromHex('00ff7f')).toEqual(new RgbColor(0, 255, 127));
  });

  it('formats lower-case hex', () => {
    expect(RgbColor.fromHex('#ABCDEF').toHex()).toBe('#abcdef');
    expect(new RgbColor(1, 2, 3).toHex()).toBe('#010203');
  });

  it('rejects malformed hex', () => {
    expect(() => RgbColor.fromHex('zzz')).toThrow(ColorParseError);
    expect(() => RgbColor.fromHex('#12345')).toThrow('Invalid hex color: "#12345"');
  });

  it('compares by channel values', () => {
    expect(RED.equals(RgbColor.fromHex('#ff0000'))).toBe(true);
    expect(RED.equals(GREEN)).toBe(false);
  });

  it('renders truecolor escapes', () => {
    expect(new RgbColor(1, 2, 3).render('rgb')).toBe('\x1b[38;2;1;2;3m');
    expect(new RgbColor(1, 2, 3).render('rgb', 'background')).toBe('\x1b[48;2;1;2;3m');
  });

  it('renders 256-color escapes', () => {
    expect(RED.render('8bit')).toBe('\x1b[38;5;196m');
    expect(RED.render('8bit', 'background')).toBe('\x1b[48;5;196m');
  });

  it('renders 16-color escapes', () => {
    expect(RED.render('ansi')).toBe('\x1b[91m');
    expect(RED.render('ansi', 'background')).toBe('\x1b[101m');
    expect(new RgbColor(0, 0, 0).render('ansi')).toBe('\x1b[30m');
  });
});

describe('ANSI conversion', () => {
  it('maps colors onto the 6x6x6 cube', () => {
    expect(rgbToAnsi256(255, 0, 0)).toBe(196);
    expect(rgbToAnsi256(0, 0, 255)).toBe(21);
  });

  it('maps grays onto the grayscale ramp', () => {
    expect(rgbToAnsi256(0, 0, 0)).toBe(16);
    expect(rgbToAnsi256(255, 255, 255)).toBe(231);
    expect(rgbToAnsi256(128, 128, 128)).toBe(244);
  });

  it('maps 256-color codes to 16-color codes', () => {
    expect(ansi256ToAnsi16(3)).toBe(33);
    expect(ansi256ToAnsi16(9)).toBe(91);
    expect(ansi256ToAnsi16(16)).toBe(30);
    expect(ansi256ToAnsi16(231)).toBe(97);
  });

  it('uses separate foreground and background resets', () => {
    expect(ANSI_RESET).toBe('\x1b[39m\x1b[49m');
  });
});

// ── profile.ts ───────────────────────────────────────────────────────────────

describe('ColorProfile.spreadTo', () => {
  const rgb = new ColorProfile([RED, GREEN, BLUE]);

  it('repeats each color evenly', () => {
    expect(hexes(new ColorProfile([RED, GREEN]).spreadTo(4))).toEqual(['#ff0000', '#ff0000', '#00ff00', '#00ff00']);
  });

  it('widens the borders with an even remainder', () => {
    expect(hexes(rgb.spreadTo(5))).toEqual(['#ff0000', '#ff0000', '#00ff00', '#0000ff', '#0000ff']);
  });

  it('widens the center with an odd remainder', () => {
    expect(hexes(rgb.spreadTo(4))).toEqual(['#ff0000', '#00ff00', '#00ff00', '#0000ff']);
    expect(hexes(rgb.spreadTo(7))).toEqual([
      '#ff0000',
      '#ff0000',
      '#00ff00',
      '#00ff00',
      '#00ff00',
      '#0000ff',
      '#0000ff',
    ]);
  });

  it('shrinks to the borders or the center', () => {
    expect(hexes(rgb.spreadTo(2))).toEqual(['#ff0000', '#0000ff']);
    expect(hexes(rgb.spreadTo(1))).toEqual(['#00ff00']);
  });

  it('always returns exactly the requested length', () => {
    for (let length = 1; length <= 20; length++) {
      expect(rgb.spreadTo(length).length).toBe(length);
    }
  });

  it('rejects an empty profile', () => {
    expect(() => new ColorProfile([]).spreadTo(3)).toThrow('Cannot spread an empty color profile');
  });

  it('rejects lengths below one', () => {
    expect(() => rgb.spreadTo(0)).toThrow(ProfileSpreadError);
  });
});

describe('ColorProfile', () => {
  it('withWeights repeats each color by its weight', () => {
    expect(hexes(new ColorProfile([RED, BLUE]).withWeights([1, 2]))).toEqual(['#ff0000', '#0000ff', '#0000ff']);
  });

  it('withWeights rejects a weight count mismatch', () => {
    expect(() => new ColorProfile([RED]).withWeights([1, 1])).toThrow(RangeError);
  });

  it('unique keeps the first occurrence of each color', () => {
    expect(hexes(new ColorProfile([RED, GREEN, RED, BLUE, GREEN]).unique())).toEqual([
      '#ff0000',
      '#00ff00',
      '#0000ff',
    ]);
  });

  it('colorAt returns undefined outside the palette', () => {
    const profile = new ColorProfile([RED, GREEN]);
    expect(profile.colorAt(1)).toEqual(GREEN);
    expect(profile.colorAt(2)).toBeUndefined();
    expect(profile.colorAt(-1)).toBeUndefined();
    expect(profile.colorAt(0.5)).toBeUndefined();
  });

  it('keeps its colors frozen', () => {
    expect(Object.isFrozen(new ColorProfile([RED]).colors)).toBe(true);
  });
});

describe('ColorProfile.colorText', () => {
  const R = '\x1b[38;2;255;0;0m';
  const G = '\x1b[38;2;0;255;0m';

  it('emits an escape only where the color changes', () => {
    expect(new ColorProfile([RED, GREEN]).colorText('abcd', 'rgb')).toBe(`${R}ab${G}cd${ANSI_RESET}`);
  });

  it('returns empty text unchanged', () => {
    expect(new ColorProfile([RED]).colorText('', 'rgb')).toBe('');
  });

  it('renders background gradients', () => {
    expect(new ColorProfile([RED]).colorText('a b', 'rgb', 'background')).toBe(`\x1b[48;2;255;0;0ma b${ANSI_RESET}`);
  });
});

// ── presets.ts ───────────────────────────────────────────────────────────────

describe('presets', () => {
  it('lists every preset once, in table order', () => {
    expect([...PRESET_NAMES]).toEqual(Object.keys(PRESETS));
  });

  it('looks presets up case-insensitively', () => {
    expect(getPreset('Rainbow').length).toBe(6);
    expect(hexes(getPreset(' BISEXUAL '))).toEqual(['#d60270', '#9b4f96', '#0038a8']);
  });

  it('rejects unknown presets', () => {
    expect(() => getPreset('plaid')).toThrow(UnknownPresetError);
  });

  it('parses comma-separated hex lists', () => {
    expect(hexes(parseColorList('#ff0000, 00f ,'))).toEqual(['#ff0000', '#0000ff']);
  });

  it('rejects an empty list', () => {
    expect(() => parseColorList(' , ')).toThrow(InvalidOptionError);
  });
});
