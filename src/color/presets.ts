import { InvalidOptionError, UnknownPresetError } from '../errors.js';
import { ColorProfile } from './profile.js';

/**
 * Built-in flag palettes, top stripe first.
 * Insertion order determines listing order.
 */
export const PRESETS = {
  rainbow: ['#e50000', '#ff8d00', '#ffee00', '#028121', '#004cff', '#770088'],
  transgender: ['#55cdfd', '#f6aab7', '#ffffff', '#f6aab7', '#55cdfd'],
  nonbinary: ['#fcf431', '#fcfcfc', '#9d59d2', '#282828'],
  agender: ['#000000', '#bababa', '#ffffff', '#baf484', '#ffffff', '#bababa', '#000000'],
  bisexual: ['#d60270', '#9b4f96', '#0038a8'],
  pansexual: ['#ff1c8d', '#ffd700', '#1ab3ff'],
  lesbian: ['#d62800', '#ff9b56', '#ffffff', '#d462a6', '#a40062'],
  asexual: ['#000000', '#a4a4a4', '#ffffff', '#810081'],
  genderfluid: ['#fe76a2', '#ffffff', '#bf12d7', '#000000', '#303cbe'],
  aromantic: ['#3ba740', '#a8d47a', '#ffffff', '#ababab', '#000000'],
} as const satisfies Record<string, readonly string[]>;

export type PresetName = keyof typeof PRESETS;

export const PRESET_NAMES: readonly PresetName[] = Object.freeze([
  'rainbow',
  'transgender',
  'nonbinary',
  'agender',
  'bisexual',
  'pansexual',
  'lesbian',
  'asexual',
  'genderfluid',
  'aromantic',
]);

export function isPresetName(name: string): name is PresetName {
  return Object.hasOwn(PRESETS, name);
}

/** Look up a preset by name (case-insensitive). */
export function getPreset(name: string): ColorProfile {
  const key = name.trim().toLowerCase();
  if (!isPresetName(key)) throw new UnknownPresetError(name, PRESET_NAMES);
  return ColorProfile.fromHex(PRESETS[key]);
}

/**
 * Build an ad-hoc profile from a comma-separated hex list,
 * e.g. `"#ff0000, #00ff00"`.
 */
export function parseColorList(list: string): ColorProfile {
  const entries = list
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

  if (entries.length === 0) throw new InvalidOptionError('--colors', list, 'expected at least one hex color');
  return ColorProfile.fromHex(entries);
}
