import chalk from 'chalk';
import type { BackendAdapter } from '../backends/registry.js';
import type { ColorProfile } from '../color/profile.js';
import type { AsciiSize, ForeBackPair } from '../types/index.js';

/**
 * Swatch of a profile: two background-colored cells per color
 */
export function formatSwatch(profile: ColorProfile): string {
  return profile.colors.map((color) => chalk.bgHex(color.toHex())('  ')).join('');
}

/**
 * Preset row for the presets listing
 * Format: name  swatch  (N colors)
 */
export function formatPresetLine(name: string, profile: ColorProfile): string {
  return `${chalk.cyan(name.padEnd(14))}${formatSwatch(profile)}  ${chalk.gray(`(${profile.length} colors)`)}`;
}

export function formatForeBack(pair: ForeBackPair | undefined): string {
  return pair ? `fore \${c${pair[0]}}, back \${c${pair[1]}}` : 'none (full gradient)';
}

export function formatSize({ width, height }: AsciiSize): string {
  return `${width}x${height}`;
}

/**
 * Backend row for the config listing
 * Format: ✓ name  label
 */
export function formatBackendLine(adapter: BackendAdapter, available: boolean): string {
  const mark = available ? chalk.green('✓') : chalk.gray('✗');
  return `  ${mark} ${adapter.name.padEnd(14)}${chalk.gray(adapter.label)}`;
}
