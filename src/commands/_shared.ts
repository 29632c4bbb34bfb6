import * as fs from 'node:fs';
import chalk from 'chalk';
import { getPreset, parseColorList } from '../color/presets.js';
import type { ColorProfile } from '../color/profile.js';
import { BackendExitError, GradfetchError } from '../errors.js';
import { normalizeAscii } from '../recolor/metrics.js';
import type { GradfetchConfig } from '../types/schemas.js';

export const DEFAULT_PRESET = 'rainbow';

/** Strip CRLF endings and one trailing newline so the art has no phantom last line. */
export function cleanAsciiText(text: string): string {
  return text.replace(/\r\n?/g, '\n').replace(/\n$/, '');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Read ascii art from a file, or from stdin when `file` is absent or `-`.
 * The result is cleaned and padded to a rectangle.
 */
export async function readAsciiInput(file: string | undefined, context: { isTTY: boolean }): Promise<string> {
  if (!file || file === '-') {
    if (context.isTTY && process.stdin.isTTY) {
      throw new GradfetchError('No ascii art given. Pass a file or pipe the art on stdin.');
    }
    return normalizeAscii(cleanAsciiText(await readStdin()));
  }
  return normalizeAscii(cleanAsciiText(fs.readFileSync(file, 'utf8')));
}

/**
 * Pick the color profile: explicit hex list, then preset flag, then config,
 * then the default preset.
 */
export function resolveProfile(options: { colors?: string; preset?: string }, config: GradfetchConfig): ColorProfile {
  if (options.colors) return parseColorList(options.colors);
  if (options.preset) return getPreset(options.preset);
  if (config.colors) return parseColorList(config.colors.join(','));
  return getPreset(config.preset ?? DEFAULT_PRESET);
}

/**
 * Print an error the way every command does and flag a failing exit.
 */
export function reportError(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red('Error:'), message);
  if (error instanceof BackendExitError && error.hint) {
    console.error(chalk.yellow(error.hint));
  }
  process.exitCode = 1;
}
