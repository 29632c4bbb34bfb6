import * as clack from '@clack/prompts';
import chalk from 'chalk';
import { getPreset, PRESET_NAMES } from '../color/presets.js';
import { formatPresetLine } from '../display/format.js';
import { InvalidOptionError } from '../errors.js';
import { recolorAscii } from '../recolor/alignment.js';
import type { ColorAlignment } from '../types/index.js';
import { parseAlignmentMode, parseAnsiMode, parseTheme } from '../utils/options.js';
import { readAsciiInput, reportError } from './_shared.js';

/**
 * Presets command — list the built-in palettes, optionally previewing
 * ascii art in each of them
 */
export async function presetsCommand(
  options: { preview?: string; mode?: string; theme?: string; align?: string },
  context: { isTTY: boolean },
): Promise<void> {
  try {
    if (context.isTTY) {
      clack.intro(chalk.bold('Color presets'));
    }

    if (!options.preview) {
      for (const name of PRESET_NAMES) {
        console.log(formatPresetLine(name, getPreset(name)));
      }
    } else {
      const asc = await readAsciiInput(options.preview, context);
      const mode = options.mode ? parseAnsiMode(options.mode) : 'rgb';
      const theme = options.theme ? parseTheme(options.theme) : 'dark';
      const alignMode = options.align ? parseAlignmentMode(options.align) : 'horizontal';
      if (alignMode === 'custom') {
        throw new InvalidOptionError('--align', alignMode, 'previews use a gradient: pick horizontal or vertical');
      }
      const alignment: ColorAlignment = { mode: alignMode };

      for (const name of PRESET_NAMES) {
        console.log(chalk.cyan.bold(name));
        console.log(recolorAscii(asc, alignment, getPreset(name), mode, theme));
        console.log();
      }
    }

    if (context.isTTY) {
      clack.outro(chalk.gray('Use one with "gradfetch render --preset <name>"'));
    }
  } catch (error) {
    reportError(error);
  }
}
