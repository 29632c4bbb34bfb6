import { detectDistroName, runBackend } from '../backends/run.js';
import { createLogger } from '../logger.js';
import { recolorAscii } from '../recolor/alignment.js';
import { recommendForeBack } from '../recolor/fore-back.js';
import type { GradfetchConfig } from '../types/schemas.js';
import { loadConfig, saveConfig } from '../utils/config.js';
import {
  parseAlignmentMode,
  parseAnsiMode,
  parseBackend,
  parseCustomColors,
  parseForeBack,
  parseTheme,
  resolveAlignment,
} from '../utils/options.js';
import { readAsciiInput, reportError, resolveProfile } from './_shared.js';

const log = createLogger('render');

export interface RenderOptions {
  preset?: string;
  colors?: string;
  mode?: string;
  theme?: string;
  align?: string;
  foreBack?: string;
  custom?: string;
  distro?: string;
  detectDistro?: boolean;
  backend?: string;
  print?: boolean;
  save?: boolean;
}

/**
 * Render command handler — recolor ascii art and print it directly or
 * through a fetch backend
 */
export async function renderCommand(
  file: string | undefined,
  options: RenderOptions,
  context: { isTTY: boolean; extraArgs: string[] },
): Promise<void> {
  try {
    const config = loadConfig() ?? {};
    const asc = await readAsciiInput(file, context);

    const profile = resolveProfile(options, config);
    const mode = options.mode ? parseAnsiMode(options.mode) : (config.mode ?? 'rgb');
    const theme = options.theme ? parseTheme(options.theme) : (config.theme ?? 'dark');
    const backend = options.backend ? parseBackend(options.backend) : (config.backend ?? 'neofetch');

    let distro = options.distro ?? config.distro;
    if (!distro && options.detectDistro) {
      distro = await detectDistroName(backend);
    }
    const recommended = distro ? recommendForeBack(distro) : undefined;
    if (distro) log.info('distro', distro, 'fore/back', recommended ?? 'none');

    const alignment = resolveAlignment(
      {
        mode: options.align ? parseAlignmentMode(options.align) : undefined,
        foreBack: options.foreBack ? parseForeBack(options.foreBack) : undefined,
        customColors: options.custom ? parseCustomColors(options.custom) : undefined,
        recommended,
      },
      config.alignment,
    );

    const output = recolorAscii(asc, alignment, profile, mode, theme);

    if (options.save) {
      const { preset: _preset, colors: _colors, ...rest } = config;
      const palette: GradfetchConfig = options.colors
        ? { colors: profile.colors.map((color) => color.toHex()) }
        : options.preset
          ? { preset: options.preset }
          : { preset: config.preset, colors: config.colors };
      saveConfig({ ...rest, ...palette, mode, theme, alignment, backend });
    }

    if (options.print) {
      process.stdout.write(`${output}\n`);
      return;
    }

    await runBackend(output, backend, [...(config.args ?? []), ...context.extraArgs]);
  } catch (error) {
    reportError(error);
  }
}
