#!/usr/bin/env node

import { Command } from 'commander';
import { configCommand } from './commands/config.js';
import { inspectCommand } from './commands/inspect.js';
import { presetsCommand } from './commands/presets.js';
import { type RenderOptions, renderCommand } from './commands/render.js';
import { setLogLevel } from './logger.js';
import { ALIGNMENT_MODES, ANSI_MODES, BACKEND_NAMES, TERMINAL_THEMES } from './types/index.js';

const program = new Command();
const VERSION = '0.1.0';

// Detect TTY for intro/outro decoration and stdin handling
const isTTY = Boolean(process.stdout.isTTY);

/**
 * Configure CLI program
 */
program
  .name('gradfetch')
  .description('Recolor neofetch/fastfetch ascii art with gradient color profiles.')
  .version(VERSION)
  .option('--verbose', 'Log progress to stderr')
  .option('--debug', 'Log debug details to stderr')
  .helpOption('-h, --help', 'Display help for command')
  .addHelpText(
    'after',
    `
Examples:
  $ gradfetch render logo.txt --print                 # Horizontal rainbow to stdout
  $ gradfetch render logo.txt -p transgender -a vertical
  $ gradfetch render logo.txt --distro fedora         # Keep the outline neutral
  $ gradfetch render logo.txt -a custom --custom 1=0,2=3
  $ cat logo.txt | gradfetch render - -b fastfetch -- --structure OS:Kernel
  $ gradfetch presets --preview logo.txt
  $ gradfetch inspect logo.txt --json
`,
  )
  .hook('preAction', () => {
    const opts = program.opts<{ verbose?: boolean; debug?: boolean }>();
    if (opts.debug) setLogLevel('debug');
    else if (opts.verbose) setLogLevel('info');
  });

/**
 * Render command (default)
 */
program
  .command('render', { isDefault: true })
  .description('Recolor ascii art and print it through a fetch backend')
  .argument('[file]', 'Ascii art file with ${c1}..${c6} placeholders ("-" or omitted: stdin)')
  .argument('[backendArgs...]', 'Extra arguments for the backend (after --)')
  .option('-p, --preset <name>', 'Color preset (see "gradfetch presets")')
  .option('-c, --colors <hex-list>', 'Custom gradient as comma-separated hex colors')
  .option('-m, --mode <mode>', `Color mode (${ANSI_MODES.join(', ')})`)
  .option('-t, --theme <theme>', `Terminal theme (${TERMINAL_THEMES.join(', ')})`)
  .option('-a, --align <alignment>', `Color alignment (${ALIGNMENT_MODES.join(', ')})`)
  .option('--fore-back <fore,back>', 'Keep slot <fore> neutral and put the gradient on slot <back>')
  .option('--custom <slot=index,...>', 'Slot to palette index mapping for custom alignment')
  .option('-d, --distro <name>', 'Use the fore/back recommendation for this distro')
  .option('--detect-distro', 'Ask the backend for the distro name')
  .option('-b, --backend <backend>', `Fetch backend (${BACKEND_NAMES.join(', ')})`)
  .option('--print', 'Print the recolored art to stdout instead of running a backend')
  .option('--save', 'Save these choices to the config file')
  .action(async (file: string | undefined, backendArgs: string[], options: RenderOptions) => {
    await renderCommand(file, options, { isTTY, extraArgs: backendArgs });
  });

/**
 * Presets command
 */
program
  .command('presets')
  .description('List color presets')
  .option('--preview <file>', 'Show ascii art recolored with every preset')
  .option('-m, --mode <mode>', `Color mode for previews (${ANSI_MODES.join(', ')})`)
  .option('-t, --theme <theme>', `Terminal theme for previews (${TERMINAL_THEMES.join(', ')})`)
  .option('-a, --align <alignment>', 'Preview alignment (horizontal, vertical)')
  .action(async (options: { preview?: string; mode?: string; theme?: string; align?: string }) => {
    await presetsCommand(options, { isTTY });
  });

/**
 * Inspect command
 */
program
  .command('inspect')
  .description('Show size and color slot usage of ascii art')
  .argument('[file]', 'Ascii art file ("-" or omitted: stdin)')
  .option('-d, --distro <name>', 'Also show the fore/back recommendation for this distro')
  .option('--json', 'Output as JSON')
  .action(async (file: string | undefined, options: { distro?: string; json?: boolean }) => {
    await inspectCommand(file, options, { isTTY });
  });

/**
 * Config command
 */
program
  .command('config')
  .description('Show the config file and the installed backends')
  .option('--path', 'Print only the config file path')
  .action(async (options: { path?: boolean }) => {
    await configCommand(options);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
