import chalk from 'chalk';
import { formatForeBack, formatSize } from '../display/format.js';
import { GradfetchError } from '../errors.js';
import { fillStarting } from '../recolor/fill-starting.js';
import { recommendForeBack } from '../recolor/fore-back.js';
import { asciiSize } from '../recolor/metrics.js';
import { placeholderScanner } from '../recolor/placeholders.js';
import { type AsciiSize, type ForeBackPair, PLACEHOLDER_SLOTS, type PlaceholderSlot } from '../types/index.js';
import { readAsciiInput, reportError } from './_shared.js';

export interface AsciiReport {
  size: AsciiSize;
  /** Occurrences per slot */
  slots: Record<PlaceholderSlot, number>;
  /** Lines that inherit their starting color from an earlier line */
  carriedLines: number;
  /** Why the art cannot be recolored with slot-aware alignments, if it cannot */
  fillError?: string;
  distro?: string;
  foreBack?: ForeBackPair;
}

/** Measure ascii art and summarize how its color slots are used. */
export function inspectAscii(asc: string, distro?: string): AsciiReport {
  const scanner = placeholderScanner();
  const slots: Record<PlaceholderSlot, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0, 6: 0 };
  for (const match of scanner.findAll(asc)) {
    slots[match.slot] += 1;
  }

  let carriedLines = 0;
  let fillError: string | undefined;
  try {
    const original = asc.split('\n');
    const filled = fillStarting(asc).split('\n');
    carriedLines = filled.filter((line, i) => line !== original[i]).length;
  } catch (err) {
    if (!(err instanceof GradfetchError)) throw err;
    fillError = err.message;
  }

  return {
    size: asciiSize(asc),
    slots,
    carriedLines,
    ...(fillError ? { fillError } : {}),
    ...(distro ? { distro, foreBack: recommendForeBack(distro) } : {}),
  };
}

/**
 * Inspect command handler
 */
export async function inspectCommand(
  file: string | undefined,
  options: { distro?: string; json?: boolean },
  context: { isTTY: boolean },
): Promise<void> {
  try {
    const report = inspectAscii(await readAsciiInput(file, context), options.distro);

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }

    console.log(`${chalk.gray('Size:'.padEnd(14))}${formatSize(report.size)}`);
    const used = PLACEHOLDER_SLOTS.filter((slot) => report.slots[slot] > 0)
      .map((slot) => `\${c${slot}} x${report.slots[slot]}`)
      .join(', ');
    console.log(`${chalk.gray('Slots:'.padEnd(14))}${used || 'none'}`);
    console.log(`${chalk.gray('Carried:'.padEnd(14))}${report.carriedLines} line(s)`);
    if (report.fillError) {
      console.log(`${chalk.gray('Fill:'.padEnd(14))}${chalk.yellow(report.fillError)}`);
    }
    if (report.distro) {
      console.log(`${chalk.gray('Fore/back:'.padEnd(14))}${formatForeBack(report.foreBack)} for ${report.distro}`);
    }
  } catch (error) {
    reportError(error);
  }
}
