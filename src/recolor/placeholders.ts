import { InvalidPlaceholderError } from '../errors.js';
import { isPlaceholderSlot, PLACEHOLDER_SLOTS, type PlaceholderMatch, type PlaceholderSlot } from '../types/index.js';

/** Literal color tokens understood by neofetch-compatible ascii art */
export const PLACEHOLDER_PATTERNS: readonly string[] = Object.freeze(PLACEHOLDER_SLOTS.map(placeholderFor));

export function placeholderFor(slot: PlaceholderSlot): string {
  return `\${c${slot}}`;
}

/** Parse the slot digits of a `${cN}` token. */
export function parseSlot(text: string): PlaceholderSlot {
  const slot = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!isPlaceholderSlot(slot)) throw new InvalidPlaceholderError(text);
  return slot;
}

function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Multi-pattern search over the six placeholder tokens.
 *
 * The compiled pattern is never used directly: each call works on a copy, so
 * one scanner can be shared freely.
 */
export class PlaceholderScanner {
  private readonly pattern: RegExp;

  constructor() {
    this.pattern = new RegExp(PLACEHOLDER_PATTERNS.map(escapeRegExp).join('|'), 'g');
  }

  /** Every token occurrence in `line`, left to right. */
  findAll(line: string): PlaceholderMatch[] {
    const re = new RegExp(this.pattern);
    const matches: PlaceholderMatch[] = [];
    let m: RegExpExecArray | null;
    while ((m = re.exec(line)) !== null) {
      matches.push(toMatch(m));
    }
    return matches;
  }

  /** First token starting at or after `from`. */
  findNext(line: string, from = 0): PlaceholderMatch | undefined {
    const re = new RegExp(this.pattern);
    re.lastIndex = from;
    const m = re.exec(line);
    return m ? toMatch(m) : undefined;
  }

  /** Replace every token in one pass; `replacement` receives the token's slot. */
  replaceAll(text: string, replacement: (slot: PlaceholderSlot) => string): string {
    return text.replace(new RegExp(this.pattern), (token) => replacement(slotOf(token)));
  }

  /** Remove every token. */
  strip(text: string): string {
    return this.replaceAll(text, () => '');
  }
}

function slotOf(token: string): PlaceholderSlot {
  // `${c` prefix, `}` suffix
  return parseSlot(token.slice(3, -1));
}

function toMatch(m: RegExpExecArray): PlaceholderMatch {
  return { slot: slotOf(m[0]), start: m.index, end: m.index + m[0].length };
}

let sharedScanner: PlaceholderScanner | undefined;

/** Process-wide scanner, built on first use. */
export function placeholderScanner(): PlaceholderScanner {
  if (!sharedScanner) sharedScanner = new PlaceholderScanner();
  return sharedScanner;
}
