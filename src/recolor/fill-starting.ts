import { MissingColorStateError } from '../errors.js';
import { placeholderScanner } from './placeholders.js';

const SPACES_ONLY = /^ *$/;

/**
 * Make every line start with a color placeholder by carrying the last
 * placeholder of the previous lines forward.
 *
 * e.g. `"${c1}...\n..."` -> `"${c1}...\n${c1}..."`
 *
 * A line counts as already started when only spaces precede its first token.
 */
export function fillStarting(asc: string): string {
  const scanner = placeholderScanner();
  let carry: string | undefined;

  return asc
    .split('\n')
    .map((line, index) => {
      const matches = scanner.findAll(line);
      const first = matches[0];
      let filled = line;

      if (!first || !SPACES_ONLY.test(line.slice(0, first.start))) {
        if (carry === undefined) throw new MissingColorStateError(index);
        filled = carry + line;
      }

      const last = matches[matches.length - 1];
      if (last) carry = line.slice(last.start, last.end);

      return filled;
    })
    .join('\n');
}
