const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Split text into user-perceived characters, so a combining sequence or an
 * emoji made of several code points occupies a single entry.
 */
export function splitGraphemes(text: string): string[] {
  if (!text) return [];
  return Array.from(segmenter.segment(text), (s) => s.segment);
}
