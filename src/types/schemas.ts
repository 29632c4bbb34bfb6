/**
 * Zod schemas for untrusted input: the YAML config file and structured CLI
 * option values. Output types line up with the engine's own types.
 */
import { z } from 'zod';
import { parseSlot } from '../recolor/placeholders.js';
import type { CustomColorMap } from './index.js';
import { ANSI_MODES, BACKEND_NAMES, isPlaceholderSlot, TERMINAL_THEMES } from './names.js';

// ── Alignment ───────────────────────────────────────────────────────────────

export const PlaceholderSlotSchema = z.number().int().refine(isPlaceholderSlot, {
  message: 'Color slot must be an integer from 1 to 6',
});

/** `[fore, back]` — two distinct slots */
export const ForeBackSchema = z
  .tuple([PlaceholderSlotSchema, PlaceholderSlotSchema])
  .readonly()
  .refine(([fore, back]) => fore !== back, { message: 'Fore and back slots must differ' });

/** `{ "1": 0, "3": 2 }` — slot keys (as YAML/JSON object keys) to 0-based palette indices */
export const CustomColorsSchema = z
  .record(z.string().regex(/^[1-6]$/, 'Custom color keys must be slots 1-6'), z.number().int().nonnegative())
  .transform((record): CustomColorMap => {
    const map: CustomColorMap = {};
    for (const [key, index] of Object.entries(record)) {
      map[parseSlot(key)] = index;
    }
    return map;
  });

export const AlignmentSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('horizontal'), foreBack: ForeBackSchema.optional() }),
  z.object({ mode: z.literal('vertical'), foreBack: ForeBackSchema.optional() }),
  z.object({ mode: z.literal('custom'), customColors: CustomColorsSchema }),
]);

// ── Config file ─────────────────────────────────────────────────────────────

export const ConfigSchema = z
  .object({
    preset: z.string().min(1),
    colors: z.array(z.string()).min(1),
    mode: z.enum(ANSI_MODES),
    theme: z.enum(TERMINAL_THEMES),
    alignment: AlignmentSchema,
    backend: z.enum(BACKEND_NAMES),
    args: z.array(z.string()),
    distro: z.string().min(1),
  })
  .partial()
  .strict();

export type GradfetchConfig = z.infer<typeof ConfigSchema>;
