/**
 * Typed error hierarchy for gradfetch.
 * Every recolor failure is deterministic, so none of these are retried:
 * callers decide whether to abort or fall back to uncolored output.
 */

/**
 * Base error for all gradfetch errors.
 * Includes an optional `cause` for error chaining.
 */
export class GradfetchError extends Error {
  override readonly name: string = 'GradfetchError';
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Thrown when the slot text inside a recognized `${cN}` token is not 1-6. */
export class InvalidPlaceholderError extends GradfetchError {
  override readonly name = 'InvalidPlaceholderError';
  constructor(public readonly slotText: string) {
    super(`Invalid color placeholder slot: "${slotText}" (expected 1-6)`);
  }
}

/** Thrown when a line needs the carried color slot but no earlier line set one. */
export class MissingColorStateError extends GradfetchError {
  override readonly name = 'MissingColorStateError';
  constructor(public readonly line: number) {
    super(`Line ${line + 1} has no starting color placeholder and no previous line defines one`);
  }
}

/** Thrown when a color profile cannot be spread to the requested length. */
export class ProfileSpreadError extends GradfetchError {
  override readonly name = 'ProfileSpreadError';
  constructor(
    public readonly requested: number,
    public readonly available: number,
  ) {
    super(
      available === 0
        ? 'Cannot spread an empty color profile'
        : `Cannot spread a color profile of ${available} colors to length ${requested}`,
    );
  }
}

/** Thrown when ascii art is wider or taller than the renderer supports. */
export class DimensionOverflowError extends GradfetchError {
  override readonly name = 'DimensionOverflowError';
  constructor(
    public readonly dimension: 'width' | 'height',
    public readonly value: number,
    public readonly max: number,
  ) {
    super(`Ascii art ${dimension} ${value} exceeds the maximum of ${max}`);
  }
}

/** Thrown when a custom alignment maps a slot to a palette index that does not exist. */
export class InvalidColorIndexError extends GradfetchError {
  override readonly name = 'InvalidColorIndexError';
  constructor(
    public readonly slot: number,
    public readonly index: number,
    public readonly paletteSize: number,
  ) {
    super(`Color slot ${slot} maps to palette index ${index}, but the palette has ${paletteSize} colors`);
  }
}

/** Thrown when a hex color string cannot be parsed. */
export class ColorParseError extends GradfetchError {
  override readonly name = 'ColorParseError';
  constructor(public readonly input: string) {
    super(`Invalid hex color: "${input}"`);
  }
}

/** Thrown when an unknown preset name is provided. */
export class UnknownPresetError extends GradfetchError {
  override readonly name = 'UnknownPresetError';
  constructor(
    public readonly preset: string,
    validPresets: readonly string[],
  ) {
    super(`Unknown preset: "${preset}". Valid presets: ${validPresets.join(', ')}`);
  }
}

/** Thrown when a CLI option value cannot be interpreted. */
export class InvalidOptionError extends GradfetchError {
  override readonly name = 'InvalidOptionError';
  constructor(
    public readonly option: string,
    public readonly value: string,
    reason: string,
  ) {
    super(`Invalid value for ${option}: "${value}" (${reason})`);
  }
}

/** Thrown when the config file cannot be read, parsed or written. */
export class ConfigError extends GradfetchError {
  override readonly name = 'ConfigError';
  constructor(
    public readonly filePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${message}: ${filePath}`, options);
  }
}

/** Thrown when a fetch backend binary is not available on PATH. */
export class BackendNotFoundError extends GradfetchError {
  override readonly name = 'BackendNotFoundError';
  constructor(public readonly backend: string) {
    super(`Backend not available: ${backend}. Is it installed and on your PATH?`);
  }
}

/** Thrown when a fetch backend exits with a non-zero status. */
export class BackendExitError extends GradfetchError {
  override readonly name = 'BackendExitError';
  constructor(
    public readonly backend: string,
    public readonly exitCode: number | null,
    public readonly hint?: string,
  ) {
    super(`${backend} exited with code ${exitCode ?? 'unknown'}`);
  }
}
