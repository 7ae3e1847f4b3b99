/**
 * Thrown when a `#` metadata line is not a JSON object of numeric line values.
 * The load that read it is abandoned.
 */
export class DirectiveParseError extends Error {
  constructor(line: string, options?: { cause?: unknown }) {
    super(`Invalid font directive: ${line}`, options);
    this.name = 'DirectiveParseError';
  }
}

export class FontNotFoundError extends Error {
  readonly fontName: string;

  constructor(fontName: string) {
    super(`"${fontName}" font not found.`);
    this.name = 'FontNotFoundError';
    this.fontName = fontName;
  }
}

/**
 * Thrown when render options are updated with unknown keys or unusable values.
 */
export class InvalidRenderOptionError extends Error {
  readonly keys: string[];

  constructor(message: string, keys: string[] = []) {
    super(message);
    this.name = 'InvalidRenderOptionError';
    this.keys = keys;
  }
}
