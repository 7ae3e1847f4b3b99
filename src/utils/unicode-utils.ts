/** `'A'` -> `'U+0041'` */
export function codePointLabel(char: string): string {
  const code = char.codePointAt(0);
  if (code === undefined) {
    return '';
  }
  return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
}

export function charForCode(code: number): string {
  if (!Number.isInteger(code) || code < 0 || code > 0x10ffff) {
    throw new RangeError(`Invalid code point: ${code}`);
  }
  return String.fromCodePoint(code);
}

/** First code point of `text`, or undefined for an empty string. */
export function firstChar(text: string): string | undefined {
  for (const char of text) {
    return char;
  }
  return undefined;
}
