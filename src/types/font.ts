export interface RenderOptions {
  xofs: number;
  yofs: number;
  scalex: number;
  scaley: number;
  spacing: number;
  capLine: number;
  baseLine: number;
  bottomLine: number;
}

export interface LoadOptions {
  /** Code point given to the first glyph line when glyphs are stored in line order. */
  firstCode?: number;
  /** Store each glyph under the code embedded in its record instead. */
  useEmbeddedCode?: boolean;
  /** Keep the current glyphs; new keys overwrite existing ones. */
  merge?: boolean;
}

/**
 * Source of named font resources. Implementations decode whatever container
 * holds the `.jhf` data; errors they raise reach the caller unchanged.
 */
export interface FontArchive {
  list(): Promise<string[]>;
  read(name: string): Promise<Uint8Array>;
}

export type RenderFormat = 'svg' | 'path' | 'strokes' | 'lines';
