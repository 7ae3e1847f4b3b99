export { DirectiveParseError, FontNotFoundError, InvalidRenderOptionError } from './errors';
export { applyDirective, decodeStrokes, decodeValue, emptyDirectiveContext, HersheyGlyph, parseGlyphLine } from './services/glyph-parser';
export type { Directive, DirectiveMetrics, ParsedLine } from './services/glyph-parser';
export { DEFAULT_RENDER_OPTIONS, HersheyFont, median, multimode } from './services/hershey-font';
export { textGlyphs, textLines, textStrokes } from './services/stroke-compositor';
export type { GlyphMap } from './services/stroke-compositor';
export { decodeFontLines, FontCatalog } from './services/font-catalog';
export { DirectoryFontArchive, findFontFiles, readFontFile } from './services/file-handler';
export type { DirectoryFontArchiveOptions } from './services/file-handler';
export { applyLayout, renderText } from './services/text-renderer';
export type { RenderRequest, TextLayout } from './services/text-renderer';
export { strokesToPathData, strokesToSVG } from './utils/svg-utils';
export { strokeBounds, strokeLines } from './utils/stroke-utils';
export { createServer } from './server';
export { BUNDLED_FONTS_DIR, loadConfig } from './config';
export type { ServerConfig } from './config';
export type { FontArchive, LoadOptions, RenderFormat, RenderOptions } from './types/font';
export type { Box, DirectiveContext, GlyphData, Line, LineMetrics, Point, Stroke } from './types/glyph';
