import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { codePointLabel, firstChar } from '../utils/unicode-utils';
import type { ToolContext } from './context';

const glyphInfoSchema = z.object({
  character: z.string().min(1).describe('Character to describe; only the first code point is used'),
  font: z.string().optional().describe('Font name from list-fonts (default: the catalog default font)'),
  fontFile: z.string().optional().describe('Path to a .jhf font file, used instead of "font"'),
  directory: z.string().optional().describe('Directory containing .jhf fonts (default: bundled Hershey fonts)'),
});

export function registerGlyphInfoTool(server: McpServer, { fonts }: ToolContext): void {
  server.tool(
    'glyph-info',
    'Describe one glyph of a Hershey font: bearings, width, boxes, reference lines and strokes in font units',
    glyphInfoSchema.shape,
    async ({ character, font, fontFile, directory }) => {
      try {
        const char = firstChar(character) ?? '';
        const loaded = await fonts.load({ font, fontFile, directory });
        const glyph = loaded.font.getGlyph(char);

        if (!glyph) {
          return {
            content: [
              {
                type: 'text',
                text: `❌ ${codePointLabel(char)} has no glyph in ${loaded.name}`,
              },
            ],
            isError: true,
          };
        }

        const info = {
          font: loaded.name,
          character: char,
          codePoint: codePointLabel(char),
          charcode: glyph.charcode,
          leftSide: glyph.leftSide,
          rightSide: glyph.rightSide,
          width: glyph.width,
          drawBox: glyph.drawBox,
          charBox: glyph.charBox,
          capLine: glyph.capLine,
          baseLine: glyph.baseLine,
          bottomLine: glyph.bottomLine,
          strokes: glyph.strokes,
        };

        return {
          content: [
            {
              type: 'text',
              text: JSON.stringify(info, null, 2),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text',
              text: `❌ Error: ${error}`,
            },
          ],
          isError: true,
        };
      }
    }
  );
}
