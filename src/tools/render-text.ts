import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import fs from 'fs-extra';
import * as path from 'path';
import { renderText } from '../services/text-renderer';
import type { ToolContext } from './context';

const renderTextSchema = z.object({
  text: z.string().describe('Text to render'),
  font: z.string().optional().describe('Font name from list-fonts (default: the catalog default font)'),
  fontFile: z.string().optional().describe('Path to a .jhf font file, used instead of "font"'),
  directory: z.string().optional().describe('Directory containing .jhf fonts (default: bundled Hershey fonts)'),
  size: z.number().positive().optional().describe('Distance from cap line to bottom line in output units'),
  spacing: z.number().optional().describe('Extra space after every glyph (default: 0)'),
  xofs: z.number().optional().describe('Horizontal offset of the first glyph (default: 0)'),
  yofs: z.number().optional().describe('Vertical offset added to the bottom line (default: 0)'),
  format: z.enum(['svg', 'path', 'strokes', 'lines']).optional().describe('Output format (default: "svg")'),
  precision: z.number().int().min(0).max(10).optional().describe('Decimal places of coordinates (default: 3)'),
  outputFile: z.string().optional().describe('Also write the result to this file'),
});

export function registerRenderTextTool(server: McpServer, { config, fonts }: ToolContext): void {
  server.tool(
    'render-text',
    'Render text with a Hershey stroke font as SVG, SVG path data, polylines or line segments',
    renderTextSchema.shape,
    async ({ text, font, fontFile, directory, size = config.defaultSize, spacing, xofs, yofs, format = 'svg', precision, outputFile }) => {
      try {
        if (fontFile && !(await fs.pathExists(fontFile))) {
          return {
            content: [
              {
                type: 'text',
                text: `❌ Font file ${fontFile} does not exist`,
              },
            ],
            isError: true,
          };
        }

        const loaded = await fonts.load({ font, fontFile, directory });
        const output = renderText(loaded.font, { text, format, size, spacing, xofs, yofs, precision });

        if (outputFile) {
          await fs.ensureDir(path.dirname(outputFile));
          await fs.writeFile(outputFile, output);
          console.error(`Rendered "${text}" with ${loaded.name} to ${outputFile}`);
          return {
            content: [
              {
                type: 'text',
                text: `✅ Text rendered with ${loaded.name} and saved to ${outputFile}\n\n${output}`,
              },
            ],
          };
        }

        return {
          content: [
            {
              type: 'text',
              text: output,
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
