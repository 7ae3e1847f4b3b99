import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import fs from 'fs-extra';
import type { ToolContext } from './context';

const listFontsSchema = z.object({
  directory: z.string().optional().describe('Directory containing .jhf fonts (default: bundled Hershey fonts)'),
});

export function registerListFontsTool(server: McpServer, { config, fonts }: ToolContext): void {
  server.tool('list-fonts', 'List the Hershey fonts available for rendering', listFontsSchema.shape, async ({ directory = config.fontsDir }) => {
    try {
      if (!(await fs.pathExists(directory))) {
        return {
          content: [
            {
              type: 'text',
              text: `❌ Directory ${directory} does not exist`,
            },
          ],
          isError: true,
        };
      }

      const names = await fonts.catalog(directory).listNames();

      if (names.length === 0) {
        return {
          content: [
            {
              type: 'text',
              text: `No fonts found in ${directory}`,
            },
          ],
        };
      }

      const fontList = names.map((name, index) => `• ${name}${index === 0 ? ' (default)' : ''}`).join('\n');

      return {
        content: [
          {
            type: 'text',
            text: `🔤 Fonts available in ${directory}:\n\n${fontList}\n\nTotal: ${names.length} fonts`,
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
  });
}
