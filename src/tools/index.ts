import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ToolContext } from './context';
import { registerGlyphInfoTool } from './glyph-info';
import { registerListFontsTool } from './list-fonts';
import { registerRenderTextTool } from './render-text';

export function registerAllTools(server: McpServer, context: ToolContext): void {
  registerListFontsTool(server, context);
  registerRenderTextTool(server, context);
  registerGlyphInfoTool(server, context);
}
