import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ServerConfig } from '../../src/config';
import { createServer } from '../../src/server';
import { FIXTURE_FONTS_DIR } from '../fixtures/glyphs';

const config: ServerConfig = {
  fontsDir: FIXTURE_FONTS_DIR,
  defaultFont: 'futural',
  defaultSize: 28,
};

interface ToolOutput {
  text: string;
  isError: boolean;
}

describe('MCP tools', () => {
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    server = createServer(config);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  async function call(name: string, args: Record<string, unknown>): Promise<ToolOutput> {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const text = result.content.map((item) => (item.type === 'text' ? item.text : '')).join('');
    return { text, isError: result.isError === true };
  }

  it('should register every tool', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual(['glyph-info', 'list-fonts', 'render-text']);
  });

  describe('list-fonts', () => {
    it('should list fonts with the default first', async () => {
      expect(await call('list-fonts', {})).toEqual({
        text: `🔤 Fonts available in ${FIXTURE_FONTS_DIR}:\n\n• mini (default)\n• zeta\n\nTotal: 2 fonts`,
        isError: false,
      });
    });

    it('should report a missing directory', async () => {
      const directory = path.join(FIXTURE_FONTS_DIR, 'absent');

      expect(await call('list-fonts', { directory })).toEqual({
        text: `❌ Directory ${directory} does not exist`,
        isError: true,
      });
    });
  });

  describe('render-text', () => {
    let tempDir: string | undefined;

    afterEach(async () => {
      if (tempDir) {
        await fs.remove(tempDir);
        tempDir = undefined;
      }
    });

    it('should render line segments', async () => {
      const output = await call('render-text', { text: '!', font: 'mini', format: 'lines' });

      expect(output.isError).toBe(false);
      expect(JSON.parse(output.text)).toEqual([
        [
          [4, 16],
          [22, 16],
        ],
      ]);
    });

    it('should use the default font and size', async () => {
      expect(await call('render-text', { text: 'x!', format: 'path' })).toEqual({
        text: 'M 4 -16 L 22 -16',
        isError: false,
      });
    });

    it('should render from a font file', async () => {
      const output = await call('render-text', { text: ' ', fontFile: path.join(FIXTURE_FONTS_DIR, 'zeta.jhf'), format: 'strokes' });

      expect(output.text).toBe('[[[4,28],[4,7]]]');
    });

    it('should report unknown fonts', async () => {
      expect(await call('render-text', { text: 'A', font: 'nope' })).toEqual({
        text: '❌ Error: FontNotFoundError: "nope" font not found.',
        isError: true,
      });
    });

    it('should write the result to a file', async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'hershey-render-'));
      const outputFile = path.join(tempDir, 'out', 'dash.txt');

      const output = await call('render-text', { text: '!', font: 'mini', format: 'path', outputFile });

      expect(output.text).toBe(`✅ Text rendered with mini and saved to ${outputFile}\n\nM 4 -16 L 22 -16`);
      expect(await fs.readFile(outputFile, 'utf8')).toBe('M 4 -16 L 22 -16');
    });
  });

  describe('glyph-info', () => {
    it('should describe a glyph in font units', async () => {
      const output = await call('glyph-info', { character: '!', font: 'mini' });

      expect(JSON.parse(output.text)).toEqual({
        font: 'mini',
        character: '!',
        codePoint: 'U+0021',
        charcode: 12345,
        leftSide: -13,
        rightSide: 13,
        width: 26,
        drawBox: [
          [-9, 0],
          [9, 0],
        ],
        charBox: [
          [-13, 16],
          [13, -12],
        ],
        capLine: -12,
        baseLine: 9,
        bottomLine: 16,
        strokes: [
          [
            [-9, 0],
            [9, 0],
          ],
        ],
      });
    });

    it('should report characters without a glyph', async () => {
      expect(await call('glyph-info', { character: 'x', font: 'mini' })).toEqual({
        text: '❌ U+0078 has no glyph in mini',
        isError: true,
      });
    });
  });
});
