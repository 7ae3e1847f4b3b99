import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from './config';
import { createServer } from './server';

async function main() {
  const config = loadConfig();
  const server = createServer(config);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`Hershey text server ready, fonts from ${config.fontsDir}`);
}

process.on('SIGINT', () => process.exit(0));
process.on('SIGTERM', () => process.exit(0));

main().catch((error: unknown) => {
  console.error(`❌ Fatal: ${error}`);
  process.exit(1);
});
