import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { registerAllTools } from './tools';
import { logger } from './utils/logger';

async function main() {
  const server = new McpServer({
    name: 'Template-to-Font',
    version: '1.0.0',
    description: 'MCP server for generating fonts from hand-drawn character templates',
  });

  registerAllTools(server);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('server', 'listening on stdio');
}

process.on('SIGINT', () => process.exit(0));
process.on('SIGTERM', () => process.exit(0));

main().catch((error) => {
  logger.error('server', 'failed to start', { error: String(error) });
  process.exit(1);
});
