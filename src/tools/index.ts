import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerGenerateTemplateTool } from './generate-template';
import { registerGenerateFontTool } from './generate-font';
import { registerListImagesTool } from './list-images';
import { registerInspectFontTool } from './inspect-font';

export function registerAllTools(server: McpServer): void {
  registerGenerateTemplateTool(server);
  registerGenerateFontTool(server);
  registerListImagesTool(server);
  registerInspectFontTool(server);
}
