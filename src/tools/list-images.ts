import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { findTemplateImages } from '../services/file-handler';
import fs from 'fs-extra';
import * as path from 'path';

const listImagesSchema = z.object({
  directory: z.string().describe('Directory to explore'),
});

export function registerListImagesTool(server: McpServer): void {
  server.tool('list-template-images', 'List template images (png, jpg, webp, tiff) in a directory', listImagesSchema.shape, async ({ directory }) => {
    try {
      if (!(await fs.pathExists(directory))) {
        return {
          content: [
            {
              type: 'text',
              text: `❌ Directory ${directory} does not exist`,
            },
          ],
        };
      }

      const images = await findTemplateImages(directory);

      if (images.length === 0) {
        return {
          content: [
            {
              type: 'text',
              text: `No template images found in ${directory}`,
            },
          ],
        };
      }

      const fileList = images.map((file) => `• ${path.relative(directory, file)}`).join('\n');

      return {
        content: [
          {
            type: 'text',
            text: `📁 Template images found in ${directory}:\n\n${fileList}\n\nTotal: ${images.length} files`,
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
      };
    }
  });
}
