#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import dotenv from 'dotenv';
import { createClient } from './config.js';
import { CollectionBrowserTool } from './tools/collection-browser.js';
import { dispatchTool, type PexelsTools } from './tools/dispatch.js';
import { MediaSearchTool } from './tools/media-search.js';

dotenv.config();

const server = new Server(
  {
    name: 'pexels-stock-media',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

async function main() {
  // Fails fast with api_key_not_found before the transport is opened.
  const client = createClient();
  const tools: PexelsTools = {
    media: new MediaSearchTool(client),
    collections: new CollectionBrowserTool(client),
  };

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        ...tools.media.getTools(),
        ...tools.collections.getTools()
      ]
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatchTool(tools, name, args);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('Pexels stock media MCP server running on stdio');
}

main().catch((error) => {
  console.error('Server failed to start:', error instanceof Error ? error.message : error);
  process.exit(1);
});
