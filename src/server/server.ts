/**
 * MCP server setup: tool and resource registration over stdio.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import * as z from 'zod';
import sessionStatusResource, {
  type ResourceContents,
} from '../mcp/resources/session-status.ts';
import { workflow } from '../mcp/tools/stack-inspection/index.ts';
import {
  stackInspectionTools,
  type ToolDefinition,
} from '../mcp/tools/stack-inspection/registry.ts';
import type { ToolResponse } from '../types/common.ts';
import { log } from '../utils/logging/index.ts';
import { createErrorResponse } from '../utils/responses/index.ts';
import { version } from '../version.ts';

export interface ResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
  handler: () => Promise<ResourceContents>;
}

export interface ServerRegistry {
  tools: ToolDefinition[];
  resources: ResourceDefinition[];
}

const defaultRegistry: ServerRegistry = {
  tools: stackInspectionTools,
  resources: [sessionStatusResource],
};

export function toToolListing(tool: ToolDefinition): Tool {
  const json = z.toJSONSchema(z.object(tool.schema));
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: {
      type: 'object',
      properties: json.properties,
      required: json.required,
    },
  };
}

export async function dispatchToolCall(
  registry: ServerRegistry,
  name: string,
  args: Record<string, unknown> = {},
): Promise<ToolResponse> {
  const tool = registry.tools.find((candidate) => candidate.name === name);
  if (!tool) {
    return createErrorResponse(`Unknown tool: ${name}`);
  }
  log('debug', `Calling tool ${name}`);
  return tool.handler(args);
}

export function createServer(registry: ServerRegistry = defaultRegistry): Server {
  const server = new Server(
    {
      name: 'lanetrace-mcp',
      version,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
      },
      instructions: `${workflow.name}: ${workflow.description}`,
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: registry.tools.map(toToolListing),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    dispatchToolCall(registry, request.params.name, request.params.arguments),
  );

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: registry.resources.map(({ uri, name, description, mimeType }) => ({
      uri,
      name,
      description,
      mimeType,
    })),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const resource = registry.resources.find((candidate) => candidate.uri === request.params.uri);
    if (!resource) {
      throw new Error(`Unknown resource: ${request.params.uri}`);
    }
    const result = await resource.handler();
    return {
      contents: result.contents.map((entry) => ({
        uri: resource.uri,
        mimeType: resource.mimeType,
        text: entry.text,
      })),
    };
  });

  log('info', `Registered ${registry.tools.length} tools`);
  return server;
}

export async function startServer(server: Server): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log('info', 'LaneTrace MCP server running on stdio');
}
