import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Scope } from '../config/credentials.js';
import type { Dispatcher } from '../core/dispatcher.js';
import { serializeEnvelope } from '../core/envelope.js';
import type { ToolRegistry } from '../tools/registry.js';

export const SERVER_NAME = 'portal-mcp-server';
export const SERVER_VERSION = '1.0.0';

/**
 * MCP protocol server over the shared dispatcher.
 *
 * Stateless apart from what the SDK keeps per connection, so SSE creates one
 * per stream while stdio uses a single instance. Every call result is text
 * content holding the wire envelope; failures also set `isError`.
 */
export function createProtocolServer(dispatcher: Dispatcher, registry: ToolRegistry, callerScope: Scope): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION
    },
    {
      capabilities: {
        tools: {}
      }
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = registry.list().map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { ...tool.inputSchema },
      ...(tool.annotations && { annotations: { ...tool.annotations } })
    }));
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const envelope = await dispatcher.dispatch(name, args, callerScope);

    return {
      content: [
        {
          type: 'text' as const,
          text: serializeEnvelope(envelope)
        }
      ],
      ...(!envelope.ok && { isError: true })
    };
  });

  return server;
}
