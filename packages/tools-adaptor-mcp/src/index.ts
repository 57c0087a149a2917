import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { type Part, type ToolDefinition, type ToolExecuteOptions, mapWhen } from '@pagecut/tools-core';
import { ZodObject, type ZodRawShape, type ZodTypeAny } from 'zod';

// biome-ignore lint/suspicious/noExplicitAny: Necessary for array of tools with diverse signatures
export type McpToolDefinition = ToolDefinition<any, any>;

export interface McpServerOptions {
  name: string;
  version: string;
  description: string;
  tools: McpToolDefinition[];
}

/** The slice of McpServer that tool registration needs. */
export type ToolRegistrar = Pick<McpServer, 'tool'>;

type McpContent = CallToolResult['content'][number];

function mapToMcpContent(parts: Part[]): McpContent[] {
  return mapWhen(parts, {
    text: (part): McpContent => ({ type: 'text', text: part.value }),
    json: (part): McpContent => ({ type: 'text', text: JSON.stringify(part.value, null, 2) }),
  });
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function registerTools(
  server: ToolRegistrar,
  tools: McpToolDefinition[],
  toolOptions: ToolExecuteOptions,
): void {
  for (const tool of tools) {
    const { name, description, execute } = tool;
    const inputSchema: ZodTypeAny = tool.inputSchema;

    // Primitive schemas are wrapped as { value: schema } for MCP registration
    let isObjectSchema = false;
    let schemaDefinition: ZodRawShape = { value: inputSchema };
    if (inputSchema instanceof ZodObject) {
      isObjectSchema = true;
      schemaDefinition = inputSchema.shape;
    }

    const toolCallback = async (mcpArgs: Record<string, unknown>): Promise<CallToolResult> => {
      try {
        const executionArgs = isObjectSchema ? mcpArgs : mcpArgs.value;
        const resultParts = await execute({ context: toolOptions, args: executionArgs });
        return { content: mapToMcpContent(resultParts), isError: false };
      } catch (error: unknown) {
        console.error(`Error executing tool ${name}:`, error);
        return { content: [{ type: 'text', text: `Error: ${describeError(error)}` }], isError: true };
      }
    };

    server.tool(name, description, schemaDefinition, toolCallback);
  }
}

export async function startMcpServer(
  serverOptions: McpServerOptions,
  toolOptions: ToolExecuteOptions,
): Promise<McpServer> {
  // Imported lazily so tool packages can be loaded without the server runtime
  const { McpServer: McpServerConstructor } = await import('@modelcontextprotocol/sdk/server/mcp.js');

  const server = new McpServerConstructor(
    { name: serverOptions.name, version: serverOptions.version },
    { instructions: serverOptions.description },
  );

  registerTools(server, serverOptions.tools, toolOptions);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `[${serverOptions.name}] MCP server started on stdio with tools: ${serverOptions.tools
      .map((tool) => tool.name)
      .join(', ')}`,
  );

  const shutdown = (signal: string) => {
    console.error(`[${serverOptions.name}] Received ${signal}. Shutting down...`);
    process.exit(0);
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}
