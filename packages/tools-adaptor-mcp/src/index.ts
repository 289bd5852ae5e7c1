import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { type Part, createLogger, formatFieldErrors, mapWhen, textPart } from '@paperqa/tools-core';
import { z, type ZodTypeAny } from 'zod';

const log = createLogger('mcp');

/**
 * What the adaptor needs from a tool definition. `execute` is declared as a method so that
 * definitions with narrower argument types can share one array.
 */
export interface McpToolDefinition<TContext> {
  name: string;
  description: string;
  inputSchema: ZodTypeAny;
  contextSchema: ZodTypeAny;
  execute(params: { context: TContext; args: unknown }): Promise<Part[]>;
}

export interface McpServerOptions<TContext> {
  name: string;
  version: string;
  description: string;
  tools: readonly McpToolDefinition<TContext>[];
}

type McpContent = { type: 'text'; text: string };

export interface McpToolResult {
  [key: string]: unknown;
  content: McpContent[];
  isError?: boolean;
}

export function mapToMcpContent(parts: Part[]): McpContent[] {
  return mapWhen(parts, {
    text: (part) => ({ type: 'text' as const, text: part.value }),
    json: (part) => ({ type: 'text' as const, text: JSON.stringify(part.value, null, 2) }),
  });
}

/** Registers every tool on the server. The context is validated once against each tool's contextSchema. */
export function registerTools<TContext>(
  server: McpServer,
  tools: readonly McpToolDefinition<TContext>[],
  context: TContext,
): void {
  for (const tool of tools) {
    const { name, description, inputSchema, contextSchema } = tool;

    const contextCheck = contextSchema.safeParse(context);
    if (!contextCheck.success) {
      throw new Error(`Context validation failed for tool ${name}: ${formatFieldErrors(contextCheck.error)}`);
    }

    // MCP takes a raw object shape; other schemas are wrapped as { value }.
    const isObjectSchema = inputSchema instanceof z.ZodObject;
    const schemaDefinition = inputSchema instanceof z.ZodObject ? inputSchema.shape : { value: inputSchema };

    const toolCallback = async (mcpArgs: Record<string, unknown>): Promise<McpToolResult> => {
      try {
        const args = isObjectSchema ? mcpArgs : mcpArgs.value;
        const resultParts = await tool.execute({ context, args });
        return { content: mapToMcpContent(resultParts), isError: false };
      } catch (error: unknown) {
        log.error(`Error executing tool ${name}:`, error);
        const errorMessage = error instanceof Error ? error.message : String(error);
        return { content: mapToMcpContent([textPart(`Error: ${errorMessage}`)]), isError: true };
      }
    };

    server.tool(name, description, schemaDefinition, toolCallback);
  }
}

export async function startMcpServer<TContext>(
  serverOptions: McpServerOptions<TContext>,
  context: TContext,
): Promise<McpServer> {
  const { McpServer: McpServerConstructor } = await import('@modelcontextprotocol/sdk/server/mcp.js');

  const server = new McpServerConstructor({
    name: serverOptions.name,
    version: serverOptions.version,
  });

  registerTools(server, serverOptions.tools, context);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  // stdout carries the protocol; the logger writes to stderr.
  log.info(`${serverOptions.name} ${serverOptions.version} listening on stdio (${serverOptions.description})`);

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}. Shutting down...`);
    process.exit(0);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}
