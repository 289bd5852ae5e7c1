import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { BaseContextSchema, type ToolExecuteOptions, defineTool, jsonPart, textPart } from '@paperqa/tools-core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { type McpServerOptions, mapToMcpContent, registerTools, startMcpServer } from './index.js';

// --- Mocking Setup ---
const { mockMcpToolMethod, mockMcpConnectMethod } = vi.hoisted(() => ({
  mockMcpToolMethod: vi.fn(),
  mockMcpConnectMethod: vi.fn(),
}));

vi.mock('@modelcontextprotocol/sdk/server/mcp.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@modelcontextprotocol/sdk/server/mcp.js')>();
  return {
    ...actual,
    // A function expression so the mock can be called with `new`.
    McpServer: vi.fn().mockImplementation(function (opts: unknown) {
      return { tool: mockMcpToolMethod, connect: mockMcpConnectMethod, options: opts };
    }),
  };
});

vi.mock('@modelcontextprotocol/sdk/server/stdio.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@modelcontextprotocol/sdk/server/stdio.js')>();
  return {
    ...actual,
    StdioServerTransport: vi.fn().mockImplementation(function () {
      return { __isMockStdioTransport: true };
    }),
  };
});
// --- End Mocking Setup ---

const context: ToolExecuteOptions = { workspaceRoot: '/mock/workspace' };

const textTool = defineTool({
  name: 'textTool',
  description: 'desc1',
  inputSchema: z.object({ p1: z.string() }),
  contextSchema: BaseContextSchema,
  execute: async ({ context: ctx, args }) => [textPart(`${args.p1} in ${ctx.workspaceRoot}`)],
});

const jsonTool = defineTool({
  name: 'jsonTool',
  description: 'desc2',
  inputSchema: z.object({ p2: z.number() }),
  contextSchema: BaseContextSchema,
  execute: async ({ args }) => [jsonPart({ data: args.p2 }, z.object({ data: z.number() }))],
});

const errorTool = defineTool({
  name: 'errorTool',
  description: 'errorDesc',
  inputSchema: z.object({}),
  contextSchema: BaseContextSchema,
  execute: async () => {
    throw new Error('Tool execution failed');
  },
});

const nonErrorThrowTool = defineTool({
  name: 'nonErrorTool',
  description: 'Throws non-error',
  inputSchema: z.object({}),
  contextSchema: BaseContextSchema,
  execute: async () => {
    throw 'Something bad happened';
  },
});

const primitiveSchemaTool = defineTool({
  name: 'primitiveSchemaTool',
  description: 'primitiveDesc',
  inputSchema: z.string(),
  contextSchema: BaseContextSchema,
  execute: async ({ args }) => [textPart(`got ${args}`)],
});

async function createServer(): Promise<McpServer> {
  const { McpServer: MockedMcpServer } = await import('@modelcontextprotocol/sdk/server/mcp.js');
  return new MockedMcpServer({ name: 'reg-test', version: '1' });
}

function registeredCallback(call = 0): (args: Record<string, unknown>) => Promise<unknown> {
  return mockMcpToolMethod.mock.calls[call][3];
}

describe('tools-adaptor-mcp', () => {
  // Only the spies are restored; the module mocks above must keep their implementations.
  let consoleErrorSpy: { mockRestore(): void };

  beforeEach(() => {
    vi.clearAllMocks();
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  describe('mapToMcpContent', () => {
    it('should map text parts and stringify json parts', () => {
      expect(mapToMcpContent([textPart('a'), jsonPart({ b: 1 }, z.object({ b: z.number() }))])).toEqual([
        { type: 'text', text: 'a' },
        { type: 'text', text: '{\n  "b": 1\n}' },
      ]);
    });
  });

  describe('registerTools', () => {
    it('should register each tool with its object shape', async () => {
      const server = await createServer();
      registerTools(server, [textTool, jsonTool, errorTool], context);

      expect(mockMcpToolMethod).toHaveBeenCalledTimes(3);
      expect(mockMcpToolMethod).toHaveBeenNthCalledWith(
        1,
        'textTool',
        'desc1',
        textTool.inputSchema.shape,
        expect.any(Function),
      );
      expect(mockMcpToolMethod).toHaveBeenNthCalledWith(
        2,
        'jsonTool',
        'desc2',
        jsonTool.inputSchema.shape,
        expect.any(Function),
      );
    });

    it('should wrap a primitive schema as { value }', async () => {
      const server = await createServer();
      registerTools(server, [primitiveSchemaTool], context);
      expect(mockMcpToolMethod).toHaveBeenCalledWith(
        'primitiveSchemaTool',
        'primitiveDesc',
        { value: primitiveSchemaTool.inputSchema },
        expect.any(Function),
      );
      const result = await registeredCallback()({ value: 'x' });
      expect(result).toEqual({ content: [{ type: 'text', text: 'got x' }], isError: false });
    });

    it('should pass the context and arguments to the tool', async () => {
      const server = await createServer();
      registerTools(server, [textTool], context);
      const result = await registeredCallback()({ p1: 'test' });
      expect(result).toEqual({ content: [{ type: 'text', text: 'test in /mock/workspace' }], isError: false });
    });

    it('should map json result correctly', async () => {
      const server = await createServer();
      registerTools(server, [jsonTool], context);
      const result = await registeredCallback()({ p2: 123 });
      expect(result).toEqual({
        content: [{ type: 'text', text: JSON.stringify({ data: 123 }, null, 2) }],
        isError: false,
      });
    });

    it('should handle errors from tool execution', async () => {
      const server = await createServer();
      registerTools(server, [errorTool], context);
      const result = await registeredCallback()({});
      expect(result).toEqual({ content: [{ type: 'text', text: 'Error: Tool execution failed' }], isError: true });
      expect(console.error).toHaveBeenCalledWith('[paperqa:mcp:ERROR] Error executing tool errorTool:', expect.any(Error));
    });

    it('should keep the server mock working across tests', async () => {
      const server = await createServer();
      expect(server.tool).toBe(mockMcpToolMethod);
      registerTools(server, [jsonTool], context);
      expect(mockMcpToolMethod).toHaveBeenCalledTimes(1);
    });

    it('should handle non-Error throws from tool execution', async () => {
      const server = await createServer();
      registerTools(server, [nonErrorThrowTool], context);
      const result = await registeredCallback()({});
      expect(result).toEqual({ content: [{ type: 'text', text: 'Error: Something bad happened' }], isError: true });
    });

    it('should reject a context that does not satisfy the tool', async () => {
      const server = await createServer();
      const strictTool = defineTool({
        name: 'strictTool',
        description: 'needs a flag',
        inputSchema: z.object({}),
        contextSchema: BaseContextSchema.extend({ flag: z.boolean() }),
        execute: async () => [],
      });
      expect(() => registerTools<unknown>(server, [strictTool], { workspaceRoot: '/w', flag: 'yes' })).toThrow(
        'Context validation failed for tool strictTool: flag: Expected boolean, received string',
      );
      expect(mockMcpToolMethod).not.toHaveBeenCalled();
    });
  });

  describe('startMcpServer', () => {
    const serverOptions: McpServerOptions<ToolExecuteOptions> = {
      name: 'test-server',
      version: '1.0.0',
      description: 'Test MCP Server',
      tools: [textTool],
    };

    let processOnSpy: { mockRestore(): void };

    beforeEach(() => {
      processOnSpy = vi.spyOn(process, 'on').mockReturnValue(process);
    });

    afterEach(() => {
      processOnSpy.mockRestore();
    });

    it('should create the server, register tools and connect over stdio', async () => {
      const { McpServer: MockedMcpServer } = await import('@modelcontextprotocol/sdk/server/mcp.js');
      const { StdioServerTransport: MockedStdio } = await import('@modelcontextprotocol/sdk/server/stdio.js');

      const server = await startMcpServer(serverOptions, context);

      expect(MockedMcpServer).toHaveBeenCalledWith({ name: 'test-server', version: '1.0.0' });
      expect(mockMcpToolMethod).toHaveBeenCalledTimes(1);
      expect(MockedStdio).toHaveBeenCalledTimes(1);
      expect(mockMcpConnectMethod).toHaveBeenCalledWith(expect.objectContaining({ __isMockStdioTransport: true }));
      expect(server.tool).toBe(mockMcpToolMethod);
    });

    it('should install signal handlers', async () => {
      await startMcpServer(serverOptions, context);
      expect(process.on).toHaveBeenCalledWith('SIGINT', expect.any(Function));
      expect(process.on).toHaveBeenCalledWith('SIGTERM', expect.any(Function));
    });
  });
});
