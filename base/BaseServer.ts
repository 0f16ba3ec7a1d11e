import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  CallToolResult,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  Tool,
} from "@modelcontextprotocol/sdk/types.js";

export type ToolArguments = Record<string, unknown> | undefined;

export abstract class BaseServer {
  protected server: Server;

  constructor(
    protected readonly serverName: string,
    protected readonly serverVersion: string,
    protected readonly serverDescription: string
  ) {
    this.server = new Server(
      {
        name: serverName,
        version: serverVersion,
      },
      {
        capabilities: {
          tools: {},
        },
        instructions: serverDescription,
      }
    );
    this.setupHandlers();
  }

  protected abstract getTools(): Tool[];
  protected abstract handleToolCall(name: string, args: ToolArguments): Promise<CallToolResult>;

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.getTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      return await this.handleToolCall(request.params.name, request.params.arguments);
    });
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async run(): Promise<void> {
    await this.connect(new StdioServerTransport());
    console.error(`${this.serverName} MCP server running on stdio`);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  protected textResult(texts: string[], isError: boolean = false): CallToolResult {
    return {
      content: texts.map((text) => ({ type: "text" as const, text })),
      ...(isError ? { isError: true } : {}),
    };
  }

  protected throwMcpError(code: ErrorCode, message: string): never {
    throw new McpError(code, message);
  }
}
