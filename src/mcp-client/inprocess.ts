import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { clientInfo, closeSessionThenTransport, type ClientLike } from "./session";
import { toToolCallResult, type CallOptions, type MCPClient, type ToolCallResult } from "./types";

/**
 * A server instance plus whatever it holds open (e.g. a database handle)
 */
export type HostedServer = {
  server: McpServer;
  dispose?: () => void | Promise<void>;
};

export type HostedServerFactory = () => HostedServer | Promise<HostedServer>;

export interface InProcessMCPClientOptions {
  /** Override Client creation for testing */
  clientFactory?: (name: string) => ClientLike;
  /** Handshake timeout in milliseconds */
  connectTimeout?: number;
}

/**
 * MCP client linked to a server in the same process through the SDK's in-memory
 * transport pair. Messages are passed as objects, never serialized.
 */
export class InProcessMCPClient implements MCPClient {
  private client: ClientLike;
  private hosted: HostedServer | null;
  private toolsCache: Tool[] | null;
  private name: string;
  private serverFactory: HostedServerFactory;
  private connectTimeout?: number;

  constructor(name: string, serverFactory: HostedServerFactory, options?: InProcessMCPClientOptions) {
    this.name = name;
    this.serverFactory = serverFactory;
    this.hosted = null;
    this.toolsCache = null;
    this.connectTimeout = options?.connectTimeout;
    this.client = options?.clientFactory?.(name) ?? new Client(clientInfo(name), {});
  }

  async connect(): Promise<void> {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const hosted = await this.serverFactory();
    this.hosted = hosted;

    await hosted.server.connect(serverTransport);
    await this.client.connect(clientTransport, { timeout: this.connectTimeout });
  }

  async listTools(): Promise<Tool[]> {
    const result = await this.client.listTools();
    this.toolsCache = result.tools;
    return result.tools;
  }

  async callTool(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<ToolCallResult> {
    const raw = await this.client.callTool({ name, arguments: args }, CallToolResultSchema, {
      timeout: options?.timeoutMs,
      signal: options?.signal,
    });
    return toToolCallResult(raw);
  }

  async close(): Promise<void> {
    const hosted = this.hosted;
    this.hosted = null;
    this.toolsCache = null;
    if (!hosted) {
      return;
    }
    try {
      // the server side plays the transport role here
      await closeSessionThenTransport(this.name, this.client, hosted.server);
    } finally {
      await hosted.dispose?.();
    }
  }

  getCachedTools(): Tool[] | null {
    return this.toolsCache;
  }
}
