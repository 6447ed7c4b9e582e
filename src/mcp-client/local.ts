import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import { CallToolResultSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import type { StdioServiceConfig } from "../config";
import { log } from "../logging";
import { clientInfo, closeSessionThenTransport, type ClientLike, type TransportLike } from "./session";
import { toToolCallResult, type CallOptions, type MCPClient, type ToolCallResult } from "./types";

/**
 * Stdio transport as seen by the client, stderr exposed when piped
 */
export interface StdioTransportLike extends TransportLike {
  readonly stderr?: { on(event: "data", listener: (chunk: unknown) => void): unknown } | null;
}

/**
 * Options for LocalMCPClient including DI seams for testing
 */
export interface LocalMCPClientOptions {
  /** Override Client creation for testing */
  clientFactory?: (name: string) => ClientLike;
  /** Override transport creation for testing */
  transportFactory?: (opts: {
    command: string;
    args: string[];
    env: Record<string, string>;
    cwd?: string;
    stderr: "pipe" | "inherit" | "ignore";
  }) => StdioTransportLike;
  /** Handshake timeout in milliseconds */
  connectTimeout?: number;
}

/**
 * Parent environment with unset variables dropped
 */
function parentEnvironment(): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}

/**
 * MCP client for a spawned process speaking over stdio
 */
export class LocalMCPClient implements MCPClient {
  private client: ClientLike;
  private transport: StdioTransportLike | null;
  private toolsCache: Tool[] | null;
  private name: string;
  private config: StdioServiceConfig;
  private connectTimeout?: number;
  private transportFactory: NonNullable<LocalMCPClientOptions["transportFactory"]>;

  constructor(config: StdioServiceConfig, options?: LocalMCPClientOptions) {
    this.transport = null;
    this.toolsCache = null;
    this.name = config.name;
    this.config = config;
    this.connectTimeout = options?.connectTimeout;

    const clientFactory = options?.clientFactory ?? ((name: string) => new Client(clientInfo(name), {}));

    this.transportFactory = options?.transportFactory ?? ((opts) => new StdioClientTransport(opts));

    this.client = clientFactory(this.name);
  }

  async connect(): Promise<void> {
    if (!this.config.command) {
      throw new Error(`Stdio MCP server ${this.name} has no command`);
    }

    const transport = this.transportFactory({
      command: this.config.command,
      args: this.config.args,
      env: {
        ...parentEnvironment(),
        ...this.config.env,
      },
      cwd: this.config.cwd,
      stderr: "pipe",
    });
    this.transport = transport;

    await this.client.connect(transport, { timeout: this.connectTimeout });

    transport.stderr?.on("data", chunk => {
      log("debug", `[${this.name}] stderr: ${String(chunk).trimEnd()}`);
    });
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
    const transport = this.transport;
    this.transport = null;
    this.toolsCache = null;
    if (!transport) {
      return;
    }
    await closeSessionThenTransport(this.name, this.client, transport);
  }

  /**
   * Get cached tools without re-fetching
   */
  getCachedTools(): Tool[] | null {
    return this.toolsCache;
  }
}
