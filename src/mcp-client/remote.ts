import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";
import { CallToolResultSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import type { RemoteServiceConfig } from "../config";
import { errorMessage } from "../errors";
import { log } from "../logging";
import { clientInfo, closeSessionThenTransport, type ClientLike, type TransportLike } from "./session";
import { toToolCallResult, type CallOptions, type MCPClient, type ToolCallResult } from "./types";

export type RemoteProtocol = "streamable-http" | "sse";

/**
 * Options for RemoteMCPClient including DI seams for testing
 */
export interface RemoteMCPClientOptions {
  /** Override Client creation for testing */
  clientFactory?: (name: string) => ClientLike;
  /** Override StreamableHTTP transport creation for testing */
  streamableTransportFactory?: (url: URL, headers?: Record<string, string>) => TransportLike;
  /** Override SSE transport creation for testing */
  sseTransportFactory?: (url: URL, headers: Record<string, string>) => TransportLike;
  /** Handshake timeout used when the service config sets none */
  connectTimeout?: number;
}

/**
 * Remote MCP client with auto-detection
 * Tries Streamable HTTP first (newer), falls back to SSE (legacy) unless `protocol` pins one
 */
export class RemoteMCPClient implements MCPClient {
  private client: ClientLike;
  private transport: TransportLike | null;
  private toolsCache: Tool[] | null;
  private name: string;
  private config: RemoteServiceConfig;
  private transportType: RemoteProtocol | null;
  private options: RemoteMCPClientOptions;

  constructor(config: RemoteServiceConfig, options?: RemoteMCPClientOptions) {
    this.transport = null;
    this.toolsCache = null;
    this.name = config.name;
    this.config = config;
    this.transportType = null;
    this.options = options ?? {};

    this.client = this.createClient();
  }

  private createClient(): ClientLike {
    if (this.options.clientFactory) {
      return this.options.clientFactory(this.name);
    }
    return new Client(clientInfo(this.name), {});
  }

  private createStreamableTransport(url: URL): TransportLike {
    if (this.options.streamableTransportFactory) {
      return this.options.streamableTransportFactory(url, this.config.headers);
    }
    return new StreamableHTTPClientTransport(url, {
      requestInit: {
        headers: this.config.headers,
      },
    });
  }

  private createSSETransport(url: URL, headers: Record<string, string>): TransportLike {
    if (this.options.sseTransportFactory) {
      return this.options.sseTransportFactory(url, headers);
    }
    return new SSEClientTransport(url, {
      requestInit: {
        headers,
      },
    });
  }

  /**
   * Request options for any call on the stream.
   * `readTimeout` bounds a request that sets no timeout of its own, and caps the
   * total time any request may stay open while progress keeps extending it.
   */
  private requestOptions(timeout?: number, signal?: AbortSignal): RequestOptions {
    const readTimeout = this.config.readTimeout;
    if (readTimeout === undefined) {
      return { timeout, signal };
    }
    return {
      timeout: timeout ?? readTimeout,
      resetTimeoutOnProgress: true,
      maxTotalTimeout: readTimeout,
      signal,
    };
  }

  private async attempt(protocol: RemoteProtocol, url: URL): Promise<void> {
    const transport =
      protocol === "streamable-http"
        ? this.createStreamableTransport(url)
        : this.createSSETransport(url, { Accept: "text/event-stream", ...this.config.headers });

    try {
      await this.client.connect(transport, this.requestOptions(this.config.timeout ?? this.options.connectTimeout));
      this.transport = transport;
      this.transportType = protocol;
    } catch (error) {
      // Clean up only the attempted transport; avoid closing an existing connection.
      await transport.close().catch((closeError: unknown) => {
        log("debug", `[${this.name}] closing failed ${protocol} transport: ${errorMessage(closeError)}`);
      });
      throw error;
    }
  }

  async connect(): Promise<void> {
    if (!this.config.url) {
      throw new Error(`Remote MCP server ${this.name} has no URL`);
    }

    const url = new URL(this.config.url);
    this.transportType = null;

    if (this.config.protocol !== "auto") {
      await this.attempt(this.config.protocol, url);
      return;
    }

    try {
      await this.attempt("streamable-http", url);
      return;
    } catch (error) {
      log("debug", `[${this.name}] streamable HTTP failed, trying SSE: ${errorMessage(error)}`);
      // Reset client for new connection attempt
      this.client = this.createClient();
    }

    await this.attempt("sse", url);
  }

  async listTools(): Promise<Tool[]> {
    const result = await this.client.listTools(undefined, this.requestOptions());
    this.toolsCache = result.tools;
    return result.tools;
  }

  async callTool(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<ToolCallResult> {
    const raw = await this.client.callTool(
      { name, arguments: args },
      CallToolResultSchema,
      this.requestOptions(options?.timeoutMs, options?.signal)
    );
    return toToolCallResult(raw);
  }

  async close(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    this.toolsCache = null;
    this.transportType = null;
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

  /**
   * Get the transport type that was used for connection
   */
  getTransportType(): RemoteProtocol | null {
    return this.transportType;
  }
}
