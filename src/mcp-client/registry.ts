import { EventEmitter } from "events";
import { normalizeTools, type CatalogTool } from "../catalog";
import { ConnectionConfigSchema, type ConnectionConfig, type ServiceConfig } from "../config";
import { TransportError, UnknownToolError, errorMessage } from "../errors";
import { log } from "../logging";
import { globalProfiler } from "../profiler";
import { createMCPClient } from "./factory";
import { resultText, type CallOptions, type MCPClient, type ServiceSession } from "./types";

/**
 * Factory function type for creating MCP clients
 * Used for dependency injection in tests
 */
export type MCPClientFactory = (service: ServiceConfig, connection: ConnectionConfig) => MCPClient;

export type SessionRegistryOptions = {
  /** Custom client factory for testing */
  clientFactory?: MCPClientFactory;
  /** Connection configuration; unset fields take the schema defaults */
  connectionConfig?: Partial<ConnectionConfig>;
};

export type InitState = "idle" | "connecting" | "ready" | "degraded" | "failed";

/**
 * Two services advertised the same tool name; `winner` now owns the flat name
 */
export type ToolCollision = {
  toolName: string;
  winner: string;
  shadowed: string;
};

/**
 * Events emitted by SessionRegistry
 */
export interface SessionRegistryEvents {
  "server:connected": (serverName: string, tools: CatalogTool[]) => void;
  "server:error": (serverName: string, error: string) => void;
  /** All services attempted; not emitted when connectAll aborts */
  "connect:complete": (state: InitState) => void;
}

/**
 * Sleep for specified milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Race a promise against a timeout; the timer is cleared either way
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, errorMessage: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(errorMessage)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Owns one session per configured service and the flat tool table built from them.
 */
export class SessionRegistry extends EventEmitter {
  private sessions: Map<string, ServiceSession>;
  private clients: Map<string, MCPClient>;
  private table: Map<string, CatalogTool>;
  private collisions: ToolCollision[];
  private clientFactory: MCPClientFactory;
  private connectionConfig: ConnectionConfig;

  private initState: InitState = "idle";
  private initPromise: Promise<void> | null = null;

  constructor(options?: SessionRegistryOptions) {
    super();
    this.sessions = new Map();
    this.clients = new Map();
    this.table = new Map();
    this.collisions = [];
    this.clientFactory = options?.clientFactory ?? createMCPClient;
    this.connectionConfig = ConnectionConfigSchema.parse(options?.connectionConfig ?? {});
  }

  /**
   * Connect every service concurrently and build the flat tool table.
   * No-op while sessions exist or a connect is already running.
   */
  async connectAll(services: ServiceConfig[]): Promise<void> {
    if (this.initPromise) {
      return this.initPromise;
    }
    if (this.sessions.size > 0) {
      return;
    }

    this.initPromise = this.connectServices(services).finally(() => {
      this.initPromise = null;
    });
    return this.initPromise;
  }

  private async connectServices(services: ServiceConfig[]): Promise<void> {
    globalProfiler.connectStart();
    this.initState = "connecting";

    for (const service of services) {
      this.sessions.set(service.name, {
        name: service.name,
        transport: service.transport,
        config: service,
        tools: [],
        status: "connecting",
      });
    }

    const results = await Promise.allSettled(services.map(service => this.connectServiceWithRetry(service)));

    const failed: Array<{ name: string; error: string }> = [];
    results.forEach((result, index) => {
      const service = services[index];
      if (service && result.status === "rejected") {
        failed.push({ name: service.name, error: errorMessage(result.reason) });
      }
    });

    if (failed.length > 0 && this.connectionConfig.onConnectError === "abort") {
      const summary = failed.map(f => `${f.name} (${f.error})`).join(", ");
      log("error", `Aborting startup, services unreachable: ${summary}`);
      await this.closeClients();
      this.resetState();
      this.initState = "failed";
      globalProfiler.connectComplete("failed");
      throw new TransportError(`Could not connect to: ${summary}`, { details: { failed } });
    }

    this.rebuildTable(services);

    const state = failed.length === 0 ? "ready" : "degraded";
    this.initState = state;
    globalProfiler.connectComplete(state);
    log("info", `Connected ${this.clients.size}/${services.length} services, ${this.table.size} tools`, {
      state,
    });
    this.emit("connect:complete", state);
  }

  /**
   * Connect to a service with exponential backoff between attempts
   */
  private async connectServiceWithRetry(service: ServiceConfig): Promise<void> {
    const maxAttempts = this.connectionConfig.retryAttempts + 1;
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await this.connectService(service);
        return;
      } catch (error) {
        lastError = error;
        log("warn", `[${service.name}] connect attempt ${attempt}/${maxAttempts} failed: ${errorMessage(error)}`);

        if (attempt < maxAttempts) {
          const exponentialDelay = this.connectionConfig.retryDelay * Math.pow(2, attempt - 1);
          // Cap to 30s to avoid excessively long waits
          await sleep(Math.min(exponentialDelay, 30000));
        }
      }
    }

    const message = lastError === null ? "Connection failed after retries" : errorMessage(lastError);
    this.sessions.set(service.name, {
      name: service.name,
      transport: service.transport,
      config: service,
      tools: [],
      status: "error",
      error: message,
    });

    globalProfiler.recordServerConnect(service.name, -1, 0, "error", message);
    this.emit("server:error", service.name, message);
    throw lastError instanceof Error ? lastError : new Error(message);
  }

  /**
   * Connect, handshake and list tools for a single service
   */
  private async connectService(service: ServiceConfig): Promise<void> {
    const startTime = performance.now();
    const { connectTimeout, requestTimeout } = this.connectionConfig;

    const client = this.clientFactory(service, this.connectionConfig);

    try {
      await withTimeout(
        client.connect(),
        connectTimeout,
        `Connection to ${service.name} timed out after ${connectTimeout}ms`
      );

      const tools = await withTimeout(
        client.listTools(),
        requestTimeout,
        `Listing tools from ${service.name} timed out after ${requestTimeout}ms`
      );

      const catalogTools = normalizeTools(service.name, tools);
      const connectTime = performance.now() - startTime;

      this.sessions.set(service.name, {
        name: service.name,
        transport: service.transport,
        config: service,
        tools: catalogTools,
        status: "connected",
      });
      this.clients.set(service.name, client);

      globalProfiler.recordServerConnect(service.name, connectTime, catalogTools.length, "connected");
      log("info", `[${service.name}] connected over ${service.transport}, ${catalogTools.length} tools`);
      this.emit("server:connected", service.name, catalogTools);
    } catch (error) {
      await client.close().catch((closeError: unknown) => {
        log("debug", `[${service.name}] cleanup after failed connect: ${errorMessage(closeError)}`);
      });
      throw error;
    }
  }

  /**
   * Merge connected services' tools in config order; later services win collisions
   */
  private rebuildTable(services: ServiceConfig[]): void {
    this.table.clear();
    this.collisions = [];

    for (const service of services) {
      const session = this.sessions.get(service.name);
      if (!session || session.status !== "connected") {
        continue;
      }
      for (const tool of session.tools) {
        const existing = this.table.get(tool.id.name);
        if (existing) {
          const collision: ToolCollision = {
            toolName: tool.id.name,
            winner: service.name,
            shadowed: existing.id.server,
          };
          this.collisions.push(collision);
          log("warn", `Tool name collision: ${tool.id.name} from ${existing.id.server} is shadowed by ${service.name}`);
        }
        this.table.set(tool.id.name, tool);
      }
    }
  }

  /**
   * Call a tool by its flat name.
   * Text parts of the response are joined with newlines.
   */
  async invoke(toolName: string, args: Record<string, unknown>, options?: CallOptions): Promise<string> {
    const tool = this.table.get(toolName);
    if (!tool) {
      throw new UnknownToolError(toolName, this.getToolNames());
    }
    return this.callOn(tool.id.server, toolName, args, options);
  }

  /**
   * Call a tool on a named service, bypassing the flat table.
   * Reaches tools shadowed by a name collision.
   */
  async invokeQualified(
    serverName: string,
    toolName: string,
    args: Record<string, unknown>,
    options?: CallOptions
  ): Promise<string> {
    const qualified = `${serverName}_${toolName}`;
    const session = this.sessions.get(serverName);
    if (!session || !session.tools.some(tool => tool.idString === qualified)) {
      throw new UnknownToolError(qualified);
    }
    return this.callOn(serverName, toolName, args, options);
  }

  private async callOn(
    serverName: string,
    toolName: string,
    args: Record<string, unknown>,
    options?: CallOptions
  ): Promise<string> {
    const client = this.clients.get(serverName);
    if (!client) {
      throw new TransportError(`No open session for server: ${serverName}`, { server: serverName });
    }

    const timeoutMs = options?.timeoutMs ?? this.connectionConfig.requestTimeout;
    const done = globalProfiler.startTimer("tool.invoke");

    try {
      const result = await withTimeout(
        client.callTool(toolName, args, { timeoutMs, signal: options?.signal }),
        timeoutMs,
        `Tool ${toolName} timed out after ${timeoutMs}ms`
      );
      const text = resultText(result);
      if (result.isError) {
        throw new TransportError(text || `Tool ${toolName} returned an error`, {
          server: serverName,
          details: { tool: toolName, remote: true },
        });
      }
      return text;
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(`Tool ${toolName} on ${serverName} failed: ${errorMessage(error)}`, {
        server: serverName,
        cause: error,
      });
    } finally {
      done();
    }
  }

  private async closeClients(): Promise<void> {
    const entries = Array.from(this.clients.entries());
    const results = await Promise.allSettled(entries.map(([, client]) => client.close()));
    results.forEach((result, index) => {
      const name = entries[index]?.[0] ?? "unknown";
      if (result.status === "rejected") {
        log("warn", `[${name}] close failed: ${errorMessage(result.reason)}`);
      } else {
        log("debug", `[${name}] closed`);
      }
    });
  }

  private resetState(): void {
    this.sessions.clear();
    this.clients.clear();
    this.table.clear();
    this.collisions = [];
  }

  /**
   * Close every session, tolerating individual failures, then forget all state
   */
  async disconnectAll(): Promise<void> {
    if (this.initPromise) {
      await this.initPromise.catch((error: unknown) => {
        log("debug", `connect in progress ended with: ${errorMessage(error)}`);
      });
    }
    await this.closeClients();
    this.resetState();
    this.initState = "idle";
  }

  getTool(name: string): CatalogTool | undefined {
    return this.table.get(name);
  }

  getTools(): CatalogTool[] {
    return Array.from(this.table.values());
  }

  getToolNames(): string[] {
    return Array.from(this.table.keys());
  }

  getServer(name: string): ServiceSession | undefined {
    return this.sessions.get(name);
  }

  getServers(): ServiceSession[] {
    return Array.from(this.sessions.values());
  }

  getCollisions(): ToolCollision[] {
    return [...this.collisions];
  }

  getInitState(): InitState {
    return this.initState;
  }

  /**
   * At least one service is connected
   */
  isReady(): boolean {
    return this.clients.size > 0;
  }
}
