import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";
import type { CallToolResultSchema, Tool } from "@modelcontextprotocol/sdk/types.js";
import { errorMessage } from "../errors";

/**
 * Transport-like interface for DI/testing
 */
export interface TransportLike {
  close(): Promise<void>;
}

/**
 * Client-like interface for DI/testing; the SDK Client satisfies it
 */
export interface ClientLike {
  connect(transport: TransportLike, options?: RequestOptions): Promise<void>;
  listTools(params?: undefined, options?: RequestOptions): Promise<{ tools: Tool[] }>;
  callTool(
    request: { name: string; arguments: Record<string, unknown> },
    resultSchema?: typeof CallToolResultSchema,
    options?: RequestOptions
  ): Promise<unknown>;
  close(): Promise<void>;
}

/**
 * Close the MCP session first, then its transport.
 * Both steps run even if the first fails; failures are reported together.
 */
export async function closeSessionThenTransport(
  name: string,
  session: { close(): Promise<void> } | null,
  transport: { close(): Promise<void> } | null
): Promise<void> {
  const failures: string[] = [];

  if (session) {
    try {
      await session.close();
    } catch (error) {
      failures.push(`session: ${errorMessage(error)}`);
    }
  }

  if (transport) {
    try {
      await transport.close();
    } catch (error) {
      failures.push(`transport: ${errorMessage(error)}`);
    }
  }

  if (failures.length > 0) {
    throw new Error(`Closing ${name} failed (${failures.join("; ")})`);
  }
}

export const CLIENT_VERSION = "0.1.0";

export function clientInfo(serviceName: string): { name: string; version: string } {
  return { name: `toolrag-client-${serviceName}`, version: CLIENT_VERSION };
}
