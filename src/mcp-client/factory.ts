import type { ConnectionConfig, ServiceConfig } from "../config";
import { createBundledServer } from "../servers";
import { InProcessMCPClient } from "./inprocess";
import { LocalMCPClient } from "./local";
import { RemoteMCPClient } from "./remote";
import type { MCPClient } from "./types";

/**
 * Default client factory: one real MCP client per service, by transport
 */
export function createMCPClient(service: ServiceConfig, connection: ConnectionConfig): MCPClient {
  switch (service.transport) {
    case "stdio":
      return new LocalMCPClient(service, { connectTimeout: connection.connectTimeout });
    case "remote":
      return new RemoteMCPClient(service, { connectTimeout: connection.connectTimeout });
    case "inprocess":
      return new InProcessMCPClient(service.name, () => createBundledServer(service), {
        connectTimeout: connection.connectTimeout,
      });
  }
}
