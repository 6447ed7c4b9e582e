export * from "./types";
export * from "./fake";
export * from "./local";
export * from "./remote";
export * from "./inprocess";
export { createMCPClient } from "./factory";
export { closeSessionThenTransport, type ClientLike, type TransportLike } from "./session";
export {
  SessionRegistry,
  withTimeout,
  type MCPClientFactory,
  type SessionRegistryOptions,
  type InitState,
  type ToolCollision,
  type SessionRegistryEvents,
} from "./registry";
