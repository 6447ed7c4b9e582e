import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { errorMessage } from "../errors";
import { log } from "../logging";

export const SERVER_VERSION = "0.1.0";

export function textResult(text: string): { content: Array<{ type: "text"; text: string }> } {
  return { content: [{ type: "text", text }] };
}

/**
 * Serve over stdio until the parent closes the pipe.
 * stdout carries the protocol, so diagnostics only go to the log file.
 */
export async function serveStdio(name: string, server: McpServer, onClose?: () => void): Promise<void> {
  const transport = new StdioServerTransport();
  transport.onclose = () => {
    log("info", `[${name}] stdio transport closed`);
    onClose?.();
  };
  await server.connect(transport);
  log("info", `[${name}] serving over stdio`);
}

/**
 * Entry-point wrapper: log startup failures and exit non-zero
 */
export function runServerMain(name: string, start: () => Promise<void>): void {
  start().catch((error: unknown) => {
    log("error", `[${name}] failed to start: ${errorMessage(error)}`);
    process.stderr.write(`${name}: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  });
}
