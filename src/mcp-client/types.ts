import { CallToolResultSchema, type Tool } from "@modelcontextprotocol/sdk/types.js";
import type { CatalogTool } from "../catalog";
import type { ServiceConfig } from "../config";

export type TransportKind = ServiceConfig["transport"];

/**
 * One live connection to a tool-providing service, owned by the SessionRegistry
 */
export type ServiceSession = {
  name: string;
  transport: TransportKind;
  config: ServiceConfig;
  tools: CatalogTool[];
  status: "connecting" | "connected" | "error";
  error?: string;
};

export type ToolContentPart = {
  type: string;
  text?: string;
};

export type ToolCallResult = {
  content: ToolContentPart[];
  isError: boolean;
};

export type CallOptions = {
  /** Per-call timeout in milliseconds */
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type MCPClient = {
  connect(): Promise<void>;
  listTools(): Promise<Tool[]>;
  callTool(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<ToolCallResult>;
  close(): Promise<void>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reduce a tools/call response to its content parts.
 * Legacy `toolResult` payloads become a single JSON text part.
 */
export function toToolCallResult(raw: unknown): ToolCallResult {
  if (isRecord(raw) && "toolResult" in raw && !("content" in raw)) {
    return {
      content: [{ type: "text", text: JSON.stringify(raw.toolResult) }],
      isError: false,
    };
  }

  const parsed = CallToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error("Malformed tools/call response");
  }

  return {
    content: parsed.data.content.map(part => ({
      type: part.type,
      text: part.type === "text" ? part.text : undefined,
    })),
    isError: parsed.data.isError === true,
  };
}

/**
 * Text parts of a result joined in order with newlines
 */
export function resultText(result: ToolCallResult): string {
  return result.content
    .flatMap(part => (part.type === "text" && typeof part.text === "string" ? [part.text] : []))
    .join("\n");
}
