import type { Tool } from "@modelcontextprotocol/sdk/types.js";

// Canonical identifier for a tool advertised by a service
export type ToolId = {
  server: string;  // owning MCP service name
  name: string;    // tool name as advertised
};

// Qualified tool ID (e.g., "academic_get_advisor")
export type ToolIdString = `${string}_${string}`;

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, Record<string, unknown>>;
  required: string[];
};

// Curated catalog record, loaded once from the catalog file
export type ToolDescriptor = {
  readonly name: string;
  readonly description: string;
  readonly category: string;
  readonly keywords: readonly string[];
  readonly examples: readonly string[];
  readonly server: string;
  readonly inputSchema: ToolInputSchema;
};

// Tool as learned from a connected service at tools/list time
export type CatalogTool = {
  id: ToolId;
  idString: ToolIdString;
  description: string;
  inputSchema: Tool["inputSchema"];
  required: string[];
  properties: Record<string, unknown>;
  args: Array<{ name: string; description?: string; required: boolean }>;
};

// Text blob + vector stored per descriptor
export type IndexedEntry = {
  id: string;
  text: string;
};
