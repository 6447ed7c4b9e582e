import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { CatalogTool, IndexedEntry, ToolDescriptor, ToolId, ToolIdString } from "./types";

/**
 * Normalize a tool from an MCP server into a CatalogTool
 */
export function normalizeTool(
  serverName: string,
  tool: Tool
): CatalogTool {
  const id: ToolId = {
    server: serverName,
    name: tool.name,
  };

  const idString: ToolIdString = `${serverName}_${tool.name}`;

  const properties = extractProperties(tool.inputSchema);
  const required = extractRequired(tool.inputSchema);
  const args = extractArgs(properties, required);

  return {
    id,
    idString,
    description: tool.description || "",
    inputSchema: tool.inputSchema,
    required,
    properties,
    args,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractProperties(schema: Tool["inputSchema"]): Record<string, unknown> {
  return isRecord(schema.properties) ? { ...schema.properties } : {};
}

function extractRequired(schema: Tool["inputSchema"]): string[] {
  const required: unknown = schema.required;
  if (!Array.isArray(required)) {
    return [];
  }
  return required.filter((entry): entry is string => typeof entry === "string");
}

/**
 * Extract argument information from JSON schema properties
 */
function extractArgs(
  properties: Record<string, unknown>,
  required: string[]
): CatalogTool["args"] {
  return Object.entries(properties).map(([name, prop]) => {
    const description =
      isRecord(prop) && typeof prop.description === "string" ? prop.description : undefined;
    return { name, description, required: required.includes(name) };
  });
}

/**
 * Normalize multiple tools from a server
 */
export function normalizeTools(
  serverName: string,
  tools: Tool[]
): CatalogTool[] {
  return tools.map(tool => normalizeTool(serverName, tool));
}

/**
 * Condensed call signature, e.g. `get_advisor(student_name)`; optional args get a `?`
 */
export function toolSignature(tool: CatalogTool): string {
  const argList = tool.args.map(arg => `${arg.name}${arg.required ? "" : "?"}`).join(", ");
  return `${tool.id.name}(${argList})`;
}

/**
 * Text that gets embedded for a catalog descriptor.
 * Combines every descriptive field so keyword and example phrasing both match.
 */
export function buildSearchableText(descriptor: ToolDescriptor): string {
  return [
    `Tool: ${descriptor.name}`,
    `Description: ${descriptor.description}`,
    `Category: ${descriptor.category}`,
    `Keywords: ${descriptor.keywords.join(", ")}`,
    `Examples: ${descriptor.examples.join(" | ")}`,
  ].join(" ");
}

/**
 * Immutable registry of curated tool descriptors, keyed by name
 */
export class ToolCatalog {
  private readonly byName: ReadonlyMap<string, ToolDescriptor>;

  constructor(descriptors: Iterable<ToolDescriptor>) {
    const byName = new Map<string, ToolDescriptor>();
    for (const descriptor of descriptors) {
      if (byName.has(descriptor.name)) {
        throw new Error(`Duplicate tool name in catalog: ${descriptor.name}`);
      }
      byName.set(descriptor.name, Object.freeze(descriptor));
    }
    this.byName = byName;
  }

  get size(): number {
    return this.byName.size;
  }

  get(name: string): ToolDescriptor | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  list(): ToolDescriptor[] {
    return Array.from(this.byName.values());
  }

  names(): string[] {
    return Array.from(this.byName.keys());
  }

  /**
   * One entry per descriptor, keyed by the descriptor name
   */
  toIndexedEntries(): IndexedEntry[] {
    return this.list().map(descriptor => ({
      id: descriptor.name,
      text: buildSearchableText(descriptor),
    }));
  }
}
