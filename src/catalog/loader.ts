import { readFile } from "fs/promises";
import { z } from "zod";
import { ConfigError, errorMessage } from "../errors";
import { ToolCatalog } from "./catalog";
import type { ToolDescriptor } from "./types";

const PropertySchema = z.record(z.string(), z.unknown());

export const ToolInputSchemaSchema = z.object({
  type: z.literal("object").default("object"),
  properties: z.record(z.string(), PropertySchema).default({}),
  required: z.array(z.string()).default([]),
});

/**
 * One record of the tool catalog file.
 * Every field is mandatory except `examples`.
 */
export const ToolDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().min(1),
  category: z.string().min(1),
  keywords: z.array(z.string()),
  examples: z.array(z.string()).default([]),
  server: z.string().min(1),
  inputSchema: ToolInputSchemaSchema,
});

export const ToolCatalogFileSchema = z.object({
  tools: z.array(ToolDescriptorSchema),
});

export type ToolCatalogFile = z.infer<typeof ToolCatalogFileSchema>;

function toDescriptor(record: z.infer<typeof ToolDescriptorSchema>): ToolDescriptor {
  return {
    ...record,
    // keywords are a set: drop duplicates, keep first-seen order
    keywords: Array.from(new Set(record.keywords)),
  };
}

/**
 * Build a catalog from already-parsed JSON
 */
export function parseToolCatalog(data: unknown): ToolCatalog {
  const file = ToolCatalogFileSchema.parse(data);
  return new ToolCatalog(file.tools.map(toDescriptor));
}

function describeCatalogError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join(", ");
  }
  return errorMessage(error);
}

/**
 * Load the tool catalog file, loaded once at startup
 * @throws ConfigError when the file is missing, not JSON, or fails validation
 */
export async function loadToolCatalog(filePath: string): Promise<ToolCatalog> {
  try {
    const raw = await readFile(filePath, "utf-8");
    const data: unknown = JSON.parse(raw);
    return parseToolCatalog(data);
  } catch (error) {
    throw new ConfigError(`Cannot load tool catalog ${filePath}: ${describeCatalogError(error)}`, error);
  }
}
