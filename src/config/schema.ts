import { z } from "zod";

/**
 * Spawned-process service
 * Launches a command and speaks MCP over its stdio
 */
export const StdioServiceConfigSchema = z.object({
  name: z.string().min(1),
  transport: z.literal("stdio"),
  command: z.string().min(1).describe("Executable that starts the MCP server"),
  args: z.array(z.string()).default([]).describe("Arguments passed to the command"),
  env: z.record(z.string(), z.string()).optional().describe("Extra environment variables for the process"),
  cwd: z.string().optional().describe("Working directory for the process"),
});

/**
 * Network-streamed service
 * Streamable HTTP with SSE fallback unless `protocol` pins one
 */
export const RemoteServiceConfigSchema = z.object({
  name: z.string().min(1),
  transport: z.literal("remote"),
  url: z.string().url().describe("MCP endpoint URL"),
  headers: z.record(z.string(), z.string()).optional().describe("HTTP headers, e.g. for authentication"),
  protocol: z.enum(["auto", "streamable-http", "sse"]).default("auto"),
  /** Handshake timeout in milliseconds */
  timeout: z.number().int().min(100).max(60000).optional(),
  /** Upper bound in milliseconds for any single request on the stream */
  readTimeout: z.number().int().min(100).max(3600000).optional(),
});

/**
 * Bundled server linked in the same process
 * No serialization to another process; the call goes through the in-memory transport pair
 */
export const InProcessServiceConfigSchema = z.object({
  name: z.string().min(1),
  transport: z.literal("inprocess"),
  server: z.enum(["utility", "academic"]),
  /** SQLite file for the academic server (default: seeded in-memory database) */
  database: z.string().optional(),
});

export const ServiceConfigSchema = z.discriminatedUnion("transport", [
  StdioServiceConfigSchema,
  RemoteServiceConfigSchema,
  InProcessServiceConfigSchema,
]);

/**
 * Connection settings for MCP services
 */
export const ConnectionConfigSchema = z.object({
  /** Connection timeout in milliseconds (default: 5000) */
  connectTimeout: z.number().min(100).max(60000).default(5000),
  /** Per-call timeout in milliseconds (default: 5000) */
  requestTimeout: z.number().min(100).max(300000).default(5000),
  /** Number of retry attempts on connection failure (default: 2) */
  retryAttempts: z.number().min(0).max(10).default(2),
  /** Base delay between retries in milliseconds (default: 1000) */
  retryDelay: z.number().min(0).max(30000).default(1000),
  /**
   * What connectAll does when a service cannot be reached:
   * - "abort": close everything and fail startup
   * - "skip": continue with the reachable services
   */
  onConnectError: z.enum(["abort", "skip"]).default("abort"),
});

export const EmbeddingConfigSchema = z.object({
  provider: z.enum(["hashed", "openai"]).default("hashed"),
  model: z.string().optional(),
  dimensions: z.number().int().min(32).max(4096).optional(),
});

export const RagConfigSchema = z.object({
  topK: z.number().int().min(1).max(50).default(3),
  scoreThreshold: z.number().min(-1).max(1).default(0),
  /**
   * Behaviour when retrieval yields no registered candidate:
   * - "all-tools": expose the full tool table
   * - "no-tool-answer": answer that no relevant tool exists
   */
  onEmpty: z.enum(["all-tools", "no-tool-answer"]).default("all-tools"),
});

export const AgentConfigSchema = z.object({
  maxRounds: z.number().int().min(1).max(50).default(5),
  model: z.string().default("gpt-4o-mini"),
  temperature: z.number().min(0).max(2).default(0),
  systemPrompt: z.string().optional(),
});

export const SettingsConfigSchema = z.object({
  catalogPath: z.string().default("data/tool-catalog.json"),
  dataDir: z.string().default(".toolrag"),
  embedding: EmbeddingConfigSchema.default({}),
  rag: RagConfigSchema.default({}),
  agent: AgentConfigSchema.default({}),
  connection: ConnectionConfigSchema.default({}),
});

/**
 * toolrag configuration schema
 * Located at ./toolrag.jsonc unless TOOLRAG_CONFIG points elsewhere
 */
export const ConfigSchema = z
  .object({
    /** MCP services to connect to, in registration order */
    servers: z.array(ServiceConfigSchema),
    settings: SettingsConfigSchema.default({}),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.servers.forEach((server, index) => {
      if (seen.has(server.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate server name: ${server.name}`,
          path: ["servers", index, "name"],
        });
      }
      seen.add(server.name);
    });
  });

export type Config = z.infer<typeof ConfigSchema>;
export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;
export type StdioServiceConfig = z.infer<typeof StdioServiceConfigSchema>;
export type RemoteServiceConfig = z.infer<typeof RemoteServiceConfigSchema>;
export type InProcessServiceConfig = z.infer<typeof InProcessServiceConfigSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;
export type RagConfig = z.infer<typeof RagConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type SettingsConfig = z.infer<typeof SettingsConfigSchema>;
