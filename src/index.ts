// toolrag - retrieval-narrowed tool selection over MCP services
// Public API for embedding the orchestrator in another program

export {
  Orchestrator,
  createOrchestrator,
  NO_RELEVANT_TOOL_ANSWER,
  AgentLoop,
  OpenAIDecisionModel,
  normalizeArguments,
  classifyArguments,
  findMissingRequired,
} from "./agent";
export type {
  QueryOptions,
  QueryResult,
  OrchestratorStatus,
  CreateOrchestratorOptions,
  AgentTurn,
  Decision,
  DecisionInput,
  DecisionModel,
  ToolSchema,
  LoopState,
  LoopOutcome,
} from "./agent";

export { loadConfig, parseConfig, configBaseDir, describeConfigError, DEFAULT_CONFIG_PATH } from "./config";
export type { Config, ServiceConfig, StdioServiceConfig, RemoteServiceConfig, InProcessServiceConfig } from "./config";

export { ToolCatalog, loadToolCatalog } from "./catalog";
export type { CatalogTool, ToolDescriptor, ToolIdString } from "./catalog";

export { EmbeddingIndex, Retriever, FileVectorStore, HashedEmbeddingFunction, OpenAIEmbeddingFunction } from "./retrieval";
export type { EmbeddingFunction, RetrievalHit, VectorStore } from "./retrieval";

export { SessionRegistry, createMCPClient, FakeMCPClient, InProcessMCPClient } from "./mcp-client";
export type { MCPClient, ServiceSession, ToolCallResult } from "./mcp-client";

export * from "./errors";
export { globalProfiler, Profiler } from "./profiler";
export { runInteractive } from "./interactive";
