import { resolve } from "path";
import { loadToolCatalog, toolSignature, type CatalogTool, type ToolCatalog } from "../catalog";
import type { Config } from "../config";
import { RetrievalUnavailableError, errorMessage } from "../errors";
import { log } from "../logging";
import { SessionRegistry, type MCPClientFactory, type ToolCollision } from "../mcp-client";
import type { ServiceSession } from "../mcp-client";
import { globalProfiler, type PerformanceReport } from "../profiler";
import {
  EmbeddingIndex,
  FileVectorStore,
  Retriever,
  createEmbeddingFunction,
  type BuildResult,
  type EmbeddingFunction,
  type RetrievalHit,
} from "../retrieval";
import type { AgentTurn, DecisionModel } from "./decision";
import { AgentLoop, type LoopState } from "./loop";
import { OpenAIDecisionModel } from "./openai-model";

export const NO_RELEVANT_TOOL_ANSWER = "No relevant tool is available for this request.";

export type QueryOptions = {
  useRag?: boolean;
  signal?: AbortSignal;
};

export type QueryResult =
  | { success: true; answer: string; steps: AgentTurn[]; candidates: string[] }
  | { success: false; error: string; steps: AgentTurn[] };

export type OrchestratorStatus = {
  servers: Array<Pick<ServiceSession, "name" | "transport" | "status" | "error"> & { toolCount: number }>;
  toolCount: number;
  collisions: ToolCollision[];
  indexSize: number | null;
  profile: PerformanceReport;
};

export interface OrchestratorOptions {
  config: Config;
  catalog: ToolCatalog;
  index: EmbeddingIndex;
  registry: SessionRegistry;
  model: DecisionModel;
  onState?: (state: LoopState) => void;
}

/**
 * Query API: retrieval narrowing, then the decide/invoke loop over the narrowed tools
 */
export class Orchestrator {
  private readonly config: Config;
  private readonly catalog: ToolCatalog;
  private readonly index: EmbeddingIndex;
  private readonly registry: SessionRegistry;
  private readonly retriever: Retriever;
  private readonly loop: AgentLoop;
  private readonly onState?: (state: LoopState) => void;
  private indexing: Promise<BuildResult> | null = null;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.catalog = options.catalog;
    this.index = options.index;
    this.registry = options.registry;
    this.onState = options.onState;
    this.retriever = new Retriever({ index: this.index, catalog: this.catalog });
    this.loop = new AgentLoop({
      model: options.model,
      invoker: this.registry,
      maxRounds: this.config.settings.agent.maxRounds,
      onState: options.onState,
    });
  }

  /**
   * Connect every configured service (no-op once connected)
   */
  async connect(): Promise<void> {
    await this.registry.connectAll(this.config.servers);
  }

  /**
   * Embed catalog entries missing from the index
   */
  async indexCatalog(): Promise<BuildResult> {
    const entries = this.catalog.toIndexedEntries();
    const start = performance.now();
    const result = await this.index.build(entries);
    globalProfiler.recordIndexBuild(performance.now() - start, entries.length, result.added, result.skipped);
    log("info", `Indexed catalog: ${result.added} added, ${result.skipped} unchanged`);
    return result;
  }

  /**
   * Index once per process; a failed build is retried on the next query
   */
  private ensureIndexed(): Promise<BuildResult> {
    if (!this.indexing) {
      this.indexing = this.indexCatalog().catch((error: unknown) => {
        this.indexing = null;
        throw error;
      });
    }
    return this.indexing;
  }

  /**
   * Rank catalog tools for a query without running the loop
   */
  async retrieve(text: string): Promise<RetrievalHit[]> {
    await this.ensureIndexed();
    const { topK, scoreThreshold } = this.config.settings.rag;
    return this.retriever.retrieve(text, topK, scoreThreshold);
  }

  /**
   * Candidate tools for a query, or null when retrieval found nothing relevant
   * and the configuration asks for a "no relevant tool" answer
   */
  private async selectCandidates(text: string, useRag: boolean): Promise<CatalogTool[] | null> {
    const allTools = this.registry.getTools();
    if (!useRag) {
      return allTools;
    }

    this.onState?.("retrieving");
    let hits: RetrievalHit[];
    try {
      hits = await this.retrieve(text);
    } catch (error) {
      if (error instanceof RetrievalUnavailableError) {
        log("warn", `Retrieval unavailable, exposing all tools: ${error.message}`);
        return allTools;
      }
      throw error;
    }

    const candidates: CatalogTool[] = [];
    for (const hit of hits) {
      const tool = this.registry.getTool(hit.toolName);
      if (tool) {
        candidates.push(tool);
      }
    }
    log("debug", `Retrieved ${hits.map(h => `${h.toolName}(${h.similarityScore.toFixed(3)})`).join(", ")}`);

    if (candidates.length > 0) {
      log("debug", `Candidates: ${candidates.map(toolSignature).join(", ")}`);
      return candidates;
    }
    if (this.config.settings.rag.onEmpty === "no-tool-answer") {
      return null;
    }
    log("info", "No registered tool retrieved, exposing all tools");
    return allTools;
  }

  /**
   * Answer one query. Never throws: failures resolve to `success: false`.
   */
  async query(text: string, options?: QueryOptions): Promise<QueryResult> {
    const useRag = options?.useRag ?? true;
    const done = globalProfiler.startTimer("agent.query");
    this.onState?.("start");

    try {
      await this.connect();

      const candidates = await this.selectCandidates(text, useRag);
      if (candidates === null) {
        this.onState?.("finished");
        return {
          success: true,
          answer: NO_RELEVANT_TOOL_ANSWER,
          steps: [{ stepIndex: 1, action: null, observation: NO_RELEVANT_TOOL_ANSWER, status: "final" }],
          candidates: [],
        };
      }

      const outcome = await this.loop.run(text, candidates, options?.signal);
      if (outcome.state === "finished") {
        return {
          success: true,
          answer: outcome.answer,
          steps: outcome.steps,
          candidates: candidates.map(tool => tool.id.name),
        };
      }
      log("warn", `Query aborted: ${outcome.error}`);
      return { success: false, error: outcome.error, steps: outcome.steps };
    } catch (error) {
      log("error", `Query failed: ${errorMessage(error)}`);
      return { success: false, error: errorMessage(error), steps: [] };
    } finally {
      done();
    }
  }

  async status(): Promise<OrchestratorStatus> {
    let indexSize: number | null = null;
    try {
      indexSize = await this.index.size();
    } catch (error) {
      log("warn", `Index size unavailable: ${errorMessage(error)}`);
    }

    return {
      servers: this.registry.getServers().map(server => ({
        name: server.name,
        transport: server.transport,
        status: server.status,
        error: server.error,
        toolCount: server.tools.length,
      })),
      toolCount: this.registry.getTools().length,
      collisions: this.registry.getCollisions(),
      indexSize,
      profile: globalProfiler.export(),
    };
  }

  async close(): Promise<void> {
    await this.registry.disconnectAll();
  }
}

export interface CreateOrchestratorOptions {
  /** Directory relative paths in the settings resolve against (default: cwd) */
  baseDir?: string;
  model?: DecisionModel;
  embedder?: EmbeddingFunction;
  clientFactory?: MCPClientFactory;
  onState?: (state: LoopState) => void;
}

/**
 * Wire catalog, index, registry and decision model from a validated config
 */
export async function createOrchestrator(config: Config, options?: CreateOrchestratorOptions): Promise<Orchestrator> {
  const baseDir = options?.baseDir ?? process.cwd();
  const { settings } = config;

  const catalog = await loadToolCatalog(resolve(baseDir, settings.catalogPath));
  const embedder = options?.embedder ?? createEmbeddingFunction(settings.embedding);
  const store = new FileVectorStore({ dataDir: resolve(baseDir, settings.dataDir) });

  return new Orchestrator({
    config,
    catalog,
    index: new EmbeddingIndex({ embedder, store }),
    registry: new SessionRegistry({
      clientFactory: options?.clientFactory,
      connectionConfig: settings.connection,
    }),
    model:
      options?.model ??
      new OpenAIDecisionModel({
        model: settings.agent.model,
        temperature: settings.agent.temperature,
        systemPrompt: settings.agent.systemPrompt,
      }),
    onState: options?.onState,
  });
}

