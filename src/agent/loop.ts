import type { CatalogTool } from "../catalog";
import { RoundLimitExceededError, SchemaMismatchError, TransportError, UnknownToolError, errorMessage } from "../errors";
import { log } from "../logging";
import type { CallOptions } from "../mcp-client";
import { globalProfiler } from "../profiler";
import { toToolSchema, type AgentTurn, type Decision, type DecisionModel } from "./decision";
import { classifyArguments, findMissingRequired, normalizeArguments, type Scalar } from "./normalizer";

export type LoopState = "start" | "retrieving" | "deciding" | "invoking" | "finished" | "aborted";

export type LoopOutcome =
  | { state: "finished"; answer: string; steps: AgentTurn[] }
  | { state: "aborted"; error: string; steps: AgentTurn[] };

/**
 * Arguments as the model sent them, parsed but not bound to any schema
 */
function requestedArguments(raw: unknown): Record<string, unknown> | Scalar {
  const args = classifyArguments(raw);
  return args.kind === "empty" ? {} : args.value;
}

/**
 * The part of the session registry the loop needs
 */
export interface ToolInvoker {
  invoke(toolName: string, args: Record<string, unknown>, options?: CallOptions): Promise<string>;
}

export interface AgentLoopOptions {
  model: DecisionModel;
  invoker: ToolInvoker;
  maxRounds: number;
  /** Observer for state transitions */
  onState?: (state: LoopState) => void;
}

/**
 * Decide/invoke loop for one query over a fixed candidate set.
 * Holds no per-query state, so one instance serves concurrent queries.
 */
export class AgentLoop {
  private readonly model: DecisionModel;
  private readonly invoker: ToolInvoker;
  private readonly maxRounds: number;
  private readonly onState?: (state: LoopState) => void;

  constructor(options: AgentLoopOptions) {
    this.model = options.model;
    this.invoker = options.invoker;
    this.maxRounds = options.maxRounds;
    this.onState = options.onState;
  }

  /**
   * Run until a final answer or `maxRounds` tool rounds.
   * Only tools in `candidates` can ever be invoked.
   */
  async run(query: string, candidates: CatalogTool[], signal?: AbortSignal): Promise<LoopOutcome> {
    const steps: AgentTurn[] = [];
    const allowed = new Map(candidates.map(tool => [tool.id.name, tool]));
    const tools = candidates.map(toToolSchema);
    let rounds = 0;

    while (rounds < this.maxRounds) {
      if (signal?.aborted) {
        this.onState?.("aborted");
        return { state: "aborted", error: "Query cancelled", steps };
      }

      this.onState?.("deciding");
      const done = globalProfiler.startTimer("agent.decide");
      let decision: Decision;
      try {
        decision = await this.model.decide({ query, tools, turns: [...steps] }, signal).finally(done);
      } catch (error) {
        log("error", `Decision failed after ${steps.length} steps: ${errorMessage(error)}`);
        this.onState?.("aborted");
        return { state: "aborted", error: errorMessage(error), steps };
      }
      const stepIndex = steps.length + 1;

      if (decision.type === "final") {
        steps.push({ stepIndex, action: null, observation: decision.answer, status: "final" });
        this.onState?.("finished");
        return { state: "finished", answer: decision.answer, steps };
      }

      rounds++;
      const tool = allowed.get(decision.tool);
      if (!tool) {
        steps.push({
          stepIndex,
          action: { tool: decision.tool, arguments: requestedArguments(decision.arguments) },
          observation: `Unknown tool: ${decision.tool}. Available tools: ${[...allowed.keys()].join(", ") || "none"}`,
          status: "unknown_tool",
        });
        continue;
      }

      const args = normalizeArguments(decision.arguments, tool.required, tool.properties);
      const missing = findMissingRequired(args, tool.required);
      if (missing.length > 0) {
        log("warn", new SchemaMismatchError(tool.id.name, missing).message, { raw: decision.arguments });
      }

      this.onState?.("invoking");
      // not cancelled mid-call: an in-flight invocation finishes or times out
      steps.push(await this.invoke(stepIndex, tool.id.name, args));
    }

    this.onState?.("aborted");
    return { state: "aborted", error: new RoundLimitExceededError(this.maxRounds).message, steps };
  }

  private async invoke(
    stepIndex: number,
    toolName: string,
    args: Record<string, unknown>
  ): Promise<AgentTurn> {
    const action = { tool: toolName, arguments: args };
    try {
      const observation = await this.invoker.invoke(toolName, args);
      return { stepIndex, action, observation, status: "ok" };
    } catch (error) {
      if (error instanceof UnknownToolError) {
        return { stepIndex, action, observation: error.message, status: "unknown_tool" };
      }
      if (error instanceof TransportError) {
        log("warn", `Tool ${toolName} failed: ${error.message}`);
        return { stepIndex, action, observation: `Error: ${error.message}`, status: "transport_error" };
      }
      throw error;
    }
  }
}
