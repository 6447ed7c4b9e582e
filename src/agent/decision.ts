import type { CatalogTool } from "../catalog";
import type { Scalar } from "./normalizer";

/**
 * Tool as presented to the decision model
 */
export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface AgentAction {
  tool: string;
  /** Normalized arguments; for a tool outside the candidates, what the model sent */
  arguments: Record<string, unknown> | Scalar;
}

export type TurnStatus = "ok" | "unknown_tool" | "transport_error" | "final";

/**
 * One step of a query. `action` is null for the final answer.
 */
export interface AgentTurn {
  stepIndex: number;
  action: AgentAction | null;
  observation: string;
  status: TurnStatus;
}

export interface DecisionInput {
  query: string;
  tools: ToolSchema[];
  turns: readonly AgentTurn[];
}

/**
 * A final answer, or exactly one tool call with its raw (un-normalized) arguments
 */
export type Decision =
  | { type: "final"; answer: string }
  | { type: "tool_call"; tool: string; arguments: unknown };

/**
 * The language model behind the loop, treated as opaque
 */
export interface DecisionModel {
  decide(input: DecisionInput, signal?: AbortSignal): Promise<Decision>;
}

export function toToolSchema(tool: CatalogTool): ToolSchema {
  return {
    name: tool.id.name,
    description: tool.description,
    inputSchema: { ...tool.inputSchema },
  };
}
