import OpenAI from "openai";
import type { Decision, DecisionInput, DecisionModel } from "./decision";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type ChatTool = OpenAI.Chat.Completions.ChatCompletionTool;

export const DEFAULT_SYSTEM_PROMPT = [
  "You answer questions using the tools provided.",
  "Call at most one tool per turn and only with the listed tools.",
  "When the observations are enough, reply with the final answer as plain text.",
].join("\n");

/**
 * Subset of the OpenAI client used for chat completions (DI seam for tests)
 */
export interface ChatClientLike {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
            tool_calls?: Array<{ id: string; function: { name: string; arguments: string } }>;
          };
        }>;
      }>;
    };
  };
}

export interface OpenAIDecisionModelOptions {
  model?: string;
  temperature?: number;
  systemPrompt?: string;
  apiKey?: string;
  client?: ChatClientLike;
}

function parseToolArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    // not JSON: hand the bare string to the normalizer
    return raw;
  }
}

function callId(stepIndex: number): string {
  return `call_${stepIndex}`;
}

/**
 * Prior turns replayed as assistant tool calls followed by tool results
 */
export function toChatMessages(input: DecisionInput, systemPrompt: string): ChatMessage[] {
  const messages: ChatMessage[] = [
    { role: "system", content: systemPrompt },
    { role: "user", content: input.query },
  ];

  for (const turn of input.turns) {
    if (!turn.action) {
      continue;
    }
    messages.push({
      role: "assistant",
      content: null,
      tool_calls: [
        {
          id: callId(turn.stepIndex),
          type: "function",
          function: { name: turn.action.tool, arguments: JSON.stringify(turn.action.arguments) },
        },
      ],
    });
    messages.push({ role: "tool", tool_call_id: callId(turn.stepIndex), content: turn.observation });
  }

  return messages;
}

export function toChatTools(input: DecisionInput): ChatTool[] {
  return input.tools.map(tool => ({
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

/**
 * Decision model backed by OpenAI chat completions with native tool calling
 */
export class OpenAIDecisionModel implements DecisionModel {
  private client: ChatClientLike | null;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly systemPrompt: string;

  constructor(options?: OpenAIDecisionModelOptions) {
    this.model = options?.model ?? "gpt-4o-mini";
    this.temperature = options?.temperature ?? 0;
    this.systemPrompt = options?.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;
    this.apiKey = options?.apiKey;
    this.client = options?.client ?? null;
  }

  // created on first use so commands that never decide run without an API key
  private getClient(): ChatClientLike {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.apiKey ?? process.env.OPENAI_API_KEY });
    }
    return this.client;
  }

  async decide(input: DecisionInput, signal?: AbortSignal): Promise<Decision> {
    const tools = toChatTools(input);
    const response = await this.getClient().chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        messages: toChatMessages(input, this.systemPrompt),
        ...(tools.length > 0 ? { tools, tool_choice: "auto" as const, parallel_tool_calls: false } : {}),
      },
      { signal }
    );

    const message = response.choices[0]?.message;
    if (!message) {
      throw new Error("Empty response from OpenAI.");
    }

    const call = message.tool_calls?.[0];
    if (call) {
      return {
        type: "tool_call",
        tool: call.function.name,
        arguments: parseToolArguments(call.function.arguments),
      };
    }

    if (!message.content) {
      throw new Error("Empty response from OpenAI.");
    }

    return { type: "final", answer: message.content };
  }
}
