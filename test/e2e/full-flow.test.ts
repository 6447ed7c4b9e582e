import { test, expect, describe, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import type { Decision, DecisionInput, DecisionModel } from "../../src/agent/decision";
import type { LoopState } from "../../src/agent/loop";
import { NO_RELEVANT_TOOL_ANSWER, createOrchestrator, type Orchestrator } from "../../src/agent/orchestrator";
import { ConfigSchema, type RagConfig } from "../../src/config";
import { globalProfiler } from "../../src/profiler";
import type { EmbeddingFunction } from "../../src/retrieval/types";

/**
 * Full query path: curated catalog, hashed embeddings on disk, both bundled
 * servers in process, and a scripted decision model in place of the LLM.
 */

const CATALOG_PATH = fileURLToPath(new URL("../../data/tool-catalog.json", import.meta.url));

const ALL_TOOLS = ["get_time", "calculate", "get_advisor", "get_student_courses", "list_students"];

type Step = (input: DecisionInput) => Decision;

class ScriptedModel implements DecisionModel {
  inputs: DecisionInput[] = [];

  constructor(private readonly steps: Step[]) {}

  async decide(input: DecisionInput): Promise<Decision> {
    this.inputs.push(input);
    const step = this.steps[this.inputs.length - 1];
    if (!step) {
      throw new Error("script exhausted");
    }
    return step(input);
  }

  /** Tool names offered on the first decision */
  offered(): string[] {
    return this.inputs[0]?.tools.map(t => t.name) ?? [];
  }
}

class OfflineEmbedder implements EmbeddingFunction {
  readonly model = "offline";

  async embed(): Promise<number[][]> {
    throw new Error("embedding service unreachable");
  }
}

describe("orchestrated queries", () => {
  let dataDir: string;
  const open: Orchestrator[] = [];

  beforeEach(() => {
    dataDir = mkdtempSync(join(tmpdir(), "toolrag-e2e-"));
    globalProfiler.reset();
  });

  afterEach(async () => {
    await Promise.all(open.splice(0).map(o => o.close()));
    rmSync(dataDir, { recursive: true, force: true });
  });

  async function setup(
    model: DecisionModel,
    options?: { rag?: Partial<RagConfig>; maxRounds?: number; embedder?: EmbeddingFunction; onState?: (s: LoopState) => void }
  ): Promise<Orchestrator> {
    const config = ConfigSchema.parse({
      servers: [
        { name: "utility", transport: "inprocess", server: "utility" },
        { name: "academic", transport: "inprocess", server: "academic" },
      ],
      settings: {
        catalogPath: CATALOG_PATH,
        dataDir,
        rag: { topK: 2, ...options?.rag },
        agent: { maxRounds: options?.maxRounds ?? 5 },
        connection: { retryAttempts: 0 },
      },
    });
    const orchestrator = await createOrchestrator(config, {
      model,
      embedder: options?.embedder,
      onState: options?.onState,
    });
    open.push(orchestrator);
    return orchestrator;
  }

  test("a time question only sees the top-ranked tools", async () => {
    const model = new ScriptedModel([
      () => ({ type: "tool_call", tool: "get_time", arguments: {} }),
      input => ({ type: "final", answer: `It is ${input.turns[0]?.observation ?? "unknown"}` }),
    ]);
    const orchestrator = await setup(model);

    const result = await orchestrator.query("What time is it?");

    expect(model.offered()).toEqual(["get_time", "calculate"]);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.candidates).toEqual(["get_time", "calculate"]);
      expect(result.steps[0]?.status).toBe("ok");
      expect(result.steps[0]?.observation).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
      expect(result.answer).toBe(`It is ${result.steps[0]?.observation ?? ""}`);
    }
  });

  test("an advisor question: tool outside the candidates, then a bare-string argument", async () => {
    const model = new ScriptedModel([
      () => ({ type: "tool_call", tool: "list_students", arguments: {} }),
      () => ({ type: "tool_call", tool: "get_advisor", arguments: "Agus Setiawan" }),
      input => ({ type: "final", answer: input.turns[1]?.observation ?? "" }),
    ]);
    const orchestrator = await setup(model);

    const result = await orchestrator.query("Who is the advisor of Agus Setiawan?");

    expect(model.offered()).toEqual(["get_advisor", "get_time"]);
    expect(result).toEqual({
      success: true,
      answer: "Advisor of Agus Setiawan: Dr. Budi Santoso",
      candidates: ["get_advisor", "get_time"],
      steps: [
        {
          stepIndex: 1,
          action: { tool: "list_students", arguments: {} },
          observation: "Unknown tool: list_students. Available tools: get_advisor, get_time",
          status: "unknown_tool",
        },
        {
          stepIndex: 2,
          action: { tool: "get_advisor", arguments: { student_name: "Agus Setiawan" } },
          observation: "Advisor of Agus Setiawan: Dr. Budi Santoso",
          status: "ok",
        },
        { stepIndex: 3, action: null, observation: "Advisor of Agus Setiawan: Dr. Budi Santoso", status: "final" },
      ],
    });
  });

  test("JSON-string arguments reach the calculator", async () => {
    const model = new ScriptedModel([
      () => ({ type: "tool_call", tool: "calculate", arguments: '{"expression": "10 * 5"}' }),
      input => ({ type: "final", answer: input.turns[0]?.observation ?? "" }),
    ]);
    const orchestrator = await setup(model, { rag: { topK: 1 } });

    const result = await orchestrator.query("Calculate 10 times 5");

    expect(model.offered()).toEqual(["calculate"]);
    expect(result.success && result.answer).toBe("50");
  });

  test("nothing above the threshold yields the no-relevant-tool answer", async () => {
    const model = new ScriptedModel([]);
    const orchestrator = await setup(model, { rag: { scoreThreshold: 0.45, onEmpty: "no-tool-answer" } });

    const result = await orchestrator.query("What is the weather in Paris?");

    expect(result).toEqual({
      success: true,
      answer: NO_RELEVANT_TOOL_ANSWER,
      candidates: [],
      steps: [{ stepIndex: 1, action: null, observation: NO_RELEVANT_TOOL_ANSWER, status: "final" }],
    });
    expect(model.inputs).toEqual([]);
  });

  test("nothing above the threshold exposes every tool by default", async () => {
    const model = new ScriptedModel([() => ({ type: "final", answer: "I cannot check the weather." })]);
    const orchestrator = await setup(model, { rag: { scoreThreshold: 0.45 } });

    await orchestrator.query("What is the weather in Paris?");

    expect(model.offered()).toEqual(ALL_TOOLS);
  });

  test("retrieval can be turned off per query", async () => {
    const model = new ScriptedModel([() => ({ type: "final", answer: "ok" })]);
    const orchestrator = await setup(model);

    const result = await orchestrator.query("What time is it?", { useRag: false });

    expect(model.offered()).toEqual(ALL_TOOLS);
    expect(result.success && result.candidates).toEqual(ALL_TOOLS);
  });

  test("an unreachable embedding backend falls back to every tool", async () => {
    const model = new ScriptedModel([() => ({ type: "final", answer: "ok" })]);
    const orchestrator = await setup(model, { embedder: new OfflineEmbedder() });

    const result = await orchestrator.query("What time is it?");

    expect(result.success).toBe(true);
    expect(model.offered()).toEqual(ALL_TOOLS);
  });

  test("the round limit ends the query unsuccessfully", async () => {
    const call: Step = () => ({ type: "tool_call", tool: "get_time", arguments: {} });
    const orchestrator = await setup(new ScriptedModel([call, call, call]), { maxRounds: 2 });

    const result = await orchestrator.query("What time is it?");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe("Stopped after 2 tool rounds without a final answer");
      expect(result.steps.map(s => s.status)).toEqual(["ok", "ok"]);
    }
  });

  test("a model failure resolves to an error result", async () => {
    const orchestrator = await setup(new ScriptedModel([]));

    expect(await orchestrator.query("What time is it?")).toEqual({
      success: false,
      error: "script exhausted",
      steps: [],
    });
  });

  test("a model failure mid-query keeps the completed steps", async () => {
    const orchestrator = await setup(new ScriptedModel([() => ({ type: "tool_call", tool: "get_time", arguments: {} })]));

    const result = await orchestrator.query("What time is it?");

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe("script exhausted");
      expect(result.steps.map(s => [s.action?.tool, s.status])).toEqual([["get_time", "ok"]]);
    }
  });

  test("state transitions of a one-tool query", async () => {
    const states: LoopState[] = [];
    const model = new ScriptedModel([
      () => ({ type: "tool_call", tool: "get_time", arguments: {} }),
      () => ({ type: "final", answer: "done" }),
    ]);
    const orchestrator = await setup(model, { onState: s => states.push(s) });

    await orchestrator.query("What time is it?");

    expect(states).toEqual(["start", "retrieving", "deciding", "invoking", "deciding", "finished"]);
  });

  test("the index persists in the data directory", async () => {
    const first = await setup(new ScriptedModel([]));
    expect(await first.indexCatalog()).toEqual({ added: 5, skipped: 0 });
    await first.close();

    const second = await setup(new ScriptedModel([]));
    expect(await second.indexCatalog()).toEqual({ added: 0, skipped: 5 });
  });

  test("status reports sessions, tools and the index", async () => {
    const orchestrator = await setup(new ScriptedModel([]));
    await orchestrator.connect();
    await orchestrator.indexCatalog();

    const status = await orchestrator.status();

    expect(status.servers).toEqual([
      { name: "utility", transport: "inprocess", status: "connected", error: undefined, toolCount: 2 },
      { name: "academic", transport: "inprocess", status: "connected", error: undefined, toolCount: 3 },
    ]);
    expect(status.toolCount).toBe(5);
    expect(status.collisions).toEqual([]);
    expect(status.indexSize).toBe(5);
    expect(status.profile.connection.state).toBe("ready");
  });
});
