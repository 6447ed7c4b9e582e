import { test, expect, describe } from "vitest";
import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { normalizeTool } from "../../src/catalog/catalog";
import type { Decision, DecisionInput, DecisionModel } from "../../src/agent/decision";
import { AgentLoop, type LoopState, type ToolInvoker } from "../../src/agent/loop";
import { TransportError, UnknownToolError } from "../../src/errors";

const getTime: Tool = {
  name: "get_time",
  description: "Current date and time",
  inputSchema: { type: "object" },
};

const getAdvisor: Tool = {
  name: "get_advisor",
  description: "Advisor of a student",
  inputSchema: {
    type: "object",
    properties: { student_name: { type: "string" } },
    required: ["student_name"],
  },
};

const CANDIDATES = [normalizeTool("utility", getTime), normalizeTool("academic", getAdvisor)];

/**
 * Replays a fixed list of decisions and records what it was shown
 */
class ScriptedModel implements DecisionModel {
  inputs: DecisionInput[] = [];

  constructor(private readonly script: Decision[]) {}

  async decide(input: DecisionInput): Promise<Decision> {
    this.inputs.push(input);
    const next = this.script[this.inputs.length - 1];
    if (!next) {
      throw new Error("script exhausted");
    }
    return next;
  }
}

class RecordingInvoker implements ToolInvoker {
  calls: Array<{ toolName: string; args: Record<string, unknown> }> = [];

  constructor(private readonly respond: (toolName: string, args: Record<string, unknown>) => string = () => "done") {}

  async invoke(toolName: string, args: Record<string, unknown>): Promise<string> {
    this.calls.push({ toolName, args });
    return this.respond(toolName, args);
  }
}

describe("AgentLoop", () => {
  test("tool call then final answer", async () => {
    const model = new ScriptedModel([
      { type: "tool_call", tool: "get_advisor", arguments: "Agus Setiawan" },
      { type: "final", answer: "Dr. Budi Santoso" },
    ]);
    const invoker = new RecordingInvoker(() => "Advisor of Agus Setiawan: Dr. Budi Santoso");
    const loop = new AgentLoop({ model, invoker, maxRounds: 5 });

    const outcome = await loop.run("Who advises Agus Setiawan?", CANDIDATES);

    expect(outcome).toEqual({
      state: "finished",
      answer: "Dr. Budi Santoso",
      steps: [
        {
          stepIndex: 1,
          action: { tool: "get_advisor", arguments: { student_name: "Agus Setiawan" } },
          observation: "Advisor of Agus Setiawan: Dr. Budi Santoso",
          status: "ok",
        },
        { stepIndex: 2, action: null, observation: "Dr. Budi Santoso", status: "final" },
      ],
    });
    expect(invoker.calls).toEqual([{ toolName: "get_advisor", args: { student_name: "Agus Setiawan" } }]);
  });

  test("the model sees only the candidate tools and prior turns", async () => {
    const model = new ScriptedModel([
      { type: "tool_call", tool: "get_time", arguments: {} },
      { type: "final", answer: "noon" },
    ]);
    const loop = new AgentLoop({ model, invoker: new RecordingInvoker(() => "12:00"), maxRounds: 5 });

    await loop.run("What time is it?", CANDIDATES);

    expect(model.inputs[0]?.tools.map(t => t.name)).toEqual(["get_time", "get_advisor"]);
    expect(model.inputs[0]?.turns).toEqual([]);
    expect(model.inputs[1]?.turns.map(t => t.observation)).toEqual(["12:00"]);
  });

  test("an immediate final answer invokes nothing", async () => {
    const invoker = new RecordingInvoker();
    const loop = new AgentLoop({
      model: new ScriptedModel([{ type: "final", answer: "Hello!" }]),
      invoker,
      maxRounds: 1,
    });

    const outcome = await loop.run("hi", CANDIDATES);

    expect(outcome.state).toBe("finished");
    expect(outcome.steps).toHaveLength(1);
    expect(invoker.calls).toEqual([]);
  });

  test("aborts after exactly maxRounds invocations", async () => {
    const call: Decision = { type: "tool_call", tool: "get_time", arguments: {} };
    const invoker = new RecordingInvoker();
    const states: LoopState[] = [];
    const loop = new AgentLoop({
      model: new ScriptedModel([call, call, call]),
      invoker,
      maxRounds: 2,
      onState: state => states.push(state),
    });

    const outcome = await loop.run("loop forever", CANDIDATES);

    expect(outcome).toEqual({
      state: "aborted",
      error: "Stopped after 2 tool rounds without a final answer",
      steps: [
        { stepIndex: 1, action: { tool: "get_time", arguments: {} }, observation: "done", status: "ok" },
        { stepIndex: 2, action: { tool: "get_time", arguments: {} }, observation: "done", status: "ok" },
      ],
    });
    expect(invoker.calls).toHaveLength(2);
    expect(states).toEqual(["deciding", "invoking", "deciding", "invoking", "aborted"]);
  });

  test("a tool outside the candidates is never invoked", async () => {
    const invoker = new RecordingInvoker();
    const model = new ScriptedModel([
      { type: "tool_call", tool: "list_students", arguments: {} },
      { type: "final", answer: "I cannot list students." },
    ]);
    const loop = new AgentLoop({ model, invoker, maxRounds: 3 });

    const outcome = await loop.run("list students", CANDIDATES);

    expect(invoker.calls).toEqual([]);
    expect(outcome.steps[0]).toEqual({
      stepIndex: 1,
      action: { tool: "list_students", arguments: {} },
      observation: "Unknown tool: list_students. Available tools: get_time, get_advisor",
      status: "unknown_tool",
    });
    expect(outcome.state).toBe("finished");
  });

  test("a tool outside the candidates is recorded with the arguments the model sent", async () => {
    const model = new ScriptedModel([
      { type: "tool_call", tool: "list_students", arguments: '{"limit": 3}' },
      { type: "tool_call", tool: "find_student", arguments: "Agus" },
      { type: "final", answer: "?" },
    ]);

    const outcome = await new AgentLoop({ model, invoker: new RecordingInvoker(), maxRounds: 3 }).run(
      "students",
      CANDIDATES
    );

    expect(outcome.steps.map(s => s.action)).toEqual([
      { tool: "list_students", arguments: { limit: 3 } },
      { tool: "find_student", arguments: "Agus" },
      null,
    ]);
    expect(model.inputs[2]?.turns.map(t => t.action?.arguments)).toEqual([{ limit: 3 }, "Agus"]);
  });

  test("an unknown tool still counts as a round", async () => {
    const loop = new AgentLoop({
      model: new ScriptedModel([{ type: "tool_call", tool: "delete_student", arguments: {} }]),
      invoker: new RecordingInvoker(),
      maxRounds: 1,
    });

    const outcome = await loop.run("delete", []);

    expect(outcome.state).toBe("aborted");
    expect(outcome.steps.map(s => s.observation)).toEqual(["Unknown tool: delete_student. Available tools: none"]);
  });

  test("transport failures become observations", async () => {
    const model = new ScriptedModel([
      { type: "tool_call", tool: "get_time", arguments: {} },
      { type: "final", answer: "The clock is unavailable." },
    ]);
    const invoker: ToolInvoker = {
      invoke: async () => {
        throw new TransportError("Tool get_time on utility failed: socket hang up");
      },
    };
    const loop = new AgentLoop({ model, invoker, maxRounds: 3 });

    const outcome = await loop.run("time?", CANDIDATES);

    expect(outcome.steps[0]?.status).toBe("transport_error");
    expect(outcome.steps[0]?.observation).toBe("Error: Tool get_time on utility failed: socket hang up");
    expect(outcome.state).toBe("finished");
  });

  test("a tool that vanished from the registry is reported as unknown", async () => {
    const model = new ScriptedModel([
      { type: "tool_call", tool: "get_time", arguments: {} },
      { type: "final", answer: "gone" },
    ]);
    const invoker: ToolInvoker = {
      invoke: async toolName => {
        throw new UnknownToolError(toolName);
      },
    };

    const outcome = await new AgentLoop({ model, invoker, maxRounds: 3 }).run("time?", CANDIDATES);

    expect(outcome.steps[0]).toMatchObject({ status: "unknown_tool", observation: "Unknown tool: get_time" });
  });

  test("a failing model ends the run with the steps taken so far", async () => {
    const states: LoopState[] = [];
    const loop = new AgentLoop({
      model: new ScriptedModel([{ type: "tool_call", tool: "get_time", arguments: {} }]),
      invoker: new RecordingInvoker(() => "2024-01-05 07:08:09"),
      maxRounds: 3,
      onState: state => states.push(state),
    });

    const outcome = await loop.run("time?", CANDIDATES);

    expect(outcome).toEqual({
      state: "aborted",
      error: "script exhausted",
      steps: [
        { stepIndex: 1, action: { tool: "get_time", arguments: {} }, observation: "2024-01-05 07:08:09", status: "ok" },
      ],
    });
    expect(states).toEqual(["deciding", "invoking", "deciding", "aborted"]);
  });

  test("other errors propagate", async () => {
    const invoker: ToolInvoker = {
      invoke: async () => {
        throw new RangeError("bug");
      },
    };
    const loop = new AgentLoop({
      model: new ScriptedModel([{ type: "tool_call", tool: "get_time", arguments: {} }]),
      invoker,
      maxRounds: 3,
    });

    await expect(loop.run("time?", CANDIDATES)).rejects.toThrow("bug");
  });

  test("a cancelled signal stops before the next decision", async () => {
    const controller = new AbortController();
    controller.abort();
    const model = new ScriptedModel([{ type: "final", answer: "never" }]);

    const outcome = await new AgentLoop({ model, invoker: new RecordingInvoker(), maxRounds: 3 }).run(
      "time?",
      CANDIDATES,
      controller.signal
    );

    expect(outcome).toEqual({ state: "aborted", error: "Query cancelled", steps: [] });
    expect(model.inputs).toEqual([]);
  });

  test("missing required arguments are still sent", async () => {
    const invoker = new RecordingInvoker();
    const model = new ScriptedModel([
      { type: "tool_call", tool: "get_advisor", arguments: { name: "Agus" } },
      { type: "final", answer: "?" },
    ]);

    await new AgentLoop({ model, invoker, maxRounds: 3 }).run("advisor", CANDIDATES);

    expect(invoker.calls).toEqual([{ toolName: "get_advisor", args: {} }]);
  });
});
