import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { CallOptions, MCPClient, ToolCallResult } from "./types";

/**
 * Configuration for FakeMCPClient behavior
 */
export type FakeMCPClientConfig = {
  /** Tools this server provides */
  tools: Tool[];
  /** Simulated network delay in ms (default: 10) */
  delay?: number;
  /** Custom tool call handler; a string becomes a single text part */
  onCallTool?: (name: string, args: Record<string, unknown>) => Promise<ToolCallResult | string>;
  /** Simulate connection failure */
  failConnect?: boolean;
  /** Fail only the first N connection attempts */
  failConnectTimes?: number;
  /** Simulate listTools failure */
  failListTools?: boolean;
  /** Simulate close failure */
  failClose?: boolean;
  /** Error message for failures */
  errorMessage?: string;
};

/**
 * Fake MCP client for testing purposes
 * Simulates an MCP server with configurable behavior
 */
export class FakeMCPClient implements MCPClient {
  private config: FakeMCPClientConfig;
  private connected = false;
  private connectAttempts = 0;
  readonly calls: Array<{ name: string; args: Record<string, unknown>; options?: CallOptions }> = [];

  constructor(config: FakeMCPClientConfig) {
    this.config = {
      delay: 10,
      ...config,
    };
  }

  private async simulateDelay(): Promise<void> {
    const delay = this.config.delay ?? 0;
    if (delay > 0) {
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  async connect(): Promise<void> {
    await this.simulateDelay();
    this.connectAttempts++;

    if (this.config.failConnect || this.connectAttempts <= (this.config.failConnectTimes ?? 0)) {
      throw new Error(this.config.errorMessage || "Connection failed");
    }

    this.connected = true;
  }

  async listTools(): Promise<Tool[]> {
    await this.simulateDelay();

    if (this.config.failListTools) {
      throw new Error(this.config.errorMessage || "Failed to list tools");
    }

    return [...this.config.tools];
  }

  async callTool(name: string, args: Record<string, unknown>, options?: CallOptions): Promise<ToolCallResult> {
    this.calls.push({ name, args, options });
    await this.simulateDelay();

    const tool = this.config.tools.find(t => t.name === name);
    if (!tool) {
      return { content: [{ type: "text", text: `Tool not found: ${name}` }], isError: true };
    }

    if (this.config.onCallTool) {
      const result = await this.config.onCallTool(name, args);
      return typeof result === "string" ? { content: [{ type: "text", text: result }], isError: false } : result;
    }

    return {
      content: [{ type: "text", text: `Mock result for ${name} ${JSON.stringify(args)}` }],
      isError: false,
    };
  }

  async close(): Promise<void> {
    this.connected = false;
    if (this.config.failClose) {
      throw new Error(this.config.errorMessage || "Close failed");
    }
  }

  /** Check if client is connected (for testing) */
  isConnected(): boolean {
    return this.connected;
  }

  getConnectAttempts(): number {
    return this.connectAttempts;
  }
}

/**
 * Pre-configured fake tools for common test scenarios
 */
export const FakeTools: Record<"utility" | "academic", Tool[]> = {
  utility: [
    {
      name: "get_time",
      description: "Get the current local date and time",
      inputSchema: { type: "object", properties: {} },
    },
    {
      name: "calculate",
      description: "Evaluate an arithmetic expression",
      inputSchema: {
        type: "object",
        properties: {
          expression: { type: "string", description: "Expression such as 2 * (3 + 4)" },
        },
        required: ["expression"],
      },
    },
  ],

  academic: [
    {
      name: "get_advisor",
      description: "Find the academic advisor of a student",
      inputSchema: {
        type: "object",
        properties: {
          student_name: { type: "string", description: "Full name of the student" },
        },
        required: ["student_name"],
      },
    },
    {
      name: "list_students",
      description: "List every registered student",
      inputSchema: { type: "object", properties: {} },
    },
  ],
};
