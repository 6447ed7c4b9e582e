import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { calculate, CalcError } from "./calculator";
import { log } from "../../logging";
import { SERVER_VERSION, textResult } from "../shared";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatLocalTime(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Calculator result as returned to the agent; failures are text, not protocol errors
 */
export function runCalculation(expression: string): string {
  try {
    return calculate(expression);
  } catch (error) {
    if (error instanceof CalcError) {
      if (error.code === "DIVISION_BY_ZERO") {
        return "Error: Division by zero";
      }
      if (error.code === "DOMAIN_ERROR" || error.code === "OVERFLOW") {
        return `Error: ${error.message}`;
      }
      return `Error: Invalid expression - ${error.message}`;
    }
    throw error;
  }
}

export interface UtilityServerOptions {
  /** Clock override for tests */
  now?: () => Date;
}

export function createUtilityServer(options?: UtilityServerOptions): McpServer {
  const now = options?.now ?? (() => new Date());
  const server = new McpServer({ name: "utility", version: SERVER_VERSION });

  server.registerTool(
    "get_time",
    {
      title: "Current time",
      description: "Get the current local date and time as YYYY-MM-DD HH:MM:SS. Takes no arguments.",
    },
    async () => textResult(formatLocalTime(now())),
  );

  server.registerTool(
    "calculate",
    {
      title: "Calculator",
      description:
        "Evaluate an arithmetic expression. Supports numbers, + - * / **, parentheses and abs, round, min, max, pow, sqrt.",
      inputSchema: {
        expression: z.string().describe("Arithmetic expression, e.g. 2 * (3 + 4)"),
      },
    },
    async ({ expression }) => {
      const result = runCalculation(expression);
      log("debug", `[utility] calculate ${JSON.stringify(expression)} = ${result}`);
      return textResult(result);
    },
  );

  return server;
}
