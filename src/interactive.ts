import { createInterface } from "readline/promises";
import type { QueryOptions, QueryResult } from "./agent";
import { errorMessage } from "./errors";
import { log } from "./logging";

export const EXIT_COMMANDS: ReadonlySet<string> = new Set(["exit", "quit", "q"]);

/**
 * What the interactive loop needs from the orchestrator
 */
export interface QueryRunner {
  query(text: string, options?: QueryOptions): Promise<QueryResult>;
  close(): Promise<void>;
}

export interface InteractiveOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  useRag?: boolean;
  /** Print each tool step before the answer */
  verbose?: boolean;
  prompt?: string;
}

/**
 * Render a query result as terminal text
 */
export function formatQueryResult(result: QueryResult, verbose = false): string {
  const lines: string[] = [];

  if (verbose) {
    for (const step of result.steps) {
      if (step.action) {
        lines.push(`  [${step.stepIndex}] ${step.action.tool}(${JSON.stringify(step.action.arguments)}) -> ${step.observation}`);
      }
    }
  }

  lines.push(result.success ? result.answer : `Error: ${result.error}`);
  return lines.join("\n");
}

/**
 * Read queries line by line until an exit command or end of input.
 * A failed query is reported and the loop keeps going; every service is
 * disconnected on the way out.
 * @returns number of queries answered
 */
export async function runInteractive(runner: QueryRunner, options: InteractiveOptions): Promise<number> {
  const { output } = options;
  const prompt = options.prompt ?? "> ";
  const rl = createInterface({ input: options.input, terminal: false });
  let answered = 0;

  try {
    output.write(prompt);
    for await (const line of rl) {
      const text = line.trim();
      if (EXIT_COMMANDS.has(text.toLowerCase())) {
        break;
      }
      if (text.length > 0) {
        try {
          const result = await runner.query(text, { useRag: options.useRag ?? true });
          output.write(`${formatQueryResult(result, options.verbose)}\n`);
        } catch (error) {
          output.write(`Error: ${errorMessage(error)}\n`);
        }
        answered++;
      }
      output.write(prompt);
    }
  } finally {
    rl.close();
    try {
      await runner.close();
    } catch (error) {
      log("warn", `Disconnect failed: ${errorMessage(error)}`);
    }
    output.write("\n");
  }

  return answered;
}
