#!/usr/bin/env -S npx tsx
import { resolve } from "path";
import { pathToFileURL } from "url";
import { createOrchestrator, type Orchestrator, type OrchestratorStatus } from "./agent";
import {
  DEFAULT_CONFIG_PATH,
  configBaseDir,
  createDefaultConfigIfMissing,
  describeConfigError,
  loadConfig,
} from "./config";
import { ConfigError, errorMessage } from "./errors";
import { formatQueryResult, runInteractive } from "./interactive";
import { log } from "./logging";
import { createAcademicDatabaseFile } from "./servers";

export type CliCommand =
  | { name: "chat" }
  | { name: "ask"; query: string }
  | { name: "index" }
  | { name: "status" }
  | { name: "init" }
  | { name: "seed-db"; path: string }
  | { name: "help" };

export interface CliOptions {
  command: CliCommand;
  configPath: string;
  useRag: boolean;
  verbose: boolean;
  json: boolean;
}

export interface CliIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  error: NodeJS.WritableStream;
  env: NodeJS.ProcessEnv;
}

export const USAGE = [
  "Usage: toolrag [command] [--config <path>] [--no-rag] [--verbose] [--json]",
  "",
  "Commands:",
  "  chat              Interactive session (default)",
  "  ask <query>       Answer one query and exit",
  "  index             Embed catalog tools missing from the index",
  "  status            Connect and print services, tools and timings",
  "  init              Write a default config file if none exists",
  "  seed-db <path>    Create a seeded academic SQLite database",
].join("\n");

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = {}): CliOptions {
  const positional: string[] = [];
  let configPath = env.TOOLRAG_CONFIG || DEFAULT_CONFIG_PATH;
  let useRag = true;
  let verbose = false;
  let json = false;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    switch (token) {
      case "--config":
      case "-c": {
        const value = argv[++i];
        if (!value) {
          throw new Error("--config expects a path");
        }
        configPath = value;
        break;
      }
      case "--no-rag":
        useRag = false;
        break;
      case "--verbose":
      case "-v":
        verbose = true;
        break;
      case "--json":
        json = true;
        break;
      case "--help":
      case "-h":
        help = true;
        break;
      default:
        if (token === undefined || token.startsWith("-")) {
          throw new Error(`Unknown argument '${token}'`);
        }
        positional.push(token);
    }
  }

  const base = { configPath, useRag, verbose, json };
  if (help) {
    return { ...base, command: { name: "help" } };
  }

  const [name, ...rest] = positional;
  switch (name) {
    case undefined:
    case "chat":
      return { ...base, command: { name: "chat" } };
    case "ask": {
      const query = rest.join(" ").trim();
      if (!query) {
        throw new Error("ask expects a query");
      }
      return { ...base, command: { name: "ask", query } };
    }
    case "index":
    case "status":
    case "init":
      return { ...base, command: { name } };
    case "seed-db": {
      const [path] = rest;
      if (!path) {
        throw new Error("seed-db expects a database path");
      }
      return { ...base, command: { name: "seed-db", path } };
    }
    default:
      throw new Error(`Unknown command '${name}'`);
  }
}

export function formatStatus(status: OrchestratorStatus): string {
  const lines = [`Services (${status.servers.length}):`];
  for (const server of status.servers) {
    const error = server.error ? ` - ${server.error}` : "";
    lines.push(`  ${server.name} [${server.transport}] ${server.status}, ${server.toolCount} tools${error}`);
  }
  lines.push(`Tools: ${status.toolCount}`);
  for (const collision of status.collisions) {
    lines.push(`  ${collision.toolName}: ${collision.winner} shadows ${collision.shadowed}`);
  }
  lines.push(`Indexed: ${status.indexSize ?? "unavailable"}`);
  return lines.join("\n");
}

/**
 * Load the config and build an orchestrator; problems are reported on stderr
 */
async function openOrchestrator(options: CliOptions, io: CliIO): Promise<Orchestrator | null> {
  const result = await loadConfig(options.configPath);
  if (!result.success) {
    io.error.write(`Invalid config ${options.configPath}: ${describeConfigError(result.error)}\n`);
    return null;
  }
  try {
    return await createOrchestrator(result.data, { baseDir: configBaseDir(options.configPath) });
  } catch (error) {
    if (error instanceof ConfigError) {
      io.error.write(`${error.message}\n`);
      return null;
    }
    throw error;
  }
}

async function withOrchestrator(
  options: CliOptions,
  io: CliIO,
  run: (orchestrator: Orchestrator) => Promise<number>
): Promise<number> {
  const orchestrator = await openOrchestrator(options, io);
  if (!orchestrator) {
    return 1;
  }
  try {
    return await run(orchestrator);
  } finally {
    await orchestrator.close();
  }
}

/**
 * Run one CLI invocation
 * @returns process exit code
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv, io.env);
  } catch (error) {
    io.error.write(`${errorMessage(error)}\n${USAGE}\n`);
    return 2;
  }

  const { command } = options;
  switch (command.name) {
    case "help":
      io.output.write(`${USAGE}\n`);
      return 0;

    case "init": {
      const path = resolve(options.configPath);
      const created = await createDefaultConfigIfMissing(path);
      io.output.write(created ? `Created ${path}\n` : `${path} already exists\n`);
      return 0;
    }

    case "seed-db": {
      const path = resolve(command.path);
      createAcademicDatabaseFile(path);
      io.output.write(`Seeded academic database at ${path}\n`);
      return 0;
    }

    case "index":
      return withOrchestrator(options, io, async orchestrator => {
        const result = await orchestrator.indexCatalog();
        io.output.write(`Indexed ${result.added} tools (${result.skipped} unchanged)\n`);
        return 0;
      });

    case "status":
      return withOrchestrator(options, io, async orchestrator => {
        await orchestrator.connect();
        const status = await orchestrator.status();
        io.output.write(`${options.json ? JSON.stringify(status, null, 2) : formatStatus(status)}\n`);
        return 0;
      });

    case "ask":
      return withOrchestrator(options, io, async orchestrator => {
        const result = await orchestrator.query(command.query, { useRag: options.useRag });
        io.output.write(`${options.json ? JSON.stringify(result, null, 2) : formatQueryResult(result, options.verbose)}\n`);
        return result.success ? 0 : 1;
      });

    case "chat": {
      const orchestrator = await openOrchestrator(options, io);
      if (!orchestrator) {
        return 1;
      }
      // runInteractive disconnects on exit
      await runInteractive(orchestrator, {
        input: io.input,
        output: io.output,
        useRag: options.useRag,
        verbose: options.verbose,
      });
      return 0;
    }
  }
}

const isEntryPoint = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isEntryPoint) {
  runCli(process.argv.slice(2), {
    input: process.stdin,
    output: process.stdout,
    error: process.stderr,
    env: process.env,
  })
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      log("error", `toolrag failed: ${errorMessage(error)}`);
      process.stderr.write(`toolrag: ${errorMessage(error)}\n`);
      process.exitCode = 1;
    });
}
