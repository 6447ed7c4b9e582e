import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import { z } from "zod";
import { access, mkdir, readFile, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { ConfigSchema } from "./schema";

export const DEFAULT_CONFIG_PATH = "toolrag.jsonc";

export type ConfigParseResult = z.SafeParseReturnType<z.input<typeof ConfigSchema>, z.output<typeof ConfigSchema>>;

/**
 * Generate default config content
 * @returns JSONC string with the bundled servers linked in-process
 */
export function generateDefaultConfig(): string {
  return `{
  "servers": [
    // Bundled servers, linked in-process
    { "name": "utility", "transport": "inprocess", "server": "utility" },
    { "name": "academic", "transport": "inprocess", "server": "academic" }
    // Spawned over stdio:
    // { "name": "utility", "transport": "stdio", "command": "npx", "args": ["tsx", "src/servers/utility/main.ts"] }
    // Remote (streamable HTTP, SSE fallback):
    // { "name": "academic", "transport": "remote", "url": "http://localhost:8000/mcp", "headers": { "Authorization": "Bearer {env:ACADEMIC_TOKEN}" } }
  ],
  "settings": {
    "catalogPath": "data/tool-catalog.json",
    "embedding": { "provider": "hashed" },
    "rag": { "topK": 3, "scoreThreshold": 0, "onEmpty": "all-tools" },
    "agent": { "maxRounds": 5, "model": "gpt-4o-mini" }
  }
}
`;
}

/**
 * Create default config file if it doesn't exist
 * @returns true if file was created, false if it already existed
 */
export async function createDefaultConfigIfMissing(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return false;
  } catch {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, generateDefaultConfig(), "utf-8");
    return true;
  }
}

/**
 * Interpolate environment variables in config values
 * Handles {env:VAR_NAME} pattern
 */
export function interpolateEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    // Replace {env:VAR_NAME} with actual env var or empty string
    return value.replace(/\{env:([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, varName: string) => {
      return process.env[varName] || "";
    });
  }

  if (Array.isArray(value)) {
    return value.map(interpolateEnvVars);
  }

  if (value && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateEnvVars(entry);
    }
    return result;
  }

  return value;
}

function failure(message: string): ConfigParseResult {
  return {
    success: false,
    error: new z.ZodError<z.input<typeof ConfigSchema>>([
      {
        code: z.ZodIssueCode.custom,
        message,
        path: [],
      },
    ]),
  };
}

/**
 * Parse and validate toolrag.jsonc config
 * @param jsonc - JSONC string (may contain comments and trailing commas)
 */
export function parseConfig(jsonc: string): ConfigParseResult {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(jsonc, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const first = errors[0];
    const detail = first ? `${printParseErrorCode(first.error)} at offset ${first.offset}` : "unknown error";
    return failure(`Failed to parse JSONC: ${detail}`);
  }

  return ConfigSchema.safeParse(interpolateEnvVars(parsed));
}

/**
 * Load config from file path
 */
export async function loadConfig(filePath: string): Promise<ConfigParseResult> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    return failure(`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(content);
}

/**
 * Directory that relative paths in a config file resolve against
 */
export function configBaseDir(configPath: string): string {
  return dirname(resolve(configPath));
}

/**
 * Flatten zod issues into one readable line
 */
export function describeConfigError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join(", ");
}
