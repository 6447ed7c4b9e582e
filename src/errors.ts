/**
 * Error taxonomy shared by retrieval, session and agent layers.
 * Every error carries a stable machine-readable `code`.
 */

export type ToolragErrorCode =
  | "retrieval_unavailable"
  | "unknown_tool"
  | "transport_error"
  | "schema_mismatch"
  | "round_limit_exceeded"
  | "config_error";

export class ToolragError extends Error {
  readonly code: ToolragErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ToolragErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ToolragError";
    this.code = code;
    this.details = options?.details;
  }
}

/**
 * Embedding backend or vector store cannot serve requests.
 * Callers disable retrieval narrowing for the query instead of failing it.
 */
export class RetrievalUnavailableError extends ToolragError {
  constructor(message: string, cause?: unknown) {
    super("retrieval_unavailable", message, { cause });
    this.name = "RetrievalUnavailableError";
  }
}

export class UnknownToolError extends ToolragError {
  readonly toolName: string;

  constructor(toolName: string, available?: string[]) {
    super("unknown_tool", `Unknown tool: ${toolName}`, {
      details: available ? { available } : undefined,
    });
    this.name = "UnknownToolError";
    this.toolName = toolName;
  }
}

export class TransportError extends ToolragError {
  readonly server?: string;

  constructor(message: string, options?: { server?: string; cause?: unknown; details?: Record<string, unknown> }) {
    super("transport_error", message, { cause: options?.cause, details: options?.details });
    this.name = "TransportError";
    this.server = options?.server;
  }
}

export class SchemaMismatchError extends ToolragError {
  readonly toolName: string;
  readonly missing: string[];

  constructor(toolName: string, missing: string[]) {
    super("schema_mismatch", `Arguments for ${toolName} are missing required parameters: ${missing.join(", ")}`, {
      details: { missing },
    });
    this.name = "SchemaMismatchError";
    this.toolName = toolName;
    this.missing = missing;
  }
}

export class RoundLimitExceededError extends ToolragError {
  readonly maxRounds: number;

  constructor(maxRounds: number) {
    super("round_limit_exceeded", `Stopped after ${maxRounds} tool rounds without a final answer`, {
      details: { maxRounds },
    });
    this.name = "RoundLimitExceededError";
    this.maxRounds = maxRounds;
  }
}

export class ConfigError extends ToolragError {
  constructor(message: string, cause?: unknown) {
    super("config_error", message, { cause });
    this.name = "ConfigError";
  }
}

/**
 * Human-readable message for anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
