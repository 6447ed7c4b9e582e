/**
 * Argument normalization: reconcile whatever the decision model emitted for a tool
 * call with the tool's declared parameters.
 */

export type Scalar = string | number | boolean;

export type RawArguments =
  | { kind: "structured"; value: Record<string, unknown> }
  | { kind: "scalar"; value: Scalar }
  | { kind: "empty" };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Tag a raw payload by shape.
 * A string holding a JSON object is structured; blank strings, null and empty objects are empty.
 */
export function classifyArguments(raw: unknown): RawArguments {
  if (raw === undefined || raw === null) {
    return { kind: "empty" };
  }

  if (isRecord(raw)) {
    return Object.keys(raw).length === 0 ? { kind: "empty" } : { kind: "structured", value: raw };
  }

  if (typeof raw === "string") {
    const trimmed = raw.trim();
    if (trimmed.length === 0) {
      return { kind: "empty" };
    }
    if (trimmed.startsWith("{")) {
      const parsed = tryParseJson(trimmed);
      if (isRecord(parsed)) {
        return classifyArguments(parsed);
      }
    }
    return { kind: "scalar", value: raw };
  }

  if (typeof raw === "number" || typeof raw === "boolean") {
    return { kind: "scalar", value: raw };
  }

  // arrays and other shapes carry no usable binding
  return { kind: "empty" };
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Best-effort binding of raw arguments to a tool's parameters:
 * 1. a tool without parameters always gets `{}`
 * 2. structured input keeps the declared keys; with none, the first required
 *    parameter is bound from the same key when present
 * 3. a scalar binds to the first required parameter
 * 4. anything else yields `{}`
 */
export function normalizeArguments(
  raw: unknown,
  required: readonly string[],
  properties: Record<string, unknown>,
): Record<string, unknown> {
  const declared = Object.keys(properties);
  if (declared.length === 0 && required.length === 0) {
    return {};
  }

  const args = classifyArguments(raw);
  const firstRequired = required[0];

  switch (args.kind) {
    case "structured": {
      const kept: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(args.value)) {
        if (Object.hasOwn(properties, key)) {
          kept[key] = value;
        }
      }
      if (Object.keys(kept).length > 0) {
        return kept;
      }
      if (firstRequired !== undefined && args.value[firstRequired] !== undefined) {
        return { [firstRequired]: args.value[firstRequired] };
      }
      return {};
    }

    case "scalar":
      return firstRequired !== undefined ? { [firstRequired]: args.value } : {};

    case "empty":
      return {};
  }
}

/**
 * Required parameters absent from the normalized arguments
 */
export function findMissingRequired(args: Record<string, unknown>, required: readonly string[]): string[] {
  return required.filter(name => args[name] === undefined);
}
