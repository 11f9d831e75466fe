import { jsonKind, type JsonKind, type JsonValue } from "./schema";

// =============================================================================
// Types
// =============================================================================

/**
 * - empty_input: blank text, nothing to parse
 * - invalid_json: the text failed to parse
 * - not_an_object / missing_controls: parsed, but the wrong shape
 * - unsafe_number: the result holds a number that would not be written back
 *   as it was read
 */
export type CoreErrorCode =
  | "empty_input"
  | "invalid_json"
  | "not_an_object"
  | "missing_controls"
  | "unsafe_number";

export type CoreError = {
  code: CoreErrorCode;
  message: string;
  line?: number;
  column?: number;
};

export type Failure = { ok: false; error: CoreError };

// =============================================================================
// Constructors
// =============================================================================

function article(kind: JsonKind): string {
  switch (kind) {
    case "array":
    case "object":
      return `an ${kind}`;
    case "string":
    case "number":
    case "boolean":
      return `a ${kind}`;
    case "null":
      return "null";
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

export function notAnObject(label: string, value: JsonValue): Failure {
  return {
    ok: false,
    error: {
      code: "not_an_object",
      message: `${label} JSON must be an object, received ${article(jsonKind(value))}.`,
    },
  };
}

export function missingControls(message: string): Failure {
  return { ok: false, error: { code: "missing_controls", message } };
}

/**
 * Render an error for display, with its location when the parser gave one.
 */
export function formatError(error: CoreError): string {
  if (error.line !== undefined && error.column !== undefined) {
    return `${error.message} (line ${error.line}, column ${error.column})`;
  }
  return error.message;
}
