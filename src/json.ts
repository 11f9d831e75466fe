import type { Failure } from "./errors";
import type { JsonValue } from "./schema";

// =============================================================================
// Types
// =============================================================================

export type LoadResult = { ok: true; value: JsonValue } | Failure;

export type LineColumn = { line: number; column: number };

// =============================================================================
// Helpers
// =============================================================================

const POSITION_REGEX = /at position (\d+)/;

/**
 * Map a character offset to a 1-based line and column.
 */
export function positionToLineColumn(text: string, offset: number): LineColumn {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < clamped; i++) {
    if (text[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: clamped - lineStart + 1 };
}

/**
 * V8 reports "... in JSON at position N" for most syntax errors; some messages
 * (unexpected end of input, a bad leading token) carry no offset.
 */
function locateParseError(text: string, message: string): LineColumn | undefined {
  const match = POSITION_REGEX.exec(message);
  if (!match) return undefined;
  return positionToLineColumn(text, parseInt(match[1], 10));
}

// =============================================================================
// load / stringify
// =============================================================================

/**
 * Parse text into a JSON value.
 *
 * Parsing is strict: smart quotes, trailing commas and comments are errors,
 * never repaired. Surrounding whitespace is allowed, and error locations
 * refer to the text as given.
 */
export function load(text: string): LoadResult {
  if (text.trim() === "") {
    return {
      ok: false,
      error: { code: "empty_input", message: "No JSON text provided." },
    };
  }

  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      error: {
        code: "invalid_json",
        message: `Invalid JSON. Details: ${detail}`,
        ...locateParseError(text, detail),
      },
    };
  }
}

/**
 * Render a value: two-space indentation when pretty, no whitespace otherwise.
 * Non-ASCII characters are written as-is, not escaped.
 */
export function stringify(value: JsonValue, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}
