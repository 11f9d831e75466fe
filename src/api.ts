import { missingControls, type Failure } from "./errors";
import { extractControls } from "./extract";
import { load, stringify } from "./json";
import { mergeControls } from "./merge";
import {
  CONTROLS_KEY,
  hasField,
  isJsonObject,
  jsonValueSchema,
  toJsonPath,
  type JsonValue,
} from "./schema";

// =============================================================================
// Types
// =============================================================================

export type TextResult = { ok: true; text: string } | Failure;

export type RenderOptions = {
  /** Two-space indentation (default) or minified. */
  pretty?: boolean;
};

export type MergeTextOptions = RenderOptions & {
  /**
   * Tried when the source parses but has no controls, e.g. the output of an
   * earlier extraction.
   */
  fallbackText?: string;
};

// =============================================================================
// Helpers
// =============================================================================

function carriesControls(value: JsonValue): boolean {
  return isJsonObject(value) && hasField(value, CONTROLS_KEY);
}

/**
 * Load the merge source, falling back to `fallbackText` when the primary
 * source has no controls. A fallback that fails to load is ignored and the
 * primary source stands.
 */
function resolveSource(
  sourceText: string,
  fallbackText: string | undefined,
): { ok: true; value: JsonValue } | Failure {
  const source = load(sourceText);
  if (!source.ok) return source;
  if (carriesControls(source.value) || fallbackText === undefined) return source;

  const fallback = load(fallbackText);
  if (fallback.ok && carriesControls(fallback.value)) return fallback;

  return missingControls(
    `Source must contain '${CONTROLS_KEY}'. Use 'extract' first if needed.`,
  );
}

/**
 * Render a result, refusing when a number in it would come out different
 * from how it was read (an integer past 2^53 - 1, or an overflowed literal).
 */
function render(value: JsonValue, pretty: boolean): TextResult {
  const checked = jsonValueSchema.safeParse(value);
  if (!checked.success) {
    const issue = checked.error.issues[0];
    return {
      ok: false,
      error: {
        code: "unsafe_number",
        message: `Cannot write the result unchanged: ${issue.message} at ${toJsonPath(issue.path)}.`,
      },
    };
  }
  return { ok: true, text: stringify(value, pretty) };
}

// =============================================================================
// Text operations
// =============================================================================

/**
 * Parse and re-render a document (pretty-print or minify).
 */
export function formatText(text: string, options: RenderOptions = {}): TextResult {
  const loaded = load(text);
  if (!loaded.ok) return loaded;
  return render(loaded.value, options.pretty ?? true);
}

/**
 * Parse a settings document and render its controls-only document.
 */
export function extractText(sourceText: string, options: RenderOptions = {}): TextResult {
  const loaded = load(sourceText);
  if (!loaded.ok) return loaded;

  const extracted = extractControls(loaded.value);
  if (!extracted.ok) return extracted;

  return render(extracted.document, options.pretty ?? true);
}

/**
 * Parse source and target, merge the source's controls into the target and
 * render the result.
 */
export function mergeText(
  sourceText: string,
  targetText: string,
  options: MergeTextOptions = {},
): TextResult {
  const source = resolveSource(sourceText, options.fallbackText);
  if (!source.ok) return source;

  const target = load(targetText);
  if (!target.ok) return target;

  const merged = mergeControls(source.value, target.value);
  if (!merged.ok) return merged;

  return render(merged.document, options.pretty ?? true);
}
