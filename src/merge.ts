import { missingControls, notAnObject, type Failure } from "./errors";
import {
  CONTROLS_KEY,
  hasField,
  isJsonObject,
  type JsonObject,
  type JsonValue,
} from "./schema";

// =============================================================================
// Controls Merge
// =============================================================================

export type MergeResult = { ok: true; document: JsonObject } | Failure;

/**
 * Replace the controls of `target` with those of `source`.
 *
 * Rules:
 * 1. `source` may be a full settings document or a controls-only document;
 *    either way it must be an object with a `controls` field (checked first).
 * 2. `target` must be an object.
 * 3. Every other field of `target` is kept, in order, by reference.
 * 4. `controls` keeps its position in `target`, or is appended if absent.
 * 5. Neither input is mutated — returns a fresh object.
 */
export function mergeControls(source: JsonValue, target: JsonValue): MergeResult {
  if (!isJsonObject(source) || !hasField(source, CONTROLS_KEY)) {
    return missingControls(
      `Source controls object must contain '${CONTROLS_KEY}'.`,
    );
  }

  if (!isJsonObject(target)) {
    return notAnObject("Target", target);
  }

  const merged: JsonObject = { ...target };
  merged[CONTROLS_KEY] = source[CONTROLS_KEY];

  return { ok: true, document: merged };
}
