import { missingControls, notAnObject, type Failure } from "./errors";
import {
  CONTROLS_KEY,
  hasField,
  isJsonObject,
  type ControlsDocument,
  type JsonValue,
} from "./schema";

export type ExtractResult = { ok: true; document: ControlsDocument } | Failure;

/**
 * Take the controls section out of a settings document.
 *
 * The result is a new object with a single `controls` field. Its value is the
 * same reference as in `doc`, not a deep copy; `doc` itself is not touched.
 */
export function extractControls(doc: JsonValue): ExtractResult {
  if (!isJsonObject(doc)) {
    return notAnObject("Settings", doc);
  }

  if (!hasField(doc, CONTROLS_KEY)) {
    return missingControls(
      `This settings JSON does not contain a '${CONTROLS_KEY}' section.`,
    );
  }

  return { ok: true, document: { controls: doc[CONTROLS_KEY] } };
}
