import { zodToJsonSchema } from "zod-to-json-schema";
import { controlsDocumentSchema } from "./schema";

// =============================================================================
// JSON Schema Generation
// =============================================================================

/**
 * Generate a JSON Schema (draft-07) for the controls-only document.
 *
 * Editors and external tools can use it to check exported keybinding files.
 *
 * Pure — no I/O.
 */
export function generateJsonSchema(): object {
  return zodToJsonSchema(controlsDocumentSchema, {
    name: "ControlsDocument",
    $refStrategy: "root",
  });
}
