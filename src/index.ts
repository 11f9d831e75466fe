// =============================================================================
// keybind-merger Public API
// =============================================================================

// Types
export type {
  JsonValue,
  JsonObject,
  JsonArray,
  JsonPrimitive,
  JsonKind,
  ControlsDocument,
} from "./schema";
export type { CoreError, CoreErrorCode } from "./errors";
export type { LoadResult, LineColumn } from "./json";
export type { ExtractResult } from "./extract";
export type { MergeResult } from "./merge";
export type { ValidationReport, ValidationError, DocumentSummary } from "./validate";

// Core operations
export { load, stringify, positionToLineColumn } from "./json";
export { extractControls } from "./extract";
export { mergeControls } from "./merge";
export { formatError } from "./errors";

// Schemas (for callers that need direct Zod access)
export {
  jsonValueSchema,
  controlsDocumentSchema,
  settingsDocumentSchema,
  CONTROLS_KEY,
  isJsonObject,
  jsonKind,
} from "./schema";

// =============================================================================
// Validation and JSON Schema
// =============================================================================

export { validateSettings, validateSettingsText } from "./validate";
export { generateJsonSchema } from "./json-schema";

// =============================================================================
// Text operations (front-end entry points)
// =============================================================================

export type { TextResult, RenderOptions, MergeTextOptions } from "./api";
export { formatText, extractText, mergeText } from "./api";

// =============================================================================
// Files and CLI
// =============================================================================

export type { ReadResult, ReadError, WriteResult, WriteError } from "./files";
export { readDocumentText, writeDocumentText, resolveDocumentPath, STDIN_PATH } from "./files";

export type { CliConfig, ConfigResult } from "./config";
export { resolveConfig } from "./config";
export { main } from "./cli";
