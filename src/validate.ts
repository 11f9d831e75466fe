import type { ZodIssue } from "zod";
import { load } from "./json";
import {
  CONTROLS_KEY,
  hasField,
  isJsonObject,
  jsonKind,
  settingsDocumentSchema,
  toJsonPath,
  type JsonObject,
  type JsonValue,
} from "./schema";

// =============================================================================
// Types
// =============================================================================

export type ValidationError = {
  path: string;
  message: string;
  code: string;
};

export type DocumentSummary = {
  fieldCount: number;
  bindingCount: number | null;
};

export type ValidationReport =
  | { valid: true; document: JsonObject; summary: DocumentSummary; warnings?: string[] }
  | { valid: false; errors: ValidationError[] };

// =============================================================================
// Helpers
// =============================================================================

/**
 * Zod reports refinements as "custom"; the refinement names its own code.
 */
function issueCode(issue: ZodIssue): string {
  const params = issue.code === "custom" ? issue.params : undefined;
  const code: unknown = params?.code;
  return typeof code === "string" ? code : issue.code;
}

// =============================================================================
// validateSettings
// =============================================================================

/**
 * Check that a parsed value looks like a settings document.
 *
 * Steps:
 * 1. Top-level value must be an object
 * 2. `controls` must be present
 * 3. Zod pass over the whole document (every number finite and exact)
 * 4. Warn when `controls` is not an object of bindings
 */
export function validateSettings(value: JsonValue): ValidationReport {
  // Step 1: type guard
  if (!isJsonObject(value)) {
    return {
      valid: false,
      errors: [
        {
          path: "$",
          message: `Expected object, received ${jsonKind(value)}`,
          code: "invalid_type",
        },
      ],
    };
  }

  // Step 2: controls pre-check
  if (!hasField(value, CONTROLS_KEY)) {
    return {
      valid: false,
      errors: [
        {
          path: `$.${CONTROLS_KEY}`,
          message: `Missing required field: ${CONTROLS_KEY}`,
          code: "missing_field",
        },
      ],
    };
  }

  // Step 3: Zod structural validation
  const result = settingsDocumentSchema.safeParse(value);
  if (!result.success) {
    const errors: ValidationError[] = result.error.issues.map((issue) => ({
      path: toJsonPath(issue.path),
      message: issue.message,
      code: issueCode(issue),
    }));
    return { valid: false, errors };
  }

  // Step 4: controls shape warning
  const controls = value[CONTROLS_KEY];
  const warnings = isJsonObject(controls)
    ? undefined
    : [`"${CONTROLS_KEY}" is ${jsonKind(controls)}, expected an object of bindings`];

  return {
    valid: true,
    document: value,
    summary: {
      fieldCount: Object.keys(value).length,
      bindingCount: isJsonObject(controls) ? Object.keys(controls).length : null,
    },
    warnings,
  };
}

/**
 * Parse then validate. Load failures become a single error at "$".
 */
export function validateSettingsText(text: string): ValidationReport {
  const loaded = load(text);
  if (!loaded.ok) {
    return {
      valid: false,
      errors: [{ path: "$", message: loaded.error.message, code: loaded.error.code }],
    };
  }
  return validateSettings(loaded.value);
}
