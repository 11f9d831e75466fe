import { z } from "zod";

// =============================================================================
// JSON Values
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export type JsonObject = { [key: string]: JsonValue };
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type JsonKind = "object" | "array" | "string" | "number" | "boolean" | "null";

export const NOT_FINITE_MESSAGE = "Number is not finite";
export const UNSAFE_INTEGER_MESSAGE = "Integer exceeds the safe range and would lose precision";

/**
 * Numbers that survive JSON.parse then JSON.stringify unchanged.
 * - 1e400 parses to Infinity, written back as null
 * - integers past 2^53 - 1 are rounded (9007199254740993 -> 9007199254740992)
 */
const exactNumberSchema = z
  .number()
  .finite({ message: NOT_FINITE_MESSAGE })
  .superRefine((n, ctx) => {
    if (Number.isInteger(n) && !Number.isSafeInteger(n)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: UNSAFE_INTEGER_MESSAGE,
        params: { code: "unsafe_integer" },
      });
    }
  });

/**
 * JsonValue — any value JSON can carry without loss.
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    exactNumberSchema,
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

// =============================================================================
// Documents
// =============================================================================

/**
 * The one key the core reads or writes specially.
 */
export const CONTROLS_KEY = "controls";

/**
 * Controls-only document — { "controls": ... } and nothing else meaningful.
 */
export const controlsDocumentSchema = z.object({
  [CONTROLS_KEY]: jsonValueSchema,
});

/**
 * Settings document — a full export. Fields other than controls are kept
 * as-is but still have to be JSON values.
 */
export const settingsDocumentSchema = controlsDocumentSchema.catchall(jsonValueSchema);

export type ControlsDocument = { controls: JsonValue };

// =============================================================================
// Kind helpers
// =============================================================================

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function jsonKind(value: JsonValue): JsonKind {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    default:
      return "object";
  }
}

/**
 * Convert a Zod path array to JSONPath notation.
 * ["controls", "jump"] -> "$.controls.jump", ["list", 0] -> "$.list[0]"
 */
export function toJsonPath(path: (string | number)[]): string {
  return path.reduce<string>(
    (acc, segment) => (typeof segment === "number" ? `${acc}[${segment}]` : `${acc}.${segment}`),
    "$",
  );
}

/**
 * Own-property check, so inherited names never count as fields.
 */
export function hasField(obj: JsonObject, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, key);
}
