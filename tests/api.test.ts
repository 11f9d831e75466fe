import { describe, expect, test } from "vitest";
import { extractText, formatText, mergeText } from "../src/api";

const SOURCE = '{"controls":{"forward":"w"},"volume":1}';
const TARGET = '{"controls":{"forward":"up"},"volume":5}';

// =============================================================================
// formatText
// =============================================================================

describe("formatText", () => {
  test("pretty-prints by default", () => {
    expect(formatText('{"a":[1,2]}')).toEqual({ ok: true, text: '{\n  "a": [\n    1,\n    2\n  ]\n}' });
  });

  test("minifies when pretty is false", () => {
    expect(formatText('{\n  "a": "ü"\n}', { pretty: false })).toEqual({ ok: true, text: '{"a":"ü"}' });
  });

  test("does not require controls", () => {
    expect(formatText("[true]", { pretty: false })).toEqual({ ok: true, text: "[true]" });
  });

  test("refuses an overflowed number literal", () => {
    expect(formatText('{"volume":1e400}')).toEqual({
      ok: false,
      error: {
        code: "unsafe_number",
        message: "Cannot write the result unchanged: Number is not finite at $.volume.",
      },
    });
  });

  test("reports load errors", () => {
    const result = formatText("   ");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("empty_input");
  });
});

// =============================================================================
// extractText
// =============================================================================

describe("extractText", () => {
  test("renders the controls-only document", () => {
    expect(extractText(SOURCE, { pretty: false })).toEqual({
      ok: true,
      text: '{"controls":{"forward":"w"}}',
    });
  });

  test("pretty by default", () => {
    expect(extractText(SOURCE)).toEqual({
      ok: true,
      text: '{\n  "controls": {\n    "forward": "w"\n  }\n}',
    });
  });

  test("invalid JSON fails before extraction", () => {
    const result = extractText("{invalid");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("invalid_json");
  });

  test("refuses controls holding an integer past the safe range", () => {
    const result = extractText('{"controls":{"bind":[1, 18014398509481985]}}');
    expect(result).toEqual({
      ok: false,
      error: {
        code: "unsafe_number",
        message:
          "Cannot write the result unchanged: Integer exceeds the safe range and would lose precision at $.controls.bind[1].",
      },
    });
  });

  test("missing controls fails", () => {
    const result = extractText('{"volume":5}');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("missing_controls");
  });
});

// =============================================================================
// mergeText
// =============================================================================

describe("mergeText", () => {
  test("merges source controls into the target", () => {
    expect(mergeText(SOURCE, TARGET, { pretty: false })).toEqual({
      ok: true,
      text: '{"controls":{"forward":"w"},"volume":5}',
    });
  });

  test("accepts a controls-only source", () => {
    const result = mergeText('{"controls":{"jump":"space"}}', '{"fov":90}', { pretty: false });
    expect(result).toEqual({ ok: true, text: '{"fov":90,"controls":{"jump":"space"}}' });
  });

  test("source without controls fails with missing_controls", () => {
    const result = mergeText('{"volume":1}', TARGET);
    expect(result).toEqual({
      ok: false,
      error: {
        code: "missing_controls",
        message: "Source controls object must contain 'controls'.",
      },
    });
  });

  test("falls back to fallbackText when the source has no controls", () => {
    const result = mergeText('{"volume":1}', TARGET, {
      pretty: false,
      fallbackText: '{"controls":{"forward":"i"}}',
    });
    expect(result).toEqual({ ok: true, text: '{"controls":{"forward":"i"},"volume":5}' });
  });

  test("source with controls wins over the fallback", () => {
    const result = mergeText(SOURCE, TARGET, {
      pretty: false,
      fallbackText: '{"controls":{"forward":"i"}}',
    });
    expect(result).toEqual({ ok: true, text: '{"controls":{"forward":"w"},"volume":5}' });
  });

  test("unusable fallback reports missing controls with a hint", () => {
    for (const fallbackText of ["", "{broken", '{"volume":2}']) {
      const result = mergeText('{"volume":1}', TARGET, { fallbackText });
      expect(result).toEqual({
        ok: false,
        error: {
          code: "missing_controls",
          message: "Source must contain 'controls'. Use 'extract' first if needed.",
        },
      });
    }
  });

  test("source that fails to parse is reported even with a fallback", () => {
    const result = mergeText("{broken", TARGET, { fallbackText: SOURCE });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("invalid_json");
  });

  test("refuses to round large integers outside controls", () => {
    const result = mergeText(
      '{"controls":{"a":1}}',
      '{"controls":{},"userId":12345678901234567890,"x":9007199254740993}',
      { pretty: false },
    );
    expect(result).toEqual({
      ok: false,
      error: {
        code: "unsafe_number",
        message:
          "Cannot write the result unchanged: Integer exceeds the safe range and would lose precision at $.userId.",
      },
    });
  });

  test("large integers in the source's other fields do not block the merge", () => {
    const result = mergeText(
      '{"controls":{"a":1},"userId":12345678901234567890}',
      '{"controls":{},"level":3}',
      { pretty: false },
    );
    expect(result).toEqual({ ok: true, text: '{"controls":{"a":1},"level":3}' });
  });

  test("non-object target fails with not_an_object", () => {
    const result = mergeText(SOURCE, "[]");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("not_an_object");
  });

  test("empty target fails with empty_input", () => {
    const result = mergeText(SOURCE, "");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe("empty_input");
  });
});
