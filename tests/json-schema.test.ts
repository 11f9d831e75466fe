import { describe, expect, test } from "vitest";
import { generateJsonSchema } from "../src/json-schema";

describe("generateJsonSchema", () => {
  test("is a draft-07 schema referencing ControlsDocument", () => {
    expect(generateJsonSchema()).toMatchObject({
      $schema: "http://json-schema.org/draft-07/schema#",
      $ref: "#/definitions/ControlsDocument",
    });
  });

  test("ControlsDocument is an object that requires controls", () => {
    expect(generateJsonSchema()).toMatchObject({
      definitions: {
        ControlsDocument: {
          type: "object",
          required: ["controls"],
        },
      },
    });
  });

  test("schema is valid JSON (round-trips through stringify/parse)", () => {
    const schema = generateJsonSchema();
    expect(JSON.parse(JSON.stringify(schema))).toEqual(schema);
  });

  test("mentions the controls property", () => {
    expect(JSON.stringify(generateJsonSchema())).toContain('"controls"');
  });
});
