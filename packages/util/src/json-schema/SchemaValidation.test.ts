/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, test } from "vitest";
import type { FromSchema, JsonSchemaObject } from "./JsonSchema";
import { validateAgainst } from "./SchemaValidation";

const OptionsSchema = {
  type: "object",
  properties: {
    level: { type: "integer", minimum: 0, maximum: 2 },
    name: { type: "string" },
  },
  required: ["name"],
  additionalProperties: false,
} as const satisfies JsonSchemaObject;

type Options = FromSchema<typeof OptionsSchema>;

describe("validateAgainst", () => {
  test("should accept a matching value", () => {
    const options: Options = { name: "fit", level: 1 };
    expect(validateAgainst(OptionsSchema, options)).toEqual({ valid: true });
  });

  test("should report an out-of-range value", () => {
    const result = validateAgainst(OptionsSchema, { name: "fit", level: 5 });
    expect(result.valid).toBe(false);
    expect(result.valid ? [] : result.messages).toHaveLength(1);
  });

  test("should reject a missing required property", () => {
    expect(validateAgainst(OptionsSchema, { level: 1 }).valid).toBe(false);
  });

  test("should reject unknown properties", () => {
    expect(validateAgainst(OptionsSchema, { name: "fit", extra: true }).valid).toBe(false);
  });
});
