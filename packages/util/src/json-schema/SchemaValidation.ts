/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { compileSchema, type SchemaNode } from "json-schema-library";
import type { JsonSchemaObject } from "./JsonSchema";

export { compileSchema };
export type { SchemaNode };

/**
 * Outcome of {@link validateAgainst}: either valid, or the list of formatted messages.
 */
export type SchemaValidationResult = { valid: true } | { valid: false; messages: string[] };

const compiled = new WeakMap<JsonSchemaObject, SchemaNode>();

/**
 * Compiles (once per schema object) and validates `value`.
 * Messages carry the JSON pointer of the failing value when there is one.
 */
export function validateAgainst(schema: JsonSchemaObject, value: unknown): SchemaValidationResult {
  let node = compiled.get(schema);
  if (!node) {
    node = compileSchema(schema);
    compiled.set(schema, node);
  }
  const result = node.validate(value);
  if (result.valid) return { valid: true };
  const messages = result.errors.map((e) => {
    const path = e.data.pointer || "";
    return `${e.message}${path && path !== "#" ? ` (${path})` : ""}`;
  });
  return { valid: false, messages };
}
