/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { FromSchema, JSONSchema } from "json-schema-to-ts";

export type { FromSchema };

/**
 * A JSON schema literal, declared `as const` so that {@link FromSchema} can derive its type.
 */
export type JsonSchema = JSONSchema;

/**
 * Narrows to object schemas.
 */
export type JsonSchemaObject = Exclude<JSONSchema, boolean> & {
  readonly type: "object";
  readonly properties: Readonly<Record<string, JSONSchema>>;
};
