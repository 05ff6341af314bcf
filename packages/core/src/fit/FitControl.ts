/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { type FromSchema, type JsonSchemaObject, validateAgainst } from "@modelspec/util";
import { FitControlError } from "../error/ModelError";

export const FitControlSchema = {
  type: "object",
  properties: {
    verbosity: { type: "integer", minimum: 0, maximum: 2, default: 1 },
    catch: { type: "boolean", default: false },
  },
  additionalProperties: false,
} as const satisfies JsonSchemaObject;

/**
 * `verbosity`: 0 is silent, 1 warns about caught fit failures, 2 also logs fit timing.
 * `catch`: return a failed model fit instead of throwing when the engine fails.
 */
export type FitControl = Required<FromSchema<typeof FitControlSchema>>;

export const DEFAULT_FIT_CONTROL: FitControl = Object.freeze({ verbosity: 1, catch: false });

/**
 * Validates control options and fills in the defaults.
 */
export function fitControl(options: Partial<FitControl> = {}): FitControl {
  const given = Object.fromEntries(Object.entries(options).filter(([, v]) => v !== undefined));
  const result = validateAgainst(FitControlSchema, given);
  if (!result.valid) {
    throw new FitControlError(`Invalid fit control: ${result.messages.join(", ")}`, {
      options: given,
    });
  }
  return Object.freeze({
    verbosity: options.verbosity ?? DEFAULT_FIT_CONTROL.verbosity,
    catch: options.catch ?? DEFAULT_FIT_CONTROL.catch,
  });
}
