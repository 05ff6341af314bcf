/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { getModelRegistry, type ModelRegistry } from "@modelspec/core";
import { registerLinearReg } from "./linear-reg/LinearReg";
import { registerLogisticReg } from "./logistic-reg/LogisticReg";
import { registerMixtureDa } from "./mixture-da/MixtureDa";
import { registerMultinomReg } from "./multinom-reg/MultinomReg";
import { registerNearestNeighbor } from "./nearest-neighbor/NearestNeighbor";

/**
 * Registers every bundled model definition. Call once, before creating specs.
 */
export function registerAllModels(registry: ModelRegistry = getModelRegistry()): void {
  registerLinearReg(registry);
  registerLogisticReg(registry);
  registerMultinomReg(registry);
  registerMixtureDa(registry);
  registerNearestNeighbor(registry);
}
