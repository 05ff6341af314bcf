/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  type DataFrame,
  EnginePackageRegistry,
  ModelRegistry,
  setEnginePackageRegistry,
  setModelRegistry,
} from "@modelspec/core";
import { registerAllModels } from "@modelspec/models";
import { registerFakeEngines } from "./FakeEngines";

/** `dist = 1 + 2 * speed` */
export const LINE: DataFrame = {
  speed: [1, 2, 3, 4],
  dist: [3, 5, 7, 9],
  group: ["a", "b", "a", "b"],
};

/** Two classes with `width` centroids at 2 and 8 */
export const TWO_CLASS: DataFrame = {
  width: [1, 2, 3, 7, 8, 9],
  height: [5, 5, 5, 6, 6, 6],
  species: ["setosa", "setosa", "setosa", "virginica", "virginica", "virginica"],
};

/** Three classes with `width` centroids at 2, 6 and 10 */
export const THREE_CLASS: DataFrame = {
  width: [1, 2, 3, 5, 6, 7, 9, 10, 11],
  height: [1, 1, 1, 2, 2, 2, 3, 3, 3],
  species: ["a", "a", "a", "b", "b", "b", "c", "c", "c"],
};

/**
 * Installs fresh global registries with every model and fake engine package registered.
 */
export function installRegistries(): { registry: ModelRegistry; packages: EnginePackageRegistry } {
  const registry = new ModelRegistry();
  const packages = new EnginePackageRegistry();
  setModelRegistry(registry);
  setEnginePackageRegistry(packages);
  registerAllModels(registry);
  registerFakeEngines(packages);
  return { registry, packages };
}
