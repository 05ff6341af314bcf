/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ArgumentValidationError,
  createSpec,
  getModelRegistry,
  literal,
  type ModelRegistry,
  type ModelSpec,
  sym,
} from "@modelspec/core";
import type { ModelConstructorOptions } from "../common/Model_Helpers";
import { MDA } from "../engines/EnginePackages";

export const MIXTURE_DA = "mixture_da";

export interface MixtureDaArgs {
  /** Number of mixture components per class */
  sub_classes?: unknown;
}

export function registerMixtureDa(registry: ModelRegistry = getModelRegistry()): void {
  registry.registerModel(MIXTURE_DA, { title: "Mixture Discriminant Analysis" });
  registry.registerMode(MIXTURE_DA, "classification");
  registry.registerEngine(MIXTURE_DA, "classification", MDA);
  registry.registerDependency(MIXTURE_DA, MDA, MDA);
  registry.registerArgument(MIXTURE_DA, MDA, {
    exposed: "sub_classes",
    original: "subclasses",
    func: { pkg: "discrim", fun: "sub_classes" },
    has_submodel: false,
  });
  registry.registerFit(MIXTURE_DA, MDA, "classification", {
    interface: "formula",
    protect: ["formula", "data", "weights"],
    func: { pkg: MDA, fun: "mda" },
    defaults: {},
  });
  registry.registerPredict(MIXTURE_DA, MDA, "classification", "class", {
    func: { pkg: MDA, fun: "predict" },
    args: { object: sym("object"), newdata: sym("new_data"), type: literal("class") },
  });
  registry.registerPredict(MIXTURE_DA, MDA, "classification", "prob", {
    func: { pkg: MDA, fun: "predict" },
    args: { object: sym("object"), newdata: sym("new_data"), type: literal("posterior") },
  });

  registry.registerTranslateHook(MIXTURE_DA, (context) => {
    const subclasses = context.args.subclasses;
    if (subclasses?.kind === "literal") {
      const value = subclasses.value;
      if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
        throw new ArgumentValidationError(
          "sub_classes",
          `must be a positive whole number, got ${JSON.stringify(value)}`
        );
      }
    }
    return context.args;
  });
}

/**
 * @example
 * ```typescript
 * const spec = mixtureDa({ sub_classes: 2 }, { engine: "mda" }).translate();
 * spec.method?.fit.args.subclasses; // literal(2)
 * ```
 */
export function mixtureDa(args: MixtureDaArgs = {}, options: ModelConstructorOptions = {}): ModelSpec {
  return createSpec(
    MIXTURE_DA,
    {
      args: { sub_classes: args.sub_classes },
      mode: options.mode,
      engine: options.engine,
      engineArgs: options.engineArgs,
    },
    options.registry
  );
}
