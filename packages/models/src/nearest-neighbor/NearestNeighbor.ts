/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ArgumentValidationError,
  createSpec,
  expr,
  getModelRegistry,
  literal,
  type Mode,
  type ModelRegistry,
  type ModelSpec,
  type PredictionType,
  sym,
} from "@modelspec/core";
import { checkRange, fittedArg, type ModelConstructorOptions } from "../common/Model_Helpers";
import { KKNN } from "../engines/EnginePackages";

export const NEAREST_NEIGHBOR = "nearest_neighbor";

export interface NearestNeighborArgs {
  neighbors?: unknown;
  /** Kernel used to weight distances, e.g. "rectangular" or "triangular" */
  weight_func?: unknown;
  /** Minkowski distance parameter */
  dist_power?: unknown;
}

const PREDICT_TYPES: Readonly<Record<Mode, readonly (readonly [PredictionType, string])[]>> = {
  classification: [
    ["class", "raw"],
    ["prob", "prob"],
    ["raw", "raw"],
  ],
  regression: [
    ["numeric", "raw"],
    ["raw", "raw"],
  ],
  "censored regression": [],
};

/**
 * Registers `nearest_neighbor` for classification and regression with the `kknn`
 * engine. Predictions use the spec's `neighbors`, so `multiPredict` can vary it.
 */
export function registerNearestNeighbor(registry: ModelRegistry = getModelRegistry()): void {
  registry.registerModel(NEAREST_NEIGHBOR, { title: "K-Nearest Neighbor" });
  for (const mode of ["classification", "regression"] as const) {
    registry.registerMode(NEAREST_NEIGHBOR, mode);
    registry.registerEngine(NEAREST_NEIGHBOR, mode, KKNN);
  }
  registry.registerDependency(NEAREST_NEIGHBOR, KKNN, KKNN);
  registry.registerArgument(NEAREST_NEIGHBOR, KKNN, {
    exposed: "neighbors",
    original: "ks",
    func: { pkg: "dials", fun: "neighbors" },
    has_submodel: true,
  });
  registry.registerArgument(NEAREST_NEIGHBOR, KKNN, {
    exposed: "weight_func",
    original: "kernel",
    func: { pkg: "dials", fun: "weight_func" },
    has_submodel: false,
  });
  registry.registerArgument(NEAREST_NEIGHBOR, KKNN, {
    exposed: "dist_power",
    original: "distance",
    func: { pkg: "dials", fun: "dist_power" },
    has_submodel: false,
  });

  for (const mode of ["classification", "regression"] as const) {
    registry.registerFit(NEAREST_NEIGHBOR, KKNN, mode, {
      interface: "formula",
      protect: ["formula", "data"],
      func: { pkg: KKNN, fun: "train.kknn" },
      defaults: {
        ks: expr(["n_obs"], ({ n_obs }) => Math.min(5, Number(n_obs)), {
          label: "min(5, n_obs)",
        }),
      },
    });
    for (const [type, kknnType] of PREDICT_TYPES[mode]) {
      registry.registerPredict(NEAREST_NEIGHBOR, KKNN, mode, type, {
        func: { pkg: KKNN, fun: "predict" },
        args: {
          object: sym("object"),
          newdata: sym("new_data"),
          k: fittedArg("neighbors"),
          type: literal(kknnType),
        },
      });
    }
  }

  registry.registerTranslateHook(NEAREST_NEIGHBOR, (context) => {
    const kernel = context.args.kernel;
    if (kernel?.kind === "literal" && typeof kernel.value !== "string") {
      throw new ArgumentValidationError(
        "weight_func",
        `must be a single kernel name, got ${JSON.stringify(kernel.value)}`
      );
    }
    checkRange(context.args, "ks", "neighbors", 1, Infinity);
    checkRange(context.args, "distance", "dist_power", 0, Infinity);
    return context.args;
  });
}

/**
 * Mode is `unknown` until set, since the model supports classification and regression.
 *
 * @example
 * ```typescript
 * const spec = nearestNeighbor({ neighbors: 3 }, { mode: "classification", engine: "kknn" });
 * ```
 */
export function nearestNeighbor(
  args: NearestNeighborArgs = {},
  options: ModelConstructorOptions = {}
): ModelSpec {
  return createSpec(
    NEAREST_NEIGHBOR,
    {
      args: {
        neighbors: args.neighbors,
        weight_func: args.weight_func,
        dist_power: args.dist_power,
      },
      mode: options.mode,
      engine: options.engine,
      engineArgs: options.engineArgs,
    },
    options.registry
  );
}
