/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  createSpec,
  getModelRegistry,
  literal,
  type ModelRegistry,
  type ModelSpec,
  type PredictionType,
  sym,
} from "@modelspec/core";
import {
  checkGlmnetArgs,
  GLMNET_ARGUMENTS,
  glmnetFitModule,
  glmnetPredictModule,
} from "../common/Glmnet_Modules";
import type { ModelConstructorOptions } from "../common/Model_Helpers";
import { GLMNET, MASS, STATS } from "../engines/EnginePackages";

export const LINEAR_REG = "linear_reg";

export interface LinearRegArgs {
  /** Amount of regularization */
  penalty?: unknown;
  /** Proportion of L1 regularization, 0 (ridge) to 1 (lasso) */
  mixture?: unknown;
}

/**
 * Renames stats' `fit` / `lwr` / `upr` interval columns.
 */
function intervalColumns(raw: unknown): unknown {
  if (typeof raw !== "object" || raw === null || !("lwr" in raw) || !("upr" in raw)) {
    return raw;
  }
  return { lower: raw.lwr, upper: raw.upr };
}

function registerFormulaEngine(
  registry: ModelRegistry,
  engine: string,
  pkg: string,
  fun: string,
  defaults: Readonly<Record<string, unknown>>
) {
  registry.registerEngine(LINEAR_REG, "regression", engine);
  registry.registerDependency(LINEAR_REG, engine, pkg);
  registry.registerFit(LINEAR_REG, engine, "regression", {
    interface: "formula",
    protect: ["formula", "data", "weights"],
    func: { pkg, fun },
    defaults,
  });
  registry.registerPredict(LINEAR_REG, engine, "regression", "numeric", {
    func: { pkg, fun: "predict" },
    args: { object: sym("object"), newdata: sym("new_data") },
  });
  registry.registerPredict(LINEAR_REG, engine, "regression", "raw", {
    func: { pkg, fun: "predict" },
    args: { object: sym("object"), newdata: sym("new_data") },
  });
}

function registerInterval(registry: ModelRegistry, engine: string, type: PredictionType, interval: string) {
  registry.registerPredict(LINEAR_REG, engine, "regression", type, {
    post: intervalColumns,
    func: { pkg: STATS, fun: "predict" },
    args: {
      object: sym("object"),
      newdata: sym("new_data"),
      interval: literal(interval),
      level: literal(0.95),
    },
  });
}

/**
 * Registers `linear_reg` with the `lm`, `glm`, `rlm` and `glmnet` engines.
 */
export function registerLinearReg(registry: ModelRegistry = getModelRegistry()): void {
  registry.registerModel(LINEAR_REG, { title: "Linear Regression" });
  registry.registerMode(LINEAR_REG, "regression");

  registerFormulaEngine(registry, "lm", STATS, "lm", {});
  registerInterval(registry, "lm", "conf_int", "confidence");
  registerInterval(registry, "lm", "pred_int", "prediction");

  registerFormulaEngine(registry, "glm", STATS, "glm", { family: "gaussian" });
  registerFormulaEngine(registry, "rlm", MASS, "rlm", { method: "M" });

  registry.registerEngine(LINEAR_REG, "regression", GLMNET);
  registry.registerDependency(LINEAR_REG, GLMNET, GLMNET);
  for (const descriptor of GLMNET_ARGUMENTS) {
    registry.registerArgument(LINEAR_REG, GLMNET, descriptor);
  }
  registry.registerFit(LINEAR_REG, GLMNET, "regression", glmnetFitModule("gaussian"));
  registry.registerPredict(LINEAR_REG, GLMNET, "regression", "numeric", glmnetPredictModule("response"));
  registry.registerPredict(LINEAR_REG, GLMNET, "regression", "raw", glmnetPredictModule("response"));

  registry.registerTranslateHook(LINEAR_REG, (context) => {
    checkGlmnetArgs(context);
    return context.args;
  });
}

/**
 * @example
 * ```typescript
 * const spec = linearReg({ penalty: 0.01 }, { engine: "glmnet" });
 * ```
 */
export function linearReg(args: LinearRegArgs = {}, options: ModelConstructorOptions = {}): ModelSpec {
  return createSpec(
    LINEAR_REG,
    {
      args: { penalty: args.penalty, mixture: args.mixture },
      mode: options.mode,
      engine: options.engine,
      engineArgs: options.engineArgs,
    },
    options.registry
  );
}
