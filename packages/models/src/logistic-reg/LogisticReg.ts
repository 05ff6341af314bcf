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
  sym,
} from "@modelspec/core";
import {
  checkGlmnetArgs,
  GLMNET_ARGUMENTS,
  glmnetFitModule,
  glmnetPredictModule,
} from "../common/Glmnet_Modules";
import {
  binomialClasses,
  binomialProbabilities,
  type ModelConstructorOptions,
} from "../common/Model_Helpers";
import { GLMNET, STATS } from "../engines/EnginePackages";

export const LOGISTIC_REG = "logistic_reg";

export interface LogisticRegArgs {
  penalty?: unknown;
  mixture?: unknown;
}

/**
 * Registers `logistic_reg` with the `glm` and `glmnet` engines. Both predict the
 * probability of the second outcome level, which post hooks turn into classes and
 * two-column probabilities.
 */
export function registerLogisticReg(registry: ModelRegistry = getModelRegistry()): void {
  registry.registerModel(LOGISTIC_REG, { title: "Logistic Regression" });
  registry.registerMode(LOGISTIC_REG, "classification");

  registry.registerEngine(LOGISTIC_REG, "classification", "glm");
  registry.registerDependency(LOGISTIC_REG, "glm", STATS);
  registry.registerFit(LOGISTIC_REG, "glm", "classification", {
    interface: "formula",
    protect: ["formula", "data", "weights"],
    func: { pkg: STATS, fun: "glm" },
    defaults: { family: "binomial" },
  });
  const response = {
    func: { pkg: STATS, fun: "predict" },
    args: { object: sym("object"), newdata: sym("new_data"), type: literal("response") },
  };
  registry.registerPredict(LOGISTIC_REG, "glm", "classification", "class", {
    ...response,
    post: binomialClasses,
  });
  registry.registerPredict(LOGISTIC_REG, "glm", "classification", "prob", {
    ...response,
    post: binomialProbabilities,
  });
  registry.registerPredict(LOGISTIC_REG, "glm", "classification", "raw", response);

  registry.registerEngine(LOGISTIC_REG, "classification", GLMNET);
  registry.registerDependency(LOGISTIC_REG, GLMNET, GLMNET);
  for (const descriptor of GLMNET_ARGUMENTS) {
    registry.registerArgument(LOGISTIC_REG, GLMNET, descriptor);
  }
  registry.registerFit(LOGISTIC_REG, GLMNET, "classification", glmnetFitModule("binomial"));
  registry.registerPredict(
    LOGISTIC_REG,
    GLMNET,
    "classification",
    "class",
    glmnetPredictModule("response", binomialClasses)
  );
  registry.registerPredict(
    LOGISTIC_REG,
    GLMNET,
    "classification",
    "prob",
    glmnetPredictModule("response", binomialProbabilities)
  );
  registry.registerPredict(LOGISTIC_REG, GLMNET, "classification", "raw", glmnetPredictModule("response"));

  registry.registerTranslateHook(LOGISTIC_REG, (context) => {
    checkGlmnetArgs(context);
    return context.args;
  });
}

export function logisticReg(
  args: LogisticRegArgs = {},
  options: ModelConstructorOptions = {}
): ModelSpec {
  return createSpec(
    LOGISTIC_REG,
    {
      args: { penalty: args.penalty, mixture: args.mixture },
      mode: options.mode,
      engine: options.engine,
      engineArgs: options.engineArgs,
    },
    options.registry
  );
}
