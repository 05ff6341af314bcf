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
import { checkRange, type ModelConstructorOptions } from "../common/Model_Helpers";
import { GLMNET, NNET } from "../engines/EnginePackages";

export const MULTINOM_REG = "multinom_reg";

export interface MultinomRegArgs {
  penalty?: unknown;
  mixture?: unknown;
}

/**
 * Registers `multinom_reg` with the `glmnet` and `nnet` engines.
 */
export function registerMultinomReg(registry: ModelRegistry = getModelRegistry()): void {
  registry.registerModel(MULTINOM_REG, { title: "Multinomial Regression" });
  registry.registerMode(MULTINOM_REG, "classification");

  registry.registerEngine(MULTINOM_REG, "classification", GLMNET);
  registry.registerDependency(MULTINOM_REG, GLMNET, GLMNET);
  for (const descriptor of GLMNET_ARGUMENTS) {
    registry.registerArgument(MULTINOM_REG, GLMNET, descriptor);
  }
  registry.registerFit(MULTINOM_REG, GLMNET, "classification", glmnetFitModule("multinomial"));
  registry.registerPredict(MULTINOM_REG, GLMNET, "classification", "class", glmnetPredictModule("class"));
  registry.registerPredict(MULTINOM_REG, GLMNET, "classification", "prob", glmnetPredictModule("response"));
  registry.registerPredict(MULTINOM_REG, GLMNET, "classification", "raw", glmnetPredictModule("response"));

  registry.registerEngine(MULTINOM_REG, "classification", NNET);
  registry.registerDependency(MULTINOM_REG, NNET, NNET);
  registry.registerArgument(MULTINOM_REG, NNET, {
    exposed: "penalty",
    original: "decay",
    func: { pkg: "dials", fun: "penalty" },
    has_submodel: false,
  });
  registry.registerFit(MULTINOM_REG, NNET, "classification", {
    interface: "formula",
    protect: ["formula", "data", "weights"],
    func: { pkg: NNET, fun: "multinom" },
    defaults: { trace: false },
  });
  for (const [type, nnetType] of [
    ["class", "class"],
    ["prob", "probs"],
    ["raw", "probs"],
  ] as const) {
    registry.registerPredict(MULTINOM_REG, NNET, "classification", type, {
      func: { pkg: NNET, fun: "predict" },
      args: { object: sym("object"), newdata: sym("new_data"), type: literal(nnetType) },
    });
  }

  registry.registerTranslateHook(MULTINOM_REG, (context) => {
    checkGlmnetArgs(context);
    if (context.engine === NNET) {
      checkRange(context.args, "decay", "penalty", 0, Infinity);
    }
    return context.args;
  });
}

export function multinomReg(
  args: MultinomRegArgs = {},
  options: ModelConstructorOptions = {}
): ModelSpec {
  return createSpec(
    MULTINOM_REG,
    {
      args: { penalty: args.penalty, mixture: args.mixture },
      mode: options.mode,
      engine: options.engine,
      engineArgs: options.engineArgs,
    },
    options.registry
  );
}
