/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  type ArgumentDescriptor,
  type FitModuleInput,
  literal,
  type PredictModuleInput,
  type PredictPostHook,
  sym,
  type TranslateContext,
} from "@modelspec/core";
import { GLMNET } from "../engines/EnginePackages";
import { checkRange, fittedArg, requireSinglePenalty } from "./Model_Helpers";

export const GLMNET_ARGUMENTS: readonly ArgumentDescriptor[] = [
  {
    exposed: "penalty",
    original: "lambda",
    func: { pkg: "dials", fun: "penalty" },
    has_submodel: true,
  },
  {
    exposed: "mixture",
    original: "alpha",
    func: { pkg: "dials", fun: "mixture" },
    has_submodel: false,
  },
];

export type GlmnetFamily = "gaussian" | "binomial" | "multinomial";

export function glmnetFitModule(family: GlmnetFamily): FitModuleInput {
  return {
    interface: "matrix",
    protect: ["x", "y", "weights"],
    func: { pkg: GLMNET, fun: "glmnet" },
    defaults: { family },
  };
}

/**
 * Predicts at the fitted spec's single penalty.
 */
export function glmnetPredictModule(
  type: "response" | "class",
  post?: PredictPostHook
): PredictModuleInput {
  return {
    pre: requireSinglePenalty,
    ...(post ? { post } : {}),
    func: { pkg: GLMNET, fun: "predict" },
    args: {
      object: sym("object"),
      newx: sym("new_data"),
      s: fittedArg("penalty"),
      type: literal(type),
    },
  };
}

/**
 * The penalty cannot be negative; the mixture must be in [0, 1]. An unset penalty fits
 * the whole path, and predictions then need one (or `multiPredict` values).
 */
export function checkGlmnetArgs(context: TranslateContext): void {
  if (context.engine !== GLMNET) return;
  checkRange(context.args, "lambda", "penalty", 0, Infinity);
  checkRange(context.args, "alpha", "mixture", 0, 1);
}
