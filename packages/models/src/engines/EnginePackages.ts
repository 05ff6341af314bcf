/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { EnginePackage, type EngineFn } from "@modelspec/core";

export const STATS = "stats";
export const MASS = "MASS";
export const GLMNET = "glmnet";
export const NNET = "nnet";
export const MDA = "mda";
export const KKNN = "kknn";

/**
 * Linear models. Functions the model definitions call:
 *
 * - `lm({ formula, data, weights? })` and `glm({ formula, data, weights?, family })` return
 *   a fitted object.
 * - `predict({ object, newdata, type?, interval?, level? })`:
 *   without `interval`, a `number[]` (for binomial `glm` fits with `type: "response"`, the
 *   probability of the second outcome level); with `interval` of `"confidence"` or
 *   `"prediction"`, a data frame with numeric `fit`, `lwr` and `upr` columns.
 */
export class StatsPackage extends EnginePackage {
  readonly name = STATS;

  constructor(functions?: Record<string, EngineFn>) {
    super(functions);
  }
}

/**
 * Robust regression.
 *
 * - `rlm({ formula, data, weights?, method })` returns a fitted object.
 * - `predict({ object, newdata })` returns a `number[]`.
 */
export class MassPackage extends EnginePackage {
  readonly name = MASS;

  constructor(functions?: Record<string, EngineFn>) {
    super(functions);
  }
}

/**
 * Penalized generalized linear models over a numeric matrix.
 *
 * - `glmnet({ x, y, weights?, family, lambda?, alpha? })` returns a fitted object; `y` is
 *   numeric for `gaussian` and a `Factor` for `binomial` and `multinomial`.
 * - `predict({ object, newx, s, type })` at the single penalty `s`:
 *   `type: "response"` gives a `number[]` (`gaussian`; probability of the second level
 *   for `binomial`) or a data frame with one column per level (`multinomial`);
 *   `type: "class"` gives the predicted levels as `string[]`.
 */
export class GlmnetPackage extends EnginePackage {
  readonly name = GLMNET;

  constructor(functions?: Record<string, EngineFn>) {
    super(functions);
  }
}

/**
 * - `multinom({ formula, data, weights?, decay?, trace })` returns a fitted object.
 * - `predict({ object, newdata, type })`: `"class"` gives `string[]`, `"probs"` a data frame
 *   with one column per level.
 */
export class NnetPackage extends EnginePackage {
  readonly name = NNET;

  constructor(functions?: Record<string, EngineFn>) {
    super(functions);
  }
}

/**
 * - `mda({ formula, data, weights?, subclasses? })` returns a fitted object.
 * - `predict({ object, newdata, type })`: `"class"` gives `string[]`, `"posterior"` a data
 *   frame with one column per level.
 */
export class MdaPackage extends EnginePackage {
  readonly name = MDA;

  constructor(functions?: Record<string, EngineFn>) {
    super(functions);
  }
}

/**
 * - `train.kknn({ formula, data, ks, kernel?, distance? })` returns a fitted object that
 *   keeps its training data.
 * - `predict({ object, newdata, k?, type })` using `k` neighbors (the fitted `ks` when
 *   omitted): `"raw"` gives `string[]` for classification and `number[]` for regression,
 *   `"prob"` a data frame with one column per level.
 */
export class KknnPackage extends EnginePackage {
  readonly name = KKNN;

  constructor(functions?: Record<string, EngineFn>) {
    super(functions);
  }
}
