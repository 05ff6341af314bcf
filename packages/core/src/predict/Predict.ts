/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { type DataFrame, type Factor, type Matrix, nrow } from "../data/DataFrame";
import { resolveAll, toDeferred, type Deferred } from "../deferred/Deferred";
import {
  getEnginePackageRegistry,
  type EnginePackageRegistry,
} from "../engine/EnginePackageRegistry";
import {
  ModelFitFailedError,
  PredictionError,
  UnsupportedPredictionTypeError,
} from "../error/ModelError";
import { shapeNewData } from "../fit/DataShaping";
import { isFailedFit, type ModelFit, type SuccessfulModelFit } from "../fit/ModelFit";
import { getModelRegistry, type ModelRegistry } from "../registry/ModelRegistry";
import type { Mode, PredictionType } from "../registry/RegistrySchema";
import type { CallDescriptor } from "../translate/Translator";
import {
  asClassPrediction,
  asFramePrediction,
  asNumericPrediction,
  asProbPrediction,
  formatPrediction,
} from "./PredictFormat";

export interface PredictOptions {
  /** Extra arguments for the engine's predict function; they override the module's */
  opts?: Readonly<Record<string, unknown>>;
  registry?: ModelRegistry;
  packages?: EnginePackageRegistry;
}

/**
 * Canonical value of each prediction type
 */
export interface PredictionValues {
  numeric: number[];
  class: Factor;
  prob: DataFrame;
  conf_int: DataFrame;
  pred_int: DataFrame;
  quantile: DataFrame;
  raw: unknown;
}

const MODES_FOR_TYPE: Readonly<Record<PredictionType, readonly Mode[] | "any">> = {
  numeric: ["regression", "censored regression"],
  class: ["classification"],
  prob: ["classification"],
  conf_int: ["regression", "censored regression"],
  pred_int: ["regression", "censored regression"],
  quantile: ["regression", "censored regression"],
  raw: "any",
};

function fittedCall(fit: SuccessfulModelFit): CallDescriptor {
  const call = fit.spec.method?.fit;
  if (!call) {
    throw new PredictionError(`The spec of this "${fit.spec.model}" fit was never translated`, {
      model: fit.spec.model,
    });
  }
  return call;
}

export function defaultPredictionType(mode: Mode): "class" | "numeric" {
  return mode === "classification" ? "class" : "numeric";
}

/**
 * Runs the engine's predict module for `type` and returns its raw (post-processed)
 * output.
 */
function runPredict(
  fit: ModelFit,
  newData: DataFrame | Matrix,
  type: PredictionType,
  options: PredictOptions
): { raw: unknown; rows: number; fit: SuccessfulModelFit } {
  if (isFailedFit(fit)) {
    throw new ModelFitFailedError(fit.spec.model, fit.error);
  }
  const registry = options.registry ?? getModelRegistry();
  const packages = options.packages ?? getEnginePackageRegistry();
  const { model, engine, mode } = fittedCall(fit);

  const modes = MODES_FOR_TYPE[type];
  if (modes !== "any" && !modes.includes(mode)) {
    throw new UnsupportedPredictionTypeError(
      `"${type}" predictions are not available for ${mode} models`,
      { model, mode, type }
    );
  }
  const module = registry.getPredict(model, engine, mode, type);
  if (!module) {
    const available = registry.predictionTypes(model, engine, mode);
    throw new UnsupportedPredictionTypeError(
      `No "${type}" prediction method for model "${model}" with engine "${engine}" (${mode}). Available types: ${
        available.length > 0 ? available.map((t) => `"${t}"`).join(", ") : "none"
      }`,
      { model, engine, mode, type, available }
    );
  }

  const rows = nrow(newData);
  let shaped = shapeNewData(newData, fit.preproc);
  if (module.pre) shaped = module.pre(shaped, fit);

  const bindings = { object: fit.fit, new_data: shaped, model_fit: fit };
  const extra: Record<string, Deferred> = {};
  for (const [name, value] of Object.entries(options.opts ?? {})) {
    extra[name] = toDeferred(value);
  }
  const args = resolveAll({ ...module.args, ...extra }, bindings);

  const fn = packages.getFunction(module.func, engine);
  let raw = fn(Object.freeze(args));
  if (module.post) raw = module.post(raw, fit);
  return { raw, rows, fit };
}

/**
 * Predictions of `type` in their canonical shape, checked against the number of rows in
 * `newData`.
 */
export function predictValues<T extends PredictionType>(
  fit: ModelFit,
  newData: DataFrame | Matrix,
  type: T,
  options?: PredictOptions
): PredictionValues[T];
export function predictValues(
  fit: ModelFit,
  newData: DataFrame | Matrix,
  type: PredictionType,
  options: PredictOptions = {}
): PredictionValues[PredictionType] {
  const { raw, rows, fit: fitted } = runPredict(fit, newData, type, options);
  switch (type) {
    case "numeric":
      return asNumericPrediction(raw, rows);
    case "class":
      return asClassPrediction(raw, rows, fitted.lvl ?? []);
    case "prob":
      return asProbPrediction(raw, rows, fitted.lvl ?? []);
    case "conf_int":
    case "pred_int":
    case "quantile":
      return asFramePrediction(type, raw, rows);
    case "raw":
      return raw;
  }
}

export function predictNumeric(fit: ModelFit, newData: DataFrame | Matrix, options?: PredictOptions) {
  return predictValues(fit, newData, "numeric", options);
}

export function predictClass(fit: ModelFit, newData: DataFrame | Matrix, options?: PredictOptions) {
  return predictValues(fit, newData, "class", options);
}

export function predictProb(fit: ModelFit, newData: DataFrame | Matrix, options?: PredictOptions) {
  return predictValues(fit, newData, "prob", options);
}

export function predictRaw(fit: ModelFit, newData: DataFrame | Matrix, options?: PredictOptions) {
  return predictValues(fit, newData, "raw", options);
}

export interface PredictCallOptions extends PredictOptions {
  /** Defaults to `class` for classification fits and `numeric` otherwise */
  type?: Exclude<PredictionType, "raw">;
}

/**
 * Predicts on `newData` and returns a data frame with one row per input row:
 * `.pred_class`, one `.pred_<level>` column per level, `.pred`, `.pred_lower` and
 * `.pred_upper`, or one `.pred_<column>` per quantile.
 *
 * @example
 * ```typescript
 * const fitted = fitXy(createSpec("multinom_reg", { args: { penalty: 0.1 } }).setEngine("glmnet"), x, y);
 * predict(fitted, x, { type: "prob" }); // { ".pred_a": [...], ".pred_b": [...] }
 * ```
 */
export function predict(
  fit: ModelFit,
  newData: DataFrame | Matrix,
  options: PredictCallOptions = {}
): DataFrame {
  if (isFailedFit(fit)) {
    throw new ModelFitFailedError(fit.spec.model, fit.error);
  }
  const type = options.type ?? defaultPredictionType(fittedCall(fit).mode);
  switch (type) {
    case "numeric":
      return formatPrediction(type, predictValues(fit, newData, type, options));
    case "class":
      return formatPrediction(type, predictValues(fit, newData, type, options));
    case "prob":
    case "conf_int":
    case "pred_int":
    case "quantile":
      return formatPrediction(type, predictValues(fit, newData, type, options));
  }
}
