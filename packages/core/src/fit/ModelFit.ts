/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { type Bindings, resolve } from "../deferred/Deferred";
import type { FitExecutionError } from "../error/ModelError";
import type { FitInterface } from "../registry/RegistrySchema";
import type { ModelSpec } from "../spec/ModelSpec";

/**
 * How the training data was shaped, so new data can be shaped the same way.
 */
export interface FitPreprocessing {
  /** Interface of the engine's fit function */
  readonly interface: FitInterface;
  /** How the caller supplied the data */
  readonly input: "formula" | "xy";
  readonly predictors: readonly string[];
  readonly outcome: string;
  readonly formula?: string;
}

interface ModelFitBase {
  /** The translated spec that was fitted */
  readonly spec: ModelSpec;
  readonly preproc: FitPreprocessing;
  /** Milliseconds spent in the engine's fit function */
  readonly elapsed: number;
}

export interface SuccessfulModelFit extends ModelFitBase {
  readonly status: "success";
  /** Whatever the engine's fit function returned */
  readonly fit: unknown;
  /** Outcome levels of classification fits */
  readonly lvl?: readonly string[];
  /** Data descriptors (`n_obs`, `n_preds`, `n_levels`) the arguments were resolved against */
  readonly bindings: Bindings;
}

/**
 * Returned instead of throwing when fitting with `catch` set.
 */
export interface FailedModelFit extends ModelFitBase {
  readonly status: "failure";
  readonly error: FitExecutionError;
  readonly fit?: undefined;
}

export type ModelFit = SuccessfulModelFit | FailedModelFit;

export function isFailedFit(fit: ModelFit): fit is FailedModelFit {
  return fit.status === "failure";
}

/**
 * Recognizes a model fit handed through an untyped binding such as `model_fit`.
 */
export function isModelFit(value: unknown): value is ModelFit {
  return (
    typeof value === "object" &&
    value !== null &&
    "status" in value &&
    "spec" in value &&
    "preproc" in value &&
    (value.status === "success" || value.status === "failure")
  );
}

/**
 * Value of the exposed argument `name` in the fitted spec, resolved against the data
 * descriptors of the training data.
 */
export function fittedArgValue(fit: SuccessfulModelFit, name: string): unknown {
  const value = fit.spec.args[name];
  return value === undefined ? undefined : resolve(value, fit.bindings);
}
