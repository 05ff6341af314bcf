/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ArgumentValidationError,
  type DataFrame,
  type Deferred,
  expr,
  fittedArgValue,
  isModelFit,
  type ModelRegistry,
  PredictionError,
  PredictionShapeError,
  type ShapedData,
  type SpecMode,
  type SuccessfulModelFit,
} from "@modelspec/core";

/**
 * Value of the exposed argument `name` in the spec of the fit being predicted from. Read
 * at predict time, so `multiPredict` overrides are seen; expressions resolve against the
 * training data's descriptors.
 */
export function fittedArg(name: string): Deferred {
  return expr(
    ["model_fit"],
    ({ model_fit }) => {
      if (!isModelFit(model_fit) || model_fit.status !== "success") {
        throw new PredictionError(`"model_fit" is not bound to a successful model fit`);
      }
      return fittedArgValue(model_fit, name);
    },
    { label: `model_fit.spec.args.${name}` }
  );
}

/**
 * Pre hook for engines fitted along a penalty path: `predict` needs exactly one penalty.
 */
export function requireSinglePenalty(newData: ShapedData, fit: SuccessfulModelFit): ShapedData {
  const penalty = fittedArgValue(fit, "penalty");
  if (typeof penalty !== "number") {
    throw new PredictionError(
      `"${fit.spec.model}" models fitted with engine "${fit.spec.engine}" need a single numeric penalty to predict; use multiPredict() for several`,
      { model: fit.spec.model, penalty }
    );
  }
  return newData;
}

/**
 * Post hook turning the probability of the second outcome level into a two-column
 * probability data frame.
 */
export function binomialProbabilities(raw: unknown, fit: SuccessfulModelFit): DataFrame {
  const [first, second] = binomialLevels(fit);
  const probs = secondLevelProbabilities(raw);
  return { [first]: probs.map((p) => 1 - p), [second]: probs };
}

/**
 * Post hook turning second-level probabilities into classes at a 0.5 threshold.
 */
export function binomialClasses(raw: unknown, fit: SuccessfulModelFit): string[] {
  const [first, second] = binomialLevels(fit);
  return secondLevelProbabilities(raw).map((p) => (p >= 0.5 ? second : first));
}

function binomialLevels(fit: SuccessfulModelFit): [string, string] {
  const lvl = fit.lvl ?? [];
  if (lvl.length !== 2) {
    throw new PredictionShapeError(
      `Two outcome levels are needed for binomial predictions, found ${lvl.length}`,
      { levels: lvl }
    );
  }
  return [lvl[0], lvl[1]];
}

function secondLevelProbabilities(raw: unknown): number[] {
  const values: unknown[] = Array.isArray(raw) ? raw : [];
  const probs = values.filter((p): p is number => typeof p === "number");
  if (!Array.isArray(raw) || probs.length !== values.length) {
    throw new PredictionShapeError("Binomial predictions must be numeric probabilities");
  }
  return probs;
}

/**
 * Literal numeric values outside `[min, max]` fail translation. Expressions are only
 * known at fit time and pass.
 */
export function checkRange(
  args: Readonly<Record<string, Deferred>>,
  original: string,
  exposed: string,
  min: number,
  max: number
): void {
  const value = args[original];
  if (value === undefined || value.kind !== "literal") return;
  const values: unknown[] = Array.isArray(value.value) ? value.value : [value.value];
  for (const v of values) {
    if (typeof v !== "number" || Number.isNaN(v)) {
      throw new ArgumentValidationError(exposed, `must be numeric, got ${JSON.stringify(v)}`);
    }
    if (v < min || v > max) {
      throw new ArgumentValidationError(exposed, `must be between ${min} and ${max}, got ${v}`);
    }
  }
}

/**
 * Options shared by the model constructors
 */
export interface ModelConstructorOptions {
  mode?: SpecMode;
  engine?: string;
  engineArgs?: Readonly<Record<string, unknown>>;
  registry?: ModelRegistry;
}
