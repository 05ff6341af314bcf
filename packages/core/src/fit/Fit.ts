/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { asError } from "@modelspec/util";
import {
  asFactor,
  type Column,
  type DataFrame,
  isCategoricalColumn,
  isNumericColumn,
  type Matrix,
} from "../data/DataFrame";
import { resolveAll } from "../deferred/Deferred";
import {
  getEnginePackageRegistry,
  type EnginePackageRegistry,
} from "../engine/EnginePackageRegistry";
import {
  FitExecutionError,
  InterfaceMismatchError,
  InvalidDataError,
  InvalidModeError,
  InvalidOutcomeError,
  MissingDependencyError,
  NoEngineError,
} from "../error/ModelError";
import { getModelRegistry, type ModelRegistry } from "../registry/ModelRegistry";
import { DATA_SLOTS, type DataSlot, type Mode } from "../registry/RegistrySchema";
import type { ModelSpec } from "../spec/ModelSpec";
import { buildSpecMethod, type SpecMethod } from "../translate/Translator";
import { shapeFormulaInput, shapeXyInput, type ShapedTrainingData } from "./DataShaping";
import { type FitControl, fitControl } from "./FitControl";
import type { FailedModelFit, ModelFit, SuccessfulModelFit } from "./ModelFit";

export interface FitOptions {
  control?: Partial<FitControl>;
  /** Case weights, one per row; the engine must accept a `weights` argument */
  weights?: readonly number[];
  registry?: ModelRegistry;
  packages?: EnginePackageRegistry;
}

interface Prepared {
  spec: ModelSpec;
  method: SpecMethod;
  mode: Mode;
  control: FitControl;
  packages: EnginePackageRegistry;
}

function prepare(spec: ModelSpec, options: FitOptions): Prepared {
  const control = fitControl(options.control);
  const registry = options.registry ?? getModelRegistry();
  const packages = options.packages ?? getEnginePackageRegistry();
  if (spec.mode === "unknown") {
    throw new InvalidModeError(
      `Please set the mode of model "${spec.model}" before fitting; possible modes: ${registry
        .modes(spec.model)
        .map((m) => `"${m}"`)
        .join(", ")}`,
      { model: spec.model }
    );
  }
  if (spec.engine === undefined) {
    throw new NoEngineError(spec.model);
  }
  const method = spec.method ?? buildSpecMethod(spec, registry);
  const missing = packages.missing(method.libs);
  if (missing.length > 0) {
    throw new MissingDependencyError(missing, spec.engine);
  }
  return { spec: spec.withMethod(method), method, mode: spec.mode, control, packages };
}

/**
 * Classification outcomes must be categorical and become factors; regression outcomes
 * must be numeric.
 */
function checkOutcome(outcome: Column, mode: Mode, name: string): { y: Column; lvl?: string[] } {
  if (mode === "classification") {
    if (!isCategoricalColumn(outcome)) {
      throw new InvalidOutcomeError(
        `For a classification model, the outcome "${name}" should be a factor or strings`,
        { outcome: name, mode }
      );
    }
    const y = asFactor(outcome);
    return { y, lvl: [...y.levels] };
  }
  if (!isNumericColumn(outcome)) {
    throw new InvalidOutcomeError(`For a ${mode} model, the outcome "${name}" should be numeric`, {
      outcome: name,
      mode,
    });
  }
  return { y: outcome };
}

function run(prepared: Prepared, shaped: ShapedTrainingData, options: FitOptions): ModelFit {
  const { spec, method, mode, control, packages } = prepared;
  const call = method.fit;
  const { y, lvl } = checkOutcome(shaped.outcome, mode, shaped.preproc.outcome);

  const slots: Partial<Record<DataSlot, unknown>> = {};
  if (shaped.formula !== undefined) {
    slots.formula = shaped.formula;
    // formula engines see the converted outcome in their data
    slots.data =
      shaped.data === undefined ? undefined : { ...shaped.data, [shaped.preproc.outcome]: y };
  } else {
    slots.x = shaped.x;
    slots.y = y;
  }
  if (options.weights !== undefined) {
    if (!call.protect.includes("weights")) {
      throw new InterfaceMismatchError(
        `Engine "${call.engine}" of model "${call.model}" does not accept case weights`,
        { model: call.model, engine: call.engine }
      );
    }
    if (options.weights.length !== shaped.nObs) {
      throw new InvalidDataError(
        `${options.weights.length} case weights given for ${shaped.nObs} rows`,
        { weights: options.weights.length, rows: shaped.nObs }
      );
    }
    slots.weights = options.weights;
  }

  const descriptors: Record<string, number> = {
    n_obs: shaped.nObs,
    n_preds: shaped.preproc.predictors.length,
  };
  if (lvl !== undefined) descriptors.n_levels = lvl.length;
  const bindings = { ...slots, ...descriptors };

  const fn = packages.getFunction(call.func, call.engine);
  const args: Record<string, unknown> = {};
  for (const slot of DATA_SLOTS) {
    const value = slots[slot];
    if (value !== undefined) args[call.data[slot]] = value;
  }
  Object.assign(args, resolveAll(call.args, bindings));

  const start = performance.now();
  let result: unknown;
  try {
    result = fn(Object.freeze(args));
  } catch (err) {
    const elapsed = performance.now() - start;
    const cause = asError(err);
    const error = new FitExecutionError(
      `Fitting model "${call.model}" with engine "${call.engine}" failed: ${cause.message}`,
      { model: call.model, engine: call.engine },
      { cause }
    );
    if (!control.catch) throw error;
    if (control.verbosity >= 1) {
      console.warn(error.message);
    }
    const failed: FailedModelFit = {
      status: "failure",
      spec,
      preproc: shaped.preproc,
      elapsed,
      error,
    };
    return Object.freeze(failed);
  }
  const elapsed = performance.now() - start;
  if (control.verbosity >= 2) {
    console.log(`Fit time for ${call.model} (${call.engine}): ${elapsed.toFixed(1)}ms`);
  }
  const fitted: SuccessfulModelFit = {
    status: "success",
    spec,
    preproc: shaped.preproc,
    elapsed,
    fit: result,
    ...(lvl !== undefined ? { lvl } : {}),
    bindings: Object.freeze(descriptors),
  };
  return Object.freeze(fitted);
}

/**
 * Fits `spec` to `data` using a formula such as `"y ~ a + b"` or `"y ~ ."`. The data is
 * reshaped into whatever the engine's fit function takes.
 *
 * Engine failures are rethrown as `FitExecutionError`, or returned as a failed model fit
 * when the control sets `catch`. Data and outcome problems are always thrown.
 */
export function fit(
  spec: ModelSpec,
  formula: string,
  data: DataFrame,
  options: FitOptions = {}
): ModelFit {
  const prepared = prepare(spec, options);
  const shaped = shapeFormulaInput(formula, data, prepared.method.fit.interface);
  return run(prepared, shaped, options);
}

/**
 * Fits `spec` to predictors `x` and outcome `y`.
 */
export function fitXy(
  spec: ModelSpec,
  x: DataFrame | Matrix,
  y: Column,
  options: FitOptions = {}
): ModelFit {
  const prepared = prepare(spec, options);
  const shaped = shapeXyInput(x, y, prepared.method.fit.interface);
  return run(prepared, shaped, options);
}
