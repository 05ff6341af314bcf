/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { type Cell, type Column, type DataFrame, isFactor, type Matrix, nrow } from "../data/DataFrame";
import { literal } from "../deferred/Deferred";
import {
  ModelFitFailedError,
  NoSubmodelSupportError,
  PredictionError,
  UnknownArgumentError,
} from "../error/ModelError";
import {
  fittedArgValue,
  isFailedFit,
  type ModelFit,
  type SuccessfulModelFit,
} from "../fit/ModelFit";
import { getModelRegistry } from "../registry/ModelRegistry";
import type { PredictionType } from "../registry/RegistrySchema";
import { predict, type PredictOptions } from "./Predict";

export interface MultiPredictOptions extends PredictOptions {
  type?: Exclude<PredictionType, "raw">;
  /** Values to predict at, keyed by exposed argument name (e.g. `penalty`) */
  values?: Readonly<Record<string, unknown>>;
}

function submodelArgs(fit: ModelFit, options: PredictOptions): string[] {
  const registry = options.registry ?? getModelRegistry();
  const engine = fit.spec.engine;
  if (engine === undefined) return [];
  return registry
    .argumentDescriptors(fit.spec.model, engine)
    .filter((descriptor) => descriptor.has_submodel)
    .map((descriptor) => descriptor.exposed);
}

/**
 * Whether the fit can predict at several values of a submodel argument.
 */
export function hasMultiPredict(fit: ModelFit, options: PredictOptions = {}): boolean {
  return submodelArgs(fit, options).length > 0;
}

/**
 * The exposed argument names `multiPredict` can vary.
 */
export function multiPredictArgs(fit: ModelFit, options: PredictOptions = {}): string[] {
  return submodelArgs(fit, options);
}

function asCells(value: unknown, name: string): Cell[] {
  const items: unknown[] = Array.isArray(value) ? value : [value];
  return items.map((item) => {
    if (
      item === null ||
      typeof item === "number" ||
      typeof item === "string" ||
      typeof item === "boolean"
    ) {
      return item;
    }
    throw new PredictionError(`Values of "${name}" must be numbers, strings or booleans`, {
      argument: name,
    });
  });
}

/**
 * Numeric values in ascending order; other values keep their order.
 */
function ordered(values: Cell[]): Cell[] {
  const numbers = values.filter((v): v is number => typeof v === "number");
  return numbers.length === values.length ? numbers.sort((a, b) => a - b) : values;
}

function cellAt(column: Column, i: number): Cell {
  return isFactor(column) ? column.values[i] : column[i];
}

function combinations(grid: readonly (readonly [string, Cell[]])[]): Record<string, Cell>[] {
  let out: Record<string, Cell>[] = [{}];
  for (const [name, values] of grid) {
    out = out.flatMap((combo) => values.map((value) => ({ ...combo, [name]: value })));
  }
  return out;
}

/**
 * Predicts at every combination of submodel argument values from one fit. Values not
 * given in `options.values` come from the fitted spec.
 *
 * Returns one nested data frame per row of `newData`, holding one row per combination
 * (numeric values ascending): the prediction columns followed by the argument columns.
 *
 * @example
 * ```typescript
 * multiPredict(fitted, newData, { type: "prob", values: { penalty: [0.01, 0.1] } });
 * ```
 */
export function multiPredict(
  fit: ModelFit,
  newData: DataFrame | Matrix,
  options: MultiPredictOptions = {}
): { ".pred": DataFrame[] } {
  if (isFailedFit(fit)) {
    throw new ModelFitFailedError(fit.spec.model, fit.error);
  }
  const varying = submodelArgs(fit, options);
  if (varying.length === 0) {
    throw new NoSubmodelSupportError(fit.spec.model, fit.spec.engine ?? "");
  }
  const given = options.values ?? {};
  for (const name of Object.keys(given)) {
    if (varying.includes(name)) continue;
    const hint = name === "newdata" ? ` Did you mean "new_data"?` : "";
    throw new UnknownArgumentError(
      `"${name}" is not an argument of multiPredict for model "${fit.spec.model}"; it can vary ${varying
        .map((v) => `"${v}"`)
        .join(", ")}.${hint}`,
      { argument: name, allowed: varying }
    );
  }

  const grid: [string, Cell[]][] = [];
  for (const name of varying) {
    const raw = name in given ? given[name] : fittedArgValue(fit, name);
    if (raw === undefined) continue;
    grid.push([name, ordered(asCells(raw, name))]);
  }
  if (grid.length === 0) {
    throw new PredictionError(
      `No values to predict at: pass ${varying.map((v) => `"${v}"`).join(", ")} in values`,
      { allowed: varying }
    );
  }

  const rows = nrow(newData);
  const perCombo = combinations(grid).map((combo) => {
    const overrides = Object.fromEntries(
      Object.entries(combo).map(([name, value]) => [name, literal(value)])
    );
    const sub: SuccessfulModelFit = { ...fit, spec: fit.spec.withArgs(overrides) };
    return { combo, predictions: predict(sub, newData, options) };
  });

  const nested: DataFrame[] = [];
  for (let i = 0; i < rows; i++) {
    const table: Record<string, Cell[]> = {};
    for (const { combo, predictions } of perCombo) {
      for (const [name, column] of Object.entries(predictions)) {
        (table[name] ??= []).push(cellAt(column, i));
      }
      for (const [name, value] of Object.entries(combo)) {
        (table[name] ??= []).push(value);
      }
    }
    nested.push(table);
  }
  return { ".pred": nested };
}
