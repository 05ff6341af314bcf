/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  type Column,
  type DataFrame,
  Factor,
  isFactor,
  isMatrix,
  isNumericColumn,
} from "../data/DataFrame";
import { PredictionShapeError } from "../error/ModelError";
import type { PredictionType } from "../registry/RegistrySchema";

// Canonical prediction values, checked against the number of rows predicted on.

function isColumn(value: unknown): value is Column {
  return isFactor(value) || Array.isArray(value);
}

function isDataFrame(value: unknown): value is DataFrame {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !isFactor(value) &&
    !isMatrix(value) &&
    Object.values(value).every(isColumn)
  );
}

function checkRows(type: PredictionType, length: number, rows: number) {
  if (length !== rows) {
    throw new PredictionShapeError(
      `"${type}" predictions have ${length} rows but new data has ${rows}`,
      { type, predicted: length, rows }
    );
  }
}

function numericColumn(type: PredictionType, value: unknown, what: string): readonly number[] {
  if (!Array.isArray(value) || !value.every((v): v is number => typeof v === "number")) {
    throw new PredictionShapeError(`"${type}" predictions must supply ${what} as numbers`, {
      type,
    });
  }
  return value;
}

/**
 * `number[]`, or a data frame whose `values` column holds them.
 */
export function asNumericPrediction(raw: unknown, rows: number): number[] {
  const column = isDataFrame(raw) && "values" in raw ? raw.values : raw;
  const values = numericColumn("numeric", column, "a numeric vector");
  checkRows("numeric", values.length, rows);
  return [...values];
}

/**
 * A factor, or strings that are converted with the training outcome's levels.
 */
export function asClassPrediction(raw: unknown, rows: number, lvl: readonly string[]): Factor {
  let factor: Factor;
  if (isFactor(raw)) {
    factor = raw;
  } else if (
    Array.isArray(raw) &&
    raw.every((v): v is string | null => typeof v === "string" || v === null)
  ) {
    factor = new Factor(raw, lvl);
  } else {
    throw new PredictionShapeError(`"class" predictions must be a factor or strings`, {
      type: "class",
    });
  }
  checkRows("class", factor.length, rows);
  return factor;
}

/**
 * A data frame with one numeric column per outcome level, reordered to level order.
 */
export function asProbPrediction(raw: unknown, rows: number, lvl: readonly string[]): DataFrame {
  if (!isDataFrame(raw)) {
    throw new PredictionShapeError(`"prob" predictions must be a data frame`, { type: "prob" });
  }
  const missing = lvl.filter((level) => !(level in raw));
  if (missing.length > 0) {
    throw new PredictionShapeError(
      `"prob" predictions lack column(s) for level(s) ${missing.map((m) => `"${m}"`).join(", ")}`,
      { type: "prob", missing }
    );
  }
  const out: Record<string, number[]> = {};
  for (const level of lvl) {
    const column = numericColumn("prob", raw[level], `level "${level}"`);
    checkRows("prob", column.length, rows);
    out[level] = [...column];
  }
  return out;
}

/**
 * A data frame of numeric columns; intervals must have `lower` and `upper`.
 */
export function asFramePrediction(type: PredictionType, raw: unknown, rows: number): DataFrame {
  if (!isDataFrame(raw)) {
    throw new PredictionShapeError(`"${type}" predictions must be a data frame`, { type });
  }
  if ((type === "conf_int" || type === "pred_int") && !("lower" in raw && "upper" in raw)) {
    throw new PredictionShapeError(`"${type}" predictions need "lower" and "upper" columns`, {
      type,
    });
  }
  const out: Record<string, number[]> = {};
  for (const [name, column] of Object.entries(raw)) {
    if (!isNumericColumn(column)) {
      throw new PredictionShapeError(`Column "${name}" of "${type}" predictions is not numeric`, {
        type,
      });
    }
    checkRows(type, column.length, rows);
    out[name] = [...column];
  }
  return out;
}

/**
 * Names prediction columns the way `predict()` returns them.
 */
export function formatPrediction(
  type: Exclude<PredictionType, "raw">,
  value: number[] | Factor | DataFrame
): DataFrame {
  if (type === "numeric" && Array.isArray(value)) {
    return { ".pred": value };
  }
  if (type === "class" && isFactor(value)) {
    return { ".pred_class": value };
  }
  const out: Record<string, Column> = {};
  if (isDataFrame(value)) {
    for (const [name, column] of Object.entries(value)) {
      out[`.pred_${name}`] = column;
    }
  }
  return out;
}
