/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  checkColumnLengths,
  type Column,
  type DataFrame,
  isMatrix,
  type Matrix,
  matrixToDataFrame,
  nrow,
  selectColumns,
  toMatrix,
} from "../data/DataFrame";
import { formatFormula, parseFormula, splitByFormula, XY_OUTCOME } from "../data/Formula";
import { InterfaceMismatchError, InvalidDataError } from "../error/ModelError";
import type { FitInterface, ShapedData } from "../registry/RegistrySchema";
import type { FitPreprocessing } from "./ModelFit";

/**
 * Training data in the shape an engine's interface expects. Only the slots of that
 * interface are set: `formula` + `data`, or `x` + `y`.
 */
export interface ShapedTrainingData {
  readonly formula?: string;
  readonly data?: DataFrame;
  readonly x?: ShapedData;
  readonly y?: Column;
  readonly outcome: Column;
  readonly nObs: number;
  readonly preproc: FitPreprocessing;
}

function numericMatrix(x: DataFrame | Matrix, engineInterface: FitInterface): Matrix {
  if (isMatrix(x)) return x;
  const converted = toMatrix(x);
  if (isMatrix(converted)) return converted;
  throw new InterfaceMismatchError(
    `The engine expects a numeric ${engineInterface}; column(s) ${converted.nonNumeric
      .map((c) => `"${c}"`)
      .join(", ")} are not numeric and no encoding step is defined`,
    { columns: converted.nonNumeric }
  );
}

/**
 * Shapes `formula` + `data` for an engine.
 */
export function shapeFormulaInput(
  formulaText: string,
  data: DataFrame,
  engineInterface: FitInterface
): ShapedTrainingData {
  const formula = parseFormula(formulaText);
  const nObs = nrow(data);
  const { x, y, predictors } = splitByFormula(formula, data);
  const preproc: FitPreprocessing = {
    interface: engineInterface,
    input: "formula",
    predictors,
    outcome: formula.outcome,
    formula: formula.text,
  };

  switch (engineInterface) {
    case "formula":
      return { formula: formula.text, data, outcome: y, nObs, preproc };
    case "matrix":
      return { x: numericMatrix(x, engineInterface), y, outcome: y, nObs, preproc };
    case "data.frame":
      return { x, y, outcome: y, nObs, preproc };
  }
}

/**
 * Shapes predictors `x` and outcome `y` for an engine. Formula engines get the data
 * frame of `x` plus the outcome as `..y`, with the formula `..y ~ .`.
 */
export function shapeXyInput(
  x: DataFrame | Matrix,
  y: Column,
  engineInterface: FitInterface
): ShapedTrainingData {
  const frame = isMatrix(x) ? matrixToDataFrame(x) : x;
  const nObs = nrow(frame);
  if (y.length !== nObs) {
    throw new InvalidDataError(`x has ${nObs} rows but y has ${y.length} values`, {
      rows: nObs,
      outcome: y.length,
    });
  }
  const predictors = Object.keys(frame);

  switch (engineInterface) {
    case "formula": {
      if (XY_OUTCOME in frame) {
        throw new InvalidDataError(`x cannot contain a column named "${XY_OUTCOME}"`);
      }
      const formula = formatFormula(XY_OUTCOME, ".");
      return {
        formula,
        data: { ...frame, [XY_OUTCOME]: y },
        outcome: y,
        nObs,
        preproc: { interface: engineInterface, input: "xy", predictors, outcome: XY_OUTCOME, formula },
      };
    }
    case "matrix":
      return {
        x: numericMatrix(x, engineInterface),
        y,
        outcome: y,
        nObs,
        preproc: { interface: engineInterface, input: "xy", predictors, outcome: XY_OUTCOME },
      };
    case "data.frame":
      return {
        x: frame,
        y,
        outcome: y,
        nObs,
        preproc: { interface: engineInterface, input: "xy", predictors, outcome: XY_OUTCOME },
      };
  }
}

/**
 * Shapes new data like the training data: the same predictor columns, as a matrix for
 * `matrix` engines.
 */
export function shapeNewData(newData: DataFrame | Matrix, preproc: FitPreprocessing): ShapedData {
  const frame = isMatrix(newData) ? matrixToDataFrame(newData) : newData;
  checkColumnLengths(frame);
  const predictors = selectColumns(frame, preproc.predictors);
  return preproc.interface === "matrix"
    ? numericMatrix(predictors, preproc.interface)
    : predictors;
}
