/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { InvalidDataError } from "../error/ModelError";
import { type DataFrame, selectColumns } from "./DataFrame";

/**
 * A parsed `outcome ~ term + term` formula. `predictors` is `"."` for "every other column".
 * Only plain column names are understood; transformations belong to a preprocessing step.
 */
export interface Formula {
  readonly outcome: string;
  readonly predictors: readonly string[] | ".";
  readonly text: string;
}

/** Outcome name used when x/y data is handed to a formula engine */
export const XY_OUTCOME = "..y";

const NAME = /^[A-Za-z.][A-Za-z0-9._]*$/;

export function parseFormula(text: string): Formula {
  const sides = text.split("~");
  if (sides.length !== 2) {
    throw new InvalidDataError(`Formula "${text}" must have exactly one "~"`, { formula: text });
  }
  const outcome = sides[0].trim();
  const rhs = sides[1].trim();
  if (!NAME.test(outcome)) {
    throw new InvalidDataError(`Formula "${text}" needs a single outcome column`, {
      formula: text,
    });
  }
  if (rhs === ".") {
    return { outcome, predictors: ".", text };
  }
  const terms = rhs.split("+").map((term) => term.trim());
  const invalid = terms.filter((term) => !NAME.test(term));
  if (invalid.length > 0) {
    throw new InvalidDataError(
      `Unsupported formula term(s) ${invalid.map((t) => `"${t}"`).join(", ")} in "${text}"`,
      { formula: text }
    );
  }
  return { outcome, predictors: terms, text };
}

/**
 * Predictor column names a formula selects from `data`.
 */
export function predictorNames(formula: Formula, data: DataFrame): string[] {
  if (formula.predictors === ".") {
    return Object.keys(data).filter((name) => name !== formula.outcome);
  }
  return [...formula.predictors];
}

/**
 * Splits data into the outcome column and a data frame of predictors.
 */
export function splitByFormula(formula: Formula, data: DataFrame) {
  const predictors = predictorNames(formula, data);
  const x = selectColumns(data, predictors);
  const y = selectColumns(data, [formula.outcome])[formula.outcome];
  return { x, y, predictors };
}

export function formatFormula(outcome: string, predictors: readonly string[] | "."): string {
  return `${outcome} ~ ${predictors === "." ? "." : predictors.join(" + ")}`;
}
