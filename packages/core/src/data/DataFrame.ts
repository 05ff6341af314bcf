/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { InvalidDataError } from "../error/ModelError";

export type Cell = number | string | boolean | null;

/**
 * Categorical values with an explicit, ordered set of levels.
 * A `null` value is a missing observation.
 */
export class Factor {
  readonly values: readonly (string | null)[];
  readonly levels: readonly string[];

  constructor(values: readonly (string | null)[], levels: readonly string[]) {
    const known = new Set(levels);
    if (known.size !== levels.length) {
      throw new InvalidDataError("Factor levels must be unique", { levels });
    }
    const unknown = values.filter((v): v is string => v !== null && !known.has(v));
    if (unknown.length > 0) {
      throw new InvalidDataError(
        `Factor value(s) ${[...new Set(unknown)].map((v) => `"${v}"`).join(", ")} are not levels`,
        { levels }
      );
    }
    this.values = Object.freeze([...values]);
    this.levels = Object.freeze([...levels]);
  }

  /**
   * Builds a factor; without explicit levels they are the sorted distinct values.
   */
  static from(values: readonly (string | null)[], levels?: readonly string[]): Factor {
    const lvls =
      levels ?? [...new Set(values.filter((v): v is string => v !== null))].sort();
    return new Factor(values, lvls);
  }

  get length(): number {
    return this.values.length;
  }

  /**
   * Rows `indices`, keeping the levels
   */
  pick(indices: readonly number[]): Factor {
    return new Factor(
      indices.map((i) => this.values[i] ?? null),
      this.levels
    );
  }
}

export type Column = readonly Cell[] | Factor;

/**
 * Column-major table. Every column has the same length.
 */
export type DataFrame = Readonly<Record<string, Column>>;

/**
 * Row-major numeric matrix with named columns.
 */
export interface Matrix {
  readonly columns: readonly string[];
  readonly rows: readonly (readonly number[])[];
}

export function isFactor(column: unknown): column is Factor {
  return column instanceof Factor;
}

export function isMatrix(value: unknown): value is Matrix {
  return (
    typeof value === "object" &&
    value !== null &&
    "columns" in value &&
    "rows" in value &&
    Array.isArray(value.columns) &&
    Array.isArray(value.rows)
  );
}

export function columnLength(column: Column): number {
  return column.length;
}

/**
 * Number of rows; throws on ragged frames.
 */
/**
 * Throws unless every column has the same length.
 */
export function checkColumnLengths(data: DataFrame): void {
  const lengths = new Set(Object.values(data).map(columnLength));
  if (lengths.size > 1) {
    throw new InvalidDataError("All data frame columns must have the same length", {
      columns: Object.keys(data),
    });
  }
}

export function nrow(data: DataFrame | Matrix): number {
  if (isMatrix(data)) return data.rows.length;
  checkColumnLengths(data);
  const [first] = Object.values(data);
  return first === undefined ? 0 : columnLength(first);
}

export function columnNames(data: DataFrame | Matrix): string[] {
  return isMatrix(data) ? [...data.columns] : Object.keys(data);
}

export function isNumericColumn(column: Column): column is readonly number[] {
  return !isFactor(column) && column.every((v) => typeof v === "number");
}

export function isCategoricalColumn(column: Column): boolean {
  return isFactor(column) || column.every((v) => typeof v === "string" || v === null);
}

/**
 * Turns a categorical column into a factor (strings get sorted levels).
 */
export function asFactor(column: Column): Factor {
  if (isFactor(column)) return column;
  const values = column.map((v) => {
    if (v === null || typeof v === "string") return v;
    throw new InvalidDataError(`Cannot treat ${JSON.stringify(v)} as a categorical value`);
  });
  return Factor.from(values);
}

export function selectColumns(data: DataFrame, names: readonly string[]): DataFrame {
  const missing = names.filter((name) => !(name in data));
  if (missing.length > 0) {
    throw new InvalidDataError(
      `Column(s) ${missing.map((m) => `"${m}"`).join(", ")} not found in data`,
      { missing }
    );
  }
  const out: Record<string, Column> = {};
  for (const name of names) {
    out[name] = data[name];
  }
  return out;
}

/**
 * Converts a data frame of numeric columns into a matrix.
 * Returns the names of the columns that are not numeric instead when there are any.
 */
export function toMatrix(data: DataFrame): Matrix | { nonNumeric: string[] } {
  const names = Object.keys(data);
  const nonNumeric = names.filter((name) => !isNumericColumn(data[name]));
  if (nonNumeric.length > 0) return { nonNumeric };
  const n = nrow(data);
  const rows: number[][] = [];
  for (let i = 0; i < n; i++) {
    rows.push(
      names.map((name) => {
        const value = data[name];
        return isNumericColumn(value) ? value[i] : NaN;
      })
    );
  }
  return { columns: names, rows };
}

export function matrixToDataFrame(matrix: Matrix): DataFrame {
  const out: Record<string, number[]> = {};
  matrix.columns.forEach((name, j) => {
    out[name] = matrix.rows.map((row) => row[j]);
  });
  return out;
}

