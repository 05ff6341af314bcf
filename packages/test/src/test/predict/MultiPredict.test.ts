/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  fit,
  hasMultiPredict,
  multiPredict,
  multiPredictArgs,
  NoSubmodelSupportError,
  predict,
  PredictionError,
  UnknownArgumentError,
} from "@modelspec/core";
import { linearReg, mixtureDa, multinomReg, nearestNeighbor } from "@modelspec/models";
import { beforeEach, describe, expect, test } from "vitest";
import { installRegistries, LINE, THREE_CLASS, TWO_CLASS } from "../../binding/Fixtures";

describe("multiPredict", () => {
  beforeEach(() => {
    installRegistries();
  });

  const neighborFit = () =>
    fit(
      nearestNeighbor({ neighbors: 2 }, { mode: "regression", engine: "kknn" }),
      "dist ~ speed",
      LINE
    );

  test("should report which arguments can vary", () => {
    expect(hasMultiPredict(neighborFit())).toBe(true);
    expect(multiPredictArgs(neighborFit())).toEqual(["neighbors"]);
    const lm = fit(linearReg().setEngine("lm"), "dist ~ speed", LINE);
    expect(hasMultiPredict(lm)).toBe(false);
    expect(multiPredictArgs(lm)).toEqual([]);
  });

  test("should nest one row per value for each new data row", () => {
    const result = multiPredict(neighborFit(), { speed: [1, 4] }, { values: { neighbors: [1, 3] } });
    expect(result[".pred"]).toEqual([
      { ".pred": [3, 5], neighbors: [1, 3] },
      { ".pred": [9, 7], neighbors: [1, 3] },
    ]);
    expect(Object.keys(result[".pred"][0])).toEqual([".pred", "neighbors"]);
  });

  test("should order numeric values ascending", () => {
    const result = multiPredict(neighborFit(), { speed: [1, 4] }, { values: { neighbors: [3, 1] } });
    expect(result[".pred"]).toEqual([
      { ".pred": [3, 5], neighbors: [1, 3] },
      { ".pred": [9, 7], neighbors: [1, 3] },
    ]);
  });

  test("should agree with predict at each value", () => {
    const fitted = neighborFit();
    const nested = multiPredict(fitted, { speed: [1, 4] }, { values: { neighbors: [2] } });
    expect(nested[".pred"].map((row) => row[".pred"])).toEqual([[4], [8]]);
    expect(predict(fitted, { speed: [1, 4] })).toEqual({ ".pred": [4, 8] });
  });

  test("should fall back to the fitted spec's values", () => {
    const fitted = fit(
      linearReg({ penalty: [0, 1] }).setEngine("glmnet"),
      "dist ~ speed",
      LINE
    );
    expect(() => predict(fitted, { speed: [5] })).toThrow(
      '"linear_reg" models fitted with engine "glmnet" need a single numeric penalty to predict; use multiPredict() for several'
    );
    expect(multiPredict(fitted, { speed: [5] })[".pred"]).toEqual([
      { ".pred": [11, 8.5], penalty: [0, 1] },
    ]);
  });

  test("should vary class predictions", () => {
    const fitted = fit(multinomReg({ penalty: 0.1 }).setEngine("glmnet"), "species ~ width", THREE_CLASS);
    const result = multiPredict(fitted, { width: [5.5, 11] }, { values: { penalty: [0.1, 0.2] } });
    expect(result[".pred"]).toEqual([
      { ".pred_class": ["b", "b"], penalty: [0.1, 0.2] },
      { ".pred_class": ["c", "c"], penalty: [0.1, 0.2] },
    ]);
  });

  test("should reject arguments that cannot vary", () => {
    expect(() =>
      multiPredict(neighborFit(), { speed: [1] }, { values: { newdata: { speed: [1] } } })
    ).toThrow(
      '"newdata" is not an argument of multiPredict for model "nearest_neighbor"; it can vary "neighbors". Did you mean "new_data"?'
    );
    expect(() =>
      multiPredict(neighborFit(), { speed: [1] }, { values: { weight_func: ["rectangular"] } })
    ).toThrow(UnknownArgumentError);
  });

  test("should reject engines without submodels", () => {
    const fitted = fit(mixtureDa().setEngine("mda"), "species ~ width", TWO_CLASS);
    expect(() => multiPredict(fitted, { width: [1] }, { values: { sub_classes: [1, 2] } })).toThrow(
      NoSubmodelSupportError
    );
  });

  test("should need values to predict at", () => {
    const fitted = fit(
      nearestNeighbor({}, { mode: "regression", engine: "kknn" }),
      "dist ~ speed",
      LINE
    );
    expect(() => multiPredict(fitted, { speed: [1] })).toThrow(PredictionError);
  });
});
