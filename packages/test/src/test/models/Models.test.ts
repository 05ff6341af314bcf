/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ArgumentValidationError,
  fit,
  hasMultiPredict,
  type ModelRegistry,
  multiPredict,
  multiPredictArgs,
  predict,
  PredictionError,
  predictClass,
  predictProb,
  translateSpec,
} from "@modelspec/core";
import {
  logisticReg,
  multinomReg,
  nearestNeighbor,
} from "@modelspec/models";
import { beforeEach, describe, expect, test } from "vitest";
import { CentroidFit } from "../../binding/FakeEngines";
import { installRegistries, THREE_CLASS, TWO_CLASS } from "../../binding/Fixtures";

describe("bundled models", () => {
  let registry: ModelRegistry;

  beforeEach(() => {
    registry = installRegistries().registry;
  });

  test("should register every model with its engines", () => {
    expect(registry.modelNames()).toEqual([
      "linear_reg",
      "logistic_reg",
      "multinom_reg",
      "mixture_da",
      "nearest_neighbor",
    ]);
    expect(registry.engines("linear_reg")).toEqual(["lm", "glm", "rlm", "glmnet"]);
    expect(registry.engines("multinom_reg")).toEqual(["glmnet", "nnet"]);
    expect(registry.engineModes("nearest_neighbor", "kknn")).toEqual([
      "classification",
      "regression",
    ]);
  });

  describe("logistic_reg", () => {
    test("should classify with glmnet through the binomial post hooks", () => {
      const fitted = fit(logisticReg({ penalty: 0 }).setEngine("glmnet"), "species ~ width", TWO_CLASS);
      expect(predictClass(fitted, { width: [1.5, 8.5, 4, 6] }).values).toEqual([
        "setosa",
        "virginica",
        "setosa",
        "virginica",
      ]);
      expect(predict(fitted, { width: [5] }, { type: "prob" })).toEqual({
        ".pred_setosa": [0.5],
        ".pred_virginica": [0.5],
      });
    });
  });

  describe("multinom_reg", () => {
    test("should fit nnet with its defaults and renamed penalty", () => {
      const fitted = fit(multinomReg({ penalty: 0.01 }).setEngine("nnet"), "species ~ width", THREE_CLASS);
      const centroids = fitted.fit;
      expect(centroids).toBeInstanceOf(CentroidFit);
      if (centroids instanceof CentroidFit) {
        expect(centroids.args.decay).toBe(0.01);
        expect(centroids.args.trace).toBe(false);
        expect(centroids.centroids).toEqual([2, 6, 10]);
      }
    });

    test("should predict probabilities for every level", () => {
      const fitted = fit(multinomReg({ penalty: 0.01 }).setEngine("nnet"), "species ~ width", THREE_CLASS);
      const probs = predictProb(fitted, { width: [6] });
      expect(Object.keys(probs)).toEqual(["a", "b", "c"]);
      const b = probs.b;
      expect(Array.isArray(b) ? b[0] : undefined).toBeCloseTo(5 / 7);
    });

    test("should fit the whole glmnet path when no penalty is set", () => {
      const fitted = fit(multinomReg().setEngine("glmnet"), "species ~ width", THREE_CLASS);
      expect(fitted.status).toBe("success");
      expect(hasMultiPredict(fitted)).toBe(true);
      expect(multiPredictArgs(fitted)).toEqual(["penalty"]);
      expect(() => predict(fitted, { width: [5] })).toThrow(PredictionError);
      expect(() => predict(fitted, { width: [5] })).toThrow(
        '"multinom_reg" models fitted with engine "glmnet" need a single numeric penalty to predict; use multiPredict() for several'
      );
      expect(multiPredict(fitted, { width: [5] }, { values: { penalty: [0.1, 0.01] } })[".pred"]).toEqual([
        { ".pred_class": ["b", "b"], penalty: [0.01, 0.1] },
      ]);
    });

    test("should reject a negative nnet penalty", () => {
      expect(() => translateSpec(multinomReg({ penalty: -1 }).setEngine("nnet"))).toThrow(
        'Argument "penalty": must be between 0 and Infinity, got -1'
      );
    });
  });

  describe("nearest_neighbor", () => {
    const classifier = (neighbors: number) =>
      nearestNeighbor({ neighbors }, { mode: "classification", engine: "kknn" });

    test("should reject a kernel that is not a name", () => {
      const spec = nearestNeighbor(
        { neighbors: 3, weight_func: 2 },
        { mode: "classification", engine: "kknn" }
      );
      expect(() => translateSpec(spec)).toThrow(ArgumentValidationError);
      expect(() => translateSpec(spec)).toThrow('Argument "weight_func": must be a single kernel name, got 2');
    });

    test("should reject fewer than one neighbor", () => {
      expect(() => translateSpec(classifier(0))).toThrow(
        'Argument "neighbors": must be between 1 and Infinity, got 0'
      );
    });

    test("should vote among the nearest neighbors", () => {
      const fitted = fit(classifier(3), "species ~ width", TWO_CLASS);
      expect(predictProb(fitted, { width: [3, 5] })).toEqual({
        setosa: [1, 2 / 3],
        virginica: [0, 1 / 3],
      });
      expect(predictClass(fitted, { width: [3, 5] }).values).toEqual(["setosa", "setosa"]);
    });

    test("should pass the kernel and distance under the engine's names", () => {
      const spec = nearestNeighbor(
        { neighbors: 3, weight_func: "triangular", dist_power: 1 },
        { mode: "regression", engine: "kknn" }
      );
      const call = translateSpec(spec);
      expect(Object.keys(call.args)).toEqual(["ks", "kernel", "distance"]);
    });
  });
});
