/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  DuplicateModelError,
  DuplicateRegistrationError,
  getModelRegistry,
  InvalidModeError,
  isLiteral,
  literal,
  ModelRegistry,
  ModuleValidationError,
  setModelRegistry,
  sym,
  UnknownEngineError,
  UnknownModelError,
  UnsupportedCombinationError,
} from "@modelspec/core";
import { beforeEach, describe, expect, test, vi } from "vitest";

const FORMULA_FIT = {
  interface: "formula",
  protect: ["formula", "data"],
  func: { pkg: "mda", fun: "mda" },
} as const;

describe("ModelRegistry", () => {
  let registry: ModelRegistry;

  beforeEach(() => {
    setModelRegistry(new ModelRegistry());
    registry = getModelRegistry();
  });

  describe("registration order", () => {
    test("should reject a mode for an unknown model", () => {
      expect(() => registry.registerMode("mixture_da", "classification")).toThrow(
        UnknownModelError
      );
    });

    test("should reject an engine for a mode the model does not have", () => {
      registry.registerModel("mixture_da");
      expect(() => registry.registerEngine("mixture_da", "classification", "mda")).toThrow(
        UnsupportedCombinationError
      );
    });

    test("should reject an argument for an unknown engine", () => {
      registry.registerModel("mixture_da");
      registry.registerMode("mixture_da", "classification");
      expect(() =>
        registry.registerArgument("mixture_da", "mda", {
          exposed: "sub_classes",
          original: "subclasses",
          has_submodel: false,
        })
      ).toThrow(UnknownEngineError);
    });

    test("should reject a fit module for an engine registered under another mode", () => {
      registry.registerModel("nearest_neighbor");
      registry.registerMode("nearest_neighbor", "classification");
      registry.registerMode("nearest_neighbor", "regression");
      registry.registerEngine("nearest_neighbor", "classification", "kknn");
      expect(() =>
        registry.registerFit("nearest_neighbor", "kknn", "regression", FORMULA_FIT)
      ).toThrow(UnsupportedCombinationError);
    });
  });

  describe("duplicates", () => {
    beforeEach(() => {
      registry.registerModel("mixture_da");
      registry.registerMode("mixture_da", "classification");
      registry.registerEngine("mixture_da", "classification", "mda");
    });

    test("should reject a second model with the same name", () => {
      expect(() => registry.registerModel("mixture_da")).toThrow(DuplicateModelError);
    });

    test("should treat repeated modes and engines as no-ops", () => {
      registry.registerMode("mixture_da", "classification");
      registry.registerEngine("mixture_da", "classification", "mda");
      expect(registry.modes("mixture_da")).toEqual(["classification"]);
      expect(registry.engines("mixture_da")).toEqual(["mda"]);
    });

    test("should accept an identical argument twice but not a conflicting one", () => {
      const descriptor = { exposed: "sub_classes", original: "subclasses", has_submodel: false };
      registry.registerArgument("mixture_da", "mda", descriptor);
      registry.registerArgument("mixture_da", "mda", { ...descriptor });
      expect(registry.argumentDescriptors("mixture_da", "mda")).toHaveLength(1);
      expect(() =>
        registry.registerArgument("mixture_da", "mda", { ...descriptor, original: "k" })
      ).toThrow(DuplicateRegistrationError);
    });

    test("should reject a second fit module for the same engine and mode", () => {
      registry.registerFit("mixture_da", "mda", "classification", FORMULA_FIT);
      expect(() =>
        registry.registerFit("mixture_da", "mda", "classification", FORMULA_FIT)
      ).toThrow(DuplicateRegistrationError);
    });

    test("should reject a second predict module of the same type", () => {
      const module = { func: { pkg: "mda", fun: "predict" } };
      registry.registerPredict("mixture_da", "mda", "classification", "class", module);
      registry.registerPredict("mixture_da", "mda", "classification", "prob", module);
      expect(() =>
        registry.registerPredict("mixture_da", "mda", "classification", "class", module)
      ).toThrow(DuplicateRegistrationError);
      expect(registry.predictionTypes("mixture_da", "mda", "classification")).toEqual([
        "class",
        "prob",
      ]);
    });

    test("should reject a second translation hook", () => {
      registry.registerTranslateHook("mixture_da", (context) => context.args);
      expect(() => registry.registerTranslateHook("mixture_da", (context) => context.args)).toThrow(
        DuplicateRegistrationError
      );
    });
  });

  describe("validation", () => {
    beforeEach(() => {
      registry.registerModel("linear_reg");
      registry.registerMode("linear_reg", "regression");
      registry.registerEngine("linear_reg", "regression", "glmnet");
    });

    test("should reject modes outside the known set", () => {
      expect(() => registry.registerMode("linear_reg", "ranking")).toThrow(InvalidModeError);
    });

    test("should reject a fit module with repeated protected names", () => {
      expect(() =>
        registry.registerFit("linear_reg", "glmnet", "regression", {
          interface: "matrix",
          protect: ["x", "x"],
          func: { pkg: "glmnet", fun: "glmnet" },
        })
      ).toThrow(ModuleValidationError);
    });

    test("should reject a fit module with an empty function name", () => {
      expect(() =>
        registry.registerFit("linear_reg", "glmnet", "regression", {
          interface: "matrix",
          protect: ["x", "y"],
          func: { pkg: "glmnet", fun: "" },
        })
      ).toThrow(ModuleValidationError);
    });

    test("should reject a fit module whose defaults set a protected argument", () => {
      expect(() =>
        registry.registerFit("linear_reg", "glmnet", "regression", {
          interface: "matrix",
          protect: ["x", "y"],
          func: { pkg: "glmnet", fun: "glmnet" },
          defaults: { x: 1 },
        })
      ).toThrow(ModuleValidationError);
    });

    test("should reject an argument mapped onto a protected engine argument", () => {
      registry.registerFit("linear_reg", "glmnet", "regression", {
        interface: "matrix",
        protect: ["x", "y", "weights"],
        func: { pkg: "glmnet", fun: "glmnet" },
      });
      expect(() =>
        registry.registerArgument("linear_reg", "glmnet", {
          exposed: "case_weights",
          original: "weights",
          has_submodel: false,
        })
      ).toThrow(ModuleValidationError);
    });

    test("should store plain defaults and predict arguments as literals", () => {
      registry.registerFit("linear_reg", "glmnet", "regression", {
        interface: "matrix",
        protect: ["x", "y"],
        func: { pkg: "glmnet", fun: "glmnet" },
        defaults: { family: "gaussian" },
      });
      registry.registerPredict("linear_reg", "glmnet", "regression", "numeric", {
        func: { pkg: "glmnet", fun: "predict" },
        args: { object: sym("object"), type: "response" },
      });
      const family = registry.getFit("linear_reg", "glmnet", "regression")?.defaults.family;
      expect(family).toEqual(literal("gaussian"));
      const args = registry.getPredict("linear_reg", "glmnet", "regression", "numeric")?.args;
      expect(args && isLiteral(args.object)).toBe(false);
      expect(args?.type).toEqual(literal("response"));
    });
  });

  describe("events", () => {
    test("should emit an event per registration", () => {
      const onModel = vi.fn();
      const onEngine = vi.fn();
      registry.on("model_registered", onModel);
      registry.on("engine_registered", onEngine);
      registry.registerModel("mixture_da");
      registry.registerMode("mixture_da", "classification");
      registry.registerEngine("mixture_da", "classification", "mda");
      registry.registerEngine("mixture_da", "classification", "mda");
      expect(onModel).toHaveBeenCalledWith("mixture_da");
      expect(onEngine).toHaveBeenCalledTimes(1);
      expect(onEngine).toHaveBeenCalledWith("mixture_da", "classification", "mda");
    });
  });

  describe("lookup", () => {
    test("should return exactly what was registered", () => {
      registry.registerModel("mixture_da", { title: "Mixture Discriminant Analysis" });
      registry.registerMode("mixture_da", "classification");
      registry.registerEngine("mixture_da", "classification", "mda");
      registry.registerDependency("mixture_da", "mda", "mda");
      registry.registerArgument("mixture_da", "mda", {
        exposed: "sub_classes",
        original: "subclasses",
        has_submodel: false,
      });
      registry.registerFit("mixture_da", "mda", "classification", FORMULA_FIT);
      registry.registerPredict("mixture_da", "mda", "classification", "class", {
        func: { pkg: "mda", fun: "predict" },
      });

      const info = registry.lookup("mixture_da");
      expect(info.name).toBe("mixture_da");
      expect(info.title).toBe("Mixture Discriminant Analysis");
      expect(info.modes).toEqual(["classification"]);
      expect(info.engines).toEqual([{ engine: "mda", mode: "classification" }]);
      expect(info.arguments).toEqual([
        { engine: "mda", exposed: "sub_classes", original: "subclasses", has_submodel: false },
      ]);
      expect(info.fit).toHaveLength(1);
      expect(info.fit[0].module.protect).toEqual(["formula", "data"]);
      expect(info.fit[0].module.defaults).toEqual({});
      expect(info.predict.map((p) => p.type)).toEqual(["class"]);
      expect(info.dependencies).toEqual([{ engine: "mda", packages: ["mda"] }]);
    });

    test("should restrict the view to one mode", () => {
      registry.registerModel("nearest_neighbor");
      registry.registerMode("nearest_neighbor", "classification");
      registry.registerMode("nearest_neighbor", "regression");
      registry.registerEngine("nearest_neighbor", "classification", "kknn");
      registry.registerEngine("nearest_neighbor", "regression", "kknn");
      registry.registerFit("nearest_neighbor", "kknn", "classification", FORMULA_FIT);
      registry.registerFit("nearest_neighbor", "kknn", "regression", FORMULA_FIT);

      const info = registry.lookup("nearest_neighbor", "regression");
      expect(info.modes).toEqual(["regression"]);
      expect(info.engines).toEqual([{ engine: "kknn", mode: "regression" }]);
      expect(info.fit.map((f) => f.mode)).toEqual(["regression"]);
      expect(registry.engineModes("nearest_neighbor", "kknn")).toEqual([
        "classification",
        "regression",
      ]);
    });
  });
});
