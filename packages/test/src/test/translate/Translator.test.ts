/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  ArgumentValidationError,
  createSpec,
  expr,
  formatCall,
  InvalidModeError,
  literal,
  ModelRegistry,
  ProtectedArgumentError,
  translateSpec,
} from "@modelspec/core";
import { linearReg, mixtureDa, nearestNeighbor } from "@modelspec/models";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { installRegistries } from "../../binding/Fixtures";

describe("Translator", () => {
  beforeEach(() => {
    installRegistries();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("should rename exposed arguments to the engine's names", () => {
    const call = translateSpec(mixtureDa({ sub_classes: 2 }).setEngine("mda"));
    expect(call.args).toEqual({ subclasses: literal(2) });
    expect(call.func).toEqual({ pkg: "mda", fun: "mda" });
    expect(call.interface).toBe("formula");
    expect(call.data.formula).toBe("formula");
  });

  test("should never carry data slots as arguments", () => {
    const call = translateSpec(mixtureDa({ sub_classes: 2 }).setEngine("mda"));
    for (const slot of ["formula", "data", "x", "y", "weights"]) {
      expect(call.args).not.toHaveProperty(slot);
    }
  });

  test("should fill in the defaults of each engine", () => {
    expect(translateSpec(linearReg().setEngine("glm")).args).toEqual({
      family: literal("gaussian"),
    });
    expect(translateSpec(linearReg().setEngine("rlm")).args).toEqual({ method: literal("M") });
    expect(translateSpec(linearReg().setEngine("lm")).args).toEqual({});
  });

  test("should let user arguments win over defaults", () => {
    const spec = nearestNeighbor({ neighbors: 3 }, { mode: "classification", engine: "kknn" });
    expect(translateSpec(spec).args).toEqual({ ks: literal(3) });
  });

  test("should keep expression defaults unevaluated", () => {
    const spec = nearestNeighbor({}, { mode: "regression", engine: "kknn" });
    const ks = translateSpec(spec).args.ks;
    expect(ks?.kind).toBe("expression");
    expect(ks?.kind === "expression" ? ks.label : undefined).toBe("min(5, n_obs)");
  });

  test("should place engine arguments after renamed and default arguments", () => {
    const spec = linearReg({ penalty: 0.1, mixture: 0.5 }).setEngine("glmnet", { nlambda: 10 });
    const call = translateSpec(spec);
    expect(Object.keys(call.args)).toEqual(["lambda", "alpha", "family", "nlambda"]);
    expect(call.args.nlambda).toEqual(literal(10));
  });

  test("should warn about arguments the engine cannot use", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const call = translateSpec(linearReg({ penalty: 0.1 }).setEngine("lm"));
    expect(call.args).toEqual({});
    expect(warn).toHaveBeenCalledWith(
      'Argument(s) "penalty" cannot be used with engine "lm" and will be ignored'
    );
  });

  test("should refuse to translate while the mode is unknown", () => {
    expect(() => translateSpec(nearestNeighbor().setEngine("kknn"))).toThrow(InvalidModeError);
  });

  describe("protected arguments", () => {
    test("should reject a protected engine argument", () => {
      const spec = linearReg().setEngine("lm", { data: [1, 2] });
      expect(() => translateSpec(spec)).toThrow(ProtectedArgumentError);
      expect(() => translateSpec(spec)).toThrow(
        'Argument(s) "data" cannot be set for engine "lm": they are filled in from the data at fit time'
      );
    });

    test("should reject a protected argument added by a translation hook", () => {
      const registry = new ModelRegistry();
      registry.registerModel("toy_reg");
      registry.registerMode("toy_reg", "regression");
      registry.registerEngine("toy_reg", "regression", "toy");
      registry.registerFit("toy_reg", "toy", "regression", {
        interface: "matrix",
        protect: ["x", "y"],
        func: { fun: "toy" },
      });
      registry.registerTranslateHook("toy_reg", (context) => ({
        ...context.args,
        x: literal([1, 2, 3]),
      }));
      const spec = createSpec("toy_reg", { engine: "toy" }, registry);
      expect(() => translateSpec(spec, registry)).toThrow(ProtectedArgumentError);
    });
  });

  describe("translation hooks", () => {
    test("should leave an unset glmnet penalty out of the call", () => {
      expect(translateSpec(linearReg().setEngine("glmnet")).args).toEqual({
        family: literal("gaussian"),
      });
    });

    test("should reject a negative glmnet penalty", () => {
      expect(() => translateSpec(linearReg({ penalty: -0.5 }).setEngine("glmnet"))).toThrow(
        'Argument "penalty": must be between 0 and Infinity, got -0.5'
      );
    });

    test("should check the mixture range", () => {
      const spec = linearReg({ penalty: 0.1, mixture: 2 }).setEngine("glmnet");
      expect(() => translateSpec(spec)).toThrow(ArgumentValidationError);
      expect(() => translateSpec(spec)).toThrow('Argument "mixture": must be between 0 and 1, got 2');
    });

    test("should let expressions through until fit time", () => {
      const penalty = expr(["n_obs"], ({ n_obs }) => 1 / Number(n_obs), { label: "1 / n_obs" });
      const call = translateSpec(linearReg({ penalty }).setEngine("glmnet"));
      expect(call.args.lambda).toBe(penalty);
    });

    test("should reject a fractional number of subclasses", () => {
      expect(() => translateSpec(mixtureDa({ sub_classes: 1.5 }).setEngine("mda"))).toThrow(
        'Argument "sub_classes": must be a positive whole number, got 1.5'
      );
    });
  });

  describe("formatCall", () => {
    test("should render formula calls", () => {
      const call = translateSpec(mixtureDa({ sub_classes: 2 }).setEngine("mda"));
      expect(formatCall(call)).toBe("mda::mda(formula = <formula>, data = <data>, subclasses = 2)");
    });

    test("should render matrix calls", () => {
      const call = translateSpec(linearReg({ penalty: 0.1, mixture: 0.5 }).setEngine("glmnet"));
      expect(formatCall(call)).toBe(
        'glmnet::glmnet(x = <x>, y = <y>, lambda = 0.1, alpha = 0.5, family = "gaussian")'
      );
    });
  });

  test("should list the packages a fit needs", () => {
    const spec = linearReg().translate("rlm");
    expect(spec.method?.libs).toEqual(["MASS"]);
  });
});
