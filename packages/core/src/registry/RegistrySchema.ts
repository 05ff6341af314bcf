/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import type { FromSchema, JsonSchemaObject } from "@modelspec/util";
import type { DataFrame, Matrix } from "../data/DataFrame";
import type { Deferred } from "../deferred/Deferred";
import type { SuccessfulModelFit } from "../fit/ModelFit";
import type { ModelSpec } from "../spec/ModelSpec";

export const MODES = ["classification", "regression", "censored regression"] as const;
export type Mode = (typeof MODES)[number];

/**
 * A spec's mode; `unknown` until the caller picks one of several supported modes.
 */
export type SpecMode = Mode | "unknown";

export const FIT_INTERFACES = ["formula", "data.frame", "matrix"] as const;
export type FitInterface = (typeof FIT_INTERFACES)[number];

export const PREDICTION_TYPES = [
  "numeric",
  "class",
  "prob",
  "conf_int",
  "pred_int",
  "quantile",
  "raw",
] as const;
export type PredictionType = (typeof PREDICTION_TYPES)[number];

/**
 * Data the dispatcher injects into a fit call
 */
export const DATA_SLOTS = ["formula", "data", "x", "y", "weights"] as const;
export type DataSlot = (typeof DATA_SLOTS)[number];

export function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

export function isPredictionType(value: string): value is PredictionType {
  return PREDICTION_TYPES.some((type) => type === value);
}

export const FunctionReferenceSchema = {
  type: "object",
  properties: {
    pkg: { type: "string", minLength: 1 },
    fun: { type: "string", minLength: 1 },
  },
  required: ["fun"],
  additionalProperties: false,
} as const satisfies JsonSchemaObject;

/**
 * The package and name of an engine function, e.g. `{ pkg: "glmnet", fun: "glmnet" }`.
 */
export type FunctionReference = FromSchema<typeof FunctionReferenceSchema>;

export const ArgumentDescriptorSchema = {
  type: "object",
  properties: {
    exposed: { type: "string", minLength: 1 },
    original: { type: "string", minLength: 1 },
    func: FunctionReferenceSchema,
    has_submodel: { type: "boolean" },
  },
  required: ["exposed", "original", "has_submodel"],
  additionalProperties: false,
} as const satisfies JsonSchemaObject;

/**
 * Maps an argument name users see (`exposed`) to the name the engine function expects.
 * `func` names a parameter-object constructor for tuning tools; `has_submodel` marks
 * arguments one fit can predict at several values of.
 */
export type ArgumentDescriptor = FromSchema<typeof ArgumentDescriptorSchema>;

/**
 * Structural part of a fit module; `defaults` are checked separately since they hold
 * deferred values.
 */
export const FitModuleSchema = {
  type: "object",
  properties: {
    interface: { type: "string", enum: FIT_INTERFACES },
    protect: { type: "array", items: { type: "string", minLength: 1 }, uniqueItems: true },
    func: FunctionReferenceSchema,
    data: {
      type: "object",
      properties: {
        formula: { type: "string", minLength: 1 },
        data: { type: "string", minLength: 1 },
        x: { type: "string", minLength: 1 },
        y: { type: "string", minLength: 1 },
        weights: { type: "string", minLength: 1 },
      },
      additionalProperties: false,
    },
  },
  required: ["interface", "protect", "func"],
  additionalProperties: false,
} as const satisfies JsonSchemaObject;

export interface FitModule {
  readonly interface: FitInterface;
  readonly protect: readonly string[];
  readonly func: FunctionReference;
  readonly defaults: Readonly<Record<string, Deferred>>;
  /** Engine argument receiving each data slot; slots map to themselves when absent */
  readonly data?: Readonly<Partial<Record<DataSlot, string>>>;
}

/**
 * Registration input: defaults may be plain values, which are stored as literals.
 */
export interface FitModuleInput extends Omit<FitModule, "defaults"> {
  readonly defaults?: Readonly<Record<string, unknown>>;
}

/**
 * Data handed to an engine's predict function: a data frame, or a matrix for
 * `matrix`-interface engines.
 */
export type ShapedData = DataFrame | Matrix;

export type PredictPreHook = (newData: ShapedData, fit: SuccessfulModelFit) => ShapedData;
export type PredictPostHook = (raw: unknown, fit: SuccessfulModelFit) => unknown;

export const PredictModuleSchema = {
  type: "object",
  properties: {
    func: FunctionReferenceSchema,
  },
  required: ["func"],
  additionalProperties: false,
} as const satisfies JsonSchemaObject;

export interface PredictModule {
  readonly pre?: PredictPreHook;
  readonly post?: PredictPostHook;
  readonly func: FunctionReference;
  /** May reference `object` (the raw fit), `new_data` and `model_fit` */
  readonly args: Readonly<Record<string, Deferred>>;
}

export interface PredictModuleInput extends Omit<PredictModule, "args"> {
  readonly args?: Readonly<Record<string, unknown>>;
}

/**
 * What a translation hook sees: the merged call arguments (engine names) of a spec.
 */
export interface TranslateContext {
  readonly spec: ModelSpec;
  readonly model: string;
  readonly mode: Mode;
  readonly engine: string;
  readonly args: Readonly<Record<string, Deferred>>;
}

/**
 * Model-specific translation step; returns the (possibly rewritten) arguments or throws
 * an `ArgumentValidationError`.
 */
export type TranslateHook = (context: TranslateContext) => Readonly<Record<string, Deferred>>;

/**
 * Detached view of a registry entry, as returned by `ModelRegistry.lookup()`.
 */
export interface ModelInfo {
  readonly name: string;
  readonly title?: string;
  readonly modes: readonly Mode[];
  readonly engines: readonly { readonly engine: string; readonly mode: Mode }[];
  readonly arguments: readonly (ArgumentDescriptor & { readonly engine: string })[];
  readonly fit: readonly { readonly engine: string; readonly mode: Mode; readonly module: FitModule }[];
  readonly predict: readonly {
    readonly engine: string;
    readonly mode: Mode;
    readonly type: PredictionType;
    readonly module: PredictModule;
  }[];
  readonly dependencies: readonly { readonly engine: string; readonly packages: readonly string[] }[];
}
