/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { getEnginePackageRegistry, type EnginePackageRegistry } from "./EnginePackageRegistry";

/**
 * An engine function: called with one record of keyword arguments, returns an opaque
 * value (a fitted object, raw predictions, ...).
 */
export type EngineFn = (args: Readonly<Record<string, unknown>>) => unknown;

/**
 * A package of engine functions, e.g. the functions a "glmnet" engine calls.
 *
 * The function implementations are **injected via the constructor**, so that a package
 * class can be declared without importing the library that backs it.
 *
 * @example
 * ```typescript
 * class GlmnetPackage extends EnginePackage {
 *   readonly name = "glmnet";
 * }
 * new GlmnetPackage({ glmnet: fitGlmnet, predict: predictGlmnet }).register();
 * ```
 */
export abstract class EnginePackage {
  /** Package name, as used in function references and dependency declarations */
  abstract readonly name: string;

  protected readonly functions: Readonly<Record<string, EngineFn>>;

  constructor(functions: Record<string, EngineFn> = {}) {
    this.functions = Object.freeze({ ...functions });
  }

  get functionNames(): readonly string[] {
    return Object.keys(this.functions);
  }

  getFunction(name: string): EngineFn | undefined {
    return Object.prototype.hasOwnProperty.call(this.functions, name)
      ? this.functions[name]
      : undefined;
  }

  /**
   * Installs this package so engines depending on it can run.
   */
  register(registry: EnginePackageRegistry = getEnginePackageRegistry()): this {
    registry.registerPackage(this);
    return this;
  }
}
