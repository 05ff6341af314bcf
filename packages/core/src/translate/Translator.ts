/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { type Deferred, describeDeferred } from "../deferred/Deferred";
import {
  InvalidModeError,
  NoEngineError,
  ProtectedArgumentError,
  UnsupportedCombinationError,
} from "../error/ModelError";
import { getModelRegistry, type ModelRegistry } from "../registry/ModelRegistry";
import {
  DATA_SLOTS,
  type DataSlot,
  type FitInterface,
  type FunctionReference,
  type Mode,
} from "../registry/RegistrySchema";
import type { ModelSpec } from "../spec/ModelSpec";

/**
 * A ready-to-invoke description of an engine's fit call. `args` use the engine's
 * argument names; `data` names the engine argument each data slot is passed as.
 */
export interface CallDescriptor {
  readonly model: string;
  readonly mode: Mode;
  readonly engine: string;
  readonly func: FunctionReference;
  readonly interface: FitInterface;
  readonly protect: readonly string[];
  readonly data: Readonly<Record<DataSlot, string>>;
  readonly args: Readonly<Record<string, Deferred>>;
}

/**
 * What translation attaches to a spec
 */
export interface SpecMethod {
  readonly fit: CallDescriptor;
  /** Packages that must be installed to run the fit */
  readonly libs: readonly string[];
}

function rejectProtected(
  args: Readonly<Record<string, Deferred>>,
  protect: readonly string[],
  engine: string
) {
  const offending = Object.keys(args).filter((name) => protect.includes(name));
  if (offending.length > 0) {
    throw new ProtectedArgumentError(offending, engine);
  }
}

/**
 * Builds the fit call for `spec` with its engine.
 *
 * User arguments are renamed through the engine's argument descriptors and win over the
 * fit module's defaults; unset arguments without a default are left out. Engine
 * arguments are merged last, unrenamed. No final argument may be one the fit module
 * protects, whichever way it got there, including through the model's translation hook.
 */
export function translateSpec(
  spec: ModelSpec,
  registry: ModelRegistry = getModelRegistry()
): CallDescriptor {
  const { model } = spec;
  const engine = spec.engine;
  if (engine === undefined) {
    throw new NoEngineError(model);
  }
  if (spec.mode === "unknown") {
    throw new InvalidModeError(
      `Model "${model}" supports several modes; set one with setMode() before translating`,
      { model, modes: registry.modes(model) }
    );
  }
  const mode = spec.mode;
  const fit = registry.getFit(model, engine, mode);
  if (!fit) {
    throw new UnsupportedCombinationError(
      `No fit module is registered for model "${model}", engine "${engine}", mode "${mode}"`,
      { model, engine, mode }
    );
  }

  const descriptors = registry.argumentDescriptors(model, engine);
  const merged: Record<string, Deferred> = {};
  for (const descriptor of descriptors) {
    const value = spec.args[descriptor.exposed];
    if (value !== undefined) {
      merged[descriptor.original] = value;
    }
  }

  const known = new Set(descriptors.map((d) => d.exposed));
  const dropped = Object.keys(spec.args).filter(
    (name) => spec.args[name] !== undefined && !known.has(name)
  );
  if (dropped.length > 0) {
    console.warn(
      `Argument(s) ${dropped.map((d) => `"${d}"`).join(", ")} cannot be used with engine "${engine}" and will be ignored`
    );
  }

  for (const [name, value] of Object.entries(fit.defaults)) {
    if (!(name in merged)) {
      merged[name] = value;
    }
  }
  for (const [name, value] of Object.entries(spec.engineArgs)) {
    merged[name] = value;
  }
  rejectProtected(merged, fit.protect, engine);

  let args: Readonly<Record<string, Deferred>> = merged;
  const hook = registry.getTranslateHook(model);
  if (hook) {
    args = { ...hook({ spec, model, mode, engine, args: Object.freeze({ ...merged }) }) };
    rejectProtected(args, fit.protect, engine);
  }

  const data: Record<DataSlot, string> = {
    formula: "formula",
    data: "data",
    x: "x",
    y: "y",
    weights: "weights",
  };
  for (const slot of DATA_SLOTS) {
    data[slot] = fit.data?.[slot] ?? slot;
  }

  return Object.freeze({
    model,
    mode,
    engine,
    func: fit.func,
    interface: fit.interface,
    protect: fit.protect,
    data: Object.freeze(data),
    args: Object.freeze({ ...args }),
  });
}

/**
 * Translation plus the list of packages the fit needs.
 */
export function buildSpecMethod(
  spec: ModelSpec,
  registry: ModelRegistry = getModelRegistry()
): SpecMethod {
  const fit = translateSpec(spec, registry);
  const libs = new Set(registry.dependencies(fit.model, fit.engine));
  if (fit.func.pkg) libs.add(fit.func.pkg);
  return Object.freeze({ fit, libs: Object.freeze([...libs]) });
}

/**
 * Renders a call descriptor as a call template, e.g.
 * `mda::mda(formula = <formula>, data = <data>, subclasses = 2)`.
 */
export function formatCall(call: CallDescriptor): string {
  const slots: readonly DataSlot[] =
    call.interface === "formula" ? ["formula", "data"] : ["x", "y"];
  const parts = [
    ...slots.map((slot) => `${call.data[slot]} = <${slot}>`),
    ...Object.entries(call.args).map(([name, value]) => `${name} = ${describeDeferred(value)}`),
  ];
  const fun = call.func.pkg ? `${call.func.pkg}::${call.func.fun}` : call.func.fun;
  return `${fun}(${parts.join(", ")})`;
}
