/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter, validateAgainst, type JsonSchemaObject } from "@modelspec/util";
import { type Deferred, toDeferred } from "../deferred/Deferred";
import {
  DuplicateModelError,
  DuplicateRegistrationError,
  InvalidModeError,
  ModuleValidationError,
  UnknownEngineError,
  UnknownModelError,
  UnsupportedCombinationError,
} from "../error/ModelError";
import {
  type ArgumentDescriptor,
  ArgumentDescriptorSchema,
  type FitModule,
  type FitModuleInput,
  FitModuleSchema,
  isMode,
  isPredictionType,
  type Mode,
  type ModelInfo,
  MODES,
  type PredictionType,
  type PredictModule,
  type PredictModuleInput,
  PredictModuleSchema,
  type TranslateHook,
} from "./RegistrySchema";

/**
 * Events emitted by the ModelRegistry
 */
export type ModelRegistryEvents = {
  model_registered: [model: string];
  engine_registered: [model: string, mode: Mode, engine: string];
  fit_registered: [model: string, engine: string, mode: Mode];
  predict_registered: [model: string, engine: string, mode: Mode, type: PredictionType];
};

interface ModelEntry {
  readonly name: string;
  readonly title?: string;
  readonly modes: Set<Mode>;
  readonly engines: Map<Mode, Set<string>>;
  readonly arguments: Map<string, ArgumentDescriptor[]>;
  readonly fit: Map<string, Map<Mode, FitModule>>;
  readonly predict: Map<string, Map<Mode, Map<PredictionType, PredictModule>>>;
  readonly dependencies: Map<string, Set<string>>;
  translateHook?: TranslateHook;
}

export interface RegisterModelOptions {
  /** Human readable name, e.g. "Linear Regression" */
  title?: string;
}

function frozenRecord<T>(values: Readonly<Record<string, unknown>> | undefined, wrap: (v: unknown) => T) {
  const out: Record<string, T> = {};
  for (const [name, value] of Object.entries(values ?? {})) {
    out[name] = wrap(value);
  }
  return Object.freeze(out);
}

function sameDescriptor(a: ArgumentDescriptor, b: ArgumentDescriptor): boolean {
  return (
    a.exposed === b.exposed &&
    a.original === b.original &&
    a.has_submodel === b.has_submodel &&
    a.func?.pkg === b.func?.pkg &&
    a.func?.fun === b.func?.fun
  );
}

/**
 * Process-wide store of model metadata: modes, engines, argument name mappings, fit and
 * predict modules, package dependencies and translation hooks.
 *
 * Every `register*` call checks that what it hangs off already exists (a mode needs its
 * model, an engine its mode, a fit module its engine), so the registration order is
 * enforced by the API. Nothing can be removed; tests install a fresh registry with
 * {@link setModelRegistry} instead.
 */
export class ModelRegistry {
  private readonly models = new Map<string, ModelEntry>();

  /** Event emitter for registry events */
  protected events = new EventEmitter<ModelRegistryEvents>();

  on<Event extends keyof ModelRegistryEvents>(
    name: Event,
    fn: (...args: ModelRegistryEvents[Event]) => void
  ) {
    this.events.on(name, fn);
  }

  off<Event extends keyof ModelRegistryEvents>(
    name: Event,
    fn: (...args: ModelRegistryEvents[Event]) => void
  ) {
    this.events.off(name, fn);
  }

  // ========================================================================
  // Registration
  // ========================================================================

  registerModel(name: string, options: RegisterModelOptions = {}): void {
    if (name.length === 0) {
      throw new ModuleValidationError("Model names cannot be empty");
    }
    if (this.models.has(name)) {
      throw new DuplicateModelError(name);
    }
    this.models.set(name, {
      name,
      title: options.title,
      modes: new Set(),
      engines: new Map(),
      arguments: new Map(),
      fit: new Map(),
      predict: new Map(),
      dependencies: new Map(),
    });
    this.events.emit("model_registered", name);
  }

  /**
   * Adds a mode to a model; registering a mode twice is a no-op.
   */
  registerMode(model: string, mode: string): void {
    const entry = this.entry(model);
    if (!isMode(mode)) {
      throw new InvalidModeError(
        `"${mode}" is not a valid mode. Valid modes: ${MODES.map((m) => `"${m}"`).join(", ")}`,
        { model, mode }
      );
    }
    entry.modes.add(mode);
  }

  /**
   * Adds an engine under one of the model's modes; registering it twice is a no-op.
   */
  registerEngine(model: string, mode: Mode, engine: string): void {
    const entry = this.entry(model);
    this.requireMode(entry, mode);
    if (engine.length === 0) {
      throw new ModuleValidationError("Engine names cannot be empty", { model });
    }
    let engines = entry.engines.get(mode);
    if (!engines) {
      engines = new Set();
      entry.engines.set(mode, engines);
    }
    if (engines.has(engine)) return;
    engines.add(engine);
    this.events.emit("engine_registered", model, mode, engine);
  }

  registerArgument(model: string, engine: string, descriptor: ArgumentDescriptor): void {
    const entry = this.entry(model);
    this.requireEngine(entry, engine);
    this.validate(ArgumentDescriptorSchema, descriptor, `argument "${descriptor.exposed}"`);

    for (const fit of entry.fit.get(engine)?.values() ?? []) {
      if (fit.protect.includes(descriptor.original)) {
        throw new ModuleValidationError(
          `Argument "${descriptor.exposed}" maps to "${descriptor.original}", which engine "${engine}" protects`,
          { model, engine }
        );
      }
    }

    let descriptors = entry.arguments.get(engine);
    if (!descriptors) {
      descriptors = [];
      entry.arguments.set(engine, descriptors);
    }
    const existing = descriptors.find((d) => d.exposed === descriptor.exposed);
    if (existing) {
      if (sameDescriptor(existing, descriptor)) return;
      throw new DuplicateRegistrationError(
        `Argument "${descriptor.exposed}" is already registered for model "${model}" and engine "${engine}" with a different mapping`,
        { model, engine, argument: descriptor.exposed }
      );
    }
    descriptors.push(
      Object.freeze({
        exposed: descriptor.exposed,
        original: descriptor.original,
        has_submodel: descriptor.has_submodel,
        ...(descriptor.func ? { func: Object.freeze({ ...descriptor.func }) } : {}),
      })
    );
  }

  registerFit(model: string, engine: string, mode: Mode, input: FitModuleInput): void {
    const entry = this.entry(model);
    this.requireCombination(entry, engine, mode);
    this.validate(
      FitModuleSchema,
      {
        interface: input.interface,
        protect: input.protect,
        func: input.func,
        ...(input.data ? { data: input.data } : {}),
      },
      `fit module for engine "${engine}"`
    );

    let byMode = entry.fit.get(engine);
    if (!byMode) {
      byMode = new Map();
      entry.fit.set(engine, byMode);
    }
    if (byMode.has(mode)) {
      throw new DuplicateRegistrationError(
        `A fit module is already registered for model "${model}", engine "${engine}", mode "${mode}"`,
        { model, engine, mode }
      );
    }

    const defaults = frozenRecord<Deferred>(input.defaults, toDeferred);
    const protectedDefaults = Object.keys(defaults).filter((name) => input.protect.includes(name));
    const protectedArgs = (entry.arguments.get(engine) ?? [])
      .map((d) => d.original)
      .filter((name) => input.protect.includes(name));
    const conflicts = [...protectedDefaults, ...protectedArgs];
    if (conflicts.length > 0) {
      throw new ModuleValidationError(
        `Fit module for engine "${engine}" protects ${conflicts.map((c) => `"${c}"`).join(", ")}, which cannot also be a default or a model argument`,
        { model, engine, mode }
      );
    }

    byMode.set(
      mode,
      Object.freeze({
        interface: input.interface,
        protect: Object.freeze([...input.protect]),
        func: Object.freeze({ ...input.func }),
        defaults,
        ...(input.data ? { data: Object.freeze({ ...input.data }) } : {}),
      })
    );
    this.events.emit("fit_registered", model, engine, mode);
  }

  registerPredict(
    model: string,
    engine: string,
    mode: Mode,
    type: PredictionType,
    input: PredictModuleInput
  ): void {
    const entry = this.entry(model);
    this.requireCombination(entry, engine, mode);
    if (!isPredictionType(type)) {
      throw new ModuleValidationError(`"${type}" is not a prediction type`, { model, engine });
    }
    this.validate(PredictModuleSchema, { func: input.func }, `"${type}" predict module`);

    let byMode = entry.predict.get(engine);
    if (!byMode) {
      byMode = new Map();
      entry.predict.set(engine, byMode);
    }
    let byType = byMode.get(mode);
    if (!byType) {
      byType = new Map();
      byMode.set(mode, byType);
    }
    if (byType.has(type)) {
      throw new DuplicateRegistrationError(
        `A "${type}" predict module is already registered for model "${model}", engine "${engine}", mode "${mode}"`,
        { model, engine, mode, type }
      );
    }
    byType.set(
      type,
      Object.freeze({
        ...(input.pre ? { pre: input.pre } : {}),
        ...(input.post ? { post: input.post } : {}),
        func: Object.freeze({ ...input.func }),
        args: frozenRecord<Deferred>(input.args, toDeferred),
      })
    );
    this.events.emit("predict_registered", model, engine, mode, type);
  }

  /**
   * Declares a package the engine needs at fit time.
   */
  registerDependency(model: string, engine: string, pkg: string): void {
    const entry = this.entry(model);
    this.requireEngine(entry, engine);
    let packages = entry.dependencies.get(engine);
    if (!packages) {
      packages = new Set();
      entry.dependencies.set(engine, packages);
    }
    packages.add(pkg);
  }

  /**
   * Installs the model's translation hook, run after the generic argument merge.
   */
  registerTranslateHook(model: string, hook: TranslateHook): void {
    const entry = this.entry(model);
    if (entry.translateHook) {
      throw new DuplicateRegistrationError(
        `A translation hook is already registered for model "${model}"`,
        { model }
      );
    }
    entry.translateHook = hook;
  }

  // ========================================================================
  // Lookup
  // ========================================================================

  hasModel(model: string): boolean {
    return this.models.has(model);
  }

  modelNames(): string[] {
    return [...this.models.keys()];
  }

  title(model: string): string | undefined {
    return this.entry(model).title;
  }

  modes(model: string): Mode[] {
    return [...this.entry(model).modes];
  }

  /**
   * Engines of the model, in registration order; restricted to `mode` when given.
   */
  engines(model: string, mode?: Mode): string[] {
    const entry = this.entry(model);
    const out = new Set<string>();
    for (const [m, engines] of entry.engines) {
      if (mode && m !== mode) continue;
      engines.forEach((engine) => out.add(engine));
    }
    return [...out];
  }

  /**
   * Modes under which `engine` is registered.
   */
  engineModes(model: string, engine: string): Mode[] {
    const entry = this.entry(model);
    return [...entry.engines].filter(([, engines]) => engines.has(engine)).map(([mode]) => mode);
  }

  argumentDescriptors(model: string, engine: string): readonly ArgumentDescriptor[] {
    return [...(this.entry(model).arguments.get(engine) ?? [])];
  }

  getFit(model: string, engine: string, mode: Mode): FitModule | undefined {
    return this.entry(model).fit.get(engine)?.get(mode);
  }

  getPredict(
    model: string,
    engine: string,
    mode: Mode,
    type: PredictionType
  ): PredictModule | undefined {
    return this.entry(model).predict.get(engine)?.get(mode)?.get(type);
  }

  predictionTypes(model: string, engine: string, mode: Mode): PredictionType[] {
    return [...(this.entry(model).predict.get(engine)?.get(mode)?.keys() ?? [])];
  }

  dependencies(model: string, engine: string): string[] {
    return [...(this.entry(model).dependencies.get(engine) ?? [])];
  }

  getTranslateHook(model: string): TranslateHook | undefined {
    return this.entry(model).translateHook;
  }

  /**
   * Detached view of everything registered for a model, optionally restricted to one
   * mode and/or engine. Used by introspection tooling, not on the fit/predict path.
   */
  lookup(model: string, mode?: Mode, engine?: string): ModelInfo {
    const entry = this.entry(model);
    const keepMode = (m: Mode) => mode === undefined || m === mode;
    const keepEngine = (e: string) => engine === undefined || e === engine;

    const engines = [...entry.engines]
      .filter(([m]) => keepMode(m))
      .flatMap(([m, names]) =>
        [...names].filter(keepEngine).map((name) => ({ engine: name, mode: m }))
      );
    const visibleEngines = new Set(engines.map((e) => e.engine));

    const args = [...entry.arguments]
      .filter(([e]) => visibleEngines.has(e))
      .flatMap(([e, descriptors]) => descriptors.map((d) => ({ ...d, engine: e })));

    const fit = [...entry.fit]
      .filter(([e]) => keepEngine(e))
      .flatMap(([e, byMode]) =>
        [...byMode].filter(([m]) => keepMode(m)).map(([m, module]) => ({ engine: e, mode: m, module }))
      );

    const predict = [...entry.predict]
      .filter(([e]) => keepEngine(e))
      .flatMap(([e, byMode]) =>
        [...byMode]
          .filter(([m]) => keepMode(m))
          .flatMap(([m, byType]) =>
            [...byType].map(([type, module]) => ({ engine: e, mode: m, type, module }))
          )
      );

    const dependencies = [...entry.dependencies]
      .filter(([e]) => visibleEngines.has(e))
      .map(([e, packages]) => ({ engine: e, packages: [...packages] }));

    return {
      name: entry.name,
      ...(entry.title !== undefined ? { title: entry.title } : {}),
      modes: [...entry.modes].filter(keepMode),
      engines,
      arguments: args,
      fit,
      predict,
      dependencies,
    };
  }

  // ========================================================================
  // Prerequisite checks
  // ========================================================================

  private entry(model: string): ModelEntry {
    const entry = this.models.get(model);
    if (!entry) {
      throw new UnknownModelError(model);
    }
    return entry;
  }

  private requireMode(entry: ModelEntry, mode: Mode): void {
    if (!entry.modes.has(mode)) {
      throw new UnsupportedCombinationError(
        `Mode "${mode}" has not been registered for model "${entry.name}"`,
        { model: entry.name, mode }
      );
    }
  }

  private requireEngine(entry: ModelEntry, engine: string): void {
    const known = this.engines(entry.name);
    if (!known.includes(engine)) {
      throw new UnknownEngineError(entry.name, engine, known);
    }
  }

  private requireCombination(entry: ModelEntry, engine: string, mode: Mode): void {
    this.requireMode(entry, mode);
    if (!entry.engines.get(mode)?.has(engine)) {
      throw new UnsupportedCombinationError(
        `Engine "${engine}" is not registered for model "${entry.name}" in mode "${mode}"`,
        { model: entry.name, engine, mode }
      );
    }
  }

  private validate(schema: JsonSchemaObject, value: unknown, what: string): void {
    const result = validateAgainst(schema, value);
    if (!result.valid) {
      throw new ModuleValidationError(`Invalid ${what}: ${result.messages.join(", ")}`);
    }
  }
}

// Singleton instance management for the ModelRegistry
let modelRegistry: ModelRegistry | undefined;

export function getModelRegistry(): ModelRegistry {
  if (!modelRegistry) modelRegistry = new ModelRegistry();
  return modelRegistry;
}

export function setModelRegistry(registry: ModelRegistry): void {
  modelRegistry = registry;
}
