/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { BaseError } from "@modelspec/util";

// ========================================================================
// Registration: programming errors in model-definition code
// ========================================================================

export class RegistrationError extends BaseError {
  public static override type: string = "RegistrationError";
}

export class DuplicateRegistrationError extends RegistrationError {
  public static override type: string = "DuplicateRegistrationError";
}

export class DuplicateModelError extends DuplicateRegistrationError {
  public static override type: string = "DuplicateModelError";
  constructor(model: string) {
    super(`Model "${model}" is already registered`, { model });
  }
}

export class UnknownModelError extends RegistrationError {
  public static override type: string = "UnknownModelError";
  constructor(model: string) {
    super(`Model "${model}" has not been registered`, { model });
  }
}

export class UnknownEngineError extends RegistrationError {
  public static override type: string = "UnknownEngineError";
  constructor(model: string, engine: string, known: readonly string[], mode?: string) {
    const where = mode ? ` in mode "${mode}"` : "";
    const options = known.length > 0 ? known.map((e) => `"${e}"`).join(", ") : "none";
    super(
      `Engine "${engine}" is not registered for model "${model}"${where}. Available engines: ${options}`,
      { model, engine, mode, known }
    );
  }
}

export class UnsupportedCombinationError extends RegistrationError {
  public static override type: string = "UnsupportedCombinationError";
}

/**
 * A fit or predict module whose structure does not match its schema
 */
export class ModuleValidationError extends RegistrationError {
  public static override type: string = "ModuleValidationError";
}

// ========================================================================
// Specification
// ========================================================================

export class SpecificationError extends BaseError {
  public static override type: string = "SpecificationError";
}

export class InvalidModeError extends SpecificationError {
  public static override type: string = "InvalidModeError";
}

export class NoEngineError extends SpecificationError {
  public static override type: string = "NoEngineError";
  constructor(model: string) {
    super(`No engine has been set for model "${model}"; call setEngine() first`, { model });
  }
}

// ========================================================================
// Translation
// ========================================================================

export class TranslationError extends BaseError {
  public static override type: string = "TranslationError";
}

export class ProtectedArgumentError extends TranslationError {
  public static override type: string = "ProtectedArgumentError";
  constructor(args: readonly string[], engine: string) {
    const names = args.map((a) => `"${a}"`).join(", ");
    super(
      `Argument(s) ${names} cannot be set for engine "${engine}": they are filled in from the data at fit time`,
      { args, engine }
    );
  }
}

/**
 * Raised by model translation hooks; the message names the argument.
 */
export class ArgumentValidationError extends TranslationError {
  public static override type: string = "ArgumentValidationError";
  constructor(argument: string, message: string) {
    super(`Argument "${argument}": ${message}`, { argument });
  }
}

// ========================================================================
// Execution
// ========================================================================

export class ExecutionError extends BaseError {
  public static override type: string = "ExecutionError";
}

export class FitExecutionError extends ExecutionError {
  public static override type: string = "FitExecutionError";
}

export class InterfaceMismatchError extends ExecutionError {
  public static override type: string = "InterfaceMismatchError";
}

/**
 * Malformed formulas, missing columns and ragged data frames
 */
export class InvalidDataError extends ExecutionError {
  public static override type: string = "InvalidDataError";
}

export class InvalidOutcomeError extends ExecutionError {
  public static override type: string = "InvalidOutcomeError";
}

export class MissingDependencyError extends ExecutionError {
  public static override type: string = "MissingDependencyError";
  constructor(packages: readonly string[], engine: string) {
    const names = packages.map((p) => `"${p}"`).join(", ");
    super(`Engine "${engine}" requires package(s) ${names}, which are not installed`, {
      packages,
      engine,
    });
  }
}

export class FitControlError extends ExecutionError {
  public static override type: string = "FitControlError";
}

// ========================================================================
// Prediction
// ========================================================================

export class PredictionError extends BaseError {
  public static override type: string = "PredictionError";
}

export class UnsupportedPredictionTypeError extends PredictionError {
  public static override type: string = "UnsupportedPredictionTypeError";
}

export class NoSubmodelSupportError extends PredictionError {
  public static override type: string = "NoSubmodelSupportError";
  constructor(model: string, engine: string) {
    super(`Model "${model}" with engine "${engine}" cannot predict over several submodels`, {
      model,
      engine,
    });
  }
}

export class UnresolvedSymbolError extends PredictionError {
  public static override type: string = "UnresolvedSymbolError";
  constructor(symbols: readonly string[], label: string) {
    const names = symbols.map((s) => `"${s}"`).join(", ");
    super(`Cannot evaluate \`${label}\`: symbol(s) ${names} are not bound`, { symbols });
  }
}

export class UnknownArgumentError extends PredictionError {
  public static override type: string = "UnknownArgumentError";
}

export class PredictionShapeError extends PredictionError {
  public static override type: string = "PredictionShapeError";
}

export class ModelFitFailedError extends PredictionError {
  public static override type: string = "ModelFitFailedError";
  constructor(model: string, cause: Error) {
    super(`Model "${model}" failed to fit; no predictions are available`, { model }, { cause });
  }
}
