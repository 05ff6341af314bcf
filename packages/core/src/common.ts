/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

export * from "./data/DataFrame";
export * from "./data/Formula";
export * from "./deferred/Deferred";
export * from "./engine/EnginePackage";
export * from "./engine/EnginePackageRegistry";
export * from "./error/ModelError";
export * from "./fit/DataShaping";
export * from "./fit/Fit";
export * from "./fit/FitControl";
export * from "./fit/ModelFit";
export * from "./predict/MultiPredict";
export * from "./predict/Predict";
export * from "./predict/PredictFormat";
export * from "./registry/ModelRegistry";
export * from "./registry/RegistrySchema";
export * from "./spec/ModelSpec";
export * from "./spec/formatSpec";
export * from "./translate/Translator";
