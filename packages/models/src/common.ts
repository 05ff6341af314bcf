/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

// Engine package classes (functions are injected)
export * from "./engines/EnginePackages";

// Shared modules and hooks
export * from "./common/Glmnet_Modules";
export * from "./common/Model_Helpers";

// Model definitions
export * from "./linear-reg/LinearReg";
export * from "./logistic-reg/LogisticReg";
export * from "./mixture-da/MixtureDa";
export * from "./multinom-reg/MultinomReg";
export * from "./nearest-neighbor/NearestNeighbor";

export * from "./RegisterModels";
