/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { MissingDependencyError } from "../error/ModelError";
import type { FunctionReference } from "../registry/RegistrySchema";
import type { EngineFn, EnginePackage } from "./EnginePackage";

/**
 * Package used for function references that name no package
 */
export const BASE_PACKAGE = "base";

/**
 * The installed engine packages. Resolves function references to callables.
 */
export class EnginePackageRegistry {
  private packages: Map<string, EnginePackage> = new Map();

  /**
   * Installs a package; a package with the same name is replaced.
   */
  registerPackage(pkg: EnginePackage): void {
    this.packages.set(pkg.name, pkg);
  }

  getPackage(name: string): EnginePackage | undefined {
    return this.packages.get(name);
  }

  isInstalled(name: string): boolean {
    return this.packages.has(name);
  }

  /**
   * Names in `packages` that are not installed.
   */
  missing(packages: Iterable<string>): string[] {
    return [...new Set(packages)].filter((name) => !this.isInstalled(name));
  }

  /**
   * Resolves a function reference; `engine` is only used in the error message.
   */
  getFunction(ref: FunctionReference, engine: string): EngineFn {
    const pkgName = ref.pkg ?? BASE_PACKAGE;
    const pkg = this.packages.get(pkgName);
    if (!pkg) {
      throw new MissingDependencyError([pkgName], engine);
    }
    const fn = pkg.getFunction(ref.fun);
    if (!fn) {
      throw new MissingDependencyError([`${pkgName}::${ref.fun}`], engine);
    }
    return fn;
  }
}

// Singleton instance management for the EnginePackageRegistry
let enginePackageRegistry: EnginePackageRegistry | undefined;

export function getEnginePackageRegistry(): EnginePackageRegistry {
  if (!enginePackageRegistry) enginePackageRegistry = new EnginePackageRegistry();
  return enginePackageRegistry;
}

export function setEnginePackageRegistry(registry: EnginePackageRegistry): void {
  enginePackageRegistry = registry;
}
