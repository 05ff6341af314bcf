/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { UnresolvedSymbolError } from "../error/ModelError";

/**
 * Named values an expression may reference (`object`, `new_data`, `n_preds`, ...)
 */
export type Bindings = Readonly<Record<string, unknown>>;

export interface LiteralValue<T = unknown> {
  readonly kind: "literal";
  readonly value: T;
}

/**
 * A computation that has not run yet. `symbols` lists every name `evaluate` reads
 * from its scope; resolution refuses to run while any of them is unbound.
 */
export interface ExpressionValue<T = unknown> {
  readonly kind: "expression";
  readonly symbols: readonly string[];
  readonly env: Bindings;
  readonly label: string;
  readonly evaluate: (scope: Bindings) => T;
}

export type Deferred<T = unknown> = LiteralValue<T> | ExpressionValue<T>;

export function literal<T>(value: T): LiteralValue<T> {
  const out: LiteralValue<T> = { kind: "literal", value };
  return Object.freeze(out);
}

/**
 * Captures an expression without evaluating it.
 *
 * @example
 * ```typescript
 * const mtry = expr(["n_preds"], ({ n_preds }) => Math.floor(Math.sqrt(Number(n_preds))), {
 *   label: "floor(sqrt(n_preds))",
 * });
 * ```
 */
export function expr<T>(
  symbols: readonly string[],
  evaluate: (scope: Bindings) => T,
  options: { env?: Bindings; label?: string } = {}
): ExpressionValue<T> {
  const out: ExpressionValue<T> = {
    kind: "expression",
    symbols: Object.freeze([...symbols]),
    env: Object.freeze({ ...(options.env ?? {}) }),
    label: options.label ?? `<expr: ${symbols.join(", ")}>`,
    evaluate,
  };
  return Object.freeze(out);
}

/**
 * An expression that evaluates to the value bound to `name`.
 */
export function sym(name: string): ExpressionValue<unknown> {
  return expr([name], (scope) => scope[name], { label: name });
}

export function isDeferred(value: unknown): value is Deferred {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false;
  if (value.kind === "literal") return "value" in value;
  return value.kind === "expression" && "evaluate" in value && typeof value.evaluate === "function";
}

export function isLiteral<T>(value: Deferred<T>): value is LiteralValue<T> {
  return value.kind === "literal";
}

/**
 * Wraps plain values as literals; deferred values pass through.
 */
export function toDeferred(value: unknown): Deferred {
  return isDeferred(value) ? value : literal(value);
}

/**
 * Symbols of `value` bound in neither its environment nor `bindings`.
 */
export function unboundSymbols(value: Deferred, bindings: Bindings = {}): string[] {
  if (value.kind === "literal") return [];
  return value.symbols.filter((name) => !(name in bindings) && !(name in value.env));
}

/**
 * Evaluates `value`. `bindings` shadow the expression's captured environment.
 */
export function resolve<T>(value: Deferred<T>, bindings: Bindings = {}): T {
  if (value.kind === "literal") return value.value;
  const missing = unboundSymbols(value, bindings);
  if (missing.length > 0) {
    throw new UnresolvedSymbolError(missing, value.label);
  }
  return value.evaluate({ ...value.env, ...bindings });
}

export function resolveAll(
  values: Readonly<Record<string, Deferred>>,
  bindings: Bindings = {}
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(values)) {
    out[name] = resolve(value, bindings);
  }
  return out;
}

export function describeDeferred(value: Deferred): string {
  if (value.kind === "expression") return value.label;
  const v = value.value;
  if (typeof v === "string") return JSON.stringify(v);
  if (Array.isArray(v)) return `[${v.map((item) => describeDeferred(toDeferred(item))).join(", ")}]`;
  if (typeof v === "function") return "<function>";
  return String(v);
}
