/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Root of every error thrown by modelspec.
 *
 * Subclasses override the static `type`, which becomes the instance `name` so that
 * errors stay identifiable after crossing a serialization boundary.
 */
export class BaseError extends Error {
  public static type: string = "BaseError";

  /**
   * Extra values describing the failure (argument names, engine, model, ...)
   */
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.type;
    this.details = Object.freeze({ ...details });
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize to a plain object (for logging)
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Normalizes anything thrown into an Error so it can be attached as a cause.
 */
export function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
