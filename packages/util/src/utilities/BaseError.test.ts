/**
 * @license
 * Copyright 2025 Steven Roussey <sroussey@gmail.com>
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, test } from "vitest";
import { asError, BaseError } from "./BaseError";

class ConfigError extends BaseError {
  public static override type: string = "ConfigError";
}

describe("BaseError", () => {
  test("should take its name from the static type", () => {
    const error = new ConfigError("bad option", { option: "verbosity" });
    expect(error).toBeInstanceOf(BaseError);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.name).toBe("ConfigError");
    expect(error.details).toEqual({ option: "verbosity" });
  });

  test("should serialize the cause message", () => {
    const error = new ConfigError("wrapped", {}, { cause: new Error("inner") });
    expect(error.toJSON()).toEqual({
      name: "ConfigError",
      message: "wrapped",
      details: {},
      cause: "inner",
    });
  });

  test("should turn thrown values into errors", () => {
    const error = new Error("kept");
    expect(asError(error)).toBe(error);
    expect(asError("text").message).toBe("text");
  });
});
