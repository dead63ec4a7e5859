import { describe, it, expect } from "vitest";
import { CapabilityError, ConfigError, IncomparableKeysError, IndexError } from "./errors.js";

describe("errors", () => {
  it("should carry stable names and codes", () => {
    const error = new CapabilityError("pairs", "a record build capability");

    expect(error).toBeInstanceOf(IndexError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("CapabilityError");
    expect(error.code).toBe("E_CAPABILITY");
    expect(error.message).toBe('Index "pairs" was built without a record build capability');
  });

  it("should describe the keys that could not be ordered", () => {
    const error = new IncomparableKeysError([1, 2n], null);

    expect(error.code).toBe("E_KEY_ORDER");
    expect(error.message).toBe("Cannot order keys [1, 2n] and null");
    expect(error.left).toEqual([1, 2n]);
  });

  it("should keep the cause", () => {
    const cause = new Error("bad input");
    const error = new ConfigError(["RECORD_INDEX_METRICS: invalid"], { cause });

    expect(error.cause).toBe(cause);
    expect(error.message).toBe("Invalid configuration: RECORD_INDEX_METRICS: invalid");
  });
});
