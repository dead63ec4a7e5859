import { describe, it, expect } from "vitest";
import { resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("resolveConfig", () => {
  it("should default to an exclusive end with metrics on", () => {
    expect(resolveConfig({})).toEqual({ rangeEnd: "exclusive", metrics: true });
  });

  it("should read both variables", () => {
    expect(
      resolveConfig({ RECORD_INDEX_RANGE_END: "inclusive", RECORD_INDEX_METRICS: "0" })
    ).toEqual({ rangeEnd: "inclusive", metrics: false });
  });

  it("should treat blank variables as unset and trim values", () => {
    expect(
      resolveConfig({ RECORD_INDEX_RANGE_END: "  ", RECORD_INDEX_METRICS: " 0 " })
    ).toEqual({ rangeEnd: "exclusive", metrics: false });
  });

  it("should list every invalid variable", () => {
    let caught: unknown;
    try {
      resolveConfig({ RECORD_INDEX_RANGE_END: "open", RECORD_INDEX_METRICS: "yes" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.code).toBe("E_CONFIG");
    expect(caught.issues).toHaveLength(2);
    expect(caught.issues[0]).toMatch(/^RECORD_INDEX_RANGE_END: /);
    expect(caught.issues[1]).toMatch(/^RECORD_INDEX_METRICS: /);
  });
});
