/**
 * Environment configuration
 *
 * RECORD_INDEX_RANGE_END  "exclusive" (default) | "inclusive"
 * RECORD_INDEX_METRICS    "1" (default) | "0"
 *
 * RECORD_INDEX_DEBUG is read by the logger directly.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { IndexConfig } from "./types.js";

const FlagSchema = z.enum(["0", "1"]);

const EnvSchema = z.object({
  RECORD_INDEX_RANGE_END: z.enum(["exclusive", "inclusive"]).default("exclusive"),
  RECORD_INDEX_METRICS: FlagSchema.default("1"),
});

/**
 * Resolve configuration from environment variables
 * Empty variables count as unset.
 * @throws ConfigError listing every invalid variable
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): IndexConfig {
  const input = {
    RECORD_INDEX_RANGE_END: nonEmpty(env.RECORD_INDEX_RANGE_END),
    RECORD_INDEX_METRICS: nonEmpty(env.RECORD_INDEX_METRICS),
  };

  const parsed = EnvSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(issues, { cause: parsed.error });
  }

  return {
    rangeEnd: parsed.data.RECORD_INDEX_RANGE_END,
    metrics: parsed.data.RECORD_INDEX_METRICS === "1",
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}
