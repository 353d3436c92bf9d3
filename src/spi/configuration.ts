// src/spi/configuration.ts
import { z } from "zod";
import { FilterConfigurationError } from "../core/errors.js";

export interface Configuration {
  validate(): void;
}

/** Default tolerance (Da) for matching modification masses. */
export const DEFAULT_MASS_TOLERANCE = 0.001;

export type ValidationMode = "strict" | "lenient";

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform(v => v === "true" || v === "1");

const EnvSchema = z.object({
  FILTER_MASS_TOLERANCE: z.coerce.number().positive().finite().default(DEFAULT_MASS_TOLERANCE),
  FILTER_VALIDATION: z.enum(["strict", "lenient"]).default("strict"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: booleanFlag.default("false"),
});

export class EngineConfiguration implements Configuration {
  constructor(
      readonly massTolerance: number = DEFAULT_MASS_TOLERANCE,
      readonly validation: ValidationMode = "strict",
      readonly logLevel: "debug" | "info" | "warn" | "error" | "silent" = "info",
      readonly logPretty = false,
  ) {}

  validate(): void {
    if (!Number.isFinite(this.massTolerance) || this.massTolerance <= 0) {
      throw new FilterConfigurationError("Invalid engine configuration", [
        `massTolerance must be a positive number, got ${this.massTolerance}`,
      ]);
    }
  }
}

/**
 * Reads the engine settings from environment-style key/value pairs.
 * Unset keys fall back to their defaults; invalid ones are reported together.
 */
export function loadEngineConfig(
    env: Record<string, string | undefined> = process.env,
): EngineConfiguration {
  const present = Object.fromEntries(
      Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new FilterConfigurationError(
        "Invalid engine configuration",
        parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const cfg = new EngineConfiguration(
      parsed.data.FILTER_MASS_TOLERANCE,
      parsed.data.FILTER_VALIDATION,
      parsed.data.LOG_LEVEL,
      parsed.data.LOG_PRETTY,
  );
  cfg.validate();
  return cfg;
}
