import type { DescriptorRegistry } from "../core/DescriptorRegistry.js";
import type { Filter } from "../core/Filter.js";
import { createFilter, type FilterOptions } from "../core/FilterFactory.js";
import { loadEngineConfig, type EngineConfiguration } from "../spi/configuration.js";
import { configureLogging } from "../utils/logger.js";
import { parseFilterList, parseFilterSpec } from "./parse.js";
import type { FilterSpec } from "./spec.js";

export type BuildOptions = Omit<FilterOptions, "negate">;

export function buildOptionsFrom(config: EngineConfiguration): BuildOptions {
  return { massTolerance: config.massTolerance, validation: config.validation };
}

/**
 * Loads the engine configuration from the environment, applies its logging
 * settings and returns the options to build filters with.
 */
export function configureFromEnv(env: Record<string, string | undefined> = process.env): BuildOptions {
  const config = loadEngineConfig(env);
  configureLogging({ level: config.logLevel, pretty: config.logPretty });
  return buildOptionsFrom(config);
}

/**
 * Resolves the descriptor of a filter specification (text or structured) and
 * builds the filter. Throws UnknownDescriptorError, FilterSpecSyntaxError or
 * FilterConfigurationError.
 */
export function buildFilter(
    input: FilterSpec | string,
    registry: DescriptorRegistry,
    options: BuildOptions = {},
): Filter {
  const s = parseFilterSpec(input);
  return createFilter(registry.get(s.descriptor), s.comparator, s.value ?? "", {
    ...options,
    negate: s.negate ?? false,
  });
}

export function buildFilterList(
    input: unknown,
    registry: DescriptorRegistry,
    options: BuildOptions = {},
): Filter[] {
  return parseFilterList(input).map(s => buildFilter(s, registry, options));
}
