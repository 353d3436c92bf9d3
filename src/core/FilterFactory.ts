// src/core/FilterFactory.ts
import type { Comparator, FilterDescriptor, TargetValue } from "../spi/types.js";
import { ALL_COMPARATORS } from "../spi/types.js";
import { DEFAULT_MASS_TOLERANCE, type ValidationMode } from "../spi/configuration.js";
import { FilterConfigurationError } from "./errors.js";
import { Filter } from "./Filter.js";
import type { PatternCache } from "./PatternCache.js";
import { compileCriterion } from "./predicates.js";
import { getLog } from "../utils/logger.js";

const log = getLog("FilterFactory");

export interface FilterOptions {
  negate?: boolean | undefined;
  /** Da; tolerance for `has_mass` */
  massTolerance?: number | undefined;
  /**
   * "strict" rejects filters that can never be evaluated. "lenient" builds
   * them anyway; every evaluation then reports an error and never matches.
   */
  validation?: ValidationMode | undefined;
  patternCache?: PatternCache | undefined;
}

export function isComparator(value: string): value is Comparator {
  return ALL_COMPARATORS.some(c => c === value);
}

export function createFilter<R>(
    descriptor: FilterDescriptor<R>,
    comparator: Comparator | string,
    target: TargetValue,
    options: FilterOptions = {},
): Filter<R> {
  if (!isComparator(comparator)) {
    throw new FilterConfigurationError(`Invalid filter '${descriptor.shortName}'`, [
      `unknown comparator '${comparator}'`,
    ]);
  }

  const massTolerance = options.massTolerance ?? DEFAULT_MASS_TOLERANCE;
  if (!Number.isFinite(massTolerance) || massTolerance <= 0) {
    throw new FilterConfigurationError(`Invalid filter '${descriptor.shortName}'`, [
      `mass tolerance must be a positive number, got ${massTolerance}`,
    ]);
  }

  const criterion = compileCriterion(descriptor.filterType, comparator, target, {
    massTolerance,
    patternCache: options.patternCache,
  });

  if (criterion.type === "defective") {
    if ((options.validation ?? "strict") === "strict") {
      throw new FilterConfigurationError(`Invalid filter '${descriptor.shortName}'`, [criterion.message]);
    }
    log.warn("filter built in lenient mode will never match", {
      filter: descriptor.shortName,
      reason: criterion.reason,
      detail: criterion.message,
    });
  }

  const filter = new Filter(descriptor, comparator, target, options.negate ?? false, criterion);
  if (log.isLoggable("debug")) log.debug("filter created", { filter: filter.toString() });
  return filter;
}
