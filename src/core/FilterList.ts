// src/core/FilterList.ts
import type { ScopeId } from "../spi/types.js";
import { evaluateDetailed, satisfiesFilter, type FilterOutcome } from "./Evaluator.js";
import type { Filter } from "./Filter.js";
import { getLog } from "../utils/logger.js";

const log = getLog("FilterList");

export interface FilterVerdict {
  filter: Filter;
  outcome: FilterOutcome;
}

/*
 * Composition policy for a list of active filters:
 *  - the list is a logical AND, evaluated in order, stopping at the first
 *    filter the record fails;
 *  - a filter whose descriptor does not apply to the record's kind is skipped,
 *    so one list can hold PSM, peptide and protein filters at once;
 *  - evaluation errors count as failures (fail-closed).
 * An empty list accepts every record.
 */
export function satisfiesFilterList(
    filters: readonly Filter[],
    record: unknown,
    scopeId?: ScopeId,
): boolean {
  for (const filter of filters) {
    if (!filter.descriptor.supportsRecord(record)) continue;
    if (!satisfiesFilter(filter, record, scopeId)) return false;
  }
  return true;
}

export function filterRecords<T>(
    records: readonly T[],
    filters: readonly Filter[],
    scopeId?: ScopeId,
): T[] {
  const accepted = records.filter(r => satisfiesFilterList(filters, r, scopeId));
  if (log.isLoggable("debug")) {
    log.debug("filtered records", {
      filters: filters.map(f => f.toString()),
      scopeId,
      total: records.length,
      accepted: accepted.length,
    });
  }
  return accepted;
}

/** Every applicable filter with its detailed outcome; does not short-circuit. */
export function explainFilterList(
    filters: readonly Filter[],
    record: unknown,
    scopeId?: ScopeId,
): FilterVerdict[] {
  return filters
      .filter(f => f.descriptor.supportsRecord(record))
      .map(filter => ({ filter, outcome: evaluateDetailed(filter, record, scopeId) }));
}
