// src/core/Evaluator.ts
import type { FilterValue, ScalarValue, ScopeId } from "../spi/types.js";
import { describeValue, stringValue } from "../spi/values.js";
import type { Filter } from "./Filter.js";
import { getLog } from "../utils/logger.js";

const log = getLog("Evaluator");

export type EvaluationErrorReason =
    | "shape-mismatch"
    | "unsupported-comparator"
    | "invalid-target"
    | "unsupported-record"
    | "descriptor-mismatch";

export type FilterOutcome =
    | { readonly status: "satisfied" }
    | { readonly status: "not-satisfied"; readonly missingValue: boolean }
    | { readonly status: "error"; readonly reason: EvaluationErrorReason; readonly message: string };

const SATISFIED: FilterOutcome = { status: "satisfied" };
const NOT_SATISFIED: FilterOutcome = { status: "not-satisfied", missingValue: false };
const MISSING_VALUE: FilterOutcome = { status: "not-satisfied", missingValue: true };

function failure(reason: EvaluationErrorReason, message: string): FilterOutcome {
  return { status: "error", reason, message };
}

// ---------- value shapes ----------

/** Scalars a bool/numerical/literal filter quantifies over; undefined when the shape does not fit. */
function scalarItems(value: FilterValue, acceptStringList: boolean): readonly ScalarValue[] | undefined {
  switch (value.kind) {
    case "bool":
    case "number":
    case "string":
      return [value];
    case "collection":
      return value.items;
    case "stringList":
      return acceptStringList ? value.items.map(stringValue) : undefined;
    default:
      return undefined;
  }
}

/**
 * ALL-quantification: every element must have the expected kind and pass.
 * Returns undefined when an element has another kind.
 */
function allOf<T>(
    items: readonly ScalarValue[],
    pick: (item: ScalarValue) => T | undefined,
    test: (value: T) => boolean,
): boolean | undefined {
  const values: T[] = [];
  for (const item of items) {
    const v = pick(item);
    if (v === undefined) return undefined;
    values.push(v);
  }
  return values.every(test);
}

const asBool = (s: ScalarValue): boolean | undefined => (s.kind === "bool" ? s.value : undefined);
const asNumber = (s: ScalarValue): number | undefined => (s.kind === "number" ? s.value : undefined);
const asString = (s: ScalarValue): string | undefined => (s.kind === "string" ? s.value : undefined);

function stringItems(value: FilterValue): readonly string[] | undefined {
  if (value.kind === "stringList") return value.items;
  if (value.kind !== "collection") return undefined;
  const out: string[] = [];
  for (const item of value.items) {
    if (item.kind !== "string") return undefined;
    out.push(item.value);
  }
  return out;
}

// ---------- evaluation ----------

/**
 * Evaluates a filter against one record and reports why it did or did not
 * match. A missing value never satisfies a filter, negated or not.
 */
export function evaluateDetailed<R>(filter: Filter<R>, record: unknown, scopeId?: ScopeId): FilterOutcome {
  const { descriptor, criterion } = filter;

  if (!descriptor.supportsRecord(record)) {
    return failure("unsupported-record", `'${descriptor.shortName}' does not apply to this record`);
  }

  let raw = descriptor.extract(record);

  if (descriptor.needsScopeRefinement && scopeId !== undefined) {
    if (!descriptor.refine) {
      return failure("descriptor-mismatch", `'${descriptor.shortName}' needs scope refinement but has no refine()`);
    }
    raw = descriptor.refine(scopeId, raw);
  }

  // an aggregate nobody narrowed to a scope stands for its overall value
  if (raw !== null && raw.kind === "scoped") raw = raw.overall;

  if (raw === null) return MISSING_VALUE;

  let base: boolean | undefined;
  switch (criterion.type) {
    case "defective":
      return failure(criterion.reason, criterion.message);

    case "bool": {
      const items = scalarItems(raw, false);
      base = items && allOf(items, asBool, criterion.test);
      break;
    }

    case "numerical": {
      const items = scalarItems(raw, false);
      base = items && allOf(items, asNumber, criterion.test);
      break;
    }

    case "literal": {
      const items = scalarItems(raw, true);
      base = items && allOf(items, asString, criterion.test);
      break;
    }

    case "literal_list": {
      const list = stringItems(raw);
      base = list && criterion.test(list);
      break;
    }

    case "modification":
      base = raw.kind === "modificationList" ? criterion.test(raw.items) : undefined;
      break;
  }

  if (base === undefined) {
    return failure(
        "shape-mismatch",
        `${descriptor.filterType} filter '${descriptor.shortName}' cannot evaluate a ${describeValue(raw)} value`,
    );
  }

  return filter.negate !== base ? SATISFIED : NOT_SATISFIED;
}

/**
 * Fail-closed form of `evaluateDetailed`: evaluation errors count as "not
 * satisfied" and are only logged.
 */
export function satisfiesFilter<R>(filter: Filter<R>, record: unknown, scopeId?: ScopeId): boolean {
  const outcome = evaluateDetailed(filter, record, scopeId);
  if (outcome.status === "error") {
    if (log.isLoggable("debug")) {
      log.debug("filter evaluation failed", {
        filter: filter.toString(),
        reason: outcome.reason,
        detail: outcome.message,
      });
    }
    return false;
  }
  return outcome.status === "satisfied";
}

export { satisfiesFilter as evaluate };
