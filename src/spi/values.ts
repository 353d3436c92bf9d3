// src/spi/values.ts
import type { FilterValue, Modification, ScalarValue, ScopeId } from "./types.js";

export const boolValue = (value: boolean): ScalarValue => ({ kind: "bool", value });
export const numberValue = (value: number): ScalarValue => ({ kind: "number", value });
export const stringValue = (value: string): ScalarValue => ({ kind: "string", value });

export function scalarOf(value: boolean | number | string): ScalarValue {
  if (typeof value === "boolean") return boolValue(value);
  if (typeof value === "number") return numberValue(value);
  return stringValue(value);
}

/** A collection quantified with ALL semantics by scalar filters. */
export function collectionOf(values: readonly (boolean | number | string)[]): FilterValue {
  return { kind: "collection", items: values.map(scalarOf) };
}

export function stringList(items: readonly string[]): FilterValue {
  return { kind: "stringList", items };
}

export function modificationList(items: readonly Modification[]): FilterValue {
  return { kind: "modificationList", items };
}

export function scopedValue(
    overall: FilterValue | null,
    byScope: ReadonlyMap<ScopeId, FilterValue>,
): FilterValue {
  return { kind: "scoped", overall, byScope };
}

/**
 * Default scope refinement: picks the entry of a scoped aggregate for the given
 * scope. Values that are not scoped pass through unchanged.
 */
export function refineByScope(scopeId: ScopeId, value: FilterValue | null): FilterValue | null {
  if (value === null || value.kind !== "scoped") return value;
  return value.byScope.get(scopeId) ?? null;
}

export function describeValue(value: FilterValue): string {
  switch (value.kind) {
    case "bool":
    case "number":
    case "string":
      return value.kind;
    case "collection":
      return `collection<${[...new Set(value.items.map(i => i.kind))].join("|") || "empty"}>`;
    case "stringList":
      return "list<string>";
    case "modificationList":
      return "list<modification>";
    case "scoped":
      return "scoped";
  }
}
