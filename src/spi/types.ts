// src/spi/types.ts

// ---------- Filter types & comparators ----------
export type FilterType = "bool" | "numerical" | "literal" | "literal_list" | "modification";

export type BoolComparator = "equal";
export type NumericalComparator = "less" | "less_equal" | "equal" | "greater_equal" | "greater";
export type LiteralComparator = "equal" | "contains" | "regex";
export type LiteralListComparator = "contains" | "contains_only" | "regex" | "regex_only";
export type ModificationComparator =
    | "has_any_modification" | "has_description" | "has_mass" | "has_residue";

export type Comparator =
    | BoolComparator
    | NumericalComparator
    | LiteralComparator
    | LiteralListComparator
    | ModificationComparator;

/** The comparators each filter type accepts. */
export interface ComparatorsByType {
  bool: BoolComparator;
  numerical: NumericalComparator;
  literal: LiteralComparator;
  literal_list: LiteralListComparator;
  modification: ModificationComparator;
}

export const COMPARATORS_BY_TYPE: { readonly [T in FilterType]: readonly ComparatorsByType[T][] } = {
  bool: ["equal"],
  numerical: ["less", "less_equal", "equal", "greater_equal", "greater"],
  literal: ["equal", "contains", "regex"],
  literal_list: ["contains", "contains_only", "regex", "regex_only"],
  modification: ["has_any_modification", "has_description", "has_mass", "has_residue"],
};

export const ALL_COMPARATORS: readonly Comparator[] = [
  "equal", "less", "less_equal", "greater_equal", "greater",
  "contains", "regex", "contains_only", "regex_only",
  "has_any_modification", "has_description", "has_mass", "has_residue",
];

// ---------- Domain leaf ----------
export interface Modification {
  readonly description: string | null;
  readonly mass: number;
  readonly residue: string | null;
}

// ---------- Value model ----------
/** Identifies one sub-source of an aggregate value, e.g. one input file. */
export type ScopeId = number;

export type ScalarValue =
    | { readonly kind: "bool"; readonly value: boolean }
    | { readonly kind: "number"; readonly value: number }
    | { readonly kind: "string"; readonly value: string };

export type FilterValue =
    | ScalarValue
    | { readonly kind: "collection"; readonly items: readonly ScalarValue[] }
    | { readonly kind: "stringList"; readonly items: readonly string[] }
    | { readonly kind: "modificationList"; readonly items: readonly Modification[] }
    | {
        readonly kind: "scoped";
        readonly overall: FilterValue | null;
        readonly byScope: ReadonlyMap<ScopeId, FilterValue>;
      };

/** The target a filter compares against. */
export type TargetValue = boolean | number | string;

// ---------- Descriptor capability ----------
export interface FilterDescriptor<R = unknown> {
  /** machine readable name, used in filter specifications */
  readonly shortName: string;
  readonly longName: string;
  /** name shown in filter lists */
  readonly filteringListName: string;
  readonly filterType: FilterType;
  readonly needsScopeRefinement: boolean;

  supportsRecord(record: unknown): record is R;

  /** Must be total over supported records; null means "no value". */
  extract(record: R): FilterValue | null;

  refine?(scopeId: ScopeId, value: FilterValue | null): FilterValue | null;
}
