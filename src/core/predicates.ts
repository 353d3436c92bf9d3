// src/core/predicates.ts
import type { Comparator, FilterType, Modification, TargetValue } from "../spi/types.js";
import { COMPARATORS_BY_TYPE } from "../spi/types.js";
import { compileFullMatch, type PatternCache } from "./PatternCache.js";

/**
 * A comparator and target compiled for one filter type. Each `test` yields the
 * base result, before negation. A `defective` criterion carries the reason the
 * filter could not be compiled; it never matches.
 */
export type Criterion =
    | { readonly type: "bool"; readonly test: (value: boolean) => boolean }
    | { readonly type: "numerical"; readonly test: (value: number) => boolean }
    | { readonly type: "literal"; readonly test: (value: string) => boolean }
    | { readonly type: "literal_list"; readonly test: (list: readonly string[]) => boolean }
    | { readonly type: "modification"; readonly test: (mods: readonly Modification[]) => boolean }
    | {
        readonly type: "defective";
        readonly filterType: FilterType;
        readonly reason: "unsupported-comparator" | "invalid-target";
        readonly message: string;
      };

export interface CompileOptions {
  massTolerance: number;
  patternCache?: PatternCache | undefined;
}

// ---------- literal_list ----------

/** True iff at least one element passes. */
export function anyElement(list: readonly string[], test: (s: string) => boolean): boolean {
  return list.some(test);
}

/**
 * True iff the list is non-empty, its first element passes, and so does every
 * other element. A list whose first element fails is rejected even when later
 * elements pass.
 */
export function onlyElements(list: readonly string[], test: (s: string) => boolean): boolean {
  const first = list[0];
  if (first === undefined || !test(first)) return false;
  return list.every(test);
}

// ---------- modification ----------

export function hasDescription(mods: readonly Modification[], description: string): boolean {
  return mods.some(m => m.description !== null && m.description === description);
}

export function hasMass(mods: readonly Modification[], mass: number, tolerance: number): boolean {
  return mods.some(m => Math.abs(m.mass - mass) <= tolerance);
}

/** Prefix match on the residue, so "S" also finds residues recorded as "STY". */
export function hasResidue(mods: readonly Modification[], residue: string): boolean {
  return mods.some(m => m.residue !== null && String(m.residue).startsWith(residue));
}

const DECIMAL_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$|^[+-]?Infinity$/;

/**
 * Parses a decimal literal such as "79.97" or "1e3"; undefined when the text is
 * not one. Hex, binary and octal forms are not decimals.
 */
export function parseDecimal(text: string): number | undefined {
  const trimmed = text.trim();
  return DECIMAL_RE.test(trimmed) ? Number(trimmed) : undefined;
}

// ---------- target normalisation ----------

function toBoolean(target: TargetValue): boolean | undefined {
  if (typeof target === "boolean") return target;
  if (typeof target === "string") {
    const t = target.trim().toLowerCase();
    if (t === "true") return true;
    if (t === "false") return false;
  }
  return undefined;
}

function toNumber(target: TargetValue): number | undefined {
  if (typeof target === "number") return Number.isNaN(target) ? undefined : target;
  if (typeof target === "string") return parseDecimal(target);
  return undefined;
}

function toText(target: TargetValue): string {
  return typeof target === "string" ? target : String(target);
}

// ---------- compilation ----------

function defective(
    filterType: FilterType,
    reason: "unsupported-comparator" | "invalid-target",
    message: string,
): Criterion {
  return { type: "defective", filterType, reason, message };
}

function compilePattern(
    filterType: FilterType,
    pattern: string,
    cache: PatternCache | undefined,
): RegExp | Criterion {
  try {
    return compileFullMatch(pattern, cache);
  } catch (e) {
    const why = e instanceof Error ? e.message : String(e);
    return defective(filterType, "invalid-target", `invalid pattern '${pattern}' (${why})`);
  }
}

/** The comparator narrowed to those `allowed` by one filter type. */
function narrow<C extends Comparator>(allowed: readonly C[], comparator: Comparator): C | undefined {
  return allowed.find(c => c === comparator);
}

function unreachable(value: never): never {
  throw new Error(`Unhandled comparator '${String(value)}'`);
}

export function compileCriterion(
    filterType: FilterType,
    comparator: Comparator,
    target: TargetValue,
    options: CompileOptions,
): Criterion {
  const unsupported = (): Criterion => defective(
      filterType,
      "unsupported-comparator",
      `comparator '${comparator}' is not valid for ${filterType} filters`,
  );

  switch (filterType) {
    case "bool": {
      if (narrow(COMPARATORS_BY_TYPE.bool, comparator) === undefined) return unsupported();
      const t = toBoolean(target);
      if (t === undefined) return defective(filterType, "invalid-target", `'${toText(target)}' is not a boolean`);
      return { type: "bool", test: v => v === t };
    }

    case "numerical": {
      const op = narrow(COMPARATORS_BY_TYPE.numerical, comparator);
      if (op === undefined) return unsupported();
      const t = toNumber(target);
      if (t === undefined) return defective(filterType, "invalid-target", `'${toText(target)}' is not a number`);
      switch (op) {
        case "less":          return { type: "numerical", test: v => v < t };
        case "less_equal":    return { type: "numerical", test: v => v <= t };
        case "equal":         return { type: "numerical", test: v => v === t };
        case "greater_equal": return { type: "numerical", test: v => v >= t };
        case "greater":       return { type: "numerical", test: v => v > t };
        default:              return unreachable(op);
      }
    }

    case "literal": {
      const op = narrow(COMPARATORS_BY_TYPE.literal, comparator);
      if (op === undefined) return unsupported();
      const t = toText(target);
      switch (op) {
        case "equal":
          return { type: "literal", test: v => v === t };
        case "contains":
          return { type: "literal", test: v => v.includes(t) };
        case "regex": {
          const re = compilePattern(filterType, t, options.patternCache);
          if (!(re instanceof RegExp)) return re;
          return { type: "literal", test: v => re.test(v) };
        }
        default:
          return unreachable(op);
      }
    }

    case "literal_list": {
      const op = narrow(COMPARATORS_BY_TYPE.literal_list, comparator);
      if (op === undefined) return unsupported();
      const t = toText(target);
      switch (op) {
        case "contains":
          return { type: "literal_list", test: l => anyElement(l, s => s === t) };
        case "contains_only":
          return { type: "literal_list", test: l => onlyElements(l, s => s === t) };
        case "regex":
        case "regex_only": {
          const re = compilePattern(filterType, t, options.patternCache);
          if (!(re instanceof RegExp)) return re;
          const matches = (s: string): boolean => re.test(s);
          return op === "regex"
              ? { type: "literal_list", test: l => anyElement(l, matches) }
              : { type: "literal_list", test: l => onlyElements(l, matches) };
        }
        default:
          return unreachable(op);
      }
    }

    case "modification": {
      const op = narrow(COMPARATORS_BY_TYPE.modification, comparator);
      if (op === undefined) return unsupported();
      const t = toText(target);
      switch (op) {
        case "has_any_modification":
          return { type: "modification", test: mods => mods.length > 0 };
        case "has_description":
          return { type: "modification", test: mods => hasDescription(mods, t) };
        case "has_mass": {
          const mass = parseDecimal(t);
          if (mass === undefined) return defective(filterType, "invalid-target", `'${t}' is not a mass`);
          const tolerance = options.massTolerance;
          return { type: "modification", test: mods => hasMass(mods, mass, tolerance) };
        }
        case "has_residue":
          return { type: "modification", test: mods => hasResidue(mods, t) };
        default:
          return unreachable(op);
      }
    }
  }
}
