import { z } from "zod";
import type { FilterSpec } from "./spec.js";
import { ALL_COMPARATORS } from "../spi/types.js";
import { FilterConfigurationError, FilterSpecSyntaxError } from "../core/errors.js";

const COMPARATOR_SYMBOLS: Readonly<Record<string, string>> = {
  "<": "less",
  "<=": "less_equal",
  "=": "equal",
  "==": "equal",
  ">=": "greater_equal",
  ">": "greater",
};

const NO_VALUE_COMPARATORS = new Set(["has_any_modification"]);

const FilterSpecSchema = z.object({
  descriptor: z.string().min(1).max(128),
  comparator: z.string().min(1).max(64),
  negate: z.boolean().optional(),
  value: z.union([z.string(), z.number(), z.boolean()]).optional(),
}).strict().refine(
    v => v.value !== undefined || NO_VALUE_COMPARATORS.has(v.comparator),
    { message: "value is required unless the comparator takes none", path: ["value"] },
);

const FilterListSchema = z.array(z.union([z.string(), FilterSpecSchema])).max(200);

/** `<descriptor> [not] <comparator> [value...]`; the value is the rest of the line. */
const TEXT_RE = /^(\S+)\s+(?:(not)\s+)?(\S+)(?:\s+([\s\S]*))?$/;

export function parseFilterText(text: string): FilterSpec {
  const m = TEXT_RE.exec(text.trim());
  if (!m) throw new FilterSpecSyntaxError(text, "Expected '<descriptor> [not] <comparator> <value>'");

  const [, descriptor = "", notWord, rawComparator = "", rawValue] = m;

  let comparator = rawComparator;
  let bang = false;
  if (comparator.startsWith("!") && comparator.length > 1) {
    bang = true;
    comparator = comparator.slice(1);
  }
  if (bang && notWord) throw new FilterSpecSyntaxError(text, "Negation given twice");

  comparator = COMPARATOR_SYMBOLS[comparator] ?? comparator;
  if (!ALL_COMPARATORS.some(c => c === comparator)) {
    throw new FilterSpecSyntaxError(text, `Unknown comparator '${rawComparator}'`);
  }

  const value = rawValue?.trim() ?? "";
  if (value === "" && !NO_VALUE_COMPARATORS.has(comparator)) {
    throw new FilterSpecSyntaxError(text, "Missing filter value");
  }

  return { descriptor, comparator, negate: bang || notWord !== undefined, value };
}

function issuesOf(err: z.ZodError): string[] {
  return err.issues.map(i => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message));
}

/** Validates a structured filter, or parses it when given as text. */
export function parseFilterSpec(input: unknown): FilterSpec {
  if (typeof input === "string") return parseFilterText(input);
  const parsed = FilterSpecSchema.safeParse(input);
  if (!parsed.success) throw new FilterConfigurationError("Invalid filter specification", issuesOf(parsed.error));
  return parsed.data;
}

export function parseFilterList(input: unknown): FilterSpec[] {
  const parsed = FilterListSchema.safeParse(input);
  if (!parsed.success) throw new FilterConfigurationError("Invalid filter list", issuesOf(parsed.error));
  return parsed.data.map(item => (typeof item === "string" ? parseFilterText(item) : item));
}
