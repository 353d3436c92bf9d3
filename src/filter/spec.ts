import type { TargetValue } from "../spi/types.js";

/**
 * One filter as written in a configuration or on a command line, before the
 * descriptor is resolved.
 */
export interface FilterSpec {
    descriptor: string;
    comparator: string;
    negate?: boolean | undefined;
    // absent only for comparators that take no value (has_any_modification)
    value?: TargetValue | undefined;
}

export const spec = (descriptor: string, comparator: string, value?: TargetValue): FilterSpec =>
    ({ descriptor, comparator, value });
export const not = (s: FilterSpec): FilterSpec => ({ ...s, negate: !(s.negate ?? false) });

/** The textual form understood by `parseFilterText`. */
export function formatFilterSpec(s: FilterSpec): string {
    const parts = [s.descriptor];
    if (s.negate) parts.push("not");
    parts.push(s.comparator);
    if (s.value !== undefined && s.value !== "") parts.push(String(s.value));
    return parts.join(" ");
}
