// src/core/Filter.ts
import type { Comparator, FilterDescriptor, FilterType, TargetValue } from "../spi/types.js";
import type { Criterion } from "./predicates.js";

/**
 * A descriptor bound to a comparator, a target value and a negation flag.
 * Immutable; build instances through `createFilter`.
 */
export class Filter<R = unknown> {
  constructor(
      readonly descriptor: FilterDescriptor<R>,
      readonly comparator: Comparator,
      readonly target: TargetValue,
      readonly negate: boolean,
      /** comparator and target compiled once for evaluation */
      readonly criterion: Criterion,
  ) {}

  get shortName(): string {
    return this.descriptor.shortName;
  }

  get name(): string {
    return this.descriptor.longName;
  }

  get filterType(): FilterType {
    return this.descriptor.filterType;
  }

  /** Same criterion with the negation flag flipped. */
  negated(): Filter<R> {
    return new Filter(this.descriptor, this.comparator, this.target, !this.negate, this.criterion);
  }

  /** Renders as `<shortName> [not] <comparator> <value>`. */
  toString(): string {
    const not = this.negate ? " not" : "";
    const value = String(this.target);
    return `${this.shortName}${not} ${this.comparator}${value === "" ? "" : ` ${value}`}`;
  }
}
