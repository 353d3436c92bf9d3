import { describe, expect, it, vi } from "vitest";
import { explainFilterList, filterRecords, satisfiesFilterList } from "../../src/core/FilterList.js";
import { buildFilter, buildFilterList } from "../../src/filter/build.js";
import { createFilter } from "../../src/core/FilterFactory.js";
import { createDefaultRegistry } from "../../src/domain/descriptors.js";
import type { PsmRecord, ProteinRecord } from "../../src/domain/records.js";
import type { FilterDescriptor } from "../../src/spi/types.js";
import { numberValue } from "../../src/spi/values.js";

const registry = createDefaultRegistry();

function psm(id: string, charge: number, isDecoy: boolean, accessions: string[] = ["P1"]): PsmRecord {
  return {
    kind: "psm",
    id,
    sequence: "LSSPATLNSR",
    charge,
    deltaMass: 0.001,
    missedCleavages: 0,
    isDecoy,
    accessions,
    modifications: [{ description: "Phospho", mass: 79.9663, residue: "S" }],
    sourceId: `index=${id}`,
    fileId: 1,
  };
}

const protein: ProteinRecord = { kind: "protein", accessions: ["P1"], isDecoy: false, psmCount: 3, score: 40 };

describe("satisfiesFilterList", () => {
  const filters = buildFilterList(["charge <= 3", "decoy = false", "modifications has_mass 79.966"], registry);

  it("accepts a record only when every applicable filter passes", () => {
    expect(satisfiesFilterList(filters, psm("1", 2, false))).toBe(true);
    expect(satisfiesFilterList(filters, psm("2", 4, false))).toBe(false);
    expect(satisfiesFilterList(filters, psm("3", 2, true))).toBe(false);
  });

  it("skips filters that do not apply to the record kind", () => {
    expect(satisfiesFilterList(filters, protein)).toBe(true);
    expect(satisfiesFilterList(filters, { ...protein, isDecoy: true })).toBe(false);
  });

  it("accepts everything with an empty list", () => {
    expect(satisfiesFilterList([], psm("1", 9, true))).toBe(true);
  });

  it("stops at the first failing filter", () => {
    const extract = vi.fn(() => numberValue(1));
    const counted: FilterDescriptor = {
      shortName: "counted",
      longName: "Counted filter",
      filteringListName: "Counted",
      filterType: "numerical",
      needsScopeRefinement: false,
      supportsRecord: (r: unknown): r is unknown => true,
      extract,
    };
    const list = [buildFilter("charge > 5", registry), createFilter(counted, "equal", 1)];

    expect(satisfiesFilterList(list, psm("1", 2, false))).toBe(false);
    expect(extract).not.toHaveBeenCalled();
  });
});

describe("filterRecords", () => {
  it("keeps the accepted records in order", () => {
    const records = [psm("a", 2, false), psm("b", 3, true), psm("c", 1, false), protein];
    const filters = buildFilterList(["decoy equal false", "accessions contains_only P1"], registry);

    expect(filterRecords(records, filters).map(r => ("id" in r ? r.id : r.kind))).toEqual(["a", "c", "protein"]);
  });
});

describe("explainFilterList", () => {
  it("reports the outcome of every applicable filter", () => {
    const filters = buildFilterList(
        ["charge > 3", "source_id regex index=\\d+", { descriptor: "protein_score", comparator: "greater", value: 10 }],
        registry,
    );

    const verdicts = explainFilterList(filters, psm("7", 2, false));

    expect(verdicts.map(v => v.filter.toString())).toEqual(["charge greater 3", "source_id regex index=\\d+"]);
    expect(verdicts.map(v => v.outcome)).toEqual([
      { status: "not-satisfied", missingValue: false },
      { status: "satisfied" },
    ]);
  });
});
