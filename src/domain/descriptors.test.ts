import { describe, expect, it } from "vitest";
import {
  BUILTIN_DESCRIPTORS,
  chargeDescriptor,
  createDefaultRegistry,
  decoyDescriptor,
  peptideScoreDescriptor,
  sourceIdDescriptor,
  uniqueDescriptor,
} from "./descriptors.js";
import type { PeptideRecord, ProteinRecord, PsmRecord } from "./records.js";
import { isReportRecord } from "./records.js";
import { createFilter } from "../core/FilterFactory.js";
import { evaluate, evaluateDetailed } from "../core/Evaluator.js";

const psm: PsmRecord = {
  kind: "psm",
  id: "psm-1",
  sequence: "PEPTIDEK",
  charge: 2,
  deltaMass: 0.004,
  missedCleavages: 0,
  isDecoy: false,
  accessions: ["P00001"],
  modifications: [],
  sourceId: null,
  fileId: 1,
};

const peptide: PeptideRecord = {
  kind: "peptide",
  sequence: "PEPTIDEK",
  accessions: ["P00001"],
  modifications: [],
  charges: [2, 3],
  missedCleavages: 0,
  isDecoy: null,
  psmCount: 2,
  score: 0.95,
  scoresByFile: new Map([[1, 0.9], [2, 0.2]]),
};

const protein: ProteinRecord = {
  kind: "protein",
  accessions: ["P00001", "P00002"],
  isDecoy: true,
  psmCount: 7,
  score: 12.5,
};

describe("built-in descriptors", () => {
  it("are all registered by the default registry", () => {
    const registry = createDefaultRegistry();

    expect(registry.size).toBe(BUILTIN_DESCRIPTORS.length);
    expect(registry.shortNames()).toEqual([
      "charge",
      "delta_mass",
      "missed_cleavages",
      "decoy",
      "unique",
      "sequence",
      "source_id",
      "accessions",
      "modifications",
      "nr_psms",
      "peptide_score",
      "protein_score",
    ]);
  });

  it("declare the record kinds they support", () => {
    expect(chargeDescriptor.supportsRecord(psm)).toBe(true);
    expect(chargeDescriptor.supportsRecord(peptide)).toBe(true);
    expect(chargeDescriptor.supportsRecord(protein)).toBe(false);
    expect(chargeDescriptor.supportsRecord({ charge: 2 })).toBe(false);
    expect(isReportRecord({ kind: "spectrum" })).toBe(false);
  });

  it("quantify a peptide's charges over all of its PSMs", () => {
    expect(evaluate(createFilter(chargeDescriptor, "less_equal", 2), peptide)).toBe(false);
    expect(evaluate(createFilter(chargeDescriptor, "less_equal", 3), peptide)).toBe(true);
    expect(evaluate(createFilter(chargeDescriptor, "less_equal", 2), psm)).toBe(true);
  });

  it("treat unknown decoy state and absent source ids as missing", () => {
    const isDecoy = createFilter(decoyDescriptor, "equal", true);

    expect(evaluateDetailed(isDecoy, peptide)).toEqual({ status: "not-satisfied", missingValue: true });
    expect(evaluate(isDecoy.negated(), peptide)).toBe(false);
    expect(evaluate(isDecoy, protein)).toBe(true);
    expect(evaluate(createFilter(sourceIdDescriptor, "contains", "scan"), psm)).toBe(false);
  });

  it("derive uniqueness from the accession count", () => {
    expect(evaluate(createFilter(uniqueDescriptor, "equal", true), peptide)).toBe(true);
    expect(evaluate(createFilter(uniqueDescriptor, "equal", true), { ...peptide, accessions: ["A", "B"] })).toBe(false);
  });

  it("refine peptide scores per input file", () => {
    const filter = createFilter(peptideScoreDescriptor, "greater_equal", 0.5);

    expect(peptideScoreDescriptor.needsScopeRefinement).toBe(true);
    expect(evaluate(filter, peptide)).toBe(true);
    expect(evaluate(filter, peptide, 1)).toBe(true);
    expect(evaluate(filter, peptide, 2)).toBe(false);
    expect(evaluate(filter, peptide, 3)).toBe(false);
    expect(evaluate(filter.negated(), peptide, 3)).toBe(false);
  });

  it("treat a peptide without an overall score as missing when no file is chosen", () => {
    const filter = createFilter(peptideScoreDescriptor, "greater", 0);

    expect(evaluateDetailed(filter, { ...peptide, score: null })).toEqual({
      status: "not-satisfied",
      missingValue: true,
    });
    expect(evaluate(filter, { ...peptide, score: null }, 1)).toBe(true);
  });
});
