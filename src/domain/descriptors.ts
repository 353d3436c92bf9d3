// src/domain/descriptors.ts
import type { FilterDescriptor, FilterType, FilterValue, ScopeId } from "../spi/types.js";
import {
  boolValue,
  collectionOf,
  modificationList,
  numberValue,
  refineByScope,
  scopedValue,
  stringList,
  stringValue,
} from "../spi/values.js";
import { DescriptorRegistry } from "../core/DescriptorRegistry.js";
import { isReportRecord, type RecordKind, type ReportRecord } from "./records.js";

type RecordOf<K extends RecordKind> = Extract<ReportRecord, { kind: K }>;

interface DescriptorDef<K extends RecordKind> {
  shortName: string;
  longName: string;
  filteringListName: string;
  filterType: FilterType;
  kinds: readonly K[];
  extract(record: RecordOf<K>): FilterValue | null;
  refine?: ((scopeId: ScopeId, value: FilterValue | null) => FilterValue | null) | undefined;
}

export function defineDescriptor<K extends RecordKind>(def: DescriptorDef<K>): FilterDescriptor<RecordOf<K>> {
  const kinds: readonly string[] = def.kinds;
  return {
    shortName: def.shortName,
    longName: def.longName,
    filteringListName: def.filteringListName,
    filterType: def.filterType,
    needsScopeRefinement: def.refine !== undefined,
    supportsRecord: (record: unknown): record is RecordOf<K> =>
        isReportRecord(record) && kinds.includes(record.kind),
    extract: def.extract,
    ...(def.refine ? { refine: def.refine } : {}),
  };
}

const orNull = <T>(v: T | null, wrap: (v: T) => FilterValue): FilterValue | null =>
    v === null ? null : wrap(v);

// ---------- Built-in catalogue ----------

export const chargeDescriptor = defineDescriptor({
  shortName: "charge",
  longName: "Charge filter",
  filteringListName: "Charge",
  filterType: "numerical",
  kinds: ["psm", "peptide"],
  // a peptide passes only if every supporting PSM does
  extract: r => (r.kind === "psm" ? numberValue(r.charge) : collectionOf(r.charges)),
});

export const deltaMassDescriptor = defineDescriptor({
  shortName: "delta_mass",
  longName: "Delta mass filter (Da)",
  filteringListName: "Delta mass",
  filterType: "numerical",
  kinds: ["psm"],
  extract: r => numberValue(r.deltaMass),
});

export const missedCleavagesDescriptor = defineDescriptor({
  shortName: "missed_cleavages",
  longName: "Missed cleavages filter",
  filteringListName: "#Missed cleavages",
  filterType: "numerical",
  kinds: ["psm", "peptide"],
  extract: r => numberValue(r.missedCleavages),
});

export const decoyDescriptor = defineDescriptor({
  shortName: "decoy",
  longName: "Decoy filter",
  filteringListName: "Is decoy",
  filterType: "bool",
  kinds: ["psm", "peptide", "protein"],
  extract: r => orNull(r.isDecoy, boolValue),
});

export const uniqueDescriptor = defineDescriptor({
  shortName: "unique",
  longName: "Unique peptide filter",
  filteringListName: "Is unique",
  filterType: "bool",
  kinds: ["peptide"],
  extract: r => boolValue(r.accessions.length === 1),
});

export const sequenceDescriptor = defineDescriptor({
  shortName: "sequence",
  longName: "Sequence filter",
  filteringListName: "Sequence",
  filterType: "literal",
  kinds: ["psm", "peptide"],
  extract: r => stringValue(r.sequence),
});

export const sourceIdDescriptor = defineDescriptor({
  shortName: "source_id",
  longName: "Spectrum source ID filter",
  filteringListName: "Source ID",
  filterType: "literal",
  kinds: ["psm"],
  extract: r => orNull(r.sourceId, stringValue),
});

export const accessionsDescriptor = defineDescriptor({
  shortName: "accessions",
  longName: "Accessions filter",
  filteringListName: "Accessions",
  filterType: "literal_list",
  kinds: ["psm", "peptide", "protein"],
  extract: r => stringList(r.accessions),
});

export const modificationsDescriptor = defineDescriptor({
  shortName: "modifications",
  longName: "Modifications filter",
  filteringListName: "Modifications",
  filterType: "modification",
  kinds: ["psm", "peptide"],
  extract: r => modificationList(r.modifications),
});

export const psmCountDescriptor = defineDescriptor({
  shortName: "nr_psms",
  longName: "Number of PSMs filter",
  filteringListName: "#PSMs",
  filterType: "numerical",
  kinds: ["peptide", "protein"],
  extract: r => numberValue(r.psmCount),
});

export const peptideScoreDescriptor = defineDescriptor({
  shortName: "peptide_score",
  longName: "Peptide score filter",
  filteringListName: "Peptide score",
  filterType: "numerical",
  kinds: ["peptide"],
  extract: r => {
    const byScope = new Map<ScopeId, FilterValue>();
    for (const [fileId, score] of r.scoresByFile) byScope.set(fileId, numberValue(score));
    return scopedValue(orNull(r.score, numberValue), byScope);
  },
  refine: refineByScope,
});

export const proteinScoreDescriptor = defineDescriptor({
  shortName: "protein_score",
  longName: "Protein score filter",
  filteringListName: "Protein score",
  filterType: "numerical",
  kinds: ["protein"],
  extract: r => orNull(r.score, numberValue),
});

export const BUILTIN_DESCRIPTORS: readonly FilterDescriptor[] = [
  chargeDescriptor,
  deltaMassDescriptor,
  missedCleavagesDescriptor,
  decoyDescriptor,
  uniqueDescriptor,
  sequenceDescriptor,
  sourceIdDescriptor,
  accessionsDescriptor,
  modificationsDescriptor,
  psmCountDescriptor,
  peptideScoreDescriptor,
  proteinScoreDescriptor,
];

export function createDefaultRegistry(): DescriptorRegistry {
  return new DescriptorRegistry(BUILTIN_DESCRIPTORS);
}
