// src/domain/records.ts
import type { Modification, ScopeId } from "../spi/types.js";

// ---------- Report rows ----------
export interface PsmRecord {
  kind: "psm";
  id: string;
  sequence: string;
  charge: number;
  /** observed minus theoretical mass, in Da */
  deltaMass: number;
  missedCleavages: number;
  isDecoy: boolean | null;
  accessions: readonly string[];
  modifications: readonly Modification[];
  sourceId: string | null;
  fileId: ScopeId;
}

export interface PeptideRecord {
  kind: "peptide";
  sequence: string;
  accessions: readonly string[];
  modifications: readonly Modification[];
  /** charges of the PSMs supporting the peptide */
  charges: readonly number[];
  missedCleavages: number;
  isDecoy: boolean | null;
  psmCount: number;
  score: number | null;
  scoresByFile: ReadonlyMap<ScopeId, number>;
}

export interface ProteinRecord {
  kind: "protein";
  accessions: readonly string[];
  isDecoy: boolean | null;
  psmCount: number;
  score: number | null;
}

export type ReportRecord = PsmRecord | PeptideRecord | ProteinRecord;
export type RecordKind = ReportRecord["kind"];

const KINDS: readonly string[] = ["psm", "peptide", "protein"];

export function isReportRecord(value: unknown): value is ReportRecord {
  return typeof value === "object"
      && value !== null
      && "kind" in value
      && typeof value.kind === "string"
      && KINDS.includes(value.kind);
}
