// One derivation: diff the raw releases, apply to the curated base, annotate, check parity

import { applyDiff, assertParity } from "./applicator.js";
import type { ApplyOptions } from "./applicator.js";
import { diffRaw } from "./differ.js";
import { annotateLifespans } from "./ledger.js";
import type { LifespanLedger } from "./ledger.js";
import type { CuratedSchemaDocument, RawSchemaDocument, StructuralDiff } from "./model.js";

export interface DerivationInput {
  curatedBase: CuratedSchemaDocument;
  rawBase: RawSchemaDocument;
  rawTarget: RawSchemaDocument;
  /** Ledger folded over the full release chain; without it, pairwise bookkeeping applies. */
  ledger?: LifespanLedger;
  apply?: ApplyOptions;
}

export interface Derivation {
  diff: StructuralDiff;
  document: CuratedSchemaDocument;
}

/**
 * Pure function of its inputs; throws InputUnavailable, VersionMismatch or
 * PostconditionViolation.
 */
export function deriveRelease(input: DerivationInput): Derivation {
  const diff = diffRaw(input.rawBase, input.rawTarget);
  const applied = applyDiff(input.curatedBase, diff, input.apply);
  const document = input.ledger
    ? annotateLifespans(applied, input.ledger, input.curatedBase.version)
    : applied;
  assertParity(document, input.rawTarget);
  return { diff, document };
}
