// packages/core/src/trace.ts
// Semantics notes: what a frame's results deviate from the reference semantics in.

export type SemanticsNoteKind =
  | 'boolean-null-fallback'   // nullable boolean read as False, outputs never null
  | 'group-key-divergence'    // null/NaN keys not kept as their own groups
  | 'nan-as-null';            // engine cannot hold NaN

export interface SemanticsNote {
  kind: SemanticsNoteKind;
  backend: string;
  /** IR feature key that triggered the note, e.g. 'binary:and' */
  feature?: string;
  message: string;
}

/** Append notes, skipping ones already present (same kind/backend/feature). */
export function mergeNotes(base: readonly SemanticsNote[], more: readonly SemanticsNote[]): readonly SemanticsNote[] {
  const key = (n: SemanticsNote) => `${n.kind}|${n.backend}|${n.feature ?? ''}`;
  const seen = new Set(base.map(key));
  const out = [...base];
  for (const n of more) {
    if (seen.has(key(n))) continue;
    seen.add(key(n));
    out.push(n);
  }
  return Object.freeze(out);
}

// ---- explain envelope ----
export interface ExplainResult {
  backend: string;
  lazy: boolean;
  /** SQL text, pipeline stages, or a column listing for eager tables */
  plan: unknown;
  notes: readonly SemanticsNote[];
}
