// packages/core/src/semantics/kleene.ts
// Three-valued boolean logic: true, false, null (unknown).

export type Tri = boolean | null;

/** Kleene AND: false dominates, then null. */
export function kleeneAnd(a: Tri, b: Tri): Tri {
  if (a === false || b === false) return false;
  if (a === null || b === null) return null;
  return true;
}

/** Kleene OR: true dominates, then null. */
export function kleeneOr(a: Tri, b: Tri): Tri {
  if (a === true || b === true) return true;
  if (a === null || b === null) return null;
  return false;
}

export function strictXor(a: Tri, b: Tri): Tri {
  if (a === null || b === null) return null;
  return a !== b;
}

export function strictNot(a: Tri): Tri {
  return a === null ? null : !a;
}

// ---- fallback: engines without a nullable boolean read null as False ----
const asFalse = (a: Tri): boolean => a === true;

export function fallbackAnd(a: Tri, b: Tri): boolean { return asFalse(a) && asFalse(b); }
export function fallbackOr(a: Tri, b: Tri): boolean { return asFalse(a) || asFalse(b); }
export function fallbackXor(a: Tri, b: Tri): boolean { return asFalse(a) !== asFalse(b); }
export function fallbackNot(a: Tri): boolean { return !asFalse(a); }
/** A comparison with a null operand is False instead of null. */
export function fallbackCompare(result: Tri): boolean { return asFalse(result); }

export const KLEENE_VALUES: readonly Tri[] = [true, false, null];
