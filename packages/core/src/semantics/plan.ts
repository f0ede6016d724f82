// packages/core/src/semantics/plan.ts
// Decide, per backend, how reference semantics are reproduced, and reject what cannot be.
import { UnsupportedOperationError } from '../errors';
import { children, walk } from '../expr/queries';
import type { ExprNode } from '../expr/nodes';
import type { Logger } from '../logger';
import type { SemanticsNote } from '../trace';
import type { ApproximationPolicy, BackendCapabilities } from '../types';

export type BooleanStrategy = 'native' | 'upcast' | 'approximate';

/**
 * native: the engine's nullable boolean already is Kleene.
 * upcast: emulate a nullable boolean with conditionals.
 * approximate: documented fallback, null read as False.
 */
export function planBooleanSemantics(caps: Pick<BackendCapabilities, 'nullableBoolean' | 'booleanUpcast'>): BooleanStrategy {
  if (caps.nullableBoolean) return 'native';
  if (caps.booleanUpcast) return 'upcast';
  return 'approximate';
}

/** Feature keys of the tree whose exact result can be a null boolean. */
export function nullableBooleanFeatures(node: ExprNode): string[] {
  const out = new Set<string>();
  walk(node, n => {
    if (n.kind === 'binary' && ['and', 'or', 'xor', 'eq', 'neq', 'lt', 'lte', 'gt', 'gte'].includes(n.op)) {
      out.add(`binary:${n.op}`);
    }
    if (n.kind === 'unary' && (n.op === 'not' || n.op === 'is_nan')) out.add(`unary:${n.op}`);
    if (n.kind === 'horizontal' && (n.fn === 'any' || n.fn === 'all') && !n.ignoreNulls) out.add(`horizontal:${n.fn}`);
  });
  return [...out];
}

export function booleanFallbackNote(backend: string, feature: string): SemanticsNote {
  return {
    kind: 'boolean-null-fallback',
    backend,
    feature,
    message: `${backend} has no nullable boolean: '${feature}' reads null as false and never returns null`,
  };
}

/** Apply the configured approximation policy to a note: let it through, log it, or refuse. */
export function resolveApproximation(note: SemanticsNote, policy: ApproximationPolicy, log: Logger): SemanticsNote {
  if (policy === 'error') {
    throw new UnsupportedOperationError(note.feature ?? note.kind, note.backend, 'exact null semantics are unavailable and approximations are disabled');
  }
  if (policy === 'warn') log.warn({ note }, 'approximate-semantics');
  return note;
}

/** Note for backends whose grouping does not keep null and NaN keys as groups of their own. */
export function groupKeyDivergence(backend: string, caps: Pick<BackendCapabilities, 'groupKeys'>): SemanticsNote | null {
  const { nulls, nan } = caps.groupKeys;
  if (nulls === 'own-group' && nan === 'own-group') return null;
  const parts: string[] = [];
  if (nulls === 'dropped') parts.push('null keys are dropped');
  if (nan === 'merged-with-null') parts.push('NaN keys are merged with null keys');
  if (nan === 'dropped') parts.push('NaN keys are dropped');
  return { kind: 'group-key-divergence', backend, message: `${backend} grouping: ${parts.join('; ')}` };
}

function unsupportedFeature(n: ExprNode, caps: BackendCapabilities): string | null {
  if (!caps.nodes.has(n.kind)) return n.kind;
  switch (n.kind) {
    case 'unary': return caps.unary.has(n.op) ? null : `unary:${n.op}`;
    case 'binary': return caps.binary.has(n.op) ? null : `binary:${n.op}`;
    case 'aggregation': return caps.aggregations.has(n.fn) ? null : `aggregation:${n.fn}`;
    case 'horizontal': return caps.horizontal.has(n.fn) ? null : `horizontal:${n.fn}`;
    case 'window': return caps.windows.has(n.fn) ? null : `window:${n.fn}`;
    default: return null;
  }
}

/**
 * Throw UnsupportedOperation for the first feature of the tree the backend
 * does not declare. Runs before any lowering.
 */
export function assertSupported(node: ExprNode, backend: string, caps: BackendCapabilities): void {
  const failed = unsupportedFeature(node, caps);
  if (failed) throw new UnsupportedOperationError(failed, backend);
  if (node.kind === 'window' && caps.windowsNeedOrder && needsOrder(node.fn) && node.orderBy.length === 0) {
    throw new UnsupportedOperationError(`window:${node.fn}`, backend, 'lazy backends need an explicit order_by for order-dependent windows');
  }
  for (const c of children(node)) assertSupported(c, backend, caps);
}

export function needsOrder(fn: string): boolean {
  return fn === 'cum_sum' || fn === 'cum_count' || fn === 'cum_min' || fn === 'cum_max' || fn === 'cum_prod'
    || fn === 'shift' || fn === 'diff' || fn === 'rolling_sum' || fn === 'rolling_mean'
    || fn === 'rolling_var' || fn === 'rolling_std' || fn === 'is_first_distinct' || fn === 'is_last_distinct';
}
