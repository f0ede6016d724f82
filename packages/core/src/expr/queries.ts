// packages/core/src/expr/queries.ts
// Structural queries and rewrites over the IR. Nothing here touches an engine.
import { InvalidOperationError } from '../errors';
import type { Schema } from '../schema';
import {
  aggregation, alias, binaryOp, cast, columnRef, fillNull, horizontal, nameTransform,
  unaryOp, whenNode, windowFunction,
  type ExprNode, type NamedExpr,
} from './nodes';

export function children(node: ExprNode): readonly ExprNode[] {
  switch (node.kind) {
    case 'column':
    case 'literal':
    case 'columns':
    case 'all':
      return [];
    case 'unary':
    case 'aggregation':
    case 'window':
    case 'alias':
    case 'cast':
    case 'name':
      return [node.operand];
    case 'binary':
      return [node.left, node.right];
    case 'horizontal':
      return node.operands;
    case 'fill_null':
      return [node.operand, node.value];
    case 'when':
      return [node.condition, node.then, node.otherwise];
  }
}

/** Rebuild a node with each child passed through `fn`. */
export function mapChildren(node: ExprNode, fn: (child: ExprNode) => ExprNode): ExprNode {
  switch (node.kind) {
    case 'column':
    case 'literal':
    case 'columns':
    case 'all':
      return node;
    case 'unary': return unaryOp(node.op, fn(node.operand), node.arg);
    case 'binary': return binaryOp(node.op, fn(node.left), fn(node.right));
    case 'aggregation': return aggregation(node.fn, fn(node.operand), node.ddof);
    case 'window':
      return windowFunction(node.fn, fn(node.operand), node.partitionBy, node.orderBy, node.options);
    case 'horizontal': return horizontal(node.fn, node.operands.map(fn), node.ignoreNulls);
    case 'alias': return alias(fn(node.operand), node.name);
    case 'cast': return cast(fn(node.operand), node.dtype);
    case 'fill_null': return fillNull(fn(node.operand), fn(node.value));
    case 'when': return whenNode(fn(node.condition), fn(node.then), fn(node.otherwise));
    case 'name': return nameTransform(fn(node.operand), node.transform, node.affix);
  }
}

/** Pre-order walk; return false from `visit` to skip a subtree. */
export function walk(node: ExprNode, visit: (n: ExprNode) => boolean | void): void {
  if (visit(node) === false) return;
  for (const c of children(node)) walk(c, visit);
}

function some(node: ExprNode, pred: (n: ExprNode) => boolean, throughWindows: boolean): boolean {
  let hit = false;
  walk(node, n => {
    if (hit) return false;
    if (pred(n)) { hit = true; return false; }
    if (!throughWindows && n.kind === 'window') return false;
  });
  return hit;
}

/** Fast path: a bare (possibly renamed) column, projectable without computation. */
export function isColumnOnly(node: ExprNode): boolean {
  if (node.kind === 'column') return true;
  if (node.kind === 'alias' || node.kind === 'name') return isColumnOnly(node.operand);
  return false;
}

/** Aggregations outside of any window; windowed aggregates are per-row. */
export function containsAggregation(node: ExprNode): boolean {
  return some(node, n => n.kind === 'aggregation', false);
}

export function containsWindow(node: ExprNode): boolean {
  return some(node, n => n.kind === 'window', true);
}

/** The node yields one value per frame (or per group). */
export function isScalar(node: ExprNode): boolean {
  switch (node.kind) {
    case 'literal':
    case 'aggregation':
      return true;
    case 'column':
    case 'window':
    case 'columns':
    case 'all':
      return false;
    default:
      return children(node).every(isScalar);
  }
}

/** Tree reduces to a value per group: at least one aggregation and no bare columns outside them. */
export function isAggregated(node: ExprNode): boolean {
  return isScalar(node) && containsAggregation(node);
}

export function referencedColumns(node: ExprNode): string[] {
  const out = new Set<string>();
  walk(node, n => {
    if (n.kind === 'column') out.add(n.name);
    if (n.kind === 'columns') n.names.forEach(c => out.add(c));
    if (n.kind === 'window') {
      n.partitionBy.forEach(c => out.add(c));
      n.orderBy.forEach(c => out.add(c));
    }
  });
  return [...out];
}

/**
 * Feature keys a backend must support to lower the tree:
 * 'binary:xor', 'aggregation:median', 'window:rank', 'cast', ...
 */
export function featureKeys(node: ExprNode): string[] {
  const out = new Set<string>();
  walk(node, n => {
    switch (n.kind) {
      case 'unary':
      case 'binary': out.add(`${n.kind}:${n.op}`); break;
      case 'aggregation':
      case 'window':
      case 'horizontal': out.add(`${n.kind}:${n.fn}`); break;
      default: out.add(n.kind);
    }
  });
  return [...out];
}

// ---------- output names ----------
function rootName(node: ExprNode): string {
  if (node.kind === 'column') return node.name;
  for (const c of children(node)) {
    if (c.kind === 'literal') continue;
    return rootName(c);
  }
  return 'literal';
}

export function outputName(node: ExprNode): string {
  switch (node.kind) {
    case 'column': return node.name;
    case 'literal': return 'literal';
    case 'alias': return node.name;
    case 'when': return outputName(node.then);
    case 'binary': return outputName(node.left);
    case 'horizontal': return node.operands.length ? outputName(node.operands[0]) : 'literal';
    case 'name': {
      const inner = node.transform === 'keep' ? rootName(node.operand) : outputName(node.operand);
      switch (node.transform) {
        case 'keep': return inner;
        case 'to_uppercase': return inner.toUpperCase();
        case 'to_lowercase': return inner.toLowerCase();
        case 'prefix': return `${node.affix}${inner}`;
        case 'suffix': return `${inner}${node.affix}`;
      }
      return inner;
    }
    case 'columns':
    case 'all':
      throw new InvalidOperationError('Multi-column selector has no single output name; expand it first');
    default:
      return outputName(node.operand);
  }
}

// ---------- expansion ----------
function selectors(node: ExprNode): ExprNode[] {
  const found: ExprNode[] = [];
  walk(node, n => { if (n.kind === 'columns' || n.kind === 'all') found.push(n); });
  return found;
}

/**
 * Replace the one multi-column selector in a tree by each column it names,
 * yielding one tree per column. Trees without a selector pass through.
 */
export function expand(node: ExprNode, schema: Schema): ExprNode[] {
  const found = selectors(node);
  if (found.length === 0) return [node];
  if (found.length > 1) {
    throw new InvalidOperationError('An expression may contain at most one multi-column selector');
  }
  const sel = found[0];
  let names: string[];
  if (sel.kind === 'columns') {
    names = [...sel.names];
    names.forEach(n => schema.get(n));
  } else {
    if (schema.open) throw new InvalidOperationError('all() needs a schema; pass a schema hint for this backend');
    names = schema.names();
  }
  const substitute = (n: ExprNode, name: string): ExprNode =>
    n === sel ? columnRef(name) : mapChildren(n, c => substitute(c, name));
  return names.map(name => substitute(node, name));
}

/** Expand and name every expression; duplicate output names are rejected. */
export function toNamedExprs(nodes: readonly ExprNode[], schema: Schema): NamedExpr[] {
  const out: NamedExpr[] = [];
  const seen = new Set<string>();
  for (const node of nodes) {
    for (const e of expand(node, schema)) {
      const name = outputName(e);
      if (seen.has(name)) {
        throw new InvalidOperationError(`Expression output name '${name}' is duplicated; use alias() to disambiguate`, { name });
      }
      seen.add(name);
      out.push({ name, node: e });
    }
  }
  return out;
}

/** Drop alias/name wrappers: output naming is resolved once by toNamedExprs. */
export function stripNaming(node: ExprNode): ExprNode {
  if (node.kind === 'alias' || node.kind === 'name') return stripNaming(node.operand);
  return mapChildren(node, stripNaming);
}
