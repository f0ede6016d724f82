// packages/core/src/expr/infer.ts
// Result dtype of an IR tree against a schema.
import {
  DT, formatDtype, isFloat, isInteger, isNumeric, isStringLike, isUnsignedInteger,
  isUnsupported, promote, type DType,
} from '../dtypes';
import { DtypeMismatchError } from '../errors';
import type { Schema } from '../schema';
import type { BinaryOp, ExprNode, Literal } from './nodes';

export interface InferOptions {
  /** throw DtypeMismatch instead of answering Unknown */
  strict?: boolean;
}

class Mismatch extends Error {}

function fail(message: string): never {
  throw new Mismatch(message);
}

function isDynamicLiteral(n: ExprNode): n is Literal {
  return n.kind === 'literal' && n.dynamic;
}

function floatOf(d: DType): DType {
  return d.kind === 'float' && d.bits === 32 ? DT.Float32 : DT.Float64;
}

/**
 * Promotion with dynamic literals: a JS number yields to the numeric family
 * of its partner (Int32 + 1 → Int32, Float32 * 2 → Float32) and a bare null
 * literal yields to anything.
 */
export function promoteOperands(left: ExprNode, l: DType, right: ExprNode, r: DType): DType {
  if (isDynamicLiteral(left) && left.value === null) return r;
  if (isDynamicLiteral(right) && right.value === null) return l;
  if (isDynamicLiteral(right) && isNumeric(l) && isNumeric(r)) {
    if (isInteger(r) || isFloat(l)) return l;
  }
  if (isDynamicLiteral(left) && isNumeric(l) && isNumeric(r)) {
    if (isInteger(l) || isFloat(r)) return r;
  }
  const p = promote(l, r);
  if (isUnsupported(p)) fail(`Cannot combine ${formatDtype(l)} with ${formatDtype(r)}`);
  return p;
}

function inferBinary(node: BinaryOp, schema: Schema): DType {
  const l = infer(node.left, schema);
  const r = infer(node.right, schema);
  if (l.kind === 'unknown' || r.kind === 'unknown') {
    return ['eq', 'neq', 'lt', 'lte', 'gt', 'gte', 'and', 'or', 'xor'].includes(node.op) ? DT.Boolean : DT.Unknown;
  }
  switch (node.op) {
    case 'and':
    case 'or':
    case 'xor':
      if (l.kind !== 'boolean' || r.kind !== 'boolean') {
        fail(`'${node.op}' needs Boolean operands, got ${formatDtype(l)} and ${formatDtype(r)}`);
      }
      return DT.Boolean;
    case 'eq':
    case 'neq':
    case 'lt':
    case 'lte':
    case 'gt':
    case 'gte':
      promoteOperands(node.left, l, node.right, r);
      return DT.Boolean;
    case 'add':
      if (isStringLike(l) && isStringLike(r)) return DT.String;
      return arithmetic(node, l, r);
    case 'sub':
      if (l.kind === 'datetime' && r.kind === 'datetime') return DT.Duration(l.unit);
      if (l.kind === 'date' && r.kind === 'date') return DT.Duration('ms');
      return arithmetic(node, l, r);
    case 'div': {
      const p = arithmetic(node, l, r);
      return p.kind === 'duration' ? p : floatOf(p);
    }
    default:
      return arithmetic(node, l, r);
  }
}

function arithmetic(node: BinaryOp, l: DType, r: DType): DType {
  if ((l.kind === 'datetime' || l.kind === 'date') && r.kind === 'duration' && (node.op === 'add' || node.op === 'sub')) return l;
  if (l.kind === 'duration' && (r.kind === 'datetime' || r.kind === 'date') && node.op === 'add') return r;
  if (l.kind === 'duration' && r.kind === 'duration' && (node.op === 'add' || node.op === 'sub')) {
    return promoteOperands(node.left, l, node.right, r);
  }
  const numericOrBool = (d: DType) => isNumeric(d) || d.kind === 'boolean';
  if (!numericOrBool(l) || !numericOrBool(r)) {
    fail(`'${node.op}' is not defined for ${formatDtype(l)} and ${formatDtype(r)}`);
  }
  const p = promoteOperands(node.left, l, node.right, r);
  return p.kind === 'boolean' ? DT.Int64 : p;
}

function sumDtype(d: DType): DType {
  if (d.kind === 'boolean') return DT.Int64;
  if (d.kind === 'int' && d.bits < 64) return d.signed ? DT.Int64 : DT.UInt64;
  if (isNumeric(d) || d.kind === 'duration' || d.kind === 'unknown') return d;
  return fail(`Cannot sum ${formatDtype(d)}`);
}

function meanDtype(d: DType): DType {
  if (d.kind === 'unknown') return DT.Float64;
  if (d.kind === 'duration' || d.kind === 'datetime' || d.kind === 'date') return d.kind === 'date' ? DT.Datetime('ms') : d;
  if (isNumeric(d) || d.kind === 'boolean') return floatOf(d);
  return fail(`Cannot average ${formatDtype(d)}`);
}

function infer(node: ExprNode, schema: Schema): DType {
  switch (node.kind) {
    case 'column': return schema.get(node.name);
    case 'literal': return node.dtype;
    case 'columns':
    case 'all':
      return DT.Unknown;
    case 'alias':
    case 'name':
      return infer(node.operand, schema);
    case 'cast': return node.dtype;
    case 'unary': {
      const d = infer(node.operand, schema);
      switch (node.op) {
        case 'is_null':
        case 'is_not_null':
          return DT.Boolean;
        case 'is_nan':
          if (d.kind !== 'unknown' && !isNumeric(d)) fail(`is_nan needs a numeric operand, got ${formatDtype(d)}`);
          return DT.Boolean;
        case 'not':
          if (d.kind !== 'boolean' && d.kind !== 'unknown') fail(`'not' needs a Boolean operand, got ${formatDtype(d)}`);
          return DT.Boolean;
        case 'negate':
        case 'abs':
          if (d.kind !== 'unknown' && !isNumeric(d) && d.kind !== 'duration') fail(`'${node.op}' needs a numeric operand, got ${formatDtype(d)}`);
          return isUnsignedInteger(d) && node.op === 'negate' ? DT.Int64 : d;
        case 'floor':
        case 'ceil':
        case 'round':
          if (d.kind !== 'unknown' && !isNumeric(d)) fail(`'${node.op}' needs a numeric operand, got ${formatDtype(d)}`);
          return d;
        case 'sqrt':
        case 'exp':
        case 'log':
          if (d.kind === 'unknown') return DT.Float64;
          if (!isNumeric(d)) fail(`'${node.op}' needs a numeric operand, got ${formatDtype(d)}`);
          return floatOf(d);
      }
      return d;
    }
    case 'binary': return inferBinary(node, schema);
    case 'aggregation': {
      const d = infer(node.operand, schema);
      switch (node.fn) {
        case 'sum': return sumDtype(d);
        case 'mean':
        case 'median':
          return meanDtype(d);
        case 'std':
        case 'var':
          return d.kind === 'unknown' ? DT.Float64 : (isNumeric(d) || d.kind === 'boolean' ? floatOf(d) : fail(`Cannot compute ${node.fn} of ${formatDtype(d)}`));
        case 'min':
        case 'max':
          return d;
        case 'count':
        case 'len':
        case 'n_unique':
        case 'null_count':
          return DT.UInt32;
        case 'any':
        case 'all':
          if (d.kind !== 'boolean' && d.kind !== 'unknown') fail(`'${node.fn}' needs a Boolean operand, got ${formatDtype(d)}`);
          return DT.Boolean;
      }
      return d;
    }
    case 'window': {
      const d = infer(node.operand, schema);
      switch (node.fn) {
        case 'over':
        case 'shift':
        case 'cum_min':
        case 'cum_max':
          return d;
        case 'cum_sum':
        case 'rolling_sum':
          return sumDtype(d);
        case 'cum_prod':
          return d.kind === 'boolean' || isInteger(d) ? DT.Int64 : d;
        case 'cum_count':
          return DT.UInt32;
        case 'diff':
          if (d.kind === 'datetime') return DT.Duration(d.unit);
          if (d.kind === 'date') return DT.Duration('ms');
          return isUnsignedInteger(d) ? DT.Int64 : d;
        case 'rank':
          return node.options.method === 'average' || node.options.method === undefined ? DT.Float64 : DT.UInt32;
        case 'rolling_mean':
          return meanDtype(d);
        case 'rolling_var':
        case 'rolling_std':
          return d.kind === 'unknown' ? DT.Float64 : (isNumeric(d) || d.kind === 'boolean' ? floatOf(d) : fail(`Cannot compute ${node.fn} of ${formatDtype(d)}`));
        case 'is_unique':
        case 'is_first_distinct':
        case 'is_last_distinct':
          return DT.Boolean;
      }
      return d;
    }
    case 'horizontal': {
      const dtypes = node.operands.map(o => infer(o, schema));
      if (node.fn === 'any' || node.fn === 'all') {
        dtypes.forEach(d => {
          if (d.kind !== 'boolean' && d.kind !== 'unknown') fail(`${node.fn}_horizontal needs Boolean operands, got ${formatDtype(d)}`);
        });
        return DT.Boolean;
      }
      let acc: DType = dtypes.length ? dtypes[0] : DT.Unknown;
      for (let i = 1; i < dtypes.length; i++) {
        acc = promoteOperands(node.operands[i - 1], acc, node.operands[i], dtypes[i]);
      }
      if (node.fn === 'sum') return acc.kind === 'boolean' ? DT.Int64 : acc;
      return acc;
    }
    case 'fill_null': {
      const d = infer(node.operand, schema);
      const v = infer(node.value, schema);
      if (d.kind === 'unknown') return v.kind === 'unknown' ? d : (isDynamicLiteral(node.value) ? DT.Unknown : v);
      return promoteOperands(node.operand, d, node.value, v);
    }
    case 'when': {
      const c = infer(node.condition, schema);
      if (c.kind !== 'boolean' && c.kind !== 'unknown') fail(`when() needs a Boolean condition, got ${formatDtype(c)}`);
      return promoteOperands(node.then, infer(node.then, schema), node.otherwise, infer(node.otherwise, schema));
    }
  }
}

/**
 * Result dtype of `node`. Invalid combinations throw DtypeMismatch in strict
 * mode and come back as Unknown otherwise. Unknown columns always throw
 * ColumnNotFound (unless the schema is open).
 */
export function inferDtype(node: ExprNode, schema: Schema, opts: InferOptions = {}): DType {
  try {
    return infer(node, schema);
  } catch (e) {
    if (!(e instanceof Mismatch)) throw e;
    if (opts.strict) throw new DtypeMismatchError(e.message, { node: node.kind });
    return DT.Unknown;
  }
}

