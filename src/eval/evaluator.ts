// src/eval/evaluator.ts
// AST をデコード済みのレコードに対して評価し、値ノードを返す参照実装。
// - JSONPathExpr はレコードから値を引いて newNode で Node にする。見つからなければ UNDEFINED。
// - どちらかの被演算子が UNDEFINED なら結果も UNDEFINED（出力時に省略される）。
// - 型が合わない比較・算術は E_EVAL_TYPE_MISMATCH。

import type { Node, NumericNode } from '../value/types.ts';
import { isNumeric } from '../value/types.ts';
import { UNDEFINED, boolNode, intNode, floatNode, stringNode, nodeEquals } from '../value/node.ts';
import { newNode } from '../value/newNode.ts';
import type { Expression, BinaryExpr, CallExpr, SwitchExpr, JsonPathExpr } from '../ast/types.ts';
import { BinaryOp, BINARY_OP_SYMBOLS, isBinaryOpCode } from '../ast/operators.ts';
import { builtinFunctions } from './functions.ts';
import type { EvalFunction } from './functions.ts';
import { parsePath, resolvePath } from './path.ts';
import type { PathSegment } from './path.ts';
import { failTypeMismatch, failUnknownFunction, failGenericEval } from './evaluationErrors.ts';

export type EvaluateOptions = {
  // 組み込み関数に追加・上書きする関数（キーは大文字小文字を区別しない）
  functions?: Record<string, EvalFunction>;
  // false: 未知の関数呼び出しは UNDEFINED を返す（既定 true: EvaluationError）
  strictFunctions?: boolean;
};

export type InternalOptions = {
  functions: ReadonlyMap<string, EvalFunction>;
  strictFunctions: boolean;
};

export function resolveOptions(options: EvaluateOptions = {}): InternalOptions {
  const functions = new Map<string, EvalFunction>();
  for (const [name, fn] of Object.entries(builtinFunctions)) functions.set(name, fn);
  for (const [name, fn] of Object.entries(options.functions ?? {})) functions.set(name.toLowerCase(), fn);
  return {
    functions,
    strictFunctions: options.strictFunctions ?? true,
  };
}

export function evaluate(expr: Expression, record: unknown, options: EvaluateOptions = {}): Node {
  return evalExpr(expr, record, resolveOptions(options));
}

export function evalExpr(expr: Expression, record: unknown, opts: InternalOptions): Node {
  switch (expr.type) {
    case 'Undefined':
    case 'Null':
    case 'Bool':
    case 'Int':
    case 'Float':
    case 'String':
    case 'Array':
    case 'JSON':
      return expr;
    case 'JSONPathExpr':
      return evalPath(expr, record);
    case 'BinaryExpr':
      return evalBinary(expr, record, opts);
    case 'CallExpr':
      return evalCall(expr, record, opts);
    case 'SwitchExpr':
      return evalSwitch(expr, record, opts);
  }
}

// AST は不変なので、パスの分解結果はノード単位で覚えておける
const pathCache = new WeakMap<JsonPathExpr, PathSegment[]>();

function evalPath(node: JsonPathExpr, record: unknown): Node {
  if (node.path === '*') return newNode(record);
  let segments = pathCache.get(node);
  if (!segments) {
    segments = parsePath(node.path);
    pathCache.set(node, segments);
  }
  const resolved = resolvePath(record, segments);
  return resolved.found ? newNode(resolved.value) : UNDEFINED;
}

function opName(op: number): string {
  return isBinaryOpCode(op) ? BINARY_OP_SYMBOLS[op] : `op(${op})`;
}

function evalBinary(node: BinaryExpr, record: unknown, opts: InternalOptions): Node {
  const op = node.operator;
  if (op === BinaryOp.AND || op === BinaryOp.OR) return evalLogical(node, record, opts);

  const left = evalExpr(node.left, record, opts);
  const right = evalExpr(node.right, record, opts);
  if (left.type === 'Undefined' || right.type === 'Undefined') return UNDEFINED;

  switch (op) {
    case BinaryOp.EQ:
      return boolNode(valuesEqual(left, right));
    case BinaryOp.NEQ:
      return boolNode(!valuesEqual(left, right));
    case BinaryOp.LT:
      return boolNode(compare(op, left, right) < 0);
    case BinaryOp.LTE:
      return boolNode(compare(op, left, right) <= 0);
    case BinaryOp.GT:
      return boolNode(compare(op, left, right) > 0);
    case BinaryOp.GTE:
      return boolNode(compare(op, left, right) >= 0);
    case BinaryOp.ADD:
      if (left.type === 'String' && right.type === 'String') return stringNode(left.value + right.value);
      return arithmetic(op, left, right);
    case BinaryOp.SUB:
    case BinaryOp.MUL:
    case BinaryOp.DIV:
    case BinaryOp.MOD:
      return arithmetic(op, left, right);
    default:
      return failGenericEval(`Unknown binary operator ${opName(op)}`, opName(op));
  }
}

// AND / OR は左辺で結果が決まれば右辺を評価しない
function evalLogical(node: BinaryExpr, record: unknown, opts: InternalOptions): Node {
  const name = opName(node.operator);
  const left = evalExpr(node.left, record, opts);
  if (left.type === 'Undefined') return UNDEFINED;
  if (left.type !== 'Bool') return failTypeMismatch(name, 'Bool', left.type);
  if (node.operator === BinaryOp.AND && !left.value) return left;
  if (node.operator === BinaryOp.OR && left.value) return left;

  const right = evalExpr(node.right, record, opts);
  if (right.type === 'Undefined') return UNDEFINED;
  if (right.type !== 'Bool') return failTypeMismatch(name, 'Bool', right.type);
  return right;
}

function toNumber(n: NumericNode): number {
  return n.type === 'Int' ? Number(n.value) : n.value;
}

// 負: a < b、0: 等しい、正: a > b、NaN: 比較不能
function compareNumeric(a: NumericNode, b: NumericNode): number {
  if (a.type === 'Int' && b.type === 'Int') return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  const x = toNumber(a);
  const y = toNumber(b);
  return x < y ? -1 : x > y ? 1 : x === y ? 0 : NaN;
}

// Int と Float は数値として比べる（1 = 1.0）。それ以外は型と値が一致すること。
export function valuesEqual(a: Node, b: Node): boolean {
  if (isNumeric(a) && isNumeric(b)) return compareNumeric(a, b) === 0;
  return nodeEquals(a, b);
}

// 数値同士・文字列同士のみ許容
function compare(op: number, a: Node, b: Node): number {
  if (isNumeric(a) && isNumeric(b)) return compareNumeric(a, b);
  if (a.type === 'String' && b.type === 'String') return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  return failTypeMismatch(opName(op), 'number|string', `${a.type}/${b.type}`);
}

// Int 同士は int64 で計算する（'/' だけは Float）。0 による Int の剰余は UNDEFINED。
function arithmetic(op: number, a: Node, b: Node): Node {
  if (!isNumeric(a) || !isNumeric(b)) return failTypeMismatch(opName(op), 'Int|Float', `${a.type}/${b.type}`);

  if (a.type === 'Int' && b.type === 'Int' && op !== BinaryOp.DIV) {
    switch (op) {
      case BinaryOp.ADD:
        return intNode(a.value + b.value);
      case BinaryOp.SUB:
        return intNode(a.value - b.value);
      case BinaryOp.MUL:
        return intNode(a.value * b.value);
      case BinaryOp.MOD:
        return b.value === 0n ? UNDEFINED : intNode(a.value % b.value);
    }
  }

  const x = toNumber(a);
  const y = toNumber(b);
  switch (op) {
    case BinaryOp.ADD:
      return floatNode(x + y);
    case BinaryOp.SUB:
      return floatNode(x - y);
    case BinaryOp.MUL:
      return floatNode(x * y);
    case BinaryOp.DIV:
      return floatNode(x / y);
    case BinaryOp.MOD:
      return floatNode(x % y);
    default:
      return failGenericEval(`Unknown arithmetic operator ${opName(op)}`, opName(op));
  }
}

function evalCall(node: CallExpr, record: unknown, opts: InternalOptions): Node {
  const fn = opts.functions.get(node.name.toLowerCase());
  if (!fn) {
    if (opts.strictFunctions) return failUnknownFunction(node.name);
    return UNDEFINED;
  }
  return fn(node.args.map((a) => evalExpr(a, record, opts)));
}

// 記述順に when を評価し、最初に subject と一致した case の then を返す
function evalSwitch(node: SwitchExpr, record: unknown, opts: InternalOptions): Node {
  const subject = evalExpr(node.subject, record, opts);
  for (const c of node.cases) {
    const when = evalExpr(c.when, record, opts);
    if (subject.type !== 'Undefined' && when.type !== 'Undefined' && valuesEqual(subject, when)) {
      return evalExpr(c.then, record, opts);
    }
  }
  return evalExpr(node.defaultBranch, record, opts);
}
