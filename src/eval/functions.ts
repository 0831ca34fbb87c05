// src/eval/functions.ts
// CallExpr から呼び出される組み込み関数。名前は小文字で登録し、呼び出し時も小文字化して引く。
// 引数の型が合わない場合は例外ではなく UNDEFINED を返す（値モデルの変換と同じ扱い）。

import type { Node, ValueType } from '../value/types.ts';
import { UNDEFINED, NULL, intNode, floatNode, stringNode, toType, nodeValue } from '../value/node.ts';
import { failGenericEval } from './evaluationErrors.ts';

export type EvalFunction = (args: readonly Node[]) => Node;

function arity(name: string, args: readonly Node[], min: number, max = min): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min}-${max}`;
    failGenericEval(`Function '${name}' expects ${expected} argument(s), got ${args.length}.`, name);
  }
}

function arg(args: readonly Node[], i: number): Node {
  return args[i] ?? UNDEFINED;
}

function text(node: Node): string | undefined {
  const s = toType(node, 'String');
  return s.type === 'String' ? s.value : undefined;
}

function mapText(name: string, f: (s: string) => string): EvalFunction {
  return (args) => {
    arity(name, args, 1);
    const s = text(arg(args, 0));
    return s === undefined ? UNDEFINED : stringNode(f(s));
  };
}

function convert(name: string, target: ValueType): EvalFunction {
  return (args) => {
    arity(name, args, 1);
    return toType(arg(args, 0), target);
  };
}

// 文字列は文字数、JSON 配列は要素数、JSON オブジェクトはキー数
const length: EvalFunction = (args) => {
  arity('length', args, 1);
  const v = arg(args, 0);
  if (v.type === 'String') return intNode(BigInt([...v.value].length));
  if (v.type !== 'Array' && v.type !== 'JSON') return UNDEFINED;
  const decoded = nodeValue(v);
  if (Array.isArray(decoded)) return intNode(BigInt(decoded.length));
  if (typeof decoded === 'object' && decoded !== null) return intNode(BigInt(Object.keys(decoded).length));
  return UNDEFINED;
};

const concat: EvalFunction = (args) => {
  arity('concat', args, 1, Infinity);
  let out = '';
  for (const a of args) {
    const s = text(a);
    if (s === undefined) return UNDEFINED;
    out += s;
  }
  return stringNode(out);
};

const abs: EvalFunction = (args) => {
  arity('abs', args, 1);
  const v = arg(args, 0);
  if (v.type === 'Int') return intNode(v.value < 0n ? -v.value : v.value);
  if (v.type === 'Float') return floatNode(Math.abs(v.value));
  return UNDEFINED;
};

// 最初の Undefined / Null でない引数。無ければ null
const coalesce: EvalFunction = (args) => {
  arity('coalesce', args, 1, Infinity);
  return args.find((a) => a.type !== 'Undefined' && a.type !== 'Null') ?? NULL;
};

export const builtinFunctions: Readonly<Record<string, EvalFunction>> = {
  upper: mapText('upper', (s) => s.toUpperCase()),
  lower: mapText('lower', (s) => s.toLowerCase()),
  length,
  concat,
  abs,
  coalesce,
  to_string: convert('to_string', 'String'),
  to_int: convert('to_int', 'Int'),
  to_float: convert('to_float', 'Float'),
  to_number: convert('to_number', 'Number'),
  to_bool: convert('to_bool', 'Bool'),
};
