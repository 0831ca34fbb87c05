// src/value/node.ts
// 値ノードの生成・変換（To）・文字列化（String）・値取得（Value）。
// 変換は全域関数で、表に無い組み合わせや解析失敗はすべて UNDEFINED を返す（例外は投げない）。

import type {
  Node,
  NodeType,
  ValueType,
  UndefinedNode,
  NullNode,
  BoolNode,
  IntNode,
  FloatNode,
  StringNode,
  ArrayNode,
  JsonNode,
} from './types.ts';
import { INT64_MIN, INT64_MAX } from './types.ts';

// ---- 生成 ----

export const UNDEFINED: UndefinedNode = Object.freeze({ type: 'Undefined' });
export const NULL: NullNode = Object.freeze({ type: 'Null' });

const utf8 = new TextDecoder();

export function boolNode(value: boolean): BoolNode {
  return Object.freeze({ type: 'Bool', value });
}

// int64 の範囲外は 2 の補数で丸める（呼び出し側で範囲を保証する前提）
export function intNode(value: bigint): IntNode {
  return Object.freeze({ type: 'Int', value: BigInt.asIntN(64, value) });
}

export function floatNode(value: number): FloatNode {
  return Object.freeze({ type: 'Float', value });
}

export function stringNode(value: string): StringNode {
  return Object.freeze({ type: 'String', value });
}

export function arrayNode(raw: string | Uint8Array): ArrayNode {
  return Object.freeze({ type: 'Array', raw: typeof raw === 'string' ? raw : utf8.decode(raw) });
}

export function jsonNode(raw: string | Uint8Array): JsonNode {
  return Object.freeze({ type: 'JSON', raw: typeof raw === 'string' ? raw : utf8.decode(raw) });
}

// ---- 文字列解析 ----

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INF_PATTERN = /^([+-]?)inf(?:inity)?$/i;
const BOOL_TEXT: Readonly<Record<string, boolean>> = {
  '1': true, t: true, T: true, TRUE: true, true: true, True: true,
  '0': false, f: false, F: false, FALSE: false, false: false, False: false,
};

// 10進 int64。範囲外・形式不正は undefined
export function parseInt64(text: string): bigint | undefined {
  if (!INT_PATTERN.test(text)) return undefined;
  const n = BigInt(text);
  if (n < INT64_MIN || n > INT64_MAX) return undefined;
  return n;
}

// 有限値が Infinity に溢れた場合は失敗扱い
export function parseFloat64(text: string): number | undefined {
  const inf = INF_PATTERN.exec(text);
  if (inf) return inf[1] === '-' ? -Infinity : Infinity;
  if (/^nan$/i.test(text)) return NaN;
  if (!FLOAT_PATTERN.test(text)) return undefined;
  const n = Number(text);
  return Number.isFinite(n) ? n : undefined;
}

export function parseBool(text: string): boolean | undefined {
  return Object.hasOwn(BOOL_TEXT, text) ? BOOL_TEXT[text] : undefined;
}

// 固定小数点 6 桁（%f 相当）
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  // toFixed は 1e21 以上で指数表記になる。この範囲の double は必ず整数。
  if (Math.abs(value) >= 1e21) return `${BigInt(value)}.000000`;
  const tie = roundHalfEven(value);
  if (tie !== undefined) return tie;
  const text = value.toFixed(6);
  return Object.is(value, -0) ? `-${text}` : text;
}

// 7 桁目でちょうど半分になる double は x * 128 が奇数の整数になるものに限られる。
// toFixed は絶対値の大きい側へ丸めるので、この場合だけ偶数側へ丸め直す。
function roundHalfEven(value: number): string | undefined {
  const scaled = Math.abs(value) * 128;
  if (!Number.isInteger(scaled) || scaled % 2 === 0) return undefined;
  let n = (BigInt(scaled) * 1000000n) / 128n;
  if (n % 2n !== 0n) n += 1n;
  const digits = n.toString().padStart(7, '0');
  const text = `${digits.slice(0, -6)}.${digits.slice(-6)}`;
  return value < 0 ? `-${text}` : text;
}

// ---- To ----

export function toType(node: Node, target: ValueType): Node {
  switch (node.type) {
    case 'Undefined':
      return UNDEFINED;
    case 'Null':
      return nullTo(node, target);
    case 'Bool':
      return boolTo(node, target);
    case 'Int':
      return intTo(node, target);
    case 'Float':
      return floatTo(node, target);
    case 'String':
      return stringTo(node, target);
    case 'Array':
      return arrayTo(node, target);
    case 'JSON':
      return target === 'JSON' ? node : UNDEFINED;
  }
}

function nullTo(node: NullNode, target: ValueType): Node {
  switch (target) {
    case 'Null':
      return node;
    case 'JSON':
      return jsonNode('{}');
    case 'Array':
      return arrayNode('[]');
    default:
      return UNDEFINED;
  }
}

function boolTo(node: BoolNode, target: ValueType): Node {
  switch (target) {
    case 'Bool':
      return node;
    case 'String':
      return stringNode(String(node.value));
    default:
      return UNDEFINED;
  }
}

function intTo(node: IntNode, target: ValueType): Node {
  switch (target) {
    case 'Number':
    case 'Int':
      return node;
    case 'Float':
      return floatNode(Number(node.value));
    case 'String':
      return stringNode(node.value.toString());
    default:
      return UNDEFINED;
  }
}

function floatTo(node: FloatNode, target: ValueType): Node {
  switch (target) {
    case 'Number':
    case 'Float':
      return node;
    case 'Int': {
      // 切り捨て。NaN/Inf と int64 範囲外は表現できないので UNDEFINED
      if (!Number.isFinite(node.value)) return UNDEFINED;
      const n = BigInt(Math.trunc(node.value));
      return n < INT64_MIN || n > INT64_MAX ? UNDEFINED : intNode(n);
    }
    case 'String':
      return stringNode(formatFloat(node.value));
    default:
      return UNDEFINED;
  }
}

function stringTo(node: StringNode, target: ValueType): Node {
  switch (target) {
    case 'String':
      return node;
    case 'Bool': {
      const b = parseBool(node.value);
      return b === undefined ? UNDEFINED : boolNode(b);
    }
    case 'Number':
      // 値ではなく文字列中の '.' の有無で Int / Float を選ぶ（"1e5" は Int 解析に回り失敗する）
      return node.value.includes('.') ? stringTo(node, 'Float') : stringTo(node, 'Int');
    case 'Int': {
      const n = parseInt64(node.value);
      return n === undefined ? UNDEFINED : intNode(n);
    }
    case 'Float': {
      const f = parseFloat64(node.value);
      return f === undefined ? UNDEFINED : floatNode(f);
    }
    default:
      return UNDEFINED;
  }
}

function arrayTo(node: ArrayNode, target: ValueType): Node {
  switch (target) {
    case 'String':
      return stringNode(node.raw);
    case 'Array':
      return node;
    case 'JSON':
      return jsonNode(node.raw);
    default:
      return UNDEFINED;
  }
}

// ---- String / Value ----

export function nodeToString(node: Node): string {
  switch (node.type) {
    case 'Undefined':
      return '';
    case 'Null':
      return 'null';
    case 'Bool':
      return node.value ? 'true' : 'false';
    case 'Int':
      return node.value.toString();
    case 'Float':
      return formatFloat(node.value);
    case 'String':
      return node.value;
    case 'Array':
    case 'JSON':
      return node.raw;
  }
}

/**
 * 汎用的なデコード済みの値を返す。
 * Int は bigint、Array / JSON は呼び出しごとに JSON.parse し、壊れていれば null。
 */
export function nodeValue(node: Node): unknown {
  switch (node.type) {
    case 'Undefined':
      return undefined;
    case 'Null':
      return null;
    case 'Bool':
    case 'Int':
    case 'Float':
    case 'String':
      return node.value;
    case 'Array':
    case 'JSON':
      return decodeRaw(node.raw);
  }
}

function decodeRaw(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

// 構造的な等価判定（タグ + ペイロード）
export function nodeEquals(a: Node, b: Node): boolean {
  switch (a.type) {
    case 'Undefined':
    case 'Null':
      return a.type === b.type;
    case 'Bool':
      return b.type === 'Bool' && a.value === b.value;
    case 'Int':
      return b.type === 'Int' && a.value === b.value;
    case 'Float':
      return b.type === 'Float' && a.value === b.value;
    case 'String':
      return b.type === 'String' && a.value === b.value;
    case 'Array':
      return b.type === 'Array' && a.raw === b.raw;
    case 'JSON':
      return b.type === 'JSON' && a.raw === b.raw;
  }
}

export const NODE_TYPES: readonly NodeType[] = ['Undefined', 'Null', 'Bool', 'Int', 'Float', 'String', 'Array', 'JSON'];
export const VALUE_TYPES: readonly ValueType[] = [...NODE_TYPES, 'Number'];
