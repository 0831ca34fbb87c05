// src/value/newNode.ts
// 汎用デシリアライザが返した動的な値から Node を組み立てる。
// 判定順: 数値 → 文字列/真偽 → null/undefined → バイト列 → ラッパー → 連想 → 列 → その他
// 失敗は例外にせず UNDEFINED に落とす。

import type { Node } from './types.ts';
import { UNDEFINED, NULL, boolNode, floatNode, stringNode, jsonNode, toType } from './node.ts';

export function newNode(input: unknown): Node {
  switch (typeof input) {
    case 'number':
      // JS の number は整数と浮動小数を区別しないため、安全整数だけを Int とみなす
      return Number.isSafeInteger(input) ? integerFromText(input.toString()) : floatNode(input);
    case 'bigint':
      return integerFromText(input.toString());
    case 'string':
      return stringNode(input);
    case 'boolean':
      return boolNode(input);
    case 'undefined':
      return NULL;
    case 'object':
      return objectToNode(input);
    default:
      // function / symbol
      return UNDEFINED;
  }
}

// 10進テキスト経由で正規化（int64 範囲外は UNDEFINED）
function integerFromText(text: string): Node {
  return toType(stringNode(text), 'Int');
}

function objectToNode(input: object | null): Node {
  if (input === null) return NULL;
  if (input instanceof Uint8Array) return jsonNode(input);

  // Number / String / Boolean のラッパーは一段だけ剥がして再判定
  if (input instanceof Number || input instanceof String || input instanceof Boolean) {
    return newNode(input.valueOf());
  }

  if (Array.isArray(input)) return serialize(input);
  if (input instanceof Set) return serialize(Array.from(input));
  if (input instanceof Map) {
    const entries: Array<[string, unknown]> = [];
    for (const [k, v] of input) {
      if (typeof k !== 'string') return UNDEFINED;
      entries.push([k, v]);
    }
    return serialize(Object.fromEntries(entries));
  }
  if (isPlainObject(input)) return serialize(input);

  return UNDEFINED;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

// 循環参照や bigint を含む値は JSON.stringify が投げる。値を表現できないので UNDEFINED。
function serialize(value: unknown): Node {
  try {
    const text = JSON.stringify(value);
    return typeof text === 'string' ? jsonNode(text) : UNDEFINED;
  } catch {
    return UNDEFINED;
  }
}
