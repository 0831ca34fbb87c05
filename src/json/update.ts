// src/json/update.ts
// JSON 文書の部分更新。対象キーの値の区間だけを差し替え、それ以外のテキスト（キー順・空白）は一切変更しない。
// 入力文字列は変更せず、呼び出しごとに新しい文字列を返す。

import type { Node } from '../value/types.ts';
import { nodeToString } from '../value/node.ts';
import { scanObject, findMember } from './scanner.ts';
import { failUnsupportedValue, failKeyNotFound } from './jsonErrors.ts';

/**
 * doc のトップレベルキー key の値を value で置き換えた文書を返す。
 *
 * - key が空で value が JSON の場合は文書全体を value.raw に置き換える（マージしない）。
 * - Float / Int / Bool は String() のテキストを引用符なしで、String は引用符で囲んで（エスケープはしない）、
 *   JSON は生テキストのまま埋め込む。
 * - それ以外の値、キーの不在、文書の破損は JsonUpdateError。
 */
export function updateJson(doc: string, key: string, value: Node): string {
  switch (value.type) {
    case 'Float':
    case 'Int':
    case 'Bool':
      return replaceMember(doc, key, nodeToString(value));
    case 'String':
      return replaceMember(doc, key, `"${value.value}"`);
    case 'JSON':
      if (key === '') return value.raw;
      return replaceMember(doc, key, value.raw);
    default:
      return failUnsupportedValue(key, value.type);
  }
}

/**
 * キーがあれば値を差し替え、無ければ末尾に追加する。出力レコードの組み立て用。
 * Undefined 以外のすべての値を受け付ける。String はキーと同じく JSON 文字列としてエスケープし、
 * それ以外は toWireString の表現で埋め込む。
 */
export function setJsonKey(doc: string, key: string, value: Node): string {
  if (value.type === 'Undefined') return failUnsupportedValue(key, value.type);
  const text = value.type === 'String' ? JSON.stringify(value.value) : toWireString(value);
  const layout = scanObject(doc);
  const member = findMember(layout, key);
  if (member) return splice(doc, member.valueStart, member.valueEnd, text);

  const entry = `${JSON.stringify(key)}:${text}`;
  const last = layout.members[layout.members.length - 1];
  if (last) return splice(doc, last.valueEnd, last.valueEnd, `,${entry}`);
  return splice(doc, layout.close, layout.close, entry);
}

// 大きな JSON 構造へ埋め込むための表現。JSON はそのまま、String は引用符付き、その他は String()。
export function toWireString(value: Node): string {
  switch (value.type) {
    case 'JSON':
      return value.raw;
    case 'String':
      return `"${value.value}"`;
    default:
      return nodeToString(value);
  }
}

const utf8 = new TextEncoder();

export function toBytesWithWrapString(value: Node): Uint8Array {
  return utf8.encode(toWireString(value));
}

function replaceMember(doc: string, key: string, text: string): string {
  const member = findMember(scanObject(doc), key);
  if (!member) return failKeyNotFound(key);
  return splice(doc, member.valueStart, member.valueEnd, text);
}

function splice(doc: string, start: number, end: number, text: string): string {
  return doc.slice(0, start) + text + doc.slice(end);
}
