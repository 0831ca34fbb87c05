// src/ast/types.ts
// SELECT 文の AST 型定義。
// 各ノードは type で判別される readonly オブジェクトで、親がただ一つ子を所有する木（共有・逆参照なし）。
// 必須の子はすべて非 optional。省略できるのは filter / dimensions / window / alias のみ。

import type { Node } from '../value/types.ts';
import type { WindowKind } from './window.ts';

// 木の全ノード。走査（walk）はこの閉じた集合だけを前提にする。
export type AstNode =
  | SelectStatement
  | Fields
  | Field
  | Topic
  | Filter
  | Dimensions
  | Window
  | CaseExpr
  | Expression;

// 値を生む式。クエリ中の定数は値モデルの Node がそのまま葉になる。
export type Expression =
  | Node
  | BinaryExpr
  | CallExpr
  | SwitchExpr
  | JsonPathExpr;

// SELECT fields FROM topic [WHERE filter] [GROUP BY dimensions]
export interface SelectStatement {
  readonly type: 'SelectStatement';
  readonly fields: Fields;
  readonly topic: Topic;
  readonly filter?: Filter;
  readonly dimensions?: Dimensions;
}

export interface Fields {
  readonly type: 'Fields';
  readonly items: readonly Field[];
}

// expression AS alias。SELECT * は path が '*' の JsonPathExpr で表す。
export interface Field {
  readonly type: 'Field';
  readonly expression: Expression;
  readonly alias?: string;
}

export interface Topic {
  readonly type: 'Topic';
  readonly names: readonly string[];
}

export interface Filter {
  readonly type: 'Filter';
  readonly expression: Expression;
}

// GROUP BY path, ... [WINDOW(...)]
export interface Dimensions {
  readonly type: 'Dimensions';
  readonly paths: readonly JsonPathExpr[];
  readonly window?: Window;
}

export interface Window {
  readonly type: 'Window';
  readonly kind: WindowKind;
  readonly length: number;
  readonly interval: number;
}

// operator は BinaryOp の数値。解釈は評価器が行う。
export interface BinaryExpr {
  readonly type: 'BinaryExpr';
  readonly operator: number;
  readonly left: Expression;
  readonly right: Expression;
}

// raw は呼び出しの原文（診断・出力キー用）
export interface CallExpr {
  readonly type: 'CallExpr';
  readonly raw: string;
  readonly name: string;
  readonly args: readonly Expression[];
}

// cases は記述順を保持する（先に一致したものが勝つ）
export interface SwitchExpr {
  readonly type: 'SwitchExpr';
  readonly subject: Expression;
  readonly cases: readonly CaseExpr[];
  readonly defaultBranch: Expression;
}

export interface CaseExpr {
  readonly type: 'CaseExpr';
  readonly when: Expression;
  readonly then: Expression;
}

// レコード内のフィールド参照。path の書式は解決側（評価器）が解釈する。
export interface JsonPathExpr {
  readonly type: 'JSONPathExpr';
  readonly path: string;
}

export function isJsonPath(node: AstNode): node is JsonPathExpr {
  return node.type === 'JSONPathExpr';
}
export function isWildcard(field: Field): boolean {
  return field.expression.type === 'JSONPathExpr' && field.expression.path === '*';
}
