// src/value/types.ts
// 値モデルの型定義。Node は閉じた判別共用体で、type タグで分岐する。
// いずれのノードも生成後は不変（readonly + freeze）。

// 型タグ。Number は Int | Float をまとめる論理カテゴリで、ノードとしては生成されない。
export type ValueType =
  | 'Undefined'
  | 'Null'
  | 'Bool'
  | 'Number'
  | 'Int'
  | 'Float'
  | 'String'
  | 'Array'
  | 'JSON';

// 実際にノードとして現れるタグ
export type NodeType = Exclude<ValueType, 'Number'>;

export type Node =
  | UndefinedNode
  | NullNode
  | BoolNode
  | IntNode
  | FloatNode
  | StringNode
  | ArrayNode
  | JsonNode;

// 変換に失敗したことを表す番兵。値を持たない。
export interface UndefinedNode {
  readonly type: 'Undefined';
}

export interface NullNode {
  readonly type: 'Null';
}

export interface BoolNode {
  readonly type: 'Bool';
  readonly value: boolean;
}

// int64。精度を落とさないよう bigint で保持する。
export interface IntNode {
  readonly type: 'Int';
  readonly value: bigint;
}

export interface FloatNode {
  readonly type: 'Float';
  readonly value: number;
}

export interface StringNode {
  readonly type: 'String';
  readonly value: string;
}

// JSON 配列をシリアライズ済みテキストのまま保持
export interface ArrayNode {
  readonly type: 'Array';
  readonly raw: string;
}

// JSON オブジェクトまたは配列の生テキスト
export interface JsonNode {
  readonly type: 'JSON';
  readonly raw: string;
}

export type NumericNode = IntNode | FloatNode;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export function isUndefined(node: Node): node is UndefinedNode {
  return node.type === 'Undefined';
}
export function isNull(node: Node): node is NullNode {
  return node.type === 'Null';
}
export function isNumeric(node: Node): node is NumericNode {
  return node.type === 'Int' || node.type === 'Float';
}
export function isStringNode(node: Node): node is StringNode {
  return node.type === 'String';
}
export function isJsonNode(node: Node): node is JsonNode {
  return node.type === 'JSON';
}

