// src/ast/builders.ts
// AST ノードの生成関数。配列は複製してから凍結するので、生成後に呼び出し側の配列を変えても木は変わらない。

import type {
  SelectStatement,
  Fields,
  Field,
  Topic,
  Filter,
  Dimensions,
  Window,
  Expression,
  BinaryExpr,
  CallExpr,
  SwitchExpr,
  CaseExpr,
  JsonPathExpr,
} from './types.ts';

export function selectStatement(parts: {
  fields: Fields;
  topic: Topic;
  filter?: Filter;
  dimensions?: Dimensions;
}): SelectStatement {
  return Object.freeze({ type: 'SelectStatement', ...parts });
}

export function fields(items: readonly Field[]): Fields {
  return Object.freeze({ type: 'Fields', items: Object.freeze([...items]) });
}

export function field(expression: Expression, alias?: string): Field {
  return alias === undefined
    ? Object.freeze({ type: 'Field', expression })
    : Object.freeze({ type: 'Field', expression, alias });
}

export function topic(names: readonly string[]): Topic {
  return Object.freeze({ type: 'Topic', names: Object.freeze([...names]) });
}

export function filter(expression: Expression): Filter {
  return Object.freeze({ type: 'Filter', expression });
}

export function dimensions(paths: readonly JsonPathExpr[], window?: Window): Dimensions {
  const frozen = Object.freeze([...paths]);
  return window === undefined
    ? Object.freeze({ type: 'Dimensions', paths: frozen })
    : Object.freeze({ type: 'Dimensions', paths: frozen, window });
}

export function binaryExpr(operator: number, left: Expression, right: Expression): BinaryExpr {
  return Object.freeze({ type: 'BinaryExpr', operator, left, right });
}

export function callExpr(raw: string, name: string, args: readonly Expression[]): CallExpr {
  return Object.freeze({ type: 'CallExpr', raw, name, args: Object.freeze([...args]) });
}

export function switchExpr(subject: Expression, cases: readonly CaseExpr[], defaultBranch: Expression): SwitchExpr {
  return Object.freeze({ type: 'SwitchExpr', subject, cases: Object.freeze([...cases]), defaultBranch });
}

export function caseExpr(when: Expression, then: Expression): CaseExpr {
  return Object.freeze({ type: 'CaseExpr', when, then });
}

export function jsonPath(path: string): JsonPathExpr {
  return Object.freeze({ type: 'JSONPathExpr', path });
}
