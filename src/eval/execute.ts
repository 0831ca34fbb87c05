// src/eval/execute.ts
// SELECT 文を 1 レコードに適用し、出力レコード（JSON テキスト）を組み立てる。
// ウィンドウ集約そのものは行わない。実行系向けにグループキーとウィンドウ記述子を取り出す補助だけを持つ。

import type { Node } from '../value/types.ts';
import { newNode } from '../value/newNode.ts';
import type { SelectStatement, Field, Window } from '../ast/types.ts';
import { isWildcard } from '../ast/types.ts';
import { formatExpression } from '../ast/format.ts';
import { noWindow } from '../ast/window.ts';
import { setJsonKey } from '../json/update.ts';
import { evalExpr, resolveOptions } from './evaluator.ts';
import type { EvaluateOptions } from './evaluator.ts';
import { failGenericEval } from './evaluationErrors.ts';

// 出力キー: 別名 > パス > 式のテキスト
export function outputKey(field: Field): string {
  return field.alias ?? formatExpression(field.expression);
}

/**
 * record（JSON テキスト）に statement を適用する。
 * WHERE が true にならなければ null。値が UNDEFINED のフィールドは出力から省く。
 * SELECT * は入力レコードのキーをそのまま写す（先頭にあれば原文を保ったまま使う）。
 */
export function execute(statement: SelectStatement, record: string, options: EvaluateOptions = {}): string | null {
  const opts = resolveOptions(options);
  const decoded = decodeRecord(record);

  if (statement.filter) {
    const verdict = evalExpr(statement.filter.expression, decoded, opts);
    if (verdict.type !== 'Bool' || !verdict.value) return null;
  }

  let doc = '{}';
  let written = false;
  for (const field of statement.fields.items) {
    if (isWildcard(field)) {
      if (!isObject(decoded)) return failGenericEval('SELECT * requires a JSON object record.');
      if (!written) {
        doc = record;
      } else {
        for (const [key, value] of Object.entries(decoded)) doc = setJsonKey(doc, key, newNode(value));
      }
      written = true;
      continue;
    }
    const value = evalExpr(field.expression, decoded, opts);
    if (value.type === 'Undefined') continue;
    doc = setJsonKey(doc, outputKey(field), value);
    written = true;
  }
  return doc;
}

// GROUP BY のパスをレコードに対して評価した値（記述順）
export function dimensionValues(statement: SelectStatement, record: unknown, options: EvaluateOptions = {}): Node[] {
  const opts = resolveOptions(options);
  return (statement.dimensions?.paths ?? []).map((p) => evalExpr(p, record, opts));
}

// WINDOW 句が無ければ NONE
export function windowOf(statement: SelectStatement): Window {
  return statement.dimensions?.window ?? noWindow();
}

function decodeRecord(record: string): unknown {
  try {
    return JSON.parse(record);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    return failGenericEval(`Record is not valid JSON: ${reason}`);
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
