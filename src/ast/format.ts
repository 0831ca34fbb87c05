// src/ast/format.ts
// 式をクエリテキストへ戻す。出力キーの既定名と診断メッセージで使う。

import type { Expression } from './types.ts';
import { BINARY_OP_SYMBOLS, isBinaryOpCode } from './operators.ts';

export function formatExpression(expr: Expression): string {
  switch (expr.type) {
    case 'Undefined':
      return 'undefined';
    case 'Null':
      return 'null';
    case 'Bool':
      return expr.value ? 'true' : 'false';
    case 'Int':
      return expr.value.toString();
    case 'Float':
      // 1.0 を 1 と書くと Int に読まれてしまう
      return Number.isInteger(expr.value) ? expr.value.toFixed(1) : String(expr.value);
    case 'String':
      return JSON.stringify(expr.value);
    case 'Array':
    case 'JSON':
      return expr.raw;
    case 'JSONPathExpr':
      return expr.path;
    case 'CallExpr':
      return expr.raw;
    case 'BinaryExpr': {
      const symbol = isBinaryOpCode(expr.operator) ? BINARY_OP_SYMBOLS[expr.operator] : `op(${expr.operator})`;
      return `${operand(expr.left)} ${symbol} ${operand(expr.right)}`;
    }
    case 'SwitchExpr': {
      const parts = ['CASE', formatExpression(expr.subject)];
      for (const c of expr.cases) {
        parts.push('WHEN', formatExpression(c.when), 'THEN', formatExpression(c.then));
      }
      parts.push('ELSE', formatExpression(expr.defaultBranch), 'END');
      return parts.join(' ');
    }
  }
}

// 入れ子の二項演算は常に括弧で囲む
function operand(expr: Expression): string {
  const text = formatExpression(expr);
  return expr.type === 'BinaryExpr' ? `(${text})` : text;
}
