// src/parser/index.ts
// 公開API: クエリ文字列を AST へ変換します（CST は内部実装に隠蔽）。

import { Lexer } from 'chevrotain';
import type { CstNode, IToken } from 'chevrotain';
import { allTokens } from './tokens.ts';
import { parserInstance } from './parser.ts';
import { astBuilderVisitor } from './visitor.ts';
import type { SelectStatement, Expression } from '../ast/types.ts';
import { ParseError } from '../errors/errors.ts';

const lexer = new Lexer(allTokens);

export interface ParseResult<T> {
  ast: T;
  tokens: IToken[];
}

// SELECT 文全体
export function parse(input: string): ParseResult<SelectStatement> {
  return run(input, () => parserInstance.selectStatement());
}

// 単独の式（WHERE 句の中身など）
export function parseExpression(input: string): ParseResult<Expression> {
  return run(input, () => parserInstance.expression());
}

function run<T>(input: string, rule: () => CstNode): ParseResult<T> {
  // 1) Lexing: Lexer エラーは ParseError に正規化
  const lexResult = lexer.tokenize(input);
  const le = lexResult.errors[0];
  if (le) {
    // Chevrotain のメッセージは複数行になり得るため第一文のみ採用
    const firstSentence = le.message.split('\n')[0] ?? 'Lexing error';
    // "unexpected character" を Unexpected 系として昇格（それ以外は Generic）
    const isUnexpected = firstSentence.toLowerCase().includes('unexpected character');
    const code = isUnexpected ? 'E_PARSE_UNEXPECTED_TOKEN' : 'E_PARSE_GENERIC';
    throw new ParseError(firstSentence, le.line, le.column, undefined, code);
  }

  // 2) Parsing (CST)
  parserInstance.input = lexResult.tokens;
  const cst = rule();

  const pe = parserInstance.errors[0];
  if (pe) {
    const firstSentence = pe.message.split('\n')[0] ?? pe.message;
    const token = pe.token;
    // EOF で失敗した場合トークンは位置を持たない
    const positioned = token.tokenType.name !== 'EOF';
    const isUnexpected = firstSentence.toLowerCase().includes('unexpected token');
    throw new ParseError(
      firstSentence,
      positioned ? token.startLine : undefined,
      positioned ? token.startColumn : undefined,
      positioned ? token.image : undefined,
      isUnexpected ? 'E_PARSE_UNEXPECTED_TOKEN' : 'E_PARSE_GENERIC',
    );
  }

  // 3) CST -> AST（Visitor）
  const ast = astBuilderVisitor.build<T>(cst, input);

  // デバッグ・ツール連携を考慮し tokens も返す
  return { ast, tokens: lexResult.tokens };
}
