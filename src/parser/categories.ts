// src/parser/categories.ts
import { createToken } from 'chevrotain';

// トークンの上位分類。Lexer が直接マッチさせるものではなく、カテゴリ判定（tokenMatcher）用。
export const Token = createToken({ name: 'Token', pattern: /NA/ });

// SELECT / FROM / CASE などの予約語と true / false / null
export const Keyword = createToken({ name: 'Keyword', categories: Token });

// 比較・算術演算子
export const Operator = createToken({ name: 'Operator', categories: Token });

// 括弧・カンマ・ドット
export const Separator = createToken({ name: 'Separator', categories: Token });

// 文字列・数値リテラル
export const Literal = createToken({ name: 'Literal', categories: Token });

// フィールドパス・関数名・トピック名・別名
export const Identifier = createToken({ name: 'Identifier', categories: Token });
