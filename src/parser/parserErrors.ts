// src/parser/parserErrors.ts
import { ParseError, formatLocation } from '../errors/errors.ts';

// トークン情報の型は Chevrotain の IToken のうち必要な部分だけ
export interface TokenLike {
  image: string;
  startLine?: number;
  startColumn?: number;
}

// 代表ケース: 期待外トークン
export function failUnexpectedToken(token: TokenLike, expected: string): never {
  const loc = formatLocation(token.startLine, token.startColumn);
  const msg = loc
    ? `Unexpected token '${token.image}' at ${loc}. Expected ${expected}.`
    : `Unexpected token '${token.image}'. Expected ${expected}.`;
  throw new ParseError(msg, token.startLine, token.startColumn, token.image, 'E_PARSE_UNEXPECTED_TOKEN');
}

// 構文としては通ったが値が不正（範囲外の整数、ウィンドウの長さなど）
export function failInvalidToken(token: TokenLike, detail: string): never {
  const loc = formatLocation(token.startLine, token.startColumn);
  const msg = loc ? `${detail} at ${loc}.` : `${detail}.`;
  throw new ParseError(msg, token.startLine, token.startColumn, token.image, 'E_PARSE_GENERIC');
}

export function failGenericParse(message: string): never {
  throw new ParseError(message, undefined, undefined, undefined, 'E_PARSE_GENERIC');
}
