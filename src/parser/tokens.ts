// src/parser/tokens.ts
import { createToken, Lexer } from 'chevrotain';
import { Keyword, Operator, Separator, Literal, Identifier as IdentifierCat } from './categories.ts';

// WhiteSpace は Lexer.SKIPPED とし、パーサーに渡さない。
export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /\s+/,
  group: Lexer.SKIPPED,
});

// ----- Identifiers -----
// 予約語の longer_alt に使うため先に定義する（allTokens では最後に並べる）。
// '-' は減算と衝突するので識別子には含めない。ハイフン入りのトピック名は文字列で書く。
export const Identifier = createToken({
  name: 'Identifier',
  pattern: /[a-zA-Z_][a-zA-Z0-9_]*/,
  categories: IdentifierCat,
});

// ----- Keywords -----
// longer_alt: "order" が OR + der、"selection" が SELECT + ion に割れないようにする
const keyword = (name: string, pattern: RegExp) =>
  createToken({ name, pattern, categories: Keyword, longer_alt: Identifier });

export const Select = keyword('Select', /select/i);
export const From = keyword('From', /from/i);
export const Where = keyword('Where', /where/i);
export const Group = keyword('Group', /group/i);
export const By = keyword('By', /by/i);
export const WindowKw = keyword('Window', /window/i);
export const As = keyword('As', /as/i);
export const And = keyword('And', /and/i);
export const Or = keyword('Or', /or/i);
export const Case = keyword('Case', /case/i);
export const When = keyword('When', /when/i);
export const Then = keyword('Then', /then/i);
export const Else = keyword('Else', /else/i);
export const End = keyword('End', /end/i);

export const True = keyword('True', /true/i);
export const False = keyword('False', /false/i);
export const Null = keyword('Null', /null/i);

// ----- Operators -----
// 複合演算子（2文字）を単一演算子より先に並べる。
export const GreaterThanOrEqual = createToken({ name: 'GreaterThanOrEqual', pattern: />=/, categories: Operator, start_chars_hint: ['>'] });
export const LessThanOrEqual = createToken({ name: 'LessThanOrEqual', pattern: /<=/, categories: Operator, start_chars_hint: ['<'] });
export const NotEquals = createToken({ name: 'NotEquals', pattern: /!=|<>/, categories: Operator, start_chars_hint: ['!', '<'] });

export const GreaterThan = createToken({ name: 'GreaterThan', pattern: />/, categories: Operator, start_chars_hint: ['>'] });
export const LessThan = createToken({ name: 'LessThan', pattern: /</, categories: Operator, start_chars_hint: ['<'] });
export const Equals = createToken({ name: 'Equals', pattern: /=/, categories: Operator, start_chars_hint: ['='] });
export const Plus = createToken({ name: 'Plus', pattern: /\+/, categories: Operator, start_chars_hint: ['+'] });
export const Minus = createToken({ name: 'Minus', pattern: /-/, categories: Operator, start_chars_hint: ['-'] });
// '*' は乗算と SELECT * の両方で使う
export const Star = createToken({ name: 'Star', pattern: /\*/, categories: Operator, start_chars_hint: ['*'] });
export const Slash = createToken({ name: 'Slash', pattern: /\//, categories: Operator, start_chars_hint: ['/'] });
export const Percent = createToken({ name: 'Percent', pattern: /%/, categories: Operator, start_chars_hint: ['%'] });

// ----- Separators -----
export const LParen = createToken({ name: 'LParen', pattern: /\(/, categories: Separator, start_chars_hint: ['('] });
export const RParen = createToken({ name: 'RParen', pattern: /\)/, categories: Separator, start_chars_hint: [')'] });
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/, categories: Separator, start_chars_hint: ['['] });
export const RBracket = createToken({ name: 'RBracket', pattern: /\]/, categories: Separator, start_chars_hint: [']'] });
export const Comma = createToken({ name: 'Comma', pattern: /,/, categories: Separator, start_chars_hint: [','] });
export const Dot = createToken({ name: 'Dot', pattern: /\./, categories: Separator, start_chars_hint: ['.'] });

// ----- Literals -----
// "..." と '...' の両方。エスケープは \b \f \n \r \t \v \" \' \\ \/ \uXXXX。
export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /"(?:[^\\"]|\\(?:[bfnrtv"'\\/]|u[0-9a-fA-F]{4}))*"|'(?:[^\\']|\\(?:[bfnrtv"'\\/]|u[0-9a-fA-F]{4}))*'/,
  categories: Literal,
});

// 符号は単項マイナスとして構文側で扱う。'.' か指数を含めば Float、それ以外は Int。
export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/,
  categories: Literal,
});

// ----- Token order (priority) -----
// 1) WhiteSpace（SKIPPED）
// 2) Keywords（予約語を Identifier より先に）
// 3) Operators: まず2文字（>=, <=, !=, <>）、次に1文字
// 4) Separators
// 5) Literals
// 6) Identifiers（最後）
export const allTokens = [
  WhiteSpace,

  // Keywords
  Select, From, Where, Group, By, WindowKw, As, And, Or, Case, When, Then, Else, End, True, False, Null,

  // Operators (multi-char first)
  GreaterThanOrEqual, LessThanOrEqual, NotEquals,

  // Operators (single-char)
  GreaterThan, LessThan, Equals, Plus, Minus, Star, Slash, Percent,

  // Separators
  LParen, RParen, LBracket, RBracket, Comma, Dot,

  // Literals
  StringLiteral, NumberLiteral,

  // Identifiers
  Identifier,
];
