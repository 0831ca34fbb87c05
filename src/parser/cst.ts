// src/parser/cst.ts
// 各 CST ルールの children の形。キーは parser.ts の LABEL / トークン名 / ルール名に一致させる。
// 0 回出現した要素はキー自体が存在しないため optional にしている。

import type { CstNode, IToken } from 'chevrotain';

export interface SelectStatementCstChildren {
  Select: IToken[];
  fieldList: CstNode[];
  From: IToken[];
  topicList: CstNode[];
  Where?: IToken[];
  filter?: CstNode[];
  groupByClause?: CstNode[];
}

export interface FieldListCstChildren {
  field: CstNode[];
  Comma?: IToken[];
}

export interface FieldCstChildren {
  Star?: IToken[];
  expression?: CstNode[];
  As?: IToken[];
  alias?: IToken[];
}

export interface TopicListCstChildren {
  topic: IToken[];
  Comma?: IToken[];
}

export interface GroupByClauseCstChildren {
  Group: IToken[];
  By: IToken[];
  jsonPath: CstNode[];
  Comma?: IToken[];
  windowClause?: CstNode[];
}

export interface WindowClauseCstChildren {
  Window: IToken[];
  LParen: IToken[];
  kind: IToken[];
  Comma: IToken[];
  length: IToken[];
  interval?: IToken[];
  RParen: IToken[];
}

export interface ExpressionCstChildren {
  orExpression: CstNode[];
}

// or / and / comparison / additive / multiplicative で共通
export interface BinaryCstChildren {
  lhs: CstNode[];
  rhs?: CstNode[];
  operator?: IToken[];
  Or?: IToken[];
  And?: IToken[];
}

export interface UnaryExpressionCstChildren {
  Minus?: IToken[];
  operand?: CstNode[];
  primaryExpression?: CstNode[];
}

export interface PrimaryExpressionCstChildren {
  literal?: CstNode[];
  groupExpression?: CstNode[];
  caseExpression?: CstNode[];
  callExpression?: CstNode[];
  jsonPath?: CstNode[];
}

export interface GroupExpressionCstChildren {
  LParen: IToken[];
  expression: CstNode[];
  RParen: IToken[];
}

export interface CaseExpressionCstChildren {
  Case: IToken[];
  subject?: CstNode[];
  whenClause: CstNode[];
  Else?: IToken[];
  otherwise?: CstNode[];
  End: IToken[];
}

export interface WhenClauseCstChildren {
  When: IToken[];
  when: CstNode[];
  Then: IToken[];
  then: CstNode[];
}

export interface CallExpressionCstChildren {
  name: IToken[];
  LParen: IToken[];
  args?: CstNode[];
  Comma?: IToken[];
  RParen: IToken[];
}

export interface JsonPathCstChildren {
  head: IToken[];
  segment?: IToken[];
  Dot?: IToken[];
  LBracket?: IToken[];
  RBracket?: IToken[];
}

export interface LiteralCstChildren {
  StringLiteral?: IToken[];
  NumberLiteral?: IToken[];
  True?: IToken[];
  False?: IToken[];
  Null?: IToken[];
}
