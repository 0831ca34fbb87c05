// src/parser/parser.ts
// 目的: tokens.ts のトークンを用いて SELECT 文の CST を生成する Chevrotain パーサー。
//
// selectStatement := SELECT fieldList FROM topicList [WHERE expression] [groupByClause]
// 式の優先順位（低 → 高）: OR < AND < 比較 < 加減 < 乗除剰余 < 単項マイナス < 一次式

import { CstParser } from 'chevrotain';
import {
  allTokens,
  Select,
  From,
  Where,
  Group,
  By,
  WindowKw,
  As,
  And,
  Or,
  Case,
  When,
  Then,
  Else,
  End,
  True,
  False,
  Null,
  Equals,
  NotEquals,
  GreaterThan,
  GreaterThanOrEqual,
  LessThan,
  LessThanOrEqual,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  LParen,
  RParen,
  LBracket,
  RBracket,
  Comma,
  Dot,
  Identifier,
  StringLiteral,
  NumberLiteral,
} from './tokens.ts';

export class QueryParser extends CstParser {
  constructor() {
    super(allTokens, {
      recoveryEnabled: false,
      nodeLocationTracking: 'full',
    });
    this.performSelfAnalysis();
  }

  // ---- 文 ----

  public selectStatement = this.RULE('selectStatement', () => {
    this.CONSUME(Select);
    this.SUBRULE(this.fieldList);
    this.CONSUME(From);
    this.SUBRULE(this.topicList);
    this.OPTION(() => {
      this.CONSUME(Where);
      this.SUBRULE(this.expression, { LABEL: 'filter' });
    });
    this.OPTION2(() => this.SUBRULE(this.groupByClause));
  });

  public fieldList = this.RULE('fieldList', () => {
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.field),
    });
  });

  // '*' | expression [AS alias]
  public field = this.RULE('field', () => {
    this.OR([
      { ALT: () => this.CONSUME(Star) },
      {
        ALT: () => {
          this.SUBRULE(this.expression);
          this.OPTION(() => {
            this.CONSUME(As);
            this.CONSUME(Identifier, { LABEL: 'alias' });
          });
        },
      },
    ]);
  });

  public topicList = this.RULE('topicList', () => {
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => {
        this.OR([
          { ALT: () => this.CONSUME(Identifier, { LABEL: 'topic' }) },
          { ALT: () => this.CONSUME(StringLiteral, { LABEL: 'topic' }) },
        ]);
      },
    });
  });

  // GROUP BY path, ... [WINDOW(kind, length[, interval])]
  public groupByClause = this.RULE('groupByClause', () => {
    this.CONSUME(Group);
    this.CONSUME(By);
    this.AT_LEAST_ONE_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.jsonPath),
    });
    this.OPTION(() => this.SUBRULE(this.windowClause));
  });

  // 種別名は予約語にせず Identifier で受け、visitor で検査する
  public windowClause = this.RULE('windowClause', () => {
    this.CONSUME(WindowKw);
    this.CONSUME(LParen);
    this.CONSUME(Identifier, { LABEL: 'kind' });
    this.CONSUME(Comma);
    this.CONSUME(NumberLiteral, { LABEL: 'length' });
    this.OPTION(() => {
      this.CONSUME2(Comma);
      this.CONSUME2(NumberLiteral, { LABEL: 'interval' });
    });
    this.CONSUME(RParen);
  });

  // ---- 式 ----

  public expression = this.RULE('expression', () => {
    this.SUBRULE(this.orExpression);
  });

  // 左結合
  public orExpression = this.RULE('orExpression', () => {
    this.SUBRULE(this.andExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.andExpression, { LABEL: 'rhs' });
    });
  });

  public andExpression = this.RULE('andExpression', () => {
    this.SUBRULE(this.comparisonExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.CONSUME(And);
      this.SUBRULE2(this.comparisonExpression, { LABEL: 'rhs' });
    });
  });

  // 比較は非結合（a < b < c は構文エラー）
  public comparisonExpression = this.RULE('comparisonExpression', () => {
    this.SUBRULE(this.additiveExpression, { LABEL: 'lhs' });
    this.OPTION(() => {
      this.OR([
        { ALT: () => this.CONSUME(Equals, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(NotEquals, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(GreaterThanOrEqual, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(LessThanOrEqual, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(GreaterThan, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(LessThan, { LABEL: 'operator' }) },
      ]);
      this.SUBRULE2(this.additiveExpression, { LABEL: 'rhs' });
    });
  });

  public additiveExpression = this.RULE('additiveExpression', () => {
    this.SUBRULE(this.multiplicativeExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Plus, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(Minus, { LABEL: 'operator' }) },
      ]);
      this.SUBRULE2(this.multiplicativeExpression, { LABEL: 'rhs' });
    });
  });

  public multiplicativeExpression = this.RULE('multiplicativeExpression', () => {
    this.SUBRULE(this.unaryExpression, { LABEL: 'lhs' });
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Star, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(Slash, { LABEL: 'operator' }) },
        { ALT: () => this.CONSUME(Percent, { LABEL: 'operator' }) },
      ]);
      this.SUBRULE2(this.unaryExpression, { LABEL: 'rhs' });
    });
  });

  public unaryExpression = this.RULE('unaryExpression', () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Minus);
          this.SUBRULE(this.unaryExpression, { LABEL: 'operand' });
        },
      },
      { ALT: () => this.SUBRULE(this.primaryExpression) },
    ]);
  });

  // callExpression と jsonPath はどちらも Identifier で始まる。2トークン目の '(' で区別される。
  public primaryExpression = this.RULE('primaryExpression', () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.literal) },
      { ALT: () => this.SUBRULE(this.groupExpression) },
      { ALT: () => this.SUBRULE(this.caseExpression) },
      { ALT: () => this.SUBRULE(this.callExpression) },
      { ALT: () => this.SUBRULE(this.jsonPath) },
    ]);
  });

  // ( expr )
  public groupExpression = this.RULE('groupExpression', () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expression);
    this.CONSUME(RParen);
  });

  // CASE [subject] WHEN .. THEN .. [WHEN ..]* [ELSE ..] END
  public caseExpression = this.RULE('caseExpression', () => {
    this.CONSUME(Case);
    this.OPTION(() => this.SUBRULE(this.expression, { LABEL: 'subject' }));
    this.AT_LEAST_ONE(() => this.SUBRULE(this.whenClause));
    this.OPTION2(() => {
      this.CONSUME(Else);
      this.SUBRULE2(this.expression, { LABEL: 'otherwise' });
    });
    this.CONSUME(End);
  });

  public whenClause = this.RULE('whenClause', () => {
    this.CONSUME(When);
    this.SUBRULE(this.expression, { LABEL: 'when' });
    this.CONSUME(Then);
    this.SUBRULE2(this.expression, { LABEL: 'then' });
  });

  // name(arg, ...)
  public callExpression = this.RULE('callExpression', () => {
    this.CONSUME(Identifier, { LABEL: 'name' });
    this.CONSUME(LParen);
    this.MANY_SEP({
      SEP: Comma,
      DEF: () => this.SUBRULE(this.expression, { LABEL: 'args' }),
    });
    this.CONSUME(RParen);
  });

  // a.b."c d"[0]
  public jsonPath = this.RULE('jsonPath', () => {
    this.CONSUME(Identifier, { LABEL: 'head' });
    this.MANY(() => {
      this.OR([
        {
          ALT: () => {
            this.CONSUME(Dot);
            this.OR2([
              { ALT: () => this.CONSUME2(Identifier, { LABEL: 'segment' }) },
              { ALT: () => this.CONSUME(StringLiteral, { LABEL: 'segment' }) },
            ]);
          },
        },
        {
          ALT: () => {
            this.CONSUME(LBracket);
            this.CONSUME(NumberLiteral, { LABEL: 'segment' });
            this.CONSUME(RBracket);
          },
        },
      ]);
    });
  });

  // literal: string | number | true | false | null
  public literal = this.RULE('literal', () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(NumberLiteral) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Null) },
    ]);
  });
}

// performSelfAnalysis は重いので 1 インスタンスを使い回す（input の再設定で状態はリセットされる）
export const parserInstance = new QueryParser();
