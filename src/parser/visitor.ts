// src/parser/visitor.ts
// 目的: Chevrotain の CST を AST へ変換する Visitor 実装
// 命名規約: メソッド名は CST ルール名に一致。children の形は cst.ts を参照。

import type { CstNode, IToken } from 'chevrotain';
import type {
  SelectStatement,
  Fields,
  Field,
  Topic,
  Dimensions,
  Window,
  Expression,
  CaseExpr,
  CallExpr,
  JsonPathExpr,
  SwitchExpr,
} from '../ast/types.ts';
import type { Node } from '../value/types.ts';
import type {
  SelectStatementCstChildren,
  FieldListCstChildren,
  FieldCstChildren,
  TopicListCstChildren,
  GroupByClauseCstChildren,
  WindowClauseCstChildren,
  ExpressionCstChildren,
  BinaryCstChildren,
  UnaryExpressionCstChildren,
  PrimaryExpressionCstChildren,
  GroupExpressionCstChildren,
  CaseExpressionCstChildren,
  WhenClauseCstChildren,
  CallExpressionCstChildren,
  JsonPathCstChildren,
  LiteralCstChildren,
} from './cst.ts';
import * as build from '../ast/builders.ts';
import { BinaryOp, BINARY_OP_BY_SYMBOL } from '../ast/operators.ts';
import type { BinaryOpCode } from '../ast/operators.ts';
import {
  isWindowKind,
  checkWindow,
  tumblingWindow,
  slidingWindow,
  hoppingWindow,
  sessionWindow,
} from '../ast/window.ts';
import type { WindowKind } from '../ast/window.ts';
import { NULL, boolNode, intNode, floatNode, stringNode, parseInt64 } from '../value/node.ts';
import { parserInstance } from './parser.ts';
import { failInvalidToken, failUnexpectedToken, failGenericParse } from './parserErrors.ts';

const BaseCstVisitor = parserInstance.getBaseCstVisitorConstructor();

const ESCAPES: Readonly<Record<string, string>> = {
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

// トークンの image（"..." / '...'）から両端の引用符を外し、エスケープを復元
export function unquoteString(image: string): string {
  return image.slice(1, -1).replace(/\\(u[0-9a-fA-F]{4}|.)/g, (_, esc: string) => {
    if (esc.length === 5) return String.fromCharCode(parseInt(esc.slice(1), 16));
    return ESCAPES[esc] ?? esc;
  });
}

// 種別ごとに interval の要否を確かめてから組み立てる。問題があれば理由の文字列を返す。
function buildWindow(kind: Exclude<WindowKind, 'NONE'>, length: number, interval: number | undefined): Window | string {
  switch (kind) {
    case 'TUMBLING':
      return interval === undefined ? tumblingWindow(length) : 'TUMBLING window takes no interval';
    case 'SLIDING':
      return interval === undefined ? slidingWindow(length) : 'SLIDING window takes no interval';
    case 'HOPPING':
      return interval === undefined ? 'HOPPING window requires an interval' : hoppingWindow(length, interval);
    case 'SESSION':
      return interval === undefined ? 'SESSION window requires a gap' : sessionWindow(length, interval);
  }
}

function first<T>(items: T[] | undefined, what: string): T {
  const item = items?.[0];
  if (item === undefined) return failGenericParse(`Missing ${what} in parse tree`);
  return item;
}

export class AstBuilderVisitor extends BaseCstVisitor {
  // CallExpr の原文を切り出すための入力テキスト。build() の間だけ有効。
  private source = '';

  constructor() {
    super();
    // 実装されたVisitorメソッドがパーサーの全ルールをカバーしているか検証
    this.validateVisitor();
  }

  build<T>(cst: CstNode, source: string): T {
    this.source = source;
    try {
      return this.visit(cst);
    } finally {
      this.source = '';
    }
  }

  // ---- 文 ----

  selectStatement(ctx: SelectStatementCstChildren): SelectStatement {
    const fields: Fields = this.visit(first(ctx.fieldList, 'field list'));
    const topic: Topic = this.visit(first(ctx.topicList, 'topic list'));
    const filter = ctx.filter ? build.filter(this.expr(ctx.filter)) : undefined;
    const dimensions: Dimensions | undefined = ctx.groupByClause ? this.visit(ctx.groupByClause) : undefined;
    return build.selectStatement({ fields, topic, filter, dimensions });
  }

  fieldList(ctx: FieldListCstChildren): Fields {
    return build.fields(ctx.field.map((node): Field => this.visit(node)));
  }

  field(ctx: FieldCstChildren): Field {
    if (ctx.Star) return build.field(build.jsonPath('*'));
    const alias = ctx.alias?.[0]?.image;
    return build.field(this.expr(ctx.expression), alias);
  }

  topicList(ctx: TopicListCstChildren): Topic {
    return build.topic(
      ctx.topic.map((t) => (t.tokenType.name === 'StringLiteral' ? unquoteString(t.image) : t.image)),
    );
  }

  groupByClause(ctx: GroupByClauseCstChildren): Dimensions {
    const paths = ctx.jsonPath.map((node): JsonPathExpr => this.visit(node));
    const window: Window | undefined = ctx.windowClause ? this.visit(ctx.windowClause) : undefined;
    return build.dimensions(paths, window);
  }

  windowClause(ctx: WindowClauseCstChildren): Window {
    const kindToken = first(ctx.kind, 'window kind');
    const kind = kindToken.image.toUpperCase();
    if (!isWindowKind(kind) || kind === 'NONE') {
      return failUnexpectedToken(kindToken, 'a window kind (TUMBLING, HOPPING, SLIDING, SESSION)');
    }
    const length = this.windowNumber(first(ctx.length, 'window length'));
    const intervalToken = ctx.interval?.[0];
    const interval = intervalToken ? this.windowNumber(intervalToken) : undefined;

    const window = buildWindow(kind, length, interval);
    if (typeof window === 'string') return failInvalidToken(kindToken, window);
    const problem = checkWindow(window);
    if (problem) return failInvalidToken(kindToken, problem);
    return window;
  }

  // ---- 式 ----

  expression(ctx: ExpressionCstChildren): Expression {
    return this.visit(ctx.orExpression);
  }

  orExpression(ctx: BinaryCstChildren): Expression {
    return this.fold(ctx, ctx.Or);
  }

  andExpression(ctx: BinaryCstChildren): Expression {
    return this.fold(ctx, ctx.And);
  }

  comparisonExpression(ctx: BinaryCstChildren): Expression {
    return this.fold(ctx, ctx.operator);
  }

  additiveExpression(ctx: BinaryCstChildren): Expression {
    return this.fold(ctx, ctx.operator);
  }

  multiplicativeExpression(ctx: BinaryCstChildren): Expression {
    return this.fold(ctx, ctx.operator);
  }

  // リテラルはその場で符号を反転し、それ以外は 0 - x にする
  unaryExpression(ctx: UnaryExpressionCstChildren): Expression {
    if (!ctx.Minus) return this.visit(first(ctx.primaryExpression, 'operand'));
    const operand = this.expr(ctx.operand);
    if (operand.type === 'Int') return intNode(-operand.value);
    if (operand.type === 'Float') return floatNode(-operand.value);
    return build.binaryExpr(BinaryOp.SUB, intNode(0n), operand);
  }

  primaryExpression(ctx: PrimaryExpressionCstChildren): Expression {
    const node =
      ctx.literal ?? ctx.groupExpression ?? ctx.caseExpression ?? ctx.callExpression ?? ctx.jsonPath;
    return this.visit(first(node, 'primary expression'));
  }

  groupExpression(ctx: GroupExpressionCstChildren): Expression {
    return this.expr(ctx.expression);
  }

  // 対象なしの CASE は true を対象にする。ELSE 省略時は null。
  caseExpression(ctx: CaseExpressionCstChildren): SwitchExpr {
    const subject = ctx.subject ? this.expr(ctx.subject) : boolNode(true);
    const cases = ctx.whenClause.map((node): CaseExpr => this.visit(node));
    const otherwise = ctx.otherwise ? this.expr(ctx.otherwise) : NULL;
    return build.switchExpr(subject, cases, otherwise);
  }

  whenClause(ctx: WhenClauseCstChildren): CaseExpr {
    return build.caseExpr(this.expr(ctx.when), this.expr(ctx.then));
  }

  callExpression(ctx: CallExpressionCstChildren): CallExpr {
    const nameToken = first(ctx.name, 'function name');
    const closeToken = first(ctx.RParen, "')'");
    const raw = this.source.slice(nameToken.startOffset, closeToken.startOffset + closeToken.image.length);
    const args = (ctx.args ?? []).map((node): Expression => this.visit(node));
    return build.callExpr(raw, nameToken.image, args);
  }

  // パス文字列を正規形で組み立てる: 識別子は .name、引用キーは ."key"、添字は [n]
  jsonPath(ctx: JsonPathCstChildren): JsonPathExpr {
    const tokens = [...ctx.head, ...(ctx.segment ?? [])].sort((a, b) => a.startOffset - b.startOffset);
    let path = '';
    tokens.forEach((token, i) => {
      switch (token.tokenType.name) {
        case 'NumberLiteral':
          if (!/^\d+$/.test(token.image)) failInvalidToken(token, `Array index must be an integer, got '${token.image}'`);
          path += `[${token.image}]`;
          break;
        case 'StringLiteral':
          path += `.${JSON.stringify(unquoteString(token.image))}`;
          break;
        default:
          path += i === 0 ? token.image : `.${token.image}`;
      }
    });
    return build.jsonPath(path);
  }

  literal(ctx: LiteralCstChildren): Node {
    const token = ctx.StringLiteral?.[0] ?? ctx.NumberLiteral?.[0] ?? ctx.True?.[0] ?? ctx.False?.[0] ?? ctx.Null?.[0];
    if (!token) return failGenericParse('Literal token not found');
    return this.buildLiteralNode(token);
  }

  // ---- ユーティリティ ----

  private expr(nodes: CstNode[] | undefined): Expression {
    return this.visit(first(nodes, 'expression'));
  }

  // 左結合の二項演算子を処理する共通パターン
  private fold(ctx: BinaryCstChildren, operators: IToken[] | undefined): Expression {
    let left = this.expr(ctx.lhs);
    const rhs = ctx.rhs ?? [];
    for (let i = 0; i < rhs.length; i++) {
      const opToken = first(operators?.slice(i, i + 1), 'operator');
      const right: Expression = this.visit(first(rhs.slice(i, i + 1), 'right operand'));
      left = build.binaryExpr(this.operatorCode(opToken), left, right);
    }
    return left;
  }

  private operatorCode(token: IToken): BinaryOpCode {
    const symbol = token.image.toUpperCase();
    const code = Object.hasOwn(BINARY_OP_BY_SYMBOL, symbol) ? BINARY_OP_BY_SYMBOL[symbol] : undefined;
    if (code === undefined) return failInvalidToken(token, `Unknown operator '${token.image}'`);
    return code;
  }

  private windowNumber(token: IToken): number {
    const n = /^\d+$/.test(token.image) ? Number(token.image) : NaN;
    if (!Number.isSafeInteger(n)) return failInvalidToken(token, `Window size must be an integer, got '${token.image}'`);
    return n;
  }

  // トークンからリテラルノードを構築する
  private buildLiteralNode(token: IToken): Node {
    switch (token.tokenType.name) {
      case 'StringLiteral':
        return stringNode(unquoteString(token.image));
      case 'NumberLiteral':
        return this.buildNumberNode(token);
      case 'True':
        return boolNode(true);
      case 'False':
        return boolNode(false);
      case 'Null':
        return NULL;
      default:
        return failInvalidToken(token, `Unknown literal token type ${token.tokenType.name}`);
    }
  }

  // '.' か指数表記を含めば Float、それ以外は int64
  private buildNumberNode(token: IToken): Node {
    if (/[.eE]/.test(token.image)) {
      const f = Number(token.image);
      if (!Number.isFinite(f)) return failInvalidToken(token, `Number literal '${token.image}' is out of range`);
      return floatNode(f);
    }
    const n = parseInt64(token.image);
    if (n === undefined) return failInvalidToken(token, `Integer literal '${token.image}' is out of int64 range`);
    return intNode(n);
  }
}

// ビジターのシングルトンインスタンスをエクスポート
export const astBuilderVisitor = new AstBuilderVisitor();
