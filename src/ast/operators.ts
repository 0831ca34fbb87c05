// src/ast/operators.ts
// BinaryExpr.operator に入る判別値。AST はこの値を解釈せず、パーサーと評価器の間の取り決めとして使う。

export const BinaryOp = {
  OR: 1,
  AND: 2,
  EQ: 3,
  NEQ: 4,
  LT: 5,
  LTE: 6,
  GT: 7,
  GTE: 8,
  ADD: 9,
  SUB: 10,
  MUL: 11,
  DIV: 12,
  MOD: 13,
} as const;

export type BinaryOpCode = (typeof BinaryOp)[keyof typeof BinaryOp];

export const BINARY_OP_SYMBOLS: Readonly<Record<BinaryOpCode, string>> = {
  [BinaryOp.OR]: 'OR',
  [BinaryOp.AND]: 'AND',
  [BinaryOp.EQ]: '=',
  [BinaryOp.NEQ]: '!=',
  [BinaryOp.LT]: '<',
  [BinaryOp.LTE]: '<=',
  [BinaryOp.GT]: '>',
  [BinaryOp.GTE]: '>=',
  [BinaryOp.ADD]: '+',
  [BinaryOp.SUB]: '-',
  [BinaryOp.MUL]: '*',
  [BinaryOp.DIV]: '/',
  [BinaryOp.MOD]: '%',
};

// 字句（<> は != の別表記）から判別値へ
export const BINARY_OP_BY_SYMBOL: Readonly<Record<string, BinaryOpCode>> = {
  OR: BinaryOp.OR,
  AND: BinaryOp.AND,
  '=': BinaryOp.EQ,
  '!=': BinaryOp.NEQ,
  '<>': BinaryOp.NEQ,
  '<': BinaryOp.LT,
  '<=': BinaryOp.LTE,
  '>': BinaryOp.GT,
  '>=': BinaryOp.GTE,
  '+': BinaryOp.ADD,
  '-': BinaryOp.SUB,
  '*': BinaryOp.MUL,
  '/': BinaryOp.DIV,
  '%': BinaryOp.MOD,
};

export function isBinaryOpCode(op: number): op is BinaryOpCode {
  return Object.hasOwn(BINARY_OP_SYMBOLS, op);
}
