// src/errors/errors.ts
// flowql - error types and helpers
// 目的: 層ごとに例外型を分離し、呼び出し側が分類しやすい構造を提供
// ログはライブラリ層では行わず、呼び出し側で処理する方針
// 注意: 値モデルの変換（To / newNode）は例外を投げない。失敗は Undefined ノードで表す。

export type ErrorCode =
  | 'E_PARSE_UNEXPECTED_TOKEN'
  | 'E_PARSE_GENERIC'
  | 'E_JSON_UNSUPPORTED_VALUE'
  | 'E_JSON_KEY_NOT_FOUND'
  | 'E_JSON_MALFORMED'
  | 'E_EVAL_TYPE_MISMATCH'
  | 'E_EVAL_UNKNOWN_FUNCTION'
  | 'E_EVAL_GENERIC';

export abstract class FlowqlError extends Error {
  public abstract readonly code: ErrorCode;
  constructor(message: string) {
    super(message);
    // Errorのプロトタイプ連鎖調整（Babel/TS互換）
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Parser: トークナイズ/構文解析
export class ParseError extends FlowqlError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly snippet?: string,
    code: Extract<ErrorCode, 'E_PARSE_UNEXPECTED_TOKEN' | 'E_PARSE_GENERIC'> = 'E_PARSE_GENERIC',
  ) {
    super(message);
    this.name = 'ParseError';
    this.code = code;
  }
}

// JSON 部分更新: 文書の破損・キー不在・差し替え不能な値
export class JsonUpdateError extends FlowqlError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly key?: string,
    public readonly valueType?: string,
    code: Extract<ErrorCode, 'E_JSON_UNSUPPORTED_VALUE' | 'E_JSON_KEY_NOT_FOUND' | 'E_JSON_MALFORMED'> = 'E_JSON_MALFORMED',
  ) {
    super(message);
    this.name = 'JsonUpdateError';
    this.code = code;
  }
}

// Evaluator: AST の評価
// グローバルのEvalErrorと衝突を避ける命名
export class EvaluationError extends FlowqlError {
  public readonly code: ErrorCode;
  constructor(
    message: string,
    public readonly op?: string,
    code: Extract<ErrorCode, 'E_EVAL_TYPE_MISMATCH' | 'E_EVAL_UNKNOWN_FUNCTION' | 'E_EVAL_GENERIC'> = 'E_EVAL_GENERIC',
  ) {
    super(message);
    this.name = 'EvaluationError';
    this.code = code;
  }
}

// スニペット整形（必要に応じて使用）
export function formatLocation(line?: number, column?: number): string {
  if (line == null || column == null) return '';
  return `${line}:${column}`;
}
