// src/index.ts
export * from './value/index.ts';
export * from './json/index.ts';
export * from './ast/index.ts';
export * from './eval/index.ts';
export { parse, parseExpression } from './parser/index.ts';
export type { ParseResult } from './parser/index.ts';
export { FlowqlError, ParseError, JsonUpdateError, EvaluationError } from './errors/errors.ts';
export type { ErrorCode } from './errors/errors.ts';
