// src/eval/index.ts
export { evaluate, evalExpr, resolveOptions, valuesEqual } from './evaluator.ts';
export type { EvaluateOptions, InternalOptions } from './evaluator.ts';
export { execute, outputKey, dimensionValues, windowOf } from './execute.ts';
export { builtinFunctions } from './functions.ts';
export type { EvalFunction } from './functions.ts';
export { parsePath, resolvePath } from './path.ts';
export type { PathSegment, Resolved } from './path.ts';
