// src/ast/index.ts
export * from './types.ts';
export * from './operators.ts';
export * from './window.ts';
export * from './builders.ts';
export * from './walk.ts';
export * from './format.ts';
