// src/value/index.ts
export * from './types.ts';
export * from './node.ts';
export * from './newNode.ts';
