// src/ast/walk.ts
// AST の汎用走査。個々のノード種別を知らずに木全体を辿れるよう、子の列挙をここに集約する。

import type { AstNode } from './types.ts';

// 子ノードを記述順に返す。値ノード（葉）は子を持たない。
export function children(node: AstNode): AstNode[] {
  switch (node.type) {
    case 'SelectStatement': {
      const out: AstNode[] = [node.fields, node.topic];
      if (node.filter) out.push(node.filter);
      if (node.dimensions) out.push(node.dimensions);
      return out;
    }
    case 'Fields':
      return [...node.items];
    case 'Field':
    case 'Filter':
      return [node.expression];
    case 'Dimensions':
      return node.window ? [...node.paths, node.window] : [...node.paths];
    case 'BinaryExpr':
      return [node.left, node.right];
    case 'CallExpr':
      return [...node.args];
    case 'SwitchExpr':
      return [node.subject, ...node.cases, node.defaultBranch];
    case 'CaseExpr':
      return [node.when, node.then];
    case 'Topic':
    case 'Window':
    case 'JSONPathExpr':
    case 'Undefined':
    case 'Null':
    case 'Bool':
    case 'Int':
    case 'Float':
    case 'String':
    case 'Array':
    case 'JSON':
      return [];
  }
}

// false を返すとそのノードの子孫は辿らない
export type Visitor = (node: AstNode, parent: AstNode | undefined) => boolean | void;

// 深さ優先・前順
export function walk(root: AstNode, visitor: Visitor): void {
  const visit = (node: AstNode, parent: AstNode | undefined): void => {
    if (visitor(node, parent) === false) return;
    for (const child of children(node)) visit(child, node);
  };
  visit(root, undefined);
}

// 条件に合うノードを前順で集める
export function collect<T extends AstNode>(root: AstNode, predicate: (node: AstNode) => node is T): T[] {
  const found: T[] = [];
  walk(root, (node) => {
    if (predicate(node)) found.push(node);
  });
  return found;
}
