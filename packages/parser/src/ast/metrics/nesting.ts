import type { SyntaxKind, SyntaxNode } from '../syntax.js';

/**
 * Constructs that open one more level of nesting when entered.
 */
export const NESTING_ENLARGER_KINDS: ReadonlySet<SyntaxKind> = new Set<SyntaxKind>([
  'AnonymousMethodExpression',
  'CheckedStatement',
  'DoStatement',
  'FixedStatement',
  'ForStatement',
  'ForEachStatement',
  'IfStatement',
  'LockStatement',
  'LambdaExpression',
  'SwitchStatement',
  'TryStatement',
  'UnsafeStatement',
  'UncheckedStatement',
  'WhileStatement',
]);

/**
 * Length of the longest chain of nested enlarging constructs below `node`.
 *
 *   depth(leaf) = 0
 *   depth(n)    = max over children c of depth(c) + (c enlarges ? 1 : 0)
 *
 * The increment belongs to the child being entered, so ten sibling `if`s
 * score 1 while `if { if { while { } } }` scores 3.
 */
export function nestingDepth(node: SyntaxNode): number {
  let depth = 0;

  for (const child of node.children) {
    const childDepth = nestingDepth(child) + (NESTING_ENLARGER_KINDS.has(child.kind) ? 1 : 0);
    if (childDepth > depth) {
      depth = childDepth;
    }
  }

  return depth;
}
