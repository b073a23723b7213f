import { COMPOUND_STATEMENT_KINDS, isNonBlockStatement, type SyntaxNode } from '../syntax.js';

export interface StatementCountOptions {
  /**
   * Also count statements that only wrap other statements (`if`, loops,
   * `try`, `switch`, ...). Off by default.
   */
  includeCompound?: boolean;
}

/**
 * Number of statements in the subtree rooted at `node`, regardless of how
 * deeply they are nested. Blocks are never counted, so wrapping statements in
 * extra braces leaves the count unchanged. Every node is visited, counted or
 * not.
 */
export function countStatements(node: SyntaxNode, options: StatementCountOptions = {}): number {
  const includeCompound = options.includeCompound ?? false;
  let total = 0;

  function traverse(n: SyntaxNode): void {
    if (isNonBlockStatement(n.kind) && (includeCompound || !COMPOUND_STATEMENT_KINDS.has(n.kind))) {
      total++;
    }

    for (const child of n.children) {
      traverse(child);
    }
  }

  traverse(node);
  return total;
}
