import {
  TYPE_DECLARATION_KINDS,
  descendants,
  isNonBlockStatement,
  type SyntaxNode,
} from './syntax.js';

/**
 * True when any node below `member` is a statement other than a block.
 * An empty body `{ }` is a lone block and does not qualify.
 */
export function hasExecutableBody(member: SyntaxNode): boolean {
  for (const node of descendants(member)) {
    if (isNonBlockStatement(node.kind)) return true;
  }
  return false;
}

/**
 * Collect the function-like members of every class, struct and record
 * declaration under `root`.
 *
 * A member qualifies when its subtree holds at least one non-block statement,
 * which admits methods, constructors, accessors, fields initialised with
 * statement-bodied lambdas and nested types, and rejects pure declarations.
 * Interface members are never candidates. Candidates come back in document
 * order.
 */
export function extractFunctions(root: SyntaxNode): SyntaxNode[] {
  const candidates: SyntaxNode[] = [];

  for (const node of descendants(root)) {
    if (!TYPE_DECLARATION_KINDS.has(node.kind)) continue;

    for (const member of node.children) {
      if (hasExecutableBody(member)) {
        candidates.push(member);
      }
    }
  }

  return candidates;
}
