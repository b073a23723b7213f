import type Parser from 'tree-sitter';
import type { LanguageDefinition } from './languages/types.js';
import { createNode, type SyntaxKind, type SyntaxNode, type SyntaxView } from './syntax.js';

/** Kinds whose grammar body node is flattened away */
const MEMBER_CONTAINER_KINDS: ReadonlySet<SyntaxKind> = new Set<SyntaxKind>([
  'ClassDeclaration',
  'StructDeclaration',
  'RecordDeclaration',
  'InterfaceDeclaration',
]);

/**
 * Map a grammar node onto the SyntaxKind vocabulary. Unknown types, including
 * tree-sitter ERROR nodes, become 'Other'.
 */
export function resolveKind(node: Parser.SyntaxNode, language: LanguageDefinition): SyntaxKind {
  const kind = language.nodeKinds[node.type] ?? 'Other';
  return language.refineKind ? language.refineKind(node, kind) : kind;
}

/**
 * Convert a tree-sitter node and its named descendants into SyntaxNodes.
 * Anonymous tokens (punctuation, keywords) are dropped.
 */
export function toSyntaxNode(
  node: Parser.SyntaxNode,
  file: string,
  language: LanguageDefinition,
): SyntaxNode {
  const kind = resolveKind(node, language);
  const hoistMembers = MEMBER_CONTAINER_KINDS.has(kind);
  const children: SyntaxNode[] = [];

  for (const child of node.namedChildren) {
    if (hoistMembers && language.memberListTypes.includes(child.type)) {
      for (const member of child.namedChildren) {
        children.push(toSyntaxNode(member, file, language));
      }
    } else {
      children.push(toSyntaxNode(child, file, language));
    }
  }

  return createNode(kind, children, { file, line: node.startPosition.row + 1 });
}

export function toSyntaxView(
  tree: Parser.Tree,
  file: string,
  language: LanguageDefinition,
): SyntaxView {
  return Object.freeze({
    file,
    root: toSyntaxNode(tree.rootNode, file, language),
    hasErrors: tree.rootNode.hasError,
  });
}
