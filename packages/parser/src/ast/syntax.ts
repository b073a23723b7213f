/**
 * Language-neutral, read-only syntax tree consumed by the extractor and the
 * metrics. Grammar adapters (see `./adapter.ts`) build it from tree-sitter
 * trees; tests build it by hand with {@link createNode}.
 */

/**
 * Canonical list of node kinds.
 * SyntaxKind is derived from this array. Grammar node types that have no
 * entry here are mapped to 'Other'.
 */
export const SYNTAX_KINDS = [
  'CompilationUnit',
  'NamespaceDeclaration',

  // Type declarations
  'ClassDeclaration',
  'StructDeclaration',
  'RecordDeclaration',
  'InterfaceDeclaration',
  'EnumDeclaration',

  // Members
  'MethodDeclaration',
  'ConstructorDeclaration',
  'DestructorDeclaration',
  'PropertyDeclaration',
  'IndexerDeclaration',
  'EventDeclaration',
  'FieldDeclaration',
  'OperatorDeclaration',
  'ConversionOperatorDeclaration',
  'AccessorDeclaration',

  // Statements
  'Block',
  'BreakStatement',
  'CheckedStatement',
  'ContinueStatement',
  'DoStatement',
  'EmptyStatement',
  'ExpressionStatement',
  'FixedStatement',
  'ForStatement',
  'ForEachStatement',
  'GotoStatement',
  'IfStatement',
  'LabeledStatement',
  'LocalDeclarationStatement',
  'LocalFunctionStatement',
  'LockStatement',
  'ReturnStatement',
  'SwitchStatement',
  'ThrowStatement',
  'TryStatement',
  'UncheckedStatement',
  'UnsafeStatement',
  'UsingStatement',
  'WhileStatement',
  'YieldStatement',

  // Function expressions
  'AnonymousMethodExpression',
  'LambdaExpression',

  'Other',
] as const;

export type SyntaxKind = (typeof SYNTAX_KINDS)[number];

export interface SourceLocation {
  /** Path of the file the node was parsed from */
  readonly file: string;
  /** 1-based line of the node's first token */
  readonly line: number;
}

export interface SyntaxNode {
  readonly kind: SyntaxKind;
  readonly children: readonly SyntaxNode[];
  readonly location: SourceLocation;
}

/**
 * A parsed file: the root node plus what is known about the parse.
 */
export interface SyntaxView {
  readonly file: string;
  readonly root: SyntaxNode;
  /** True when the grammar recovered from syntax errors while parsing */
  readonly hasErrors: boolean;
}

export const BLOCK_KIND: SyntaxKind = 'Block';

export const STATEMENT_KINDS: ReadonlySet<SyntaxKind> = new Set<SyntaxKind>([
  'Block',
  'BreakStatement',
  'CheckedStatement',
  'ContinueStatement',
  'DoStatement',
  'EmptyStatement',
  'ExpressionStatement',
  'FixedStatement',
  'ForStatement',
  'ForEachStatement',
  'GotoStatement',
  'IfStatement',
  'LabeledStatement',
  'LocalDeclarationStatement',
  'LocalFunctionStatement',
  'LockStatement',
  'ReturnStatement',
  'SwitchStatement',
  'ThrowStatement',
  'TryStatement',
  'UncheckedStatement',
  'UnsafeStatement',
  'UsingStatement',
  'WhileStatement',
  'YieldStatement',
]);

/**
 * Statements that exist to hold other statements. The statement-count metric
 * skips them by default so that only the work inside them is counted.
 */
export const COMPOUND_STATEMENT_KINDS: ReadonlySet<SyntaxKind> = new Set<SyntaxKind>([
  'CheckedStatement',
  'DoStatement',
  'FixedStatement',
  'ForStatement',
  'ForEachStatement',
  'IfStatement',
  'LabeledStatement',
  'LockStatement',
  'SwitchStatement',
  'TryStatement',
  'UncheckedStatement',
  'UnsafeStatement',
  'UsingStatement',
  'WhileStatement',
]);

/**
 * Type declarations whose members are function candidates.
 * Interfaces are deliberately absent; enums carry no members with bodies.
 */
export const TYPE_DECLARATION_KINDS: ReadonlySet<SyntaxKind> = new Set<SyntaxKind>([
  'ClassDeclaration',
  'StructDeclaration',
  'RecordDeclaration',
]);

export function isStatementKind(kind: SyntaxKind): boolean {
  return STATEMENT_KINDS.has(kind);
}

/** Statement kinds other than the block kind */
export function isNonBlockStatement(kind: SyntaxKind): boolean {
  return kind !== BLOCK_KIND && STATEMENT_KINDS.has(kind);
}

/**
 * Build an immutable node. Children are copied and frozen.
 */
export function createNode(
  kind: SyntaxKind,
  children: readonly SyntaxNode[] = [],
  location: SourceLocation = { file: '', line: 1 },
): SyntaxNode {
  return Object.freeze({
    kind,
    children: Object.freeze([...children]),
    location: Object.freeze({ file: location.file, line: location.line }),
  });
}

/**
 * Pre-order walk over every node below `node`, excluding `node` itself.
 */
export function* descendants(node: SyntaxNode): Generator<SyntaxNode> {
  for (const child of node.children) {
    yield child;
    yield* descendants(child);
  }
}
