import { createRequire } from 'module';
import type Parser from 'tree-sitter';
import type { SyntaxKind } from '../syntax.js';
import type { LanguageDefinition, TreeSitterLanguage } from './types.js';

const require = createRequire(import.meta.url);
const CSharp: TreeSitterLanguage = require('tree-sitter-c-sharp');

/**
 * tree-sitter-c-sharp node types mapped onto SyntaxKind.
 *
 * Older grammar releases name the foreach loop `for_each_statement`, newer
 * ones `foreach_statement`; both are listed. `checked_statement` covers both
 * `checked { }` and `unchecked { }` and is split by {@link refineCSharpKind}.
 */
const CSHARP_NODE_KINDS: Readonly<Record<string, SyntaxKind>> = {
  compilation_unit: 'CompilationUnit',
  namespace_declaration: 'NamespaceDeclaration',
  file_scoped_namespace_declaration: 'NamespaceDeclaration',

  class_declaration: 'ClassDeclaration',
  struct_declaration: 'StructDeclaration',
  record_declaration: 'RecordDeclaration',
  record_struct_declaration: 'RecordDeclaration',
  interface_declaration: 'InterfaceDeclaration',
  enum_declaration: 'EnumDeclaration',

  method_declaration: 'MethodDeclaration',
  constructor_declaration: 'ConstructorDeclaration',
  destructor_declaration: 'DestructorDeclaration',
  property_declaration: 'PropertyDeclaration',
  indexer_declaration: 'IndexerDeclaration',
  event_declaration: 'EventDeclaration',
  event_field_declaration: 'EventDeclaration',
  field_declaration: 'FieldDeclaration',
  operator_declaration: 'OperatorDeclaration',
  conversion_operator_declaration: 'ConversionOperatorDeclaration',
  accessor_declaration: 'AccessorDeclaration',

  block: 'Block',
  break_statement: 'BreakStatement',
  checked_statement: 'CheckedStatement',
  continue_statement: 'ContinueStatement',
  do_statement: 'DoStatement',
  empty_statement: 'EmptyStatement',
  expression_statement: 'ExpressionStatement',
  fixed_statement: 'FixedStatement',
  for_statement: 'ForStatement',
  foreach_statement: 'ForEachStatement',
  for_each_statement: 'ForEachStatement',
  goto_statement: 'GotoStatement',
  if_statement: 'IfStatement',
  labeled_statement: 'LabeledStatement',
  local_declaration_statement: 'LocalDeclarationStatement',
  local_function_statement: 'LocalFunctionStatement',
  lock_statement: 'LockStatement',
  return_statement: 'ReturnStatement',
  switch_statement: 'SwitchStatement',
  throw_statement: 'ThrowStatement',
  try_statement: 'TryStatement',
  unsafe_statement: 'UnsafeStatement',
  using_statement: 'UsingStatement',
  while_statement: 'WhileStatement',
  yield_statement: 'YieldStatement',

  anonymous_method_expression: 'AnonymousMethodExpression',
  lambda_expression: 'LambdaExpression',
};

/**
 * `unchecked { ... }` parses as a checked_statement whose first token is the
 * `unchecked` keyword.
 *
 * Only lambdas with a parenthesized parameter list (`(x) => ...`, `() => ...`)
 * are LambdaExpression; the single-identifier form `x => ...` is Other and
 * does not add a nesting level.
 */
export function refineCSharpKind(node: Parser.SyntaxNode, kind: SyntaxKind): SyntaxKind {
  if (kind === 'CheckedStatement' && node.child(0)?.type === 'unchecked') {
    return 'UncheckedStatement';
  }
  if (kind === 'LambdaExpression' && !node.namedChildren.some(child => child.type === 'parameter_list')) {
    return 'Other';
  }
  return kind;
}

export const csharpDefinition: LanguageDefinition = {
  id: 'csharp',
  extensions: ['cs'],
  grammar: CSharp,
  nodeKinds: CSHARP_NODE_KINDS,
  // Class, struct, record and interface bodies
  memberListTypes: ['declaration_list'],
  refineKind: refineCSharpKind,
};
