import type Parser from 'tree-sitter';
import type { SyntaxKind } from '../syntax.js';
import type { SupportedLanguage } from './registry.js';

/**
 * Tree-sitter grammar object, typed as whatever the installed tree-sitter
 * accepts in `setLanguage`.
 */
export type TreeSitterLanguage = Parameters<Parser['setLanguage']>[0];

/**
 * Complete definition for a language supported by the analyzer.
 *
 * Each supported language has a single definition file that maps its grammar
 * onto the language-neutral SyntaxKind vocabulary.
 */
export interface LanguageDefinition {
  /** Language identifier (e.g., 'csharp') */
  id: SupportedLanguage;

  /** File extensions without dots (e.g., ['cs']) */
  extensions: string[];

  /** Tree-sitter grammar object for parsing */
  grammar: TreeSitterLanguage;

  /** Grammar node type → kind. Types without an entry become 'Other'. */
  nodeKinds: Readonly<Record<string, SyntaxKind>>;

  /**
   * Body node types whose children are hoisted into the enclosing type
   * declaration, so that members are immediate children of their type.
   */
  memberListTypes: string[];

  /** Refine a kind when the grammar type alone is ambiguous */
  refineKind?(node: Parser.SyntaxNode, kind: SyntaxKind): SyntaxKind;
}
