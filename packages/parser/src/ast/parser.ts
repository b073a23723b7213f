import Parser from 'tree-sitter';
import { getLanguage } from './languages/registry.js';
import type { SupportedLanguage } from './languages/registry.js';

/**
 * Result of running tree-sitter over one file's content
 */
export interface ASTParseResult {
  tree: Parser.Tree | null;
  error?: string;
}

/**
 * Cache for parser instances to avoid recreating them
 */
const parserCache = new Map<SupportedLanguage, Parser>();

/** tree-sitter's own default; larger inputs need a larger buffer */
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Input buffer size for `content`. With the default, tree-sitter fails with
 * "Invalid argument" once the content outgrows the buffer.
 */
export function bufferSizeFor(content: string): number {
  return Math.max(MIN_BUFFER_SIZE, content.length * 2);
}

/**
 * Get or create a cached parser instance for a language
 */
function getParser(language: SupportedLanguage): Parser {
  const cached = parserCache.get(language);
  if (cached) return cached;

  const parser = new Parser();
  parser.setLanguage(getLanguage(language).grammar);
  parserCache.set(language, parser);
  return parser;
}

/**
 * Parse source code into an AST using Tree-sitter
 *
 * The input buffer is sized to the content so large files parse in one go.
 * Any other tree-sitter failure is returned rather than thrown so the caller
 * can drop that one file.
 *
 * @param content - Source code to parse
 * @param language - Programming language
 * @returns Parse result with tree or error
 */
export function parseAST(content: string, language: SupportedLanguage): ASTParseResult {
  try {
    const tree = getParser(language).parse(content, undefined, {
      bufferSize: bufferSizeFor(content),
    });

    // hasError is a property, not a method
    if (tree.rootNode.hasError) {
      return {
        tree,
        error: 'Parse completed with errors',
      };
    }

    return { tree };
  } catch (error) {
    return {
      tree: null,
      error: error instanceof Error ? error.message : 'Unknown parse error',
    };
  }
}

/**
 * Clear parser cache (useful for testing)
 */
export function clearParserCache(): void {
  parserCache.clear();
}
