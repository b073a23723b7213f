import fs from 'fs/promises';
import { parseAST } from './parser.js';
import { toSyntaxView } from './adapter.js';
import { detectLanguage, getLanguage } from './languages/registry.js';
import type { SyntaxView } from './syntax.js';
import { ParseError, ToprankErrorCode, getErrorMessage } from '../errors/index.js';
import { Ok, Err, type Result } from '../utils/result.js';

export interface ParseOptions {
  /** Reject files the grammar could only parse with error recovery */
  strict?: boolean;
}

/**
 * Parse one file's content into a SyntaxView.
 * Never throws: an unsupported or unparseable file comes back as Err.
 */
export function parseSource(
  content: string,
  file: string,
  options: ParseOptions = {},
): Result<SyntaxView, ParseError> {
  const language = detectLanguage(file);
  if (!language) {
    return Err(
      new ParseError(`Unsupported file type: ${file}`, file, undefined, ToprankErrorCode.UNSUPPORTED_LANGUAGE),
    );
  }

  const result = parseAST(content, language);
  if (!result.tree) {
    return Err(new ParseError(`Failed to parse ${file}: ${result.error ?? 'Unknown parse error'}`, file));
  }
  if (result.error && options.strict) {
    return Err(new ParseError(`Failed to parse ${file}: ${result.error}`, file, { strict: true }));
  }

  return Ok(toSyntaxView(result.tree, file, getLanguage(language)));
}

/**
 * Read and parse a file. Read failures are reported the same way as parse
 * failures.
 */
export async function parseFile(
  file: string,
  options: ParseOptions = {},
): Promise<Result<SyntaxView, ParseError>> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    return Err(new ParseError(`Failed to read ${file}: ${getErrorMessage(error)}`, file));
  }

  // Visual Studio saves C# with a byte order mark
  return parseSource(content.replace(/^\uFEFF/, ''), file, options);
}
