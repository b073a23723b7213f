import { extname } from 'path';
import type { LanguageDefinition } from './types.js';
import { csharpDefinition } from './csharp.js';

/**
 * All registered language definitions.
 * To add a language, create a definition file and add it here.
 */
const definitions: LanguageDefinition[] = [csharpDefinition];

/**
 * Canonical list of supported language IDs.
 * SupportedLanguage type is derived from this array.
 */
export const LANGUAGE_IDS = ['csharp'] as const;
export type SupportedLanguage = (typeof LANGUAGE_IDS)[number];

const languageRegistry = new Map<string, LanguageDefinition>();
const extensionMap = new Map<string, SupportedLanguage>();

for (const def of definitions) {
  if (languageRegistry.has(def.id)) {
    throw new Error(`Duplicate language ID in registry: ${def.id}`);
  }
  languageRegistry.set(def.id, def);

  for (const ext of def.extensions) {
    if (extensionMap.has(ext)) {
      throw new Error(
        `Duplicate extension "${ext}" registered by "${def.id}" (already claimed by "${extensionMap.get(ext)}")`,
      );
    }
    extensionMap.set(ext, def.id);
  }
}

/**
 * Get the full language definition for a supported language.
 *
 * @throws Error if language is not registered
 */
export function getLanguage(language: SupportedLanguage): LanguageDefinition {
  const def = languageRegistry.get(language);
  if (!def) {
    throw new Error(`No language definition registered for: ${language}`);
  }
  return def;
}

/**
 * Detect which supported language a file belongs to, based on extension.
 *
 * @returns SupportedLanguage or null if the file is not a source file
 */
export function detectLanguage(filePath: string): SupportedLanguage | null {
  // Case-sensitive: `Foo.CS` is not a source file
  const ext = extname(filePath).slice(1);
  return extensionMap.get(ext) ?? null;
}

export function isSourceFile(filePath: string): boolean {
  return detectLanguage(filePath) !== null;
}

/**
 * Get all file extensions supported by registered languages.
 */
export function getSupportedExtensions(): string[] {
  return definitions.flatMap(d => d.extensions);
}
