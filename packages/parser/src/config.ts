/**
 * Config module for .toprank.yml parsing.
 *
 * Owns the config format, validation, and loading.
 * Sensible defaults when no config file exists.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { CONFIG_FILENAME, DEFAULT_CONCURRENCY, DEFAULT_LIMIT } from './constants.js';
import { ConfigError, getErrorMessage } from './errors/index.js';

// ---------------------------------------------------------------------------
// Config Schema
// ---------------------------------------------------------------------------

const statementsConfigSchema = z
  .object({
    includeCompound: z.boolean().default(false),
  })
  .strict()
  .default({});

const toprankConfigSchema = z
  .object({
    limit: z.number().int().positive().default(DEFAULT_LIMIT),
    concurrency: z.number().int().positive().default(DEFAULT_CONCURRENCY),
    recursive: z.boolean().default(false),
    exclude: z.array(z.string()).default([]),
    strictParse: z.boolean().default(false),
    statements: statementsConfigSchema,
  })
  .strict();

export type ToprankConfig = z.infer<typeof toprankConfigSchema>;

/**
 * Option values given on the command line. Undefined means "not given".
 */
export interface ConfigOverrides {
  limit?: number;
  concurrency?: number;
  recursive?: boolean;
  exclude?: string[];
  strictParse?: boolean;
  includeCompound?: boolean;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `  - ${i.path.join('.') || '(root)'}: ${i.message}`).join('\n');
}

function validate(raw: unknown, source: string): ToprankConfig {
  const result = toprankConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid config in ${source}:\n${formatIssues(result.error)}`, { source });
  }
  return result.data;
}

export function defaultConfig(): ToprankConfig {
  return toprankConfigSchema.parse({});
}

// ---------------------------------------------------------------------------
// Config Loading
// ---------------------------------------------------------------------------

/**
 * Load .toprank.yml from `rootDir`, or the file at `configPath` when given.
 * Returns defaults when the default file does not exist; an explicitly named
 * file must exist.
 *
 * @throws ConfigError when the file cannot be read, is not YAML, or fails validation
 */
export function loadConfig(rootDir: string, configPath?: string): ToprankConfig {
  const resolvedPath = configPath
    ? path.resolve(configPath)
    : path.join(path.resolve(rootDir), CONFIG_FILENAME);

  if (!fs.existsSync(resolvedPath)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${resolvedPath}`, { path: resolvedPath });
    }
    return defaultConfig();
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${resolvedPath}: ${getErrorMessage(error)}`, {
      path: resolvedPath,
    });
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return defaultConfig();
  }

  return validate(parsed, resolvedPath);
}

/**
 * Apply command-line overrides on top of a loaded config and re-validate.
 *
 * @throws ConfigError when an override is out of range
 */
export function applyOverrides(config: ToprankConfig, overrides: ConfigOverrides): ToprankConfig {
  const { includeCompound, ...rest } = overrides;
  const defined = Object.fromEntries(Object.entries(rest).filter(([, value]) => value !== undefined));

  return validate(
    {
      ...config,
      ...defined,
      statements: {
        ...config.statements,
        ...(includeCompound !== undefined ? { includeCompound } : {}),
      },
    },
    'command-line options',
  );
}
