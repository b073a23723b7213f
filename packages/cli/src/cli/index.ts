import { Command } from 'commander';
import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { DEFAULT_CONCURRENCY, DEFAULT_LIMIT } from '@toprank/parser';
import { rankCommand } from './rank.js';

// Get version from package.json dynamically
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const require = createRequire(import.meta.url);

// src/cli/ and dist/cli/ both sit two levels below the package root
const packageJson: { version: string } = require(join(__dirname, '../../package.json'));

export const program = new Command();

program
  .name('toprank')
  .description('Rank C# members by statement count and nesting depth')
  .version(packageJson.version)
  .argument('<root>', 'Directory to scan for .cs files')
  .argument('[statementsOut]', 'File to write the statement-count ranking to')
  .argument('[nestingOut]', 'File to write the nesting-depth ranking to')
  .option('-l, --limit <n>', `Entries per ranking (default: ${DEFAULT_LIMIT})`)
  .option('-c, --concurrency <n>', `Files analyzed at once (default: ${DEFAULT_CONCURRENCY})`)
  .option('--format <type>', 'Output format: text, json', 'text')
  .option('--config <file>', 'Config file (defaults to <root>/.toprank.yml)')
  .option('-r, --recursive', 'Also scan subdirectories of <root>')
  .option('--include-compound', 'Count if/for/while/try... statements themselves')
  .option('--strict-parse', 'Skip files that only parse with error recovery')
  .option('-v, --verbose', 'Show debug logging on stderr')
  .action(rankCommand);
