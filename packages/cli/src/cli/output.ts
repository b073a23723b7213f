import fs from 'fs/promises';
import path from 'path';
import { OutputError, getErrorMessage } from '@toprank/parser';

/**
 * Write one formatted ranking to `filePath`, replacing any existing file.
 * The parent directory must already exist.
 *
 * @throws OutputError when the file cannot be written
 */
export async function writeRanking(filePath: string, content: string): Promise<void> {
  const resolved = path.resolve(filePath);
  try {
    await fs.writeFile(resolved, content, 'utf-8');
  } catch (error) {
    throw new OutputError(`Failed to write ${resolved}: ${getErrorMessage(error)}`, resolved);
  }
}
