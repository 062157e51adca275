import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigurationError } from './errors';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read a UTF-8 file a stage depends on.
 * A missing file becomes a ConfigurationError carrying the hint.
 */
export async function readRequiredFile(filePath: string, hint: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) {
      throw new ConfigurationError(`File not found: ${filePath}. ${hint}`);
    }
    throw err;
  }
}

/**
 * Write to a temporary sibling, then rename over the target, so a reader
 * sees either the previous file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;

  try {
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}
