/**
 * Snapshot comparison used to skip the completion calls when the page is unchanged
 */
import { readFile } from 'node:fs/promises';

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * True iff a file exists at `path` and its UTF-8 text equals `content` exactly.
 * Any filesystem error other than a missing file propagates.
 */
export async function unchanged(path: string, content: string): Promise<boolean> {
  let existing: string;
  try {
    existing = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }

  return existing === content;
}
