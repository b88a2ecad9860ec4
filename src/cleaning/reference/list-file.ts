import fs from 'fs';
import path from 'path';
import { ReferenceDataError } from '../cleaning.errors';
import { errorMessage } from '../../shared/types';

export const LIST_FILE_EXTENSIONS: readonly string[] = ['.txt', '.lst'];

export function isListFile(value: string): boolean {
  return LIST_FILE_EXTENSIONS.includes(path.extname(value).toLowerCase());
}

/** Newline-delimited entries of a UTF-8 file, blank lines dropped. */
export function readListFile(filePath: string): string[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (e) {
    throw new ReferenceDataError(
      `cannot read list file ${filePath}: ${errorMessage(e)}`,
      filePath,
      { cause: e },
    );
  }

  return content
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter((entry) => entry.trim().length > 0);
}
