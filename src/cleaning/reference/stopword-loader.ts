import path from 'path';
import type { LoggerService } from '../../shared/types';
import { ReferenceDataError } from '../cleaning.errors';
import { readListFile } from './list-file';

export class StopwordLoader {
  constructor(
    private readonly dir: string,
    private readonly logger: LoggerService,
  ) {}

  /**
   * Stopwords for a dialect (`hindi` → `hindi_stopwords.txt`). A missing
   * file is not fatal; the list is simply empty.
   */
  find(dialect: string): readonly string[] {
    if (!/^[\p{L}\p{N}_-]+$/u.test(dialect)) {
      this.logger.warn(`Rejected stopword dialect name "${dialect}"`);
      return [];
    }

    const filePath = path.join(this.dir, `${dialect}_stopwords.txt`);
    try {
      return Object.freeze(readListFile(filePath).map((word) => word.trim()));
    } catch (e) {
      if (!(e instanceof ReferenceDataError)) throw e;
      this.logger.warn(`Stopwords file for dialect ${dialect} not found`);
      return [];
    }
  }
}
