import type { LoggerService } from '../../shared/types';
import { errorMessage } from '../../shared/types';
import { TransliterationFailure } from '../cleaning.errors';

/** Anything that can turn one token into the target script. */
export interface TransliterationEngine {
  transliterate(token: string): string | undefined;
}

export interface Transliterator {
  readonly available: boolean;
  transliterate(token: string): string;
}

export class UnavailableTransliterator implements Transliterator {
  readonly available = false;

  transliterate(token: string): string {
    return token;
  }
}

export class EngineTransliterator implements Transliterator {
  readonly available = true;

  constructor(
    private readonly engine: TransliterationEngine,
    private readonly logger: LoggerService,
  ) {}

  transliterate(token: string): string {
    try {
      const result = this.engine.transliterate(token);
      return result ? result : token;
    } catch (e) {
      const failure = new TransliterationFailure(token, { cause: e });
      this.logger.debug(`${failure.message}: ${errorMessage(e)}`);
      return token;
    }
  }
}

export function createTransliterator(
  engine: TransliterationEngine | undefined,
  logger: LoggerService,
): Transliterator {
  if (!engine) return new UnavailableTransliterator();
  return new EngineTransliterator(engine, logger);
}
