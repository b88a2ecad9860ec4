import type { LoggerService } from '../../shared/types';
import { PhraseSet } from '../redaction/phrase-set';
import { RedactionMasker } from '../redaction/redaction-masker';
import { RuleEngine } from '../rules/rule-engine';
import { ScriptGate, ScriptRange } from '../script/script-gate';
import {
  createTransliterator,
  TransliterationEngine,
} from '../script/transliterator';
import { SpanProtector } from '../spans/span-protector';
import { CorpusCleaningPipeline } from './corpus-cleaning.pipeline';

export interface CleaningPipelineOptions {
  logger: LoggerService;
  numerals: readonly string[];
  phrases?: PhraseSet;
  maskPhrases?: boolean;
  maskChar?: string;
  script?: ScriptRange;
  ratioThreshold?: number;
  minTokens?: number;
  enforceScript?: boolean;
  /** Leave out to run without transliteration. */
  transliterationEngine?: TransliterationEngine;
}

/**
 * Builds an immutable pipeline. Everything is resolved here, so the result
 * can be shared by any number of callers.
 */
export function createCleaningPipeline(
  options: CleaningPipelineOptions,
): CorpusCleaningPipeline {
  const { logger } = options;

  return new CorpusCleaningPipeline({
    protector: new SpanProtector(),
    basic: RuleEngine.basic(logger),
    masker: new RedactionMasker(options.phrases ?? PhraseSet.empty(), {
      enabled: options.maskPhrases,
      maskChar: options.maskChar,
    }),
    gate: new ScriptGate({
      numerals: options.numerals,
      script: options.script,
      ratioThreshold: options.ratioThreshold,
      minTokens: options.minTokens,
      enforceScript: options.enforceScript,
      transliterator: createTransliterator(options.transliterationEngine, logger),
    }),
    logger,
  });
}
