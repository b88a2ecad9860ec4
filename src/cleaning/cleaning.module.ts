import path from 'path';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LoggingModule } from '../shared/lib/logging/logging.module';
import type { LoggerService } from '../shared/types';
import { CleaningConfig, loadCleaningConfig } from './cleaning.config';
import { CleaningController } from './cleaning.controller';
import { CleaningService } from './cleaning.service';
import {
  BLOCKED_PHRASES,
  BOILERPLATE_RULES,
  CLEANER,
  CLEANING_CONFIG,
  REDACTION_MASKER,
  REFERENCE_DATA,
  STOPWORDS,
} from './cleaning.tokens';
import { createCleaningPipeline } from './pipeline/create-cleaning-pipeline';
import { PhraseSet } from './redaction/phrase-set';
import { RedactionMasker } from './redaction/redaction-masker';
import {
  loadReferenceData,
  ReferenceData,
  terminalMarks,
} from './reference/reference-data';
import { StopwordLoader } from './reference/stopword-loader';
import { RuleEngine } from './rules/rule-engine';
import { loadRuleFile } from './rules/rule-file';
import { LatinDevanagariEngine } from './script/latin-devanagari.engine';

@Module({
  imports: [LoggingModule],
  controllers: [CleaningController],
  providers: [
    {
      provide: CLEANING_CONFIG,
      inject: [ConfigService],
      useFactory: loadCleaningConfig,
    },
    {
      provide: REFERENCE_DATA,
      inject: [CLEANING_CONFIG],
      useFactory: (config: CleaningConfig) => loadReferenceData(config.dataDir),
    },
    {
      provide: BLOCKED_PHRASES,
      inject: [CLEANING_CONFIG],
      useFactory: (config: CleaningConfig) => PhraseSet.fromFile(config.phrasesFile),
    },
    {
      provide: REDACTION_MASKER,
      inject: [CLEANING_CONFIG, BLOCKED_PHRASES],
      useFactory: (config: CleaningConfig, phrases: PhraseSet) =>
        new RedactionMasker(phrases, {
          enabled: config.maskPhrases,
          maskChar: config.maskChar,
        }),
    },
    {
      provide: CLEANER,
      inject: [CLEANING_CONFIG, REFERENCE_DATA, BLOCKED_PHRASES, 'LOGGER_SERVICE'],
      useFactory: (
        config: CleaningConfig,
        data: ReferenceData,
        phrases: PhraseSet,
        logger: LoggerService,
      ) =>
        createCleaningPipeline({
          logger,
          numerals: data.numerals,
          phrases,
          maskPhrases: config.maskPhrases,
          maskChar: config.maskChar,
          ratioThreshold: config.ratioThreshold,
          minTokens: config.minTokens,
          enforceScript: config.enforceScript,
          transliterationEngine: config.transliterate
            ? new LatinDevanagariEngine()
            : undefined,
        }),
    },
    {
      provide: BOILERPLATE_RULES,
      inject: [CLEANING_CONFIG, REFERENCE_DATA, 'LOGGER_SERVICE'],
      useFactory: (
        config: CleaningConfig,
        data: ReferenceData,
        logger: LoggerService,
      ) =>
        new RuleEngine(loadRuleFile(config.rulesFile), {
          logger,
          unknownRulePolicy: config.unknownRulePolicy,
          listFileDir: path.dirname(config.rulesFile),
          terminalMarks: terminalMarks(data),
        }),
    },
    {
      provide: STOPWORDS,
      inject: [CLEANING_CONFIG, 'LOGGER_SERVICE'],
      useFactory: (config: CleaningConfig, logger: LoggerService) =>
        new StopwordLoader(config.stopwordsDir, logger),
    },
    CleaningService,
  ],
  exports: [CLEANER, CleaningService],
})
export class CleaningModule {}
