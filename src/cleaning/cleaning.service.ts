import { Inject, Injectable } from '@nestjs/common';
import type { LoggerService } from '../shared/types';
import type { Cleaner } from './cleaner';
import {
  BOILERPLATE_RULES,
  CLEANER,
  REDACTION_MASKER,
  REFERENCE_DATA,
  STOPWORDS,
} from './cleaning.tokens';
import { CleanTextDto } from './dto/clean-text.dto';
import { RedactionMasker } from './redaction/redaction-masker';
import { ReferenceData, terminalMarks } from './reference/reference-data';
import { StopwordLoader } from './reference/stopword-loader';
import { RuleEngine } from './rules/rule-engine';

export interface CleanResult {
  text: string;
  linesIn: number;
  linesOut: number;
}

const countLines = (text: string): number => (text ? text.split('\n').length : 0);

@Injectable()
export class CleaningService {
  // Preprocessing stages only, for requests that skip the boilerplate chain.
  private readonly preprocessor: RuleEngine;

  constructor(
    @Inject(CLEANER) private readonly cleaner: Cleaner,
    @Inject(BOILERPLATE_RULES) private readonly boilerplate: RuleEngine,
    @Inject(REDACTION_MASKER) private readonly masker: RedactionMasker,
    @Inject(STOPWORDS) private readonly stopwords: StopwordLoader,
    @Inject(REFERENCE_DATA) referenceData: ReferenceData,
    @Inject('LOGGER_SERVICE') private readonly logger: LoggerService,
  ) {
    this.preprocessor = new RuleEngine([], {
      logger,
      terminalMarks: terminalMarks(referenceData),
    });
  }

  clean(dto: CleanTextDto): CleanResult {
    const source = dto.source ?? 'api';
    const run = {
      cleanHtml: dto.html,
      filterPunctuation: dto.filterPunctuation,
      decodeEscapes: dto.decodeEscapes,
    };

    const prepared = dto.scrub
      ? this.boilerplate.apply(dto.text, run)
      : this.preprocessor.apply(dto.text, run);
    const text = this.cleaner.clean({ source, rawText: prepared });

    const result = {
      text,
      linesIn: countLines(dto.text),
      linesOut: countLines(text),
    };
    this.logger.log(
      `Cleaned ${source} document: ${result.linesIn} -> ${result.linesOut} lines`,
    );
    return result;
  }

  check(text: string): { flagged: boolean } {
    return { flagged: this.masker.containsPhrase(text) };
  }

  stopwordsFor(dialect: string): { dialect: string; stopwords: readonly string[] } {
    return { dialect, stopwords: this.stopwords.find(dialect) };
  }
}
