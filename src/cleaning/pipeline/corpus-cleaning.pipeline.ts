import type { LoggerService } from '../../shared/types';
import { errorMessage } from '../../shared/types';
import type { Cleaner, CleanerInput } from '../cleaner';
import { RedactionMasker } from '../redaction/redaction-masker';
import { RuleEngine } from '../rules/rule-engine';
import { ScriptGate } from '../script/script-gate';
import { classifyLine, LineKind } from '../spans/line-classifier';
import { ProtectedText, SpanProtector } from '../spans/span-protector';

export interface CorpusCleaningDeps {
  protector: SpanProtector;
  /** Whitespace / duplicate / blank-line pass run on every non-table line. */
  basic: RuleEngine;
  masker: RedactionMasker;
  gate: ScriptGate;
  logger: LoggerService;
}

const LATIN_ANNOTATION = /\([a-zA-Z]+\)/g;

/** Strips stray dollar signs and bare `(abc)` annotations, nested ones included. */
export function lightClean(line: string): string {
  let out = line.replace(/\$/g, '');
  for (let prev = ''; prev !== out; ) {
    prev = out;
    out = out.replace(LATIN_ANNOTATION, '');
  }
  return out;
}

export function collapseBlankLines(text: string): string {
  return text.replace(/\n{3,}/g, '\n\n');
}

export class CorpusCleaningPipeline implements Cleaner {
  constructor(private readonly deps: CorpusCleaningDeps) {}

  clean(input: CleanerInput): string {
    return this.cleanText(input.rawText);
  }

  cleanText(text: string | null | undefined): string {
    if (!text) return '';

    const protectedText = this.deps.protector.protect(text);
    const lines = protectedText.text.split('\n');

    const kept: string[] = [];
    for (const line of lines) {
      const cleaned = this.transformLine(line, protectedText);
      if (cleaned) kept.push(cleaned);
    }

    this.deps.logger.debug(
      `Cleaned document: kept ${kept.length}/${lines.length} lines, ${protectedText.spans.size} protected spans`,
    );

    const restored = protectedText.restore(kept.join('\n'));
    return collapseBlankLines(restored).trim();
  }

  private transformLine(line: string, protectedText: ProtectedText): string {
    try {
      const kind = classifyLine(line, (l) => protectedText.hasPlaceholder(l));

      switch (kind) {
        case LineKind.Table:
          return line;
        case LineKind.MathProtected:
          return this.deps.basic.apply(lightClean(line));
        case LineKind.Normal:
          return this.cleanNormalLine(line);
      }
    } catch (e) {
      // drop the line, keep the document
      this.deps.logger.warn(`Dropped a line that failed to clean: ${errorMessage(e)}`);
      return '';
    }
  }

  private cleanNormalLine(line: string): string {
    const masked = this.deps.masker.mask(line);
    const basic = this.deps.basic.apply(lightClean(masked));
    return this.deps.gate.apply(basic).trim();
  }
}
