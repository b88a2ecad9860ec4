import { ConfigurationError } from '../cleaning.errors';
import { foldCase, PhraseSet } from './phrase-set';

export interface RedactionMaskerOptions {
  enabled?: boolean;
  maskChar?: string;
}

interface Match {
  start: number;
  end: number;
}

/**
 * Replaces configured phrases with same-length runs of a mask character.
 * All matches are collected first, then resolved left to right: the earliest
 * start wins (the longer phrase on a tie) and anything overlapping an
 * accepted span is dropped.
 */
export class RedactionMasker {
  private readonly enabled: boolean;
  private readonly maskChar: string;

  constructor(
    private readonly phrases: PhraseSet,
    options: RedactionMaskerOptions = {},
  ) {
    this.enabled = options.enabled ?? true;
    this.maskChar = options.maskChar ?? '*';

    if (this.maskChar.length !== 1) {
      throw new ConfigurationError(`mask character must be a single code unit, got "${this.maskChar}"`);
    }
  }

  mask(line: string): string {
    if (!this.enabled || !line || this.phrases.size === 0) return line;

    const accepted = this.resolve(this.findMatches(foldCase(line)));
    if (!accepted.length) return line;

    let masked = '';
    let cursor = 0;
    for (const { start, end } of accepted) {
      masked += line.slice(cursor, start) + this.maskChar.repeat(end - start);
      cursor = end;
    }
    return masked + line.slice(cursor);
  }

  containsPhrase(line: string): boolean {
    if (!this.enabled || !line || this.phrases.size === 0) return false;

    const folded = foldCase(line);
    for (const phrase of this.phrases) {
      if (folded.includes(phrase)) return true;
    }
    return false;
  }

  private findMatches(folded: string): Match[] {
    const matches: Match[] = [];

    for (const phrase of this.phrases) {
      let from = folded.indexOf(phrase);
      while (from !== -1) {
        matches.push({ start: from, end: from + phrase.length });
        from = folded.indexOf(phrase, from + 1);
      }
    }

    return matches.sort((a, b) => a.start - b.start || b.end - a.end);
  }

  private resolve(candidates: readonly Match[]): Match[] {
    const accepted: Match[] = [];
    let resumeAt = 0;

    for (const match of candidates) {
      if (match.start < resumeAt) continue;
      accepted.push(match);
      resumeAt = match.end;
    }

    return accepted;
  }
}
