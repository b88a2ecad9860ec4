import { ConfigurationError } from '../cleaning.errors';
import { tokenize } from '../rules/rule-operations';
import { Transliterator, UnavailableTransliterator } from './transliterator';

export interface ScriptRange {
  name: string;
  start: number;
  end: number;
}

export const DEVANAGARI: ScriptRange = {
  name: 'devanagari',
  start: 0x0900,
  end: 0x097f,
};

export interface ScriptGateOptions {
  /** Target-script glyphs for the digits 0–9, in order. */
  numerals: readonly string[];
  script?: ScriptRange;
  ratioThreshold?: number;
  minTokens?: number;
  /** Reject lines whose script ratio is under the threshold. */
  enforceScript?: boolean;
  transliterator?: Transliterator;
}

export const DEFAULT_RATIO_THRESHOLD = 0.7;
export const DEFAULT_MIN_TOKENS = 3;

const LATIN = /[a-zA-Z]/;
const ASCII_DIGIT = /[0-9]/g;

const codeUnit = (n: number): string => `\\u${n.toString(16).padStart(4, '0')}`;

/**
 * Per-line acceptance filter for the target script. A line survives when it
 * has enough tokens and enough target-script characters; survivors get their
 * digits (and, with a transliterator, their Latin tokens) converted.
 */
export class ScriptGate {
  private readonly script: ScriptRange;
  private readonly ratioThreshold: number;
  private readonly minTokens: number;
  private readonly enforceScript: boolean;
  private readonly numerals: readonly string[];
  private readonly disallowed: RegExp;
  private readonly normalizeTokens: (line: string) => string;

  constructor(options: ScriptGateOptions) {
    this.script = options.script ?? DEVANAGARI;
    this.ratioThreshold = options.ratioThreshold ?? DEFAULT_RATIO_THRESHOLD;
    this.minTokens = options.minTokens ?? DEFAULT_MIN_TOKENS;
    this.enforceScript = options.enforceScript ?? true;

    if (options.numerals.length !== 10) {
      throw new ConfigurationError(
        `numeral table needs 10 entries, got ${options.numerals.length}`,
      );
    }
    if (this.ratioThreshold < 0 || this.ratioThreshold > 1) {
      throw new ConfigurationError(
        `script ratio threshold must be within [0, 1], got ${this.ratioThreshold}`,
      );
    }
    if (this.script.start > this.script.end || this.script.end > 0xffff) {
      throw new ConfigurationError(`unsupported script range for ${this.script.name}`);
    }

    this.numerals = [...options.numerals];
    this.disallowed = new RegExp(
      `[^\\x20-\\x7E\\t\\n\\r${codeUnit(this.script.start)}-${codeUnit(this.script.end)}]`,
      'g',
    );

    const transliterator = options.transliterator ?? new UnavailableTransliterator();
    this.normalizeTokens = transliterator.available
      ? (line) =>
          tokenize(line)
            .map((token) =>
              LATIN.test(token) ? transliterator.transliterate(token) : token,
            )
            .join(' ')
      : (line) => line;
  }

  apply(text: string): string {
    if (!text) return '';

    const accepted: string[] = [];
    for (const line of text.split('\n')) {
      const cleaned = this.acceptLine(line);
      if (cleaned !== undefined) accepted.push(cleaned);
    }
    return accepted.join('\n');
  }

  /** The normalized line, or `undefined` when the gate rejects it. */
  acceptLine(raw: string): string | undefined {
    const line = this.stripDisallowed(raw);

    if (tokenize(line).length < this.minTokens) return undefined;
    if (this.enforceScript && this.scriptRatio(line) < this.ratioThreshold) {
      return undefined;
    }

    return this.normalizeTokens(this.convertNumerals(line));
  }

  stripDisallowed(line: string): string {
    return line.replace(this.disallowed, '');
  }

  /** Share of target-script characters, ASCII digits and whitespace. */
  scriptRatio(line: string): number {
    if (!line.length) return 0;

    let inScript = 0;
    for (let i = 0; i < line.length; i++) {
      if (this.isScriptChar(line[i])) inScript++;
    }
    return inScript / line.length;
  }

  convertNumerals(line: string): string {
    return line.replace(ASCII_DIGIT, (digit) => this.numerals[Number(digit)]);
  }

  private isScriptChar(ch: string): boolean {
    const code = ch.charCodeAt(0);
    return (
      (code >= this.script.start && code <= this.script.end) ||
      (code >= 0x30 && code <= 0x39) ||
      /\s/.test(ch)
    );
  }
}
