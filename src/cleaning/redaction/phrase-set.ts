import { readListFile } from '../reference/list-file';

/**
 * Lower-cases without changing length: a character whose lower-case form is
 * longer (e.g. `İ`) is kept as it is, so offsets in the folded string line up
 * with the original.
 */
export function foldCase(text: string): string {
  let folded = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const lower = ch.toLowerCase();
    folded += lower.length === ch.length ? lower : ch;
  }
  return folded;
}

export class PhraseSet {
  private readonly phrases: readonly string[];

  private constructor(phrases: Iterable<string>) {
    const unique = new Set<string>();
    for (const raw of phrases) {
      const phrase = foldCase(raw.trim());
      if (phrase.length > 1) unique.add(phrase);
    }
    this.phrases = Object.freeze([...unique]);
  }

  static from(phrases: Iterable<string>): PhraseSet {
    return new PhraseSet(phrases);
  }

  static fromFile(filePath: string): PhraseSet {
    return new PhraseSet(readListFile(filePath));
  }

  static empty(): PhraseSet {
    return new PhraseSet([]);
  }

  get size(): number {
    return this.phrases.length;
  }

  has(phrase: string): boolean {
    return this.phrases.includes(foldCase(phrase.trim()));
  }

  [Symbol.iterator](): Iterator<string> {
    return this.phrases[Symbol.iterator]();
  }
}
