import type { TransliterationEngine } from './transliterator';

// Rule-based romanized Hindi → Devanagari. Good enough for stray Latin
// tokens in scraped text, not a replacement for a trained model.

type Vowel = { latin: string; letter: string; sign: string };

// IMPORTANT: longest spellings first
const VOWELS: readonly Vowel[] = [
  { latin: 'aa', letter: 'आ', sign: 'ा' },
  { latin: 'ai', letter: 'ऐ', sign: 'ै' },
  { latin: 'au', letter: 'औ', sign: 'ौ' },
  { latin: 'ee', letter: 'ई', sign: 'ी' },
  { latin: 'oo', letter: 'ऊ', sign: 'ू' },
  { latin: 'a', letter: 'अ', sign: '' },
  { latin: 'i', letter: 'इ', sign: 'ि' },
  { latin: 'u', letter: 'उ', sign: 'ु' },
  { latin: 'e', letter: 'ए', sign: 'े' },
  { latin: 'o', letter: 'ओ', sign: 'ो' },
];

const CONSONANTS: ReadonlyArray<[string, string]> = [
  ['chh', 'छ'],
  ['kh', 'ख'],
  ['gh', 'घ'],
  ['ch', 'च'],
  ['jh', 'झ'],
  ['th', 'थ'],
  ['dh', 'ध'],
  ['ph', 'फ'],
  ['bh', 'भ'],
  ['sh', 'श'],
  ['k', 'क'],
  ['g', 'ग'],
  ['c', 'क'],
  ['j', 'ज'],
  ['t', 'त'],
  ['d', 'द'],
  ['n', 'न'],
  ['p', 'प'],
  ['b', 'ब'],
  ['m', 'म'],
  ['y', 'य'],
  ['r', 'र'],
  ['l', 'ल'],
  ['v', 'व'],
  ['w', 'व'],
  ['s', 'स'],
  ['h', 'ह'],
  ['f', 'फ़'],
  ['z', 'ज़'],
  ['q', 'क़'],
  ['x', 'क्स'],
];

const VIRAMA = '्';

export function latinToDevanagari(input: string): string {
  const s = (input || '').toLowerCase();
  let out = '';
  let afterConsonant = false;
  let i = 0;

  while (i < s.length) {
    const vowel = VOWELS.find((v) => s.startsWith(v.latin, i));
    if (vowel) {
      out += afterConsonant ? vowel.sign : vowel.letter;
      afterConsonant = false;
      i += vowel.latin.length;
      continue;
    }

    const consonant = CONSONANTS.find(([latin]) => s.startsWith(latin, i));
    if (consonant) {
      // consonant clusters join through a virama
      if (afterConsonant) out += VIRAMA;
      out += consonant[1];
      afterConsonant = true;
      i += consonant[0].length;
      continue;
    }

    out += s[i];
    afterConsonant = false;
    i++;
  }

  return out;
}

export class LatinDevanagariEngine implements TransliterationEngine {
  transliterate(token: string): string | undefined {
    if (!/[a-zA-Z]/.test(token)) return undefined;
    return latinToDevanagari(token);
  }
}
