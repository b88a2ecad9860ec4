import { ScriptGate } from './script-gate';
import {
  createTransliterator,
  TransliterationEngine,
  UnavailableTransliterator,
} from './transliterator';
import { LatinDevanagariEngine } from './latin-devanagari.engine';
import { ConfigurationError } from '../cleaning.errors';
import { createMockLogger } from '../../shared/testing/mock-logger';

const NUMERALS = ['०', '१', '२', '३', '४', '५', '६', '७', '८', '९'];

describe('ScriptGate', () => {
  const logger = createMockLogger();
  let gate: ScriptGate;

  beforeEach(() => {
    gate = new ScriptGate({ numerals: NUMERALS });
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should reject lines with fewer than three tokens', () => {
    expect(gate.apply('दो शब्द')).toBe('');
    expect(gate.apply('यह तीन शब्द')).toBe('यह तीन शब्द');
  });

  it('should accept a line whose script ratio is exactly 0.7', () => {
    const line = `${'क'.repeat(34)} ${'क'.repeat(34)} ${'a'.repeat(30)}`;
    expect(gate.scriptRatio(line)).toBe(0.7);
    expect(gate.apply(line)).toBe(line);
  });

  it('should reject a line whose script ratio is 0.69', () => {
    const line = `${'क'.repeat(33)} ${'क'.repeat(34)} ${'a'.repeat(31)}`;
    expect(gate.scriptRatio(line)).toBe(0.69);
    expect(gate.apply(line)).toBe('');
  });

  it('should keep mostly-English lines when script enforcement is off', () => {
    const lenient = new ScriptGate({ numerals: NUMERALS, enforceScript: false });
    expect(lenient.apply('This line is English')).toBe('This line is English');
    expect(gate.apply('This line is English')).toBe('');
  });

  it('should treat an empty line as ratio zero', () => {
    expect(gate.scriptRatio('')).toBe(0);
    expect(gate.apply('')).toBe('');
  });

  it('should convert every ASCII digit to its numeral', () => {
    expect(gate.convertNumerals('12345 को')).toBe('१२३४५ को');
    expect(gate.apply('12345 को १२३४५ में परिवर्तित किया जाना चाहिए')).toBe(
      '१२३४५ को १२३४५ में परिवर्तित किया जाना चाहिए',
    );
  });

  it('should strip characters outside the allow-list', () => {
    expect(gate.apply('नमस्ते — दुनिया “hello” 😀 है')).toBe('नमस्ते  दुनिया hello  है');
  });

  it('should keep accepted lines in order and drop the rest', () => {
    const text = 'पहली अच्छी पंक्ति है\nshort\nEnglish words only here\nदूसरी अच्छी पंक्ति है';
    expect(gate.apply(text)).toBe('पहली अच्छी पंक्ति है\nदूसरी अच्छी पंक्ति है');
  });

  it('should validate its configuration', () => {
    expect(() => new ScriptGate({ numerals: ['०'] })).toThrow(ConfigurationError);
    expect(() => new ScriptGate({ numerals: NUMERALS, ratioThreshold: 1.5 })).toThrow(
      ConfigurationError,
    );
  });

  describe('transliteration', () => {
    it('should transliterate Latin tokens when an engine is available', () => {
      const translit = new ScriptGate({
        numerals: NUMERALS,
        transliterator: createTransliterator(new LatinDevanagariEngine(), logger),
      });
      expect(translit.apply('प्रधानमंत्री kamal की  बैठक')).toBe('प्रधानमंत्री कमल की बैठक');
    });

    it('should pass lines through untouched without an engine', () => {
      const identity = new ScriptGate({
        numerals: NUMERALS,
        transliterator: new UnavailableTransliterator(),
      });
      expect(identity.apply('प्रधानमंत्री kamal की  बैठक')).toBe('प्रधानमंत्री kamal की  बैठक');
    });

    it('should keep the original token when the engine fails', () => {
      const engine: TransliterationEngine = {
        transliterate: jest.fn().mockImplementation((token: string) => {
          if (token === 'boom') throw new Error('model crashed');
          return undefined;
        }),
      };
      const failing = new ScriptGate({
        numerals: NUMERALS,
        transliterator: createTransliterator(engine, logger),
      });

      expect(failing.apply('यह boom वाक्य है')).toBe('यह boom वाक्य है');
      expect(logger.debug).toHaveBeenCalledWith(
        'transliteration failed for "boom": model crashed',
      );
    });
  });
});
