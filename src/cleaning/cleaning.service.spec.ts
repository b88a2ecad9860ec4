import path from 'path';
import { createMockLogger } from '../shared/testing/mock-logger';
import type { Cleaner, CleanerInput } from './cleaner';
import { CleaningService } from './cleaning.service';
import { PhraseSet } from './redaction/phrase-set';
import { RedactionMasker } from './redaction/redaction-masker';
import { StopwordLoader } from './reference/stopword-loader';
import { RuleEngine } from './rules/rule-engine';

const STOPWORDS_DIR = path.resolve(__dirname, '..', '..', 'data', 'stopwords');
const NUMERALS = ['०', '१', '२', '३', '४', '५', '६', '७', '८', '९'];

describe('CleaningService', () => {
  let logger: ReturnType<typeof createMockLogger>;
  let cleaner: jest.Mocked<Cleaner>;
  let service: CleaningService;

  beforeEach(() => {
    logger = createMockLogger();
    cleaner = { clean: jest.fn((input: CleanerInput) => input.rawText) };

    service = new CleaningService(
      cleaner,
      new RuleEngine([['remove_line_with_keyword', ['Follow Us']]], { logger }),
      new RedactionMasker(PhraseSet.from(['बकवास'])),
      new StopwordLoader(STOPWORDS_DIR, logger),
      { punctuations: ['।'], stops: ['!'], numerals: NUMERALS },
      logger,
    );
  });

  it('should trim lines and hand the text to the cleaner', () => {
    const result = service.clean({ text: '  पहली  \nFollow Us now\nदूसरी' });

    expect(cleaner.clean).toHaveBeenCalledWith({
      source: 'api',
      rawText: 'पहली\nFollow Us now\nदूसरी',
    });
    expect(result).toEqual({
      text: 'पहली\nFollow Us now\nदूसरी',
      linesIn: 3,
      linesOut: 3,
    });
    expect(logger.log).toHaveBeenCalledWith('Cleaned api document: 3 -> 3 lines');
  });

  it('should run the boilerplate chain when asked to scrub', () => {
    const result = service.clean({
      text: 'पहली\nFollow Us now\nदूसरी',
      source: 'feed',
      scrub: true,
    });

    expect(cleaner.clean).toHaveBeenCalledWith({ source: 'feed', rawText: 'पहली\nदूसरी' });
    expect(result.linesOut).toBe(2);
  });

  it('should keep only terminated lines when filtering punctuation', () => {
    service.clean({ text: 'यह वाक्य पूरा है।\nयह अधूरा\nवाह!', filterPunctuation: true });

    expect(cleaner.clean).toHaveBeenCalledWith({
      source: 'api',
      rawText: 'यह वाक्य पूरा है।\nवाह!',
    });
  });

  it('should extract text from markup', () => {
    service.clean({ text: '<div><p>पहली</p><p>दूसरी</p></div>', html: true });

    const [input] = cleaner.clean.mock.calls[0];
    expect(input.rawText.split('\n').filter(Boolean)).toEqual(['पहली', 'दूसरी']);
  });

  it('should decode escaped code points', () => {
    service.clean({ text: '\\u0928\\u092e\\u0938\\u094d\\u0924\\u0947', decodeEscapes: true });

    expect(cleaner.clean).toHaveBeenCalledWith({ source: 'api', rawText: 'नमस्ते' });
  });

  it('should report zero lines for an empty result', () => {
    cleaner.clean.mockReturnValue('');

    expect(service.clean({ text: 'ok' })).toEqual({ text: '', linesIn: 1, linesOut: 0 });
  });

  it('should flag text containing a blocked phrase', () => {
    expect(service.check('यह बकवास है')).toEqual({ flagged: true });
    expect(service.check('यह ठीक है')).toEqual({ flagged: false });
  });

  it('should return stopwords by dialect', () => {
    const { dialect, stopwords } = service.stopwordsFor('hindi');

    expect(dialect).toBe('hindi');
    expect(stopwords).toContain('का');
  });
});
