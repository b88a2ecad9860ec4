import { ConfigModule } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { createMockLogger } from '../shared/testing/mock-logger';
import type { Cleaner } from './cleaner';
import { CleaningController } from './cleaning.controller';
import { CleaningModule } from './cleaning.module';
import { BOILERPLATE_RULES, CLEANER, REDACTION_MASKER } from './cleaning.tokens';
import { RedactionMasker } from './redaction/redaction-masker';
import { RuleEngine } from './rules/rule-engine';

describe('CleaningModule', () => {
  let module: TestingModule;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(async () => {
    logger = createMockLogger();

    module = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
        CleaningModule,
      ],
    })
      .overrideProvider('LOGGER_SERVICE')
      .useValue(logger)
      .compile();
  });

  afterEach(async () => {
    await module.close();
  });

  it('should load the bundled rule file', () => {
    const rules = module.get<RuleEngine>(BOILERPLATE_RULES);

    expect(rules.stepNames).toEqual([
      'remove_line_with_pattern',
      'remove_line_and_before',
      'remove_line_and_below',
      'remove_line_with_keyword',
      'remove_patterns',
      'handle_whitespace',
      'remove_single_word_lines',
      'remove_redundant_lines',
      'remove_blank_lines',
      'remove_lines_with_repeated_seqs',
    ]);
  });

  it('should build a masker from the bundled phrase list', () => {
    const masker = module.get<RedactionMasker>(REDACTION_MASKER);

    expect(masker.mask('you Idiot')).toBe('you *****');
  });

  it('should provide a working cleaner', () => {
    const cleaner = module.get<Cleaner>(CLEANER);

    expect(cleaner.clean({ source: 'test', rawText: 'कक्षा 10 में ghar है' })).toBe(
      'कक्षा १० में घर है',
    );
  });

  it('should serve a scrubbed, cleaned document', () => {
    const controller = module.get(CleaningController);

    const result = controller.clean({
      text: [
        'गुजरात की विशेष अदालत ने 24 आरोपियों को दोषी करार दिया।',
        'Follow Us',
        'यह पूरी बात बकवास है',
      ].join('\n'),
      source: 'feed',
      scrub: true,
    });

    expect(result).toEqual({
      text: 'गुजरात की विशेष अदालत ने २४ आरोपियों को दोषी करार दिया।\nयह पूरी बात ***** है',
      linesIn: 3,
      linesOut: 2,
    });
    expect(logger.log).toHaveBeenCalledWith('Cleaned feed document: 3 -> 2 lines');
  });

  describe('with the script check turned off', () => {
    it('should keep lines outside the target script', async () => {
      const relaxed = await Test.createTestingModule({
        imports: [
          ConfigModule.forRoot({
            isGlobal: true,
            ignoreEnvFile: true,
            load: [
              () => ({ CLEANING_ENFORCE_SCRIPT: 'false', CLEANING_TRANSLITERATE: 'false' }),
            ],
          }),
          CleaningModule,
        ],
      })
        .overrideProvider('LOGGER_SERVICE')
        .useValue(logger)
        .compile();

      const cleaner = relaxed.get<Cleaner>(CLEANER);
      expect(cleaner.clean({ source: 'test', rawText: 'This is an English sentence' })).toBe(
        'This is an English sentence',
      );

      await relaxed.close();
    });
  });
});
