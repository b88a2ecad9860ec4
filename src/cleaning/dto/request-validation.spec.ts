import { BadRequestException, Type } from '@nestjs/common';
import { createValidationPipe } from '../../shared/lib/validation.pipe';
import { CheckPhrasesDto } from './check-phrases.dto';
import { CleanTextDto } from './clean-text.dto';

describe('request validation', () => {
  const pipe = createValidationPipe();

  const validate = (body: unknown, metatype: Type<unknown>) =>
    pipe.transform(body, { type: 'body', metatype });

  async function messagesFor(body: unknown, metatype: Type<unknown>): Promise<unknown> {
    try {
      await validate(body, metatype);
    } catch (e) {
      expect(e).toBeInstanceOf(BadRequestException);
      return e instanceof BadRequestException ? e.getResponse() : undefined;
    }
    throw new Error('body was accepted');
  }

  describe('CleanTextDto', () => {
    it('should accept a valid body', async () => {
      const body = { text: 'साफ़ पाठ', source: 'feed', scrub: true, html: false };

      await expect(validate(body, CleanTextDto)).resolves.toEqual(body);
    });

    it('should reject a body without text', async () => {
      await expect(messagesFor({ scrub: true }, CleanTextDto)).resolves.toMatchObject({
        statusCode: 400,
        message: ['text must be a string'],
      });
    });

    it('should reject a non-boolean scrub flag', async () => {
      await expect(
        messagesFor({ text: 'पाठ', scrub: 'yes' }, CleanTextDto),
      ).resolves.toMatchObject({ message: ['scrub must be a boolean value'] });
    });

    it('should reject unknown properties', async () => {
      await expect(
        messagesFor({ text: 'पाठ', extra: 1 }, CleanTextDto),
      ).resolves.toMatchObject({ message: ['property extra should not exist'] });
    });
  });

  describe('CheckPhrasesDto', () => {
    it('should accept a valid body', async () => {
      await expect(validate({ text: 'पाठ' }, CheckPhrasesDto)).resolves.toEqual({
        text: 'पाठ',
      });
    });

    it('should reject a non-string text', async () => {
      await expect(messagesFor({ text: 42 }, CheckPhrasesDto)).resolves.toMatchObject({
        message: ['text must be a string'],
      });
    });
  });
});
