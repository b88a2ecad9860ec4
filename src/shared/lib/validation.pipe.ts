import { ValidationPipe } from '@nestjs/common';

/** Request-body validation used by the HTTP app: unknown properties are a 400. */
export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true });
}
