import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { createValidationPipe } from './shared/lib/validation.pipe';
import type { LoggerService } from './shared/types';
import { errorMessage } from './shared/types';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(createValidationPipe());
  app.enableCors({ methods: 'GET,HEAD,POST' });

  const port = Number(process.env.PORT) || 3000;
  await app.listen(port);

  const logger = app.get<LoggerService>('LOGGER_SERVICE');
  logger.log(`Corpus cleaner listening on port ${port}`);
}

bootstrap().catch((e: unknown) => {
  console.error(`Failed to start: ${errorMessage(e)}`);
  process.exit(1);
});
